/**
 * Constants shared by the compile server, the device server and the client tools
 */

export const DEFAULT_SERVER_HOST = '0.0.0.0'
export const DEFAULT_SERVER_PORT = 15003

/** Synthetic calibration samples written when the client supplies none */
export const DEFAULT_SYNTHETIC_SAMPLE_COUNT = 2

export const DEFAULT_WARMUP_RUNS = 50
export const DEFAULT_REPEAT = 5
export const DEFAULT_NUMBER = 50

/** Client-side ceiling for a compile round trip (2 hours) */
export const DEFAULT_COMPILE_TIMEOUT_SECONDS = 7200

/** Delay between answering a measurement and the requested restart */
export const RESTART_DELAY_MS = 3_000

export const MODEL_FILE_NAME = 'model.onnx'
export const MODEL_FILE_EXTENSION = '.onnx'
export const ARTIFACTS_DIR_NAME = 'artifacts'
export const ARTIFACTS_ARCHIVE_NAME = 'artifacts.zip'
export const CALIBRATION_DIR_NAME = 'calibration_data'
export const CALIBRATION_SAMPLE_SUFFIX = '.tensors.json'

/** Response header set when the artifacts were calibrated on synthetic data */
export const ACCURACY_GUARANTEE_HEADER = 'x-accuracy-guarantee'

export const TOOLCHAIN_PATH_ENV = 'NPU_TOOLCHAIN_PATH'
export const DEVICE_TOOLCHAIN_PATH_ENV = 'NPU_DEVICE_TOOLCHAIN_PATH'

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  validation: 2,
} as const
