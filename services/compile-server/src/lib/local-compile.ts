import * as fs from 'fs'
import * as path from 'path'
import type { ObservabilityLogger } from '@npu-latency/observability'
import type { AcceleratorToolchain } from '@npu-latency/shared'
import { writeSyntheticCalibration } from './calibration'
import {
  AccuracyLevel,
  DebugLevel,
  TensorBits,
  calibrationConfigForTier,
  createCompilerSettings,
  createModelConfig,
  createPrecisionConfig,
} from './compiler-config'
import type { IsolatedCompilationWorker } from './isolated-worker'
import type { CompileJobResult } from '../worker/protocol'

export interface LocalCompileOptions {
  modelPath: string
  outputDir: string
  /** Directory of calibration samples; synthetic samples are used when absent */
  calibrationDataDir?: string
  toolchainPath: string
  debugLevel?: DebugLevel
  tensorBits?: TensorBits
  accuracyLevel?: AccuracyLevel
}

/**
 * Compile a model on this machine. Without a calibration directory the
 * synthetic samples live in a temporary directory beside the model, removed
 * once the compilation ends.
 */
export async function compileModelLocally(
  options: LocalCompileOptions,
  toolchain: AcceleratorToolchain,
  worker: IsolatedCompilationWorker,
  logger: ObservabilityLogger
): Promise<CompileJobResult> {
  const modelPath = path.resolve(options.modelPath)
  const settings = createCompilerSettings({
    toolchainPath: options.toolchainPath,
    debugLevel: options.debugLevel ?? DebugLevel.NO_DEBUG,
  })

  let temporaryDir: string | undefined
  let calibrationDir = options.calibrationDataDir
  if (!calibrationDir) {
    temporaryDir = fs.mkdtempSync(path.join(path.dirname(modelPath), 'calibration-'))
    const inputs = await toolchain.describeInputs(modelPath)
    writeSyntheticCalibration(inputs, temporaryDir)
    logger.warn('No calibration data directory given, using synthetic samples; accuracy is not guaranteed')
    calibrationDir = temporaryDir
  }

  try {
    return await worker.run({
      modelPath,
      outputDir: path.resolve(options.outputDir),
      calibrationDir,
      settings,
      model: createModelConfig(),
      precision: createPrecisionConfig({ tensorBits: options.tensorBits ?? TensorBits.TENSOR_8_BITS }),
      calibration: calibrationConfigForTier(options.accuracyLevel ?? AccuracyLevel.BASIC),
      copyModelToOutput: true,
      inferShapes: true,
      forceOverwrite: true,
    })
  } finally {
    if (temporaryDir) {
      fs.rmSync(temporaryDir, { recursive: true, force: true })
    }
  }
}
