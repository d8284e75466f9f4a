/**
 * Device server: inference runner, benchmarking and the HTTP surface
 */

export { DeviceInferenceRunner, InferenceModel, batchSizeOf, onesFeed } from './lib/runner'
export type { ModelKind } from './lib/runner'
export { benchmarkModel, DEFAULT_BENCHMARK_OPTIONS } from './lib/benchmark'
export type { BenchmarkOptions, BenchmarkResult } from './lib/benchmark'
export { DeviceMeasurementService } from './lib/measurement'
export type { DeviceMeasurementOptions } from './lib/measurement'
export { ShutdownController } from './lib/shutdown'
export type { ShutdownListener } from './lib/shutdown'
export { rebootBoard, REBOOT_COMMAND } from './lib/reboot'
export { createDeviceServerApp, SERVICE_NAME } from './server'
export type { DeviceServerDeps } from './server'
