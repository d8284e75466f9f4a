/**
 * @npu-latency/client
 * Remote compilation and latency measurement over HTTP.
 */

export { RemoteLatencyClient } from './client'
export type {
  LatencyMeasurer,
  LatencyReport,
  RemoteClientConfig,
  RemoteCompileResult,
} from './types'
