import type { Dispatcher } from 'undici'
import type { LatencyReport } from '@npu-latency/shared'

export interface RemoteClientConfig {
  host: string
  port: number
  /** Per-request timeout for measurements in ms (default: 2 hours, a measurement may include a compilation) */
  measureTimeoutMs?: number
  /** Per-request timeout for compilations in ms (default: 2 hours) */
  compileTimeoutMs?: number
  correlationId?: string
  /** Connection pool for both calls (default: no header or body timeout) */
  dispatcher?: Dispatcher
}

export interface RemoteCompileResult {
  archive: Buffer
  /** False when the server calibrated on synthetic data */
  accuracyGuaranteed: boolean
}

/** Anything that can turn model or artifact bytes into a latency report */
export interface LatencyMeasurer {
  measure(model: Uint8Array): Promise<LatencyReport>
}

export type { LatencyReport }
