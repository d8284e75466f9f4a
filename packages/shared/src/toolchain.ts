/**
 * Boundary to the accelerator toolchain: the native compiler/runtime that
 * parses models, compiles them for the NPU and runs inference sessions.
 */

import type { Tensor, TensorInfo } from './tensors'

export const COMPILATION_PROVIDER = 'TIDLCompilationProvider'
export const NPU_EXECUTION_PROVIDER = 'TIDLExecutionProvider'
export const CPU_EXECUTION_PROVIDER = 'CPUExecutionProvider'

export type ProviderOptionValue = string | number

/** Flat key/value option map handed to an execution provider */
export type ProviderOptions = Record<string, ProviderOptionValue>

export interface ExecutionProviderSpec {
  name: string
  options: ProviderOptions
}

export type TensorFeed = Record<string, Tensor>

/**
 * Raw hardware timestamps in nanoseconds, keyed by counter name. Bindings may
 * hand out 64-bit values as bigint.
 */
export type RawCounters = Record<string, number | bigint>

export interface InferenceSessionHandle {
  readonly inputs: TensorInfo[]
  run(feed: TensorFeed): Promise<void>
  /** Counters recorded during the most recent run */
  benchmarkData(): Promise<RawCounters>
  release(): Promise<void>
}

export interface AcceleratorToolchain {
  availableProviders(): Promise<string[]>
  describeInputs(modelPath: string): Promise<TensorInfo[]>
  /** Rewrites the model file in place with inferred shapes */
  inferShapes(modelPath: string): Promise<void>
  openSession(
    modelPath: string,
    providers: ExecutionProviderSpec[]
  ): Promise<InferenceSessionHandle>
}

export function cpuProvider(): ExecutionProviderSpec {
  return { name: CPU_EXECUTION_PROVIDER, options: {} }
}
