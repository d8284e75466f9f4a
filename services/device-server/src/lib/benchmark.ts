import {
  DEFAULT_NUMBER,
  DEFAULT_REPEAT,
  DEFAULT_WARMUP_RUNS,
} from '@npu-latency/shared'
import type { InferenceModel } from './runner'

export interface BenchmarkOptions {
  /** Discarded runs before measuring */
  warmup: number
  repeat: number
  /** Runs per repeat */
  number: number
}

export const DEFAULT_BENCHMARK_OPTIONS: BenchmarkOptions = {
  warmup: DEFAULT_WARMUP_RUNS,
  repeat: DEFAULT_REPEAT,
  number: DEFAULT_NUMBER,
}

export interface BenchmarkResult {
  /** Mean measured run divided by the batch size */
  latencyMs: number
  durations: number[]
}

/**
 * `warmup` discarded runs, then `repeat * number` measured ones
 */
export async function benchmarkModel(
  model: InferenceModel,
  options: BenchmarkOptions = DEFAULT_BENCHMARK_OPTIONS
): Promise<BenchmarkResult> {
  for (let i = 0; i < options.warmup; i++) {
    await model.benchmarkRun()
  }

  const durations: number[] = []
  const measured = options.repeat * options.number
  for (let i = 0; i < measured; i++) {
    durations.push(await model.benchmarkRun())
  }

  const mean = durations.reduce((sum, value) => sum + value, 0) / durations.length
  return { latencyMs: mean / model.batchSize, durations }
}
