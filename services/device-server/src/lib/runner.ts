/**
 * Loads a model or compiled bundle into an inference session on the device
 * and times single runs against a fixed all-ones feed.
 */

import * as fs from 'fs'
import * as path from 'path'
import { createAmbiguousArtifactError, createBadRequestError } from '@npu-latency/errors'
import type { ObservabilityLogger } from '@npu-latency/observability'
import {
  MODEL_FILE_EXTENSION,
  NPU_EXECUTION_PROVIDER,
  aggregateStatistics,
  baselineReport,
  cpuProvider,
  createFilledTensor,
  type AcceleratorToolchain,
  type ExecutionProviderSpec,
  type InferenceSessionHandle,
  type LatencyReport,
  type TensorFeed,
  type TensorInfo,
} from '@npu-latency/shared'

export type ModelKind = 'accelerated' | 'baseline'

/** First input's leading dimension; dynamic or missing means 1 */
export function batchSizeOf(inputs: TensorInfo[]): number {
  const leading = inputs[0]?.shape[0]
  return leading !== undefined && leading > 0 ? leading : 1
}

export function onesFeed(inputs: TensorInfo[]): TensorFeed {
  const feed: TensorFeed = {}
  for (const input of inputs) {
    feed[input.name] = createFilledTensor(input, 1)
  }
  return feed
}

export class InferenceModel {
  readonly batchSize: number
  private readonly feed: TensorFeed

  constructor(
    readonly modelPath: string,
    readonly kind: ModelKind,
    private readonly session: InferenceSessionHandle
  ) {
    this.batchSize = batchSizeOf(session.inputs)
    this.feed = onesFeed(session.inputs)
  }

  /** Wall-clock milliseconds of one run */
  async benchmarkRun(): Promise<number> {
    const start = performance.now()
    await this.session.run(this.feed)
    return performance.now() - start
  }

  /**
   * Counter breakdown of the last run for accelerated models; CPU baselines
   * report only their latency.
   */
  async statistics(latencyMs: number): Promise<LatencyReport> {
    if (this.kind === 'baseline') {
      return baselineReport(latencyMs)
    }
    return aggregateStatistics(await this.session.benchmarkData(), latencyMs)
  }

  release(): Promise<void> {
    return this.session.release()
  }
}

export class DeviceInferenceRunner {
  constructor(
    private readonly toolchain: AcceleratorToolchain,
    private readonly logger: ObservabilityLogger
  ) {}

  /**
   * A directory is a compiled bundle run on the NPU with CPU fallback and must
   * hold exactly one model file; a file is run on the CPU alone.
   */
  async load(artifactPath: string): Promise<InferenceModel> {
    const resolved = path.resolve(artifactPath)
    const stat = fs.existsSync(resolved) ? fs.statSync(resolved) : undefined

    if (stat?.isDirectory()) {
      const modelPath = this.findBundleModel(resolved)
      const providers: ExecutionProviderSpec[] = [
        {
          name: NPU_EXECUTION_PROVIDER,
          options: { tidl_tools_path: '', artifacts_folder: resolved },
        },
        cpuProvider(),
      ]
      this.logger.info('Loading compiled bundle', { model_path: modelPath })
      return this.open(modelPath, 'accelerated', providers)
    }

    if (stat?.isFile()) {
      this.logger.info('Loading model for a CPU baseline', { model_path: resolved })
      return this.open(resolved, 'baseline', [cpuProvider()])
    }

    throw createBadRequestError(
      `Model path must be a model file or an artifacts directory: ${resolved}`
    )
  }

  /** The session is released again when the model cannot be built around it */
  private async open(
    modelPath: string,
    kind: ModelKind,
    providers: ExecutionProviderSpec[]
  ): Promise<InferenceModel> {
    const session = await this.toolchain.openSession(modelPath, providers)
    try {
      return new InferenceModel(modelPath, kind, session)
    } catch (error) {
      await session.release().catch((releaseError: unknown) => {
        this.logger.logError('Failed to release session', releaseError, { model_path: modelPath })
      })
      throw error
    }
  }

  private findBundleModel(directory: string): string {
    const candidates = fs
      .readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && entry.name.endsWith(MODEL_FILE_EXTENSION))
      .map((entry) => entry.name)
      .sort()

    if (candidates.length !== 1) {
      throw createAmbiguousArtifactError(directory, candidates)
    }
    return path.join(directory, candidates[0])
  }
}
