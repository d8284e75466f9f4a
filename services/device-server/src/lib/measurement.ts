/**
 * Turns received bytes into a latency report: unpack or persist them in a
 * fresh working directory, load, benchmark, release.
 */

import * as fs from 'fs'
import * as path from 'path'
import { randomUUID } from 'crypto'
import { createBadRequestError, type AppError } from '@npu-latency/errors'
import { createJobSpan, type ObservabilityLogger } from '@npu-latency/observability'
import {
  MODEL_FILE_NAME,
  SerialQueue,
  extractArchive,
  isZipArchive,
  type AcceleratorToolchain,
  type LatencyReport,
} from '@npu-latency/shared'
import { DEFAULT_BENCHMARK_OPTIONS, benchmarkModel, type BenchmarkOptions } from './benchmark'
import { DeviceInferenceRunner } from './runner'
import type { ShutdownController } from './shutdown'

export interface DeviceMeasurementOptions {
  workingDir: string
  toolchain: AcceleratorToolchain
  logger: ObservabilityLogger
  benchmark?: BenchmarkOptions
  /** Requested after every answered measurement when set */
  shutdown?: ShutdownController
}

const corruptArtifactArchive = (cause?: Error): AppError =>
  createBadRequestError(
    cause ? `Artifact archive is corrupted: ${cause.message}` : 'Artifact archive is corrupted',
    { cause }
  )

export class DeviceMeasurementService {
  private readonly queue = new SerialQueue()
  private readonly runner: DeviceInferenceRunner
  private readonly workingDir: string
  private readonly benchmark: BenchmarkOptions

  constructor(private readonly options: DeviceMeasurementOptions) {
    this.runner = new DeviceInferenceRunner(options.toolchain, options.logger)
    this.workingDir = path.resolve(options.workingDir)
    this.benchmark = options.benchmark ?? DEFAULT_BENCHMARK_OPTIONS
  }

  get busy(): boolean {
    return this.queue.busy
  }

  /**
   * Measure a zip of compiled artifacts, or raw model bytes as a CPU baseline
   */
  measure(bytes: Uint8Array): Promise<LatencyReport> {
    return this.queue.run(() =>
      createJobSpan({ service: 'device-server', jobId: randomUUID(), jobType: 'measure' }).execute(
        async () => {
          const report = await this.measureNow(bytes)
          this.options.shutdown?.request()
          return report
        }
      )
    )
  }

  private async measureNow(bytes: Uint8Array): Promise<LatencyReport> {
    const logger = this.options.logger
    fs.rmSync(this.workingDir, { recursive: true, force: true })
    fs.mkdirSync(this.workingDir, { recursive: true })

    let artifactPath: string
    if (isZipArchive(bytes)) {
      const files = extractArchive(bytes, this.workingDir, corruptArtifactArchive)
      logger.info('Artifact archive extracted', { files: files.length })
      artifactPath = this.workingDir
    } else {
      artifactPath = path.join(this.workingDir, MODEL_FILE_NAME)
      fs.writeFileSync(artifactPath, bytes)
    }

    const model = await this.runner.load(artifactPath)
    try {
      const { latencyMs } = await benchmarkModel(model, this.benchmark)
      const report = await model.statistics(latencyMs)
      logger.info('Latency measured', {
        kind: model.kind,
        batch_size: model.batchSize,
        latency_ms: latencyMs,
        runs: this.benchmark.repeat * this.benchmark.number,
      })
      return report
    } finally {
      await model.release()
    }
  }
}
