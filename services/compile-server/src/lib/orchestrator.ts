/**
 * Compilation pipeline: working directory reset, model persistence, shape
 * inference, calibration, isolated compilation and artifact packaging.
 */

import * as fs from 'fs'
import { randomUUID } from 'crypto'
import { AppError, ErrorCode, createCompilerError, formatError } from '@npu-latency/errors'
import { createJobSpan, type ObservabilityLogger } from '@npu-latency/observability'
import {
  DEFAULT_SYNTHETIC_SAMPLE_COUNT,
  SerialQueue,
  packDirectoryTo,
  type AcceleratorToolchain,
  type LatencyReport,
} from '@npu-latency/shared'
import type { LatencyMeasurer } from '@npu-latency/client'
import { CalibrationDataProvider, type CalibrationSource } from './calibration'
import {
  AccuracyLevel,
  createModelConfig,
  selectCalibrationConfig,
  type CalibrationConfig,
  type CompilerSettings,
  type ModelConfig,
  type PrecisionConfig,
} from './compiler-config'
import type { IsolatedCompilationWorker } from './isolated-worker'
import { resetWorkingDir, workingDirLayout, type WorkingDirLayout } from './working-dir'

export interface OrchestratorOptions {
  workingDir: string
  toolchain: AcceleratorToolchain
  worker: IsolatedCompilationWorker
  settings: CompilerSettings
  precision: PrecisionConfig
  model?: ModelConfig
  logger: ObservabilityLogger
  /** Forwards compiled archives for measurement; required by `measure` */
  device?: LatencyMeasurer
  syntheticSampleCount?: number
  /** Run shape inference on the received model (default: true) */
  inferShapes?: boolean
  copyModelToOutput?: boolean
}

export interface CompileOutcome {
  archivePath: string
  archive: Buffer
  calibrationSource: CalibrationSource
  accuracyLevel: AccuracyLevel
  calibrationIterations: number
  durationMs: number
}

export class CompilationOrchestrator {
  private readonly queue = new SerialQueue()
  private readonly layout: WorkingDirLayout
  private readonly calibrationProvider: CalibrationDataProvider
  private readonly modelConfig: ModelConfig

  constructor(private readonly options: OrchestratorOptions) {
    this.layout = workingDirLayout(options.workingDir)
    this.calibrationProvider = new CalibrationDataProvider(options.toolchain, options.logger)
    this.modelConfig = options.model ?? createModelConfig()
  }

  get busy(): boolean {
    return this.queue.busy
  }

  get workingDir(): WorkingDirLayout {
    return this.layout
  }

  /**
   * Compile a model; with calibration bytes the advanced tier is used,
   * otherwise synthetic samples and the basic tier.
   */
  compile(model: Uint8Array, calibration?: Uint8Array): Promise<CompileOutcome> {
    return this.queue.run(() => this.traced('compile', () => this.compileNow(model, calibration)))
  }

  /**
   * Compile without calibration data and measure the result on the device
   */
  measure(model: Uint8Array): Promise<LatencyReport> {
    const device = this.options.device
    if (!device) {
      return Promise.reject(
        new AppError(ErrorCode.SERVICE_UNAVAILABLE, 'No device server configured for measurements')
      )
    }
    return this.queue.run(() =>
      this.traced('measure', async () => {
        const outcome = await this.compileNow(model)
        return device.measure(outcome.archive)
      })
    )
  }

  private traced<T>(jobType: 'compile' | 'measure', fn: () => Promise<T>): Promise<T> {
    return createJobSpan({
      service: 'compile-server',
      jobId: randomUUID(),
      jobType,
    }).execute(fn)
  }

  private async compileNow(model: Uint8Array, calibration?: Uint8Array): Promise<CompileOutcome> {
    const startTime = performance.now()
    const layout = this.layout
    const logger = this.options.logger

    resetWorkingDir(layout)
    fs.writeFileSync(layout.modelPath, model)

    if (this.options.inferShapes !== false) {
      try {
        await this.options.toolchain.inferShapes(layout.modelPath)
      } catch (error) {
        throw error instanceof AppError
          ? error
          : createCompilerError(`Shape inference failed: ${formatError(error)}`, {
              cause: error instanceof Error ? error : undefined,
            })
      }
    }

    const dataset = await this.calibrationProvider.resolve({
      modelPath: layout.modelPath,
      directory: layout.calibrationDir,
      archive: calibration,
      sampleCount: this.options.syntheticSampleCount ?? DEFAULT_SYNTHETIC_SAMPLE_COUNT,
    })
    const calibrationConfig: CalibrationConfig = selectCalibrationConfig(dataset.source === 'client')

    logger.info('Start compilation', {
      calibration_source: dataset.source,
      calibration_samples: dataset.samples.length,
      accuracy_level: AccuracyLevel[calibrationConfig.accuracyLevel],
      calibration_iterations: calibrationConfig.calibrationIterations,
      tensor_bits: this.options.precision.tensorBits,
    })

    const result = await this.options.worker.run({
      modelPath: layout.modelPath,
      outputDir: layout.artifactsDir,
      calibrationDir: layout.calibrationDir,
      settings: this.options.settings,
      model: this.modelConfig,
      precision: this.options.precision,
      calibration: calibrationConfig,
      copyModelToOutput: this.options.copyModelToOutput ?? true,
      inferShapes: false,
      forceOverwrite: true,
    })

    packDirectoryTo(layout.artifactsDir, layout.archivePath)
    const durationMs = performance.now() - startTime
    logger.logWithTiming('info', 'Compilation finished', durationMs, {
      artifact_files: result.outputFiles.length,
    })

    return {
      archivePath: layout.archivePath,
      archive: fs.readFileSync(layout.archivePath),
      calibrationSource: dataset.source,
      accuracyLevel: calibrationConfig.accuracyLevel,
      calibrationIterations: calibrationConfig.calibrationIterations,
      durationMs,
    }
  }
}
