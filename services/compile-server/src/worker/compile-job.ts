import * as fs from 'fs'
import * as path from 'path'
import { createCompilerError, createNoCalibrationDataError } from '@npu-latency/errors'
import type { ObservabilityLogger } from '@npu-latency/observability'
import {
  COMPILATION_PROVIDER,
  cpuProvider,
  type AcceleratorToolchain,
} from '@npu-latency/shared'
import { listCalibrationSamples, readCalibrationSample } from '../lib/calibration'
import { buildCompilerOptions } from '../lib/compiler-config'
import type { CompileJob, CompileJobResult } from './protocol'

function prepareOutputDir(outputDir: string, forceOverwrite: boolean): void {
  if (fs.existsSync(outputDir)) {
    if (!fs.statSync(outputDir).isDirectory()) {
      throw createCompilerError(`Output path '${outputDir}' must be a directory`)
    }
    if (!forceOverwrite) {
      throw createCompilerError(`Output directory '${outputDir}' already exists`)
    }
    fs.rmSync(outputDir, { recursive: true, force: true })
  }
  fs.mkdirSync(outputDir, { recursive: true })
}

/**
 * Compile one model: open a session on the compilation provider and feed it
 * every calibration sample, letting the provider write its artifacts into
 * the output directory. Runs inside the disposable compile process.
 */
export async function runCompileJob(
  job: CompileJob,
  toolchain: AcceleratorToolchain,
  logger: ObservabilityLogger
): Promise<CompileJobResult> {
  const startTime = performance.now()
  const modelPath = path.resolve(job.modelPath)
  const outputDir = path.resolve(job.outputDir)

  prepareOutputDir(outputDir, job.forceOverwrite)

  const samples = listCalibrationSamples(job.calibrationDir)
  if (samples.length === 0) {
    throw createNoCalibrationDataError(job.calibrationDir)
  }

  const options = buildCompilerOptions({
    settings: job.settings,
    artifactsFolder: outputDir,
    model: job.model,
    precision: job.precision,
    calibration: job.calibration,
    calibrationFrames: samples.length,
  })

  if (job.inferShapes) {
    logger.info('Running shape inference', { model_path: modelPath })
    await toolchain.inferShapes(modelPath)
  }

  logger.info('Final compiler options', { compiler_options: options })
  const session = await toolchain.openSession(modelPath, [
    { name: COMPILATION_PROVIDER, options },
    cpuProvider(),
  ])

  try {
    logger.info('Running calibration', { samples: samples.length })
    for (const sample of samples) {
      await session.run(readCalibrationSample(path.join(job.calibrationDir, sample)))
    }
    logger.info('Calibration finished')
  } finally {
    await session.release()
  }

  if (job.copyModelToOutput) {
    fs.copyFileSync(modelPath, path.join(outputDir, path.basename(modelPath)))
  }

  return {
    calibrationFrames: samples.length,
    durationMs: performance.now() - startTime,
    outputFiles: fs.readdirSync(outputDir).sort(),
  }
}
