#!/usr/bin/env node
/**
 * Compile a model on this machine without a server
 */

import { z } from 'zod'
import { createLogger } from '@npu-latency/observability'
import {
  COMPILATION_PROVIDER,
  TOOLCHAIN_PATH_ENV,
  assertProvidersAvailable,
  loadNativeToolchain,
  parseCliArgs,
  resolveToolchainPath,
  runCli,
} from '@npu-latency/shared'
import { AccuracyLevel, DebugLevel, TensorBits } from './lib/compiler-config'
import { IsolatedCompilationWorker } from './lib/isolated-worker'
import { compileModelLocally } from './lib/local-compile'

const HELP = `
Compile a model locally

Usage:
  npm run compile-model -- --model=<path> --output-dir=<path> [options]

Options:
  --model=<path>                  Model file
  --output-dir=<path>             Artifacts directory (replaced if it exists)
  --calibration-data-dir=<path>   Calibration samples (*.tensors.json); synthetic
                                  samples are used when omitted, giving no accuracy
                                  guarantee but usable latency
  --debug-level=<0-6>             Compiler debug level (default: 0)
  --tensor-bits=<bits>            8, 16 or 32 (default: 8)
  --calibration-algorithm=<name>  BASIC, ADVANCED or USER_DEFINED (default: BASIC)
  --help, -h                      Show this help and exit

Environment:
  ${TOOLCHAIN_PATH_ENV}      Compiler toolchain directory (required)
`

const OptionsSchema = z
  .object({
    model: z.string().min(1),
    outputDir: z.string().min(1),
    calibrationDataDir: z.string().min(1).optional(),
    debugLevel: z.coerce.number().pipe(z.nativeEnum(DebugLevel)).default(DebugLevel.NO_DEBUG),
    tensorBits: z.coerce.number().pipe(z.nativeEnum(TensorBits)).default(TensorBits.TENSOR_8_BITS),
    calibrationAlgorithm: z.enum(['BASIC', 'ADVANCED', 'USER_DEFINED']).default('BASIC'),
  })
  .strict()

runCli(HELP, async (argv) => {
  const options = parseCliArgs(argv, OptionsSchema)
  const logger = createLogger('compile-model')

  const toolchainPath = resolveToolchainPath(TOOLCHAIN_PATH_ENV)
  const toolchain = loadNativeToolchain(toolchainPath)
  await assertProvidersAvailable(toolchain, [COMPILATION_PROVIDER])

  const result = await compileModelLocally(
    {
      modelPath: options.model,
      outputDir: options.outputDir,
      calibrationDataDir: options.calibrationDataDir,
      toolchainPath,
      debugLevel: options.debugLevel,
      tensorBits: options.tensorBits,
      accuracyLevel: AccuracyLevel[options.calibrationAlgorithm],
    },
    toolchain,
    new IsolatedCompilationWorker(logger),
    logger
  )

  logger.logWithTiming('info', 'Model compiled', result.durationMs, {
    output_dir: options.outputDir,
    calibration_frames: result.calibrationFrames,
    files: result.outputFiles,
  })
})
