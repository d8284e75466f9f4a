#!/usr/bin/env node
/**
 * Device server: measures latency of models and compiled bundles on the board
 */

import { z } from 'zod'
import { installShutdownHandlers, startHttpServer } from '@npu-latency/http'
import { OBS_ENV, createLogger } from '@npu-latency/observability'
import {
  CPU_EXECUTION_PROVIDER,
  DEFAULT_NUMBER,
  DEFAULT_REPEAT,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  DEFAULT_WARMUP_RUNS,
  DEVICE_TOOLCHAIN_PATH_ENV,
  NPU_EXECUTION_PROVIDER,
  RESTART_DELAY_MS,
  assertProvidersAvailable,
  cliFlag,
  loadNativeToolchain,
  parseCliArgs,
  resolveToolchainPath,
  runCli,
} from '@npu-latency/shared'
import { DeviceMeasurementService } from './lib/measurement'
import { rebootBoard } from './lib/reboot'
import { ShutdownController } from './lib/shutdown'
import { SERVICE_NAME, createDeviceServerApp } from './server'

const HELP = `
Device latency server

Usage:
  npm run device-server -- [options]

Options:
  --host=<host>             Listen address (default: ${DEFAULT_SERVER_HOST})
  --port=<port>             Listen port (default: ${DEFAULT_SERVER_PORT})
  --warmup=<n>              Discarded runs before measuring (default: ${DEFAULT_WARMUP_RUNS})
  --repeat=<n>              Measured repeats (default: ${DEFAULT_REPEAT})
  --number=<n>              Runs per repeat (default: ${DEFAULT_NUMBER})
  --working-dir=<path>      Scratch directory, wiped before every measurement (default: ./working_dir)
  --reboot-after-measure    Stop and reboot the board ${RESTART_DELAY_MS / 1000} s after each measurement
  --help, -h                Show this help and exit

Environment:
  ${DEVICE_TOOLCHAIN_PATH_ENV}   Runtime toolchain directory (required)
`

const OptionsSchema = z
  .object({
    host: z.string().min(1).default(DEFAULT_SERVER_HOST),
    port: z.coerce.number().int().nonnegative().default(DEFAULT_SERVER_PORT),
    warmup: z.coerce.number().int().nonnegative().default(DEFAULT_WARMUP_RUNS),
    repeat: z.coerce.number().int().positive().default(DEFAULT_REPEAT),
    number: z.coerce.number().int().positive().default(DEFAULT_NUMBER),
    workingDir: z.string().min(1).default('./working_dir'),
    rebootAfterMeasure: cliFlag(),
  })
  .strict()

runCli(
  HELP,
  async (argv) => {
    const options = parseCliArgs(argv, OptionsSchema)
    const logger = createLogger(SERVICE_NAME)

    const toolchain = loadNativeToolchain(resolveToolchainPath(DEVICE_TOOLCHAIN_PATH_ENV))
    await assertProvidersAvailable(toolchain, [NPU_EXECUTION_PROVIDER, CPU_EXECUTION_PROVIDER])

    const shutdown = options.rebootAfterMeasure ? new ShutdownController() : undefined
    const measurements = new DeviceMeasurementService({
      workingDir: options.workingDir,
      toolchain,
      logger,
      benchmark: { warmup: options.warmup, repeat: options.repeat, number: options.number },
      shutdown,
    })

    const app = createDeviceServerApp({
      measurements,
      logger,
      includeErrorStack: OBS_ENV !== 'production',
    })
    const server = await startHttpServer({
      fetch: app.fetch,
      host: options.host,
      port: options.port,
      logger,
    })

    shutdown?.onShutdown(() => {
      logger.info('Measurement answered, stopping for reboot')
      void server
        .close()
        .then(() => rebootBoard())
        .then(
          () => process.exit(0),
          (error: unknown) => {
            logger.logError('Reboot failed', error)
            process.exit(1)
          }
        )
    })
    installShutdownHandlers(() => server.close(), logger)
  },
  { keepAlive: true }
)
