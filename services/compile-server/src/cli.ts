#!/usr/bin/env node
/**
 * Compile server: receives models over HTTP, compiles them in a disposable
 * process and forwards measurements to a device server.
 */

import { z } from 'zod'
import { RemoteLatencyClient } from '@npu-latency/client'
import { installShutdownHandlers, startHttpServer } from '@npu-latency/http'
import { OBS_ENV, createLogger } from '@npu-latency/observability'
import {
  COMPILATION_PROVIDER,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  TOOLCHAIN_PATH_ENV,
  assertProvidersAvailable,
  loadNativeToolchain,
  parseCliArgs,
  resolveToolchainPath,
  runCli,
} from '@npu-latency/shared'
import { TensorBits, createCompilerSettings, createPrecisionConfig } from './lib/compiler-config'
import { IsolatedCompilationWorker } from './lib/isolated-worker'
import { CompilationOrchestrator } from './lib/orchestrator'
import { SERVICE_NAME, createCompileServerApp } from './server'

const HELP = `
Compile server

Usage:
  npm run compile-server -- --device-host=<host> --device-port=<port> [options]

Options:
  --device-host=<host>    Device server host (required)
  --device-port=<port>    Device server port (required)
  --host=<host>           Listen address (default: ${DEFAULT_SERVER_HOST})
  --port=<port>           Listen port (default: ${DEFAULT_SERVER_PORT})
  --working-dir=<path>    Scratch directory, wiped before every job (default: ./working_dir)
  --tensor-bits=<bits>    8, 16 or 32 (default: 8)
  --help, -h              Show this help and exit

Environment:
  ${TOOLCHAIN_PATH_ENV}      Compiler toolchain directory (required)
`

const OptionsSchema = z
  .object({
    deviceHost: z.string().min(1),
    devicePort: z.coerce.number().int().positive(),
    host: z.string().min(1).default(DEFAULT_SERVER_HOST),
    port: z.coerce.number().int().nonnegative().default(DEFAULT_SERVER_PORT),
    workingDir: z.string().min(1).default('./working_dir'),
    tensorBits: z.coerce.number().pipe(z.nativeEnum(TensorBits)).default(TensorBits.TENSOR_8_BITS),
  })
  .strict()

runCli(
  HELP,
  async (argv) => {
    const options = parseCliArgs(argv, OptionsSchema)
    const logger = createLogger(SERVICE_NAME)

    const toolchainPath = resolveToolchainPath(TOOLCHAIN_PATH_ENV)
    const toolchain = loadNativeToolchain(toolchainPath)
    await assertProvidersAvailable(toolchain, [COMPILATION_PROVIDER])

    const orchestrator = new CompilationOrchestrator({
      workingDir: options.workingDir,
      toolchain,
      worker: new IsolatedCompilationWorker(logger.child({ component: 'worker' })),
      settings: createCompilerSettings({ toolchainPath }),
      precision: createPrecisionConfig({ tensorBits: options.tensorBits }),
      device: new RemoteLatencyClient({ host: options.deviceHost, port: options.devicePort }),
      logger,
    })

    const app = createCompileServerApp({
      orchestrator,
      logger,
      includeErrorStack: OBS_ENV !== 'production',
    })
    const server = await startHttpServer({
      fetch: app.fetch,
      host: options.host,
      port: options.port,
      logger,
    })
    logger.info('Compile server ready', {
      device: `${options.deviceHost}:${options.devicePort}`,
      working_dir: orchestrator.workingDir.root,
      tensor_bits: options.tensorBits,
    })

    installShutdownHandlers(() => server.close(), logger)
  },
  { keepAlive: true }
)
