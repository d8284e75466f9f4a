#!/usr/bin/env node
/**
 * Compile a model on a remote compile server and save the artifact archive
 */

import * as fs from 'fs'
import { z } from 'zod'
import {
  DEFAULT_COMPILE_TIMEOUT_SECONDS,
  DEFAULT_SERVER_HOST,
  DEFAULT_SERVER_PORT,
  parseCliArgs,
  runCli,
} from '@npu-latency/shared'
import { RemoteLatencyClient } from '../client'

const HELP = `
Compile a model remotely

Usage:
  npm run remote-compile -- --model=<path> --output=<zip> [options]

Options:
  --model=<path>              Model file
  --calibration-data=<zip>    Zip of calibration samples (*.tensors.json)
  --output=<zip>              Where to write the compiled artifacts
  --host=<host>               Compile server host (default: ${DEFAULT_SERVER_HOST})
  --port=<port>               Compile server port (default: ${DEFAULT_SERVER_PORT})
  --timeout=<sec>             Compilation time limit (default: ${DEFAULT_COMPILE_TIMEOUT_SECONDS})
  --help, -h                  Show this help and exit
`

const OptionsSchema = z
  .object({
    model: z.string().min(1),
    calibrationData: z.string().min(1).optional(),
    output: z.string().min(1),
    host: z.string().min(1).default(DEFAULT_SERVER_HOST),
    port: z.coerce.number().int().positive().default(DEFAULT_SERVER_PORT),
    timeout: z.coerce.number().positive().default(DEFAULT_COMPILE_TIMEOUT_SECONDS),
  })
  .strict()

runCli(HELP, async (argv) => {
  const options = parseCliArgs(argv, OptionsSchema)
  const model = fs.readFileSync(options.model)
  const calibration = options.calibrationData ? fs.readFileSync(options.calibrationData) : undefined

  console.log('Start compilation, please wait... (compilation takes about 3-10 minutes)')
  const client = new RemoteLatencyClient({
    host: options.host,
    port: options.port,
    compileTimeoutMs: options.timeout * 1000,
  })
  const result = await client.compile(model, calibration)

  fs.writeFileSync(options.output, result.archive)
  console.log(`Compiled model saved to ${options.output}`)
  if (!result.accuracyGuaranteed) {
    console.warn('Warning: compiled with synthetic calibration data, accuracy is not guaranteed')
  }
})
