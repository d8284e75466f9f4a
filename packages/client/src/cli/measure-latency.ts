#!/usr/bin/env node
/**
 * Measure a model's latency through a compile server or a device server
 */

import * as fs from 'fs'
import { z } from 'zod'
import { DEFAULT_SERVER_HOST, DEFAULT_SERVER_PORT, parseCliArgs, runCli } from '@npu-latency/shared'
import { RemoteLatencyClient } from '../client'

const HELP = `
Measure model latency remotely

Usage:
  npm run measure-latency -- --model=<path> [options]

Options:
  --model=<path>     Model file (or compiled artifact zip for a device server)
  --host=<host>      Server host (default: ${DEFAULT_SERVER_HOST})
  --port=<port>      Server port (default: ${DEFAULT_SERVER_PORT})
  --help, -h         Show this help and exit
`

const OptionsSchema = z
  .object({
    model: z.string().min(1),
    host: z.string().min(1).default(DEFAULT_SERVER_HOST),
    port: z.coerce.number().int().positive().default(DEFAULT_SERVER_PORT),
  })
  .strict()

runCli(HELP, async (argv) => {
  const options = parseCliArgs(argv, OptionsSchema)
  const model = fs.readFileSync(options.model)

  const client = new RemoteLatencyClient({ host: options.host, port: options.port })
  const report = await client.measure(model)

  console.log(JSON.stringify(report, null, 2))
})
