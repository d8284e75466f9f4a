/**
 * Entry point of the disposable compile process.
 *
 * Receives a single compile request over IPC, answers with a result or an
 * error, then disconnects so the process exits. A native crash ends the
 * process without an answer, which the parent reports as a compiler error.
 */

import { createLogger } from '@npu-latency/observability'
import { loadNativeToolchain } from '@npu-latency/shared'
import { runCompileJob } from './compile-job'
import { WorkerRequestSchema, serializeError, type WorkerResponse } from './protocol'

const logger = createLogger('compile-worker', { worker_pid: process.pid })

function reply(response: WorkerResponse): void {
  if (!process.send) {
    logger.error('Compile process started without an IPC channel')
    process.exit(1)
  }
  process.send(response, undefined, {}, () => process.disconnect())
}

async function handle(message: unknown): Promise<WorkerResponse> {
  const request = WorkerRequestSchema.parse(message)
  const toolchain = loadNativeToolchain(request.job.settings.toolchainPath)
  const result = await runCompileJob(request.job, toolchain, logger)
  return { type: 'result', result }
}

process.once('message', (message: unknown) => {
  void handle(message)
    .then(reply)
    .catch((error: unknown) => {
      logger.logError('Compilation failed', error)
      reply({ type: 'error', error: serializeError(error) })
    })
})
