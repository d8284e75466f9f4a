import type { ObservabilityLogger } from '@npu-latency/observability'
import type { AcceleratorToolchain } from '@npu-latency/shared'
import type { WorkerChannel, WorkerChannelFactory } from '../lib/isolated-worker'
import { runCompileJob } from './compile-job'
import { WorkerRequestSchema, serializeError, type WorkerResponse } from './protocol'

/**
 * Channel that runs the compile job in the current process. Used by the
 * local compile CLI and by tests; a crash here takes the caller down with it.
 */
export function inProcessChannelFactory(
  toolchain: AcceleratorToolchain,
  logger: ObservabilityLogger
): WorkerChannelFactory {
  return (): WorkerChannel => {
    const messageListeners: Array<(message: unknown) => void> = []
    const exitListeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = []
    const errorListeners: Array<(error: Error) => void> = []

    const emit = (response: WorkerResponse): void => {
      for (const listener of messageListeners) {
        listener(response)
      }
    }

    return {
      send(request) {
        const parsed = WorkerRequestSchema.safeParse(request)
        if (!parsed.success) {
          const error = new Error(
            `Invalid compile request: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
          )
          for (const listener of errorListeners) {
            listener(error)
          }
          return
        }
        void runCompileJob(parsed.data.job, toolchain, logger)
          .then(
            (result) => emit({ type: 'result', result }),
            (error: unknown) => emit({ type: 'error', error: serializeError(error) })
          )
          .finally(() => {
            for (const listener of exitListeners) {
              listener(0, null)
            }
          })
      },
      onMessage(listener) {
        messageListeners.push(listener)
      },
      onExit(listener) {
        exitListeners.push(listener)
      },
      onError(listener) {
        errorListeners.push(listener)
      },
      dispose() {
        messageListeners.length = 0
      },
    }
  }
}
