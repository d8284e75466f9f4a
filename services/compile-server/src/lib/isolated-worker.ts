/**
 * Runs each compilation in its own disposable process, one at a time.
 *
 * The native compiler can crash or leak; a fresh process per job keeps the
 * server alive and clean. Jobs are queued and never overlap.
 */

import { fork } from 'child_process'
import * as path from 'path'
import { AppError, createCompilerError, formatError } from '@npu-latency/errors'
import type { ObservabilityLogger } from '@npu-latency/observability'
import { SerialQueue } from '@npu-latency/shared'
import {
  WorkerResponseSchema,
  deserializeError,
  type CompileJob,
  type CompileJobResult,
  type WorkerRequest,
} from '../worker/protocol'

/** One conversation with one compile process */
export interface WorkerChannel {
  readonly pid?: number
  send(request: WorkerRequest): void
  onMessage(listener: (message: unknown) => void): void
  /** Called once the process is gone and its IPC messages are delivered */
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void
  /** Spawn failures and requests that could not be delivered */
  onError(listener: (error: Error) => void): void
  dispose(): void
}

export type WorkerChannelFactory = () => WorkerChannel

export const WORKER_ENTRY = path.join(__dirname, '..', 'worker', `entry${path.extname(__filename)}`)

export interface ForkChannelOptions {
  modulePath?: string
  /** Node binary running the child (default: the current one) */
  execPath?: string
  /** Defaults to the parent's, so a TypeScript loader active here is active there too */
  execArgv?: string[]
}

/**
 * Fork the compile entry point. Errors the child process emits are handed to
 * `onError` listeners and never thrown at the parent.
 */
export function forkWorkerChannel(options: ForkChannelOptions = {}): WorkerChannel {
  const child = fork(options.modulePath ?? WORKER_ENTRY, [], {
    stdio: 'inherit',
    execPath: options.execPath,
    execArgv: options.execArgv,
  })
  const errorListeners: Array<(error: Error) => void> = []
  const fail = (error: Error): void => {
    for (const listener of errorListeners) {
      listener(error)
    }
  }
  child.on('error', fail)

  return {
    pid: child.pid,
    send: (request) => {
      child.send(request, (error) => {
        if (error) {
          fail(error)
        }
      })
    },
    onMessage: (listener) => {
      child.on('message', listener)
    },
    onExit: (listener) => {
      child.once('close', listener)
    },
    onError: (listener) => {
      errorListeners.push(listener)
    },
    dispose: () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL')
      }
    },
  }
}

export class IsolatedCompilationWorker {
  private readonly queue = new SerialQueue()

  constructor(
    private readonly logger: ObservabilityLogger,
    private readonly createChannel: WorkerChannelFactory = () => forkWorkerChannel()
  ) {}

  get busy(): boolean {
    return this.queue.busy
  }

  get pending(): number {
    return this.queue.size
  }

  /**
   * Queue a compilation. Rejects with the child's error, or with
   * COMPILER_ERROR when the child dies without answering.
   */
  run(job: CompileJob): Promise<CompileJobResult> {
    return this.queue.run(() => this.runInChannel(job))
  }

  private runInChannel(job: CompileJob): Promise<CompileJobResult> {
    return new Promise<CompileJobResult>((resolve, reject) => {
      const channel = this.createChannel()
      const workerLogger = this.logger.child({ worker_pid: channel.pid })
      let settled = false

      const settle = (outcome: { result: CompileJobResult } | { error: Error }): void => {
        if (settled) {
          return
        }
        settled = true
        channel.dispose()
        if ('result' in outcome) {
          resolve(outcome.result)
        } else {
          reject(outcome.error)
        }
      }

      channel.onMessage((message) => {
        const parsed = WorkerResponseSchema.safeParse(message)
        if (!parsed.success) {
          workerLogger.warn('Ignoring malformed message from compile process')
          return
        }
        if (parsed.data.type === 'result') {
          settle({ result: parsed.data.result })
        } else {
          settle({ error: toJobError(deserializeError(parsed.data.error)) })
        }
      })

      channel.onExit((code, signal) => {
        if (settled) {
          return
        }
        const reason = signal ? `signal ${signal}` : `exit code ${code ?? 'unknown'}`
        workerLogger.error('Compile process exited without a result', { exit_code: code, signal })
        settle({
          error: createCompilerError(`Compilation process terminated unexpectedly (${reason})`, {
            details: { exitCode: code, signal },
          }),
        })
      })

      channel.onError((error) => {
        if (settled) {
          return
        }
        workerLogger.logError('Compile process failed', error)
        settle({
          error: createCompilerError(`Compilation process failed: ${error.message}`, { cause: error }),
        })
      })

      workerLogger.debug('Compile process started')
      try {
        channel.send({ type: 'compile', job })
      } catch (error) {
        settle({
          error: createCompilerError(`Compilation process failed: ${formatError(error)}`, {
            cause: error instanceof Error ? error : undefined,
          }),
        })
      }
    })
  }
}

/** Input errors keep their code; anything else is a compiler failure */
function toJobError(error: Error): Error {
  if (error instanceof AppError && error.category === 'input') {
    return error
  }
  return createCompilerError(error.message, {
    cause: error,
    details: error instanceof AppError ? { workerCode: error.code, ...error.details } : undefined,
  })
}
