import { serve } from '@hono/node-server'
import type { ObservabilityLogger } from '@npu-latency/observability'

type FetchHandler = (request: Request) => Response | Promise<Response>

export interface HttpServerOptions {
  fetch: FetchHandler
  host: string
  port: number
  logger: ObservabilityLogger
}

export interface RunningServer {
  host: string
  port: number
  close(): Promise<void>
}

/**
 * Listen on host:port; resolves once the socket is bound
 */
export function startHttpServer(options: HttpServerOptions): Promise<RunningServer> {
  return new Promise((resolve) => {
    const server = serve(
      { fetch: options.fetch, hostname: options.host, port: options.port },
      (info) => {
        options.logger.info('Server listening', { host: options.host, port: info.port })
        resolve({
          host: options.host,
          port: info.port,
          close: () =>
            new Promise<void>((resolveClose, rejectClose) => {
              server.close((error) => (error ? rejectClose(error) : resolveClose()))
            }),
        })
      }
    )
  })
}

const FORCED_EXIT_MS = 10_000

/**
 * Close the server on SIGINT/SIGTERM, then exit. A shutdown that hangs is
 * cut short after 10 s.
 */
export function installShutdownHandlers(
  shutdown: (signal: NodeJS.Signals) => Promise<void>,
  logger: ObservabilityLogger
): void {
  let shuttingDown = false
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']

  for (const signal of signals) {
    process.on(signal, () => {
      if (shuttingDown) {
        return
      }
      shuttingDown = true
      logger.info(`Received ${signal}, shutting down`)
      setTimeout(() => process.exit(1), FORCED_EXIT_MS).unref()
      void shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.logError('Shutdown failed', error)
          process.exit(1)
        }
      )
    })
  }
}
