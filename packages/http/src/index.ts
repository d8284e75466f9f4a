/**
 * @npu-latency/http
 * Hono middleware, error envelopes and node server lifecycle.
 */

export {
  correlation,
  requestLogger,
  errorHandler,
  notFoundHandler,
  envelopeResponse,
} from './middleware'
export type { ServiceEnv, ErrorHandlerOptions } from './middleware'

export { startHttpServer, installShutdownHandlers } from './server'
export type { HttpServerOptions, RunningServer } from './server'
