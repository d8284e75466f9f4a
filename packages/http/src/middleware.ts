/**
 * Request middleware: correlation ids, request logging and error envelopes.
 *
 * Every failure leaves the service as an ErrorEnvelope with the HTTP status
 * of its error code.
 */

import type { Context, ErrorHandler, MiddlewareHandler, NotFoundHandler } from 'hono'
import { HTTPException } from 'hono/http-exception'
import {
  CORRELATION_HEADER,
  createBadRequestError,
  createNotFoundError,
  extractCorrelationId,
  generateCorrelationId,
  runWithCorrelationId,
  toAppError,
  type ErrorEnvelope,
} from '@npu-latency/errors'
import type { ObservabilityLogger } from '@npu-latency/observability'

export type ServiceEnv = {
  Variables: {
    correlationId: string
  }
}

export function correlation(): MiddlewareHandler<ServiceEnv> {
  return async (c, next) => {
    const correlationId = extractCorrelationId(c.req.header()) ?? generateCorrelationId()
    c.set('correlationId', correlationId)
    await runWithCorrelationId(correlationId, () => next())
    c.header(CORRELATION_HEADER, correlationId)
  }
}

/**
 * One log line per request, with status and duration
 */
export function requestLogger(logger: ObservabilityLogger): MiddlewareHandler<ServiceEnv> {
  return async (c, next) => {
    const start = performance.now()
    await next()
    logger.logWithTiming('info', 'Request completed', performance.now() - start, {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      correlation_id: c.get('correlationId'),
    })
  }
}

export function envelopeResponse(envelope: ErrorEnvelope, status: number): Response {
  return new Response(JSON.stringify(envelope), {
    status,
    headers: { 'content-type': 'application/json; charset=UTF-8' },
  })
}

export interface ErrorHandlerOptions {
  /** Attach stack traces to envelopes (never in production) */
  includeStack?: boolean
}

export function errorHandler(
  logger: ObservabilityLogger,
  options: ErrorHandlerOptions = {}
): ErrorHandler<ServiceEnv> {
  return (err: Error, c: Context<ServiceEnv>) => {
    const correlationId = c.get('correlationId')
    const error =
      err instanceof HTTPException && err.status < 500
        ? createBadRequestError(err.message, { correlationId })
        : toAppError(err, correlationId)
    const context = { method: c.req.method, path: c.req.path, correlation_id: error.correlationId }

    if (error.httpStatus >= 500) {
      logger.logError('Request failed', error, context)
    } else {
      logger.warn('Request rejected', { ...context, code: error.code, reason: error.message })
    }
    return envelopeResponse(error.toEnvelope(options.includeStack ?? false), error.httpStatus)
  }
}

export function notFoundHandler(): NotFoundHandler<ServiceEnv> {
  return (c) => {
    const error = createNotFoundError(`Route ${c.req.method} ${c.req.path}`, {
      correlationId: c.get('correlationId'),
    })
    return envelopeResponse(error.toEnvelope(), error.httpStatus)
  }
}
