/**
 * Observability utilities for request/job boundary spans
 */

import { randomUUID } from 'crypto'
import { ObservabilityLogger, type LogContext } from './logger'

interface SpanContext extends LogContext {
  span_id: string
  span_name: string
  started_at: string
}

interface SpanOptions {
  spanName: string
  service: string
  additionalContext?: LogContext
}

/**
 * Lightweight span for request/job boundaries
 *
 * Tracks timing and context across async operations without
 * external dependencies like OpenTelemetry.
 */
export class ObservabilitySpan {
  private context: SpanContext
  private logger: ObservabilityLogger
  private startTime: number
  private ended = false

  constructor(options: SpanOptions) {
    this.startTime = performance.now()

    this.context = {
      ...options.additionalContext,
      span_id: randomUUID().slice(0, 8),
      span_name: options.spanName,
      started_at: new Date().toISOString(),
    }

    this.logger = new ObservabilityLogger({
      service: options.service,
      defaultContext: this.context,
    })

    this.logger.debug(`Span started: ${options.spanName}`)
  }

  end(status: 'ok' | 'error' = 'ok', error?: unknown): number {
    const durationMs = performance.now() - this.startTime
    if (this.ended) {
      return durationMs
    }

    this.ended = true
    const logContext: LogContext = {
      duration_ms: Math.round(durationMs),
      span_status: status,
    }

    if (status === 'error') {
      this.logger.logError(`Span failed: ${this.context.span_name}`, error, logContext)
    } else {
      this.logger.info(`Span completed: ${this.context.span_name}`, logContext)
    }
    return durationMs
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn()
      this.end('ok')
      return result
    } catch (error) {
      this.end('error', error)
      throw error
    }
  }
}

/**
 * Create a job boundary span
 */
export function createJobSpan(options: {
  service: string
  jobId: string
  jobType: 'compile' | 'measure'
  additionalContext?: LogContext
}): ObservabilitySpan {
  return new ObservabilitySpan({
    spanName: `job:${options.jobType}`,
    service: options.service,
    additionalContext: {
      job_id: options.jobId,
      job_type: options.jobType,
      ...options.additionalContext,
    },
  })
}

export type { SpanContext, SpanOptions }
