/**
 * Observability Logger
 *
 * Structured logger with consistent fields for both latency services.
 * JSON lines in deployed environments, one readable line per entry locally.
 */

import { getCurrentCorrelationId } from '@npu-latency/errors'
import { OBS_DEBUG, OBS_ENABLED, OBS_ENV, OBS_REDACT_FIELDS } from './feature-flags'
import { sanitizeLogObject } from './redaction'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

interface LogContext {
  correlation_id?: string
  job_id?: string
  job_stage?: string
  worker_pid?: number
  duration_ms?: number
  [key: string]: unknown
}

interface NormalizedLogError {
  code: string
  message: string
  type: string
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  env: string
  message: string
  fields: Record<string, unknown>
}

interface LoggerConfig {
  service: string
  env?: string
  defaultContext?: LogContext
  enableRedaction?: boolean
}

function isLocal(env: string): boolean {
  return env === 'local' || env === 'development' || env === 'dev' || env === 'test'
}

function formatLogEntry(entry: LogEntry): string {
  if (isLocal(entry.env) && !OBS_ENABLED) {
    const contextStr = Object.entries(entry.fields)
      .map(([key, value]) => {
        if (typeof value === 'object') {
          return `${key}=${JSON.stringify(value)}`
        }
        return `${key}=${String(value)}`
      })
      .join(' ')

    return `[${entry.timestamp}] ${entry.level.toUpperCase()} [${entry.service}] ${entry.message} ${contextStr}`.trimEnd()
  }

  return JSON.stringify({
    timestamp: entry.timestamp,
    level: entry.level,
    service: entry.service,
    env: entry.env,
    message: entry.message,
    ...entry.fields,
  })
}

const customRedactPatterns = OBS_REDACT_FIELDS.map(
  (field) => new RegExp(`^${field.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}$`, 'i')
)

/**
 * @example
 * ```typescript
 * const logger = createLogger('compile-server')
 * const jobLogger = logger.child({ job_id: 'job-42' })
 * jobLogger.info('Compilation started', { tensor_bits: 8 })
 * ```
 */
export class ObservabilityLogger {
  private service: string
  private env: string
  private context: LogContext
  private enableRedaction: boolean

  constructor(config: LoggerConfig) {
    this.service = config.service
    this.env = config.env || OBS_ENV
    this.context = config.defaultContext || {}
    this.enableRedaction = config.enableRedaction !== false
  }

  child(context: LogContext): ObservabilityLogger {
    return new ObservabilityLogger({
      service: this.service,
      env: this.env,
      defaultContext: { ...this.context, ...context },
      enableRedaction: this.enableRedaction,
    })
  }

  debug(message: string, extra?: LogContext): void {
    if (!isLocal(this.env) && !OBS_DEBUG) {
      return
    }
    this.log('debug', message, extra)
  }

  info(message: string, extra?: LogContext): void {
    this.log('info', message, extra)
  }

  warn(message: string, extra?: LogContext): void {
    this.log('warn', message, extra)
  }

  error(message: string, extra?: LogContext): void {
    this.log('error', message, extra)
  }

  logWithTiming(level: LogLevel, message: string, durationMs: number, extra?: LogContext): void {
    this.log(level, message, { ...extra, duration_ms: Math.round(durationMs) })
  }

  /**
   * Log an error with normalized structure
   */
  logError(message: string, error: unknown, extra?: LogContext): void {
    this.log('error', message, { ...extra, error: this.normalizeError(error) })
  }

  private log(level: LogLevel, message: string, extra?: LogContext): void {
    const correlationId = getCurrentCorrelationId()
    const merged: LogContext = {
      ...(correlationId ? { correlation_id: correlationId } : {}),
      ...this.context,
      ...extra,
    }
    const safeContext = this.enableRedaction
      ? sanitizeLogObject(merged, customRedactPatterns)
      : merged

    const output = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      env: this.env,
      message,
      fields: Object.fromEntries(Object.entries(safeContext).filter(([, v]) => v !== undefined)),
    })

    if (level === 'error') {
      console.error(output)
    } else if (level === 'warn') {
      console.warn(output)
    } else {
      console.log(output)
    }
  }

  private normalizeError(error: unknown): NormalizedLogError {
    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : 'INTERNAL_ERROR'
      return {
        code,
        message: error.message,
        type: error.name,
      }
    }

    return {
      code: 'UNKNOWN_ERROR',
      message: String(error),
      type: 'Unknown',
    }
  }
}

export function createLogger(
  service: string,
  defaultContext?: LogContext,
  enableRedaction?: boolean
): ObservabilityLogger {
  return new ObservabilityLogger({
    service,
    defaultContext,
    enableRedaction,
  })
}

export type { LogContext, LogEntry, LogLevel, LoggerConfig, NormalizedLogError }
