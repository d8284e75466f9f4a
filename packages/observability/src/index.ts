/**
 * @npu-latency/observability
 *
 * Structured logging, log sanitization and job spans shared by the
 * compile server, the device server and the client tools.
 *
 * @example
 * ```typescript
 * import { createLogger, createJobSpan } from '@npu-latency/observability'
 *
 * const logger = createLogger('device-server')
 * const span = createJobSpan({ service: 'device-server', jobId, jobType: 'measure' })
 * const report = await span.execute(() => measure(model))
 * ```
 */

export { ObservabilityLogger, createLogger } from './logger'
export type { LogContext, LogEntry, LogLevel, LoggerConfig, NormalizedLogError } from './logger'

export {
  sanitizeLogObject,
  DEFAULT_REDACTION_PATTERNS,
  REDACTION_MARKERS,
  MAX_LOGGED_STRING_LENGTH,
} from './redaction'

export { ObservabilitySpan, createJobSpan } from './span'
export type { SpanContext, SpanOptions } from './span'

export {
  OBS_ENABLED,
  OBS_DEBUG,
  OBS_ENV,
  OBS_REDACT_FIELDS,
  getEnvVar,
  parseBool,
} from './feature-flags'
