import type { Dispatcher } from 'undici'

/**
 * Retry strategy configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number
  /** Initial delay in ms before first retry (default: 500) */
  initialDelay?: number
  /** Maximum delay in ms between retries (default: 10000) */
  maxDelay?: number
  backoffMultiplier?: number
  /** HTTP status codes that trigger a retry (default: [408, 429, 502, 503, 504]) */
  retryableStatusCodes?: number[]
  shouldRetry?: (error: Error, attempt: number) => boolean
}

export interface ResilientFetchOptions extends RequestInit {
  /** Per-attempt timeout in ms (default: 15000) */
  timeout?: number
  retry?: RetryConfig
  correlationId?: string
  /** undici dispatcher; its header and body timeouts apply on top of `timeout` */
  dispatcher?: Dispatcher
}
