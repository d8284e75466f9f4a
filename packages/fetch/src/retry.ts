import { AppError, ErrorCode } from '@npu-latency/errors'
import type { RetryConfig } from './types'

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  initialDelay: 500,
  maxDelay: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429, 502, 503, 504],
  shouldRetry: () => true,
}

/**
 * Single-shot config for requests that must not be replayed.
 * A measurement or a compilation occupies the remote side exclusively,
 * so a second attempt would queue behind the first.
 */
export const NO_RETRY_CONFIG: Required<RetryConfig> = {
  ...DEFAULT_RETRY_CONFIG,
  maxRetries: 0,
}

/**
 * Exponential backoff with ±25% jitter
 */
export function calculateRetryDelay(attempt: number, config: Required<RetryConfig>): number {
  const exponentialDelay = config.initialDelay * Math.pow(config.backoffMultiplier, attempt - 1)
  const delayWithCap = Math.min(exponentialDelay, config.maxDelay)

  const jitter = delayWithCap * 0.25 * (Math.random() * 2 - 1)
  return Math.floor(delayWithCap + jitter)
}

export function isRetryableStatus(status: number, retryableStatusCodes: number[]): boolean {
  return retryableStatusCodes.includes(status)
}

export function isRetryableError(error: Error): boolean {
  if (error instanceof AppError) {
    return error.code === ErrorCode.TIMEOUT_ERROR
  }

  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return true
  }

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true
  }

  return (
    error.message.includes('ECONNRESET') ||
    error.message.includes('ECONNREFUSED') ||
    error.message.includes('ETIMEDOUT') ||
    error.message.includes('ENOTFOUND')
  )
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
