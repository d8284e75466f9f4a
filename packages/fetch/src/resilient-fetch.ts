import {
  AppError,
  CORRELATION_HEADER,
  ErrorCode,
  createTimeoutError,
  createExternalServiceError,
  getCurrentCorrelationId,
} from '@npu-latency/errors'
import type { Dispatcher } from 'undici'
import type { ResilientFetchOptions } from './types'
import {
  DEFAULT_RETRY_CONFIG,
  calculateRetryDelay,
  isRetryableStatus,
  isRetryableError,
  sleep,
} from './retry'

const DEFAULT_TIMEOUT = 15000

/**
 * Fetch with a per-attempt timeout and exponential backoff on transient failures.
 *
 * Timeouts surface as TIMEOUT_ERROR, anything else that exhausts the retries
 * as TRANSPORT_ERROR. Non-OK responses are returned to the caller untouched.
 * With a `dispatcher`, connection-level limits are the dispatcher's own.
 */
export async function resilientFetch(
  url: string | URL,
  options: ResilientFetchOptions = {}
): Promise<Response> {
  const { timeout = DEFAULT_TIMEOUT, retry, correlationId, dispatcher, ...fetchOptions } = options

  const requestCorrelationId = correlationId ?? getCurrentCorrelationId()

  const headers = new Headers(fetchOptions.headers)
  if (requestCorrelationId) {
    headers.set(CORRELATION_HEADER, requestCorrelationId)
  }

  const retryConfig = { ...DEFAULT_RETRY_CONFIG, ...retry }
  let lastError: Error | null = null

  for (let attempt = 1; attempt <= retryConfig.maxRetries + 1; attempt++) {
    try {
      const response = await fetchWithTimeout(url, {
        ...fetchOptions,
        headers,
        timeout,
        dispatcher,
      })

      if (
        attempt <= retryConfig.maxRetries &&
        isRetryableStatus(response.status, retryConfig.retryableStatusCodes)
      ) {
        const shouldRetry = retryConfig.shouldRetry(new Error(`HTTP ${response.status}`), attempt)

        if (shouldRetry) {
          await sleep(calculateRetryDelay(attempt, retryConfig))
          continue
        }
      }

      return response
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error))

      const isLastAttempt = attempt > retryConfig.maxRetries
      const shouldRetry =
        !isLastAttempt && isRetryableError(lastError) && retryConfig.shouldRetry(lastError, attempt)

      if (!shouldRetry) {
        break
      }

      await sleep(calculateRetryDelay(attempt, retryConfig))
    }
  }

  if (lastError instanceof AppError && lastError.code === ErrorCode.TIMEOUT_ERROR) {
    throw lastError
  }

  throw createExternalServiceError(String(url), {
    correlationId: requestCorrelationId,
    cause: lastError ?? undefined,
  })
}

async function fetchWithTimeout(
  url: string | URL,
  options: RequestInit & { timeout: number; dispatcher?: Dispatcher }
): Promise<Response> {
  const { timeout, signal: externalSignal, dispatcher, ...fetchOptions } = options

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeout)

  if (externalSignal) {
    externalSignal.addEventListener('abort', () => controller.abort())
  }

  try {
    // Node's fetch takes an undici dispatcher; the DOM typing does not declare it
    const init: RequestInit & { dispatcher?: Dispatcher } = {
      ...fetchOptions,
      signal: controller.signal,
      dispatcher,
    }
    return await fetch(url, init)
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw createTimeoutError(`Request to ${String(url)}`)
    }
    throw error
  } finally {
    clearTimeout(timeoutId)
  }
}
