import { AsyncLocalStorage } from 'async_hooks'
import { randomUUID } from 'crypto'

export const CORRELATION_HEADER = 'x-correlation-id'

/**
 * Generate a unique correlation ID for request tracing.
 */
export function generateCorrelationId(): string {
  return randomUUID()
}

/**
 * Extract correlation ID from headers (case-insensitive).
 * Common header names: X-Correlation-ID, X-Request-ID, X-Trace-ID
 */
export function extractCorrelationId(
  headers: Record<string, string | string[] | undefined>
): string | undefined {
  const headerNames = [CORRELATION_HEADER, 'x-request-id', 'x-trace-id']
  const normalized = new Map(
    Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value])
  )

  for (const name of headerNames) {
    const value = normalized.get(name)
    if (typeof value === 'string' && value.length > 0) {
      return value
    }
    if (Array.isArray(value) && value[0]) {
      return value[0]
    }
  }

  return undefined
}

/**
 * Correlation ID storage, so the ID of the request being served can be read
 * anywhere in its async call tree.
 */
const correlationStorage = new AsyncLocalStorage<string>()

export function getCurrentCorrelationId(): string | undefined {
  return correlationStorage.getStore()
}

export function runWithCorrelationId<T>(correlationId: string, callback: () => T): T {
  return correlationStorage.run(correlationId, callback)
}
