/**
 * Log sanitization utilities
 *
 * Redacts secret-looking fields and replaces binary payloads (model bytes,
 * tensor buffers, archives) with a size marker before anything is logged.
 */

export const DEFAULT_REDACTION_PATTERNS = [
  /password/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /bearer/i,
  /credential/i,
  /^authorization$/i,
  /^cookie$/i,
]

export const REDACTION_MARKERS = {
  default: '[REDACTED]',
  auth: '[REDACTED:AUTH]',
}

/** Longest string value kept verbatim in a log line */
export const MAX_LOGGED_STRING_LENGTH = 2048

function shouldRedact(key: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(key))
}

function getRedactionMarker(key: string): string {
  const lowerKey = key.toLowerCase()
  if (lowerKey.includes('authorization') || lowerKey.includes('bearer')) {
    return REDACTION_MARKERS.auth
  }
  return REDACTION_MARKERS.default
}

function describeBinary(value: ArrayBuffer | ArrayBufferView): string {
  return `[binary ${value.byteLength} bytes]`
}

function sanitizeValue(value: unknown, patterns: RegExp[]): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (value instanceof ArrayBuffer || ArrayBuffer.isView(value)) {
    return describeBinary(value)
  }

  if (typeof value === 'string') {
    return value.length > MAX_LOGGED_STRING_LENGTH
      ? `${value.slice(0, MAX_LOGGED_STRING_LENGTH)}...`
      : value
  }

  if (typeof value === 'bigint') {
    return value.toString()
  }

  if (typeof value !== 'object') {
    return value
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeValue(item, patterns))
  }

  const result: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(value)) {
    result[key] = shouldRedact(key, patterns)
      ? getRedactionMarker(key)
      : sanitizeValue(entry, patterns)
  }
  return result
}

/**
 * Deep clone a log context with secrets redacted and binary data summarized
 *
 * @example
 * ```typescript
 * sanitizeLogObject({ model: Buffer.alloc(4096), api_key: 'test-secret' })
 * // { model: '[binary 4096 bytes]', api_key: '[REDACTED]' }
 * ```
 */
export function sanitizeLogObject(
  obj: Record<string, unknown>,
  additionalPatterns: RegExp[] = []
): Record<string, unknown> {
  const patterns = [...DEFAULT_REDACTION_PATTERNS, ...additionalPatterns]
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(obj)) {
    result[key] = shouldRedact(key, patterns)
      ? getRedactionMarker(key)
      : sanitizeValue(value, patterns)
  }
  return result
}

