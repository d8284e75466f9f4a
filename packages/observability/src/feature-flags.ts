/**
 * Observability Feature Flags
 */

/**
 * Get environment variable with default value
 */
export function getEnvVar(name: string, defaultValue: string): string {
  if (typeof process !== 'undefined' && process.env) {
    return process.env[name] ?? defaultValue
  }
  return defaultValue
}

/**
 * Parse boolean from environment variable
 */
export function parseBool(value: string): boolean {
  return value === '1' || value.toLowerCase() === 'true'
}

/**
 * Force JSON log lines even in local environments
 * Default: false (0)
 */
export const OBS_ENABLED = parseBool(getEnvVar('OBS_ENABLED', '0'))

/**
 * Emit debug-level logs outside local environments
 * Default: false (0)
 */
export const OBS_DEBUG = parseBool(getEnvVar('OBS_DEBUG', '0'))

/**
 * Environment name
 * Falls back to NODE_ENV, then 'local'
 */
export const OBS_ENV = getEnvVar('ENV', getEnvVar('NODE_ENV', 'local'))

/**
 * Custom redaction fields (comma-separated)
 */
export const OBS_REDACT_FIELDS = getEnvVar('OBS_REDACT_FIELDS', '')
  .split(',')
  .map((f) => f.trim())
  .filter((f) => f.length > 0)
