/**
 * Standard error codes for the latency services.
 * Using string literals for better API debugging.
 */
export enum ErrorCode {
  // Startup (fatal)
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  // Per-request input errors (4xx, never retried)
  BAD_REQUEST = 'BAD_REQUEST',
  INVALID_CALIBRATION_DATA = 'INVALID_CALIBRATION_DATA',
  NO_CALIBRATION_DATA = 'NO_CALIBRATION_DATA',
  AMBIGUOUS_ARTIFACT = 'AMBIGUOUS_ARTIFACT',
  UNSUPPORTED_TENSOR_TYPE = 'UNSUPPORTED_TENSOR_TYPE',
  NOT_FOUND = 'NOT_FOUND',

  // Server errors (5xx)
  COMPILER_ERROR = 'COMPILER_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
}

/**
 * Coarse failure domain of an error code
 */
export type ErrorCategory = 'configuration' | 'input' | 'compiler' | 'transport' | 'internal'

export const ERROR_CODE_CATEGORY: Record<ErrorCode, ErrorCategory> = {
  [ErrorCode.CONFIGURATION_ERROR]: 'configuration',
  [ErrorCode.BAD_REQUEST]: 'input',
  [ErrorCode.INVALID_CALIBRATION_DATA]: 'input',
  [ErrorCode.NO_CALIBRATION_DATA]: 'input',
  [ErrorCode.AMBIGUOUS_ARTIFACT]: 'input',
  [ErrorCode.UNSUPPORTED_TENSOR_TYPE]: 'input',
  [ErrorCode.NOT_FOUND]: 'input',
  [ErrorCode.COMPILER_ERROR]: 'compiler',
  [ErrorCode.INTERNAL_ERROR]: 'internal',
  [ErrorCode.SERVICE_UNAVAILABLE]: 'internal',
  [ErrorCode.TRANSPORT_ERROR]: 'transport',
  [ErrorCode.TIMEOUT_ERROR]: 'transport',
}

/**
 * HTTP status codes mapped to error codes
 */
export const ERROR_CODE_TO_HTTP_STATUS: Record<ErrorCode, number> = {
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.INVALID_CALIBRATION_DATA]: 422,
  [ErrorCode.NO_CALIBRATION_DATA]: 422,
  [ErrorCode.AMBIGUOUS_ARTIFACT]: 422,
  [ErrorCode.UNSUPPORTED_TENSOR_TYPE]: 422,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.COMPILER_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.TRANSPORT_ERROR]: 502,
  [ErrorCode.TIMEOUT_ERROR]: 504,
}

/**
 * Standardized error envelope for all API responses.
 */
export interface ErrorEnvelope {
  /** Machine-readable error code */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Unique request identifier for tracing */
  correlationId?: string
  details?: Record<string, unknown>
  /** Stack trace (only in development) */
  stack?: string
  timestamp: string
}

/**
 * Application error class with correlation ID support
 */
export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly correlationId?: string
  public readonly details?: Record<string, unknown>
  public readonly isOperational: boolean

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      correlationId?: string
      details?: Record<string, unknown>
      cause?: Error
      isOperational?: boolean
    }
  ) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.correlationId = options?.correlationId
    this.details = options?.details
    this.isOperational = options?.isOperational ?? true

    if (options?.cause) {
      this.cause = options.cause
    }

    Error.captureStackTrace(this, this.constructor)
  }

  /**
   * Convert error to standard envelope format
   */
  toEnvelope(includeStack = false): ErrorEnvelope {
    return {
      code: this.code,
      message: this.message,
      correlationId: this.correlationId,
      details: this.details,
      stack: includeStack ? this.stack : undefined,
      timestamp: new Date().toISOString(),
    }
  }

  get httpStatus(): number {
    return ERROR_CODE_TO_HTTP_STATUS[this.code]
  }

  get category(): ErrorCategory {
    return ERROR_CODE_CATEGORY[this.code]
  }
}
