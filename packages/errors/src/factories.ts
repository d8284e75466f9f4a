import { AppError, ErrorCode } from './types'

/**
 * Factory functions for creating standardized errors.
 * These ensure consistent error creation across both services.
 */

interface ErrorOptions {
  correlationId?: string
  details?: Record<string, unknown>
  cause?: Error
}

export function createConfigurationError(message: string, options?: ErrorOptions): AppError {
  return new AppError(ErrorCode.CONFIGURATION_ERROR, message, {
    ...options,
    isOperational: false,
  })
}

export function createBadRequestError(message: string, options?: ErrorOptions): AppError {
  return new AppError(ErrorCode.BAD_REQUEST, message, options)
}

export function createInvalidCalibrationDataError(
  message = 'Calibration data must be a zip file',
  options?: ErrorOptions
): AppError {
  return new AppError(ErrorCode.INVALID_CALIBRATION_DATA, message, options)
}

export function createNoCalibrationDataError(directory: string, options?: ErrorOptions): AppError {
  return new AppError(
    ErrorCode.NO_CALIBRATION_DATA,
    `Cannot find any calibration input in ${directory}`,
    { ...options, details: { directory, ...options?.details } }
  )
}

export function createAmbiguousArtifactError(
  directory: string,
  candidates: string[],
  options?: ErrorOptions
): AppError {
  return new AppError(
    ErrorCode.AMBIGUOUS_ARTIFACT,
    `Artifacts directory must contain exactly one model file, found ${candidates.length}`,
    { ...options, details: { directory, candidates } }
  )
}

export function createUnsupportedTensorTypeError(
  type: string,
  options?: ErrorOptions
): AppError {
  return new AppError(ErrorCode.UNSUPPORTED_TENSOR_TYPE, `Got unknown tensor type '${type}'`, {
    ...options,
    details: { type },
  })
}

export function createNotFoundError(resource: string, options?: ErrorOptions): AppError {
  return new AppError(ErrorCode.NOT_FOUND, `${resource} not found`, options)
}

export function createCompilerError(message: string, options?: ErrorOptions): AppError {
  return new AppError(ErrorCode.COMPILER_ERROR, message, options)
}

export function createInternalError(
  message = 'An internal error occurred',
  options?: ErrorOptions
): AppError {
  return new AppError(ErrorCode.INTERNAL_ERROR, message, {
    ...options,
    isOperational: false,
  })
}

export function createTransportError(
  status: number,
  reason: string,
  options?: ErrorOptions
): AppError {
  return new AppError(
    ErrorCode.TRANSPORT_ERROR,
    `Expected status code is 200, got ${status}; reason: ${reason}`,
    { ...options, details: { status, reason, ...options?.details } }
  )
}

export function createExternalServiceError(target: string, options?: ErrorOptions): AppError {
  const cause = options?.cause ? `: ${options.cause.message}` : ''
  return new AppError(ErrorCode.TRANSPORT_ERROR, `Request to ${target} failed${cause}`, {
    ...options,
    details: { target, ...options?.details },
  })
}

export function createTimeoutError(operation: string, options?: ErrorOptions): AppError {
  return new AppError(ErrorCode.TIMEOUT_ERROR, `Operation timed out: ${operation}`, options)
}

/**
 * Convert unknown error to AppError with correlation ID
 */
export function toAppError(error: unknown, correlationId?: string): AppError {
  if (error instanceof AppError) {
    if (!error.correlationId && correlationId) {
      return new AppError(error.code, error.message, {
        correlationId,
        details: error.details,
        cause: error.cause instanceof Error ? error.cause : undefined,
        isOperational: error.isOperational,
      })
    }
    return error
  }

  if (error instanceof Error) {
    return createInternalError(error.message, {
      correlationId,
      cause: error,
    })
  }

  return createInternalError(String(error), { correlationId })
}

/**
 * Extract a printable message from anything thrown
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
