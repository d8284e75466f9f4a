/**
 * @npu-latency/errors
 * Standardized error handling, correlation IDs, and error envelopes.
 */

export {
  ErrorCode,
  ERROR_CODE_TO_HTTP_STATUS,
  ERROR_CODE_CATEGORY,
  AppError,
} from './types'
export type { ErrorEnvelope, ErrorCategory } from './types'

export {
  createConfigurationError,
  createBadRequestError,
  createInvalidCalibrationDataError,
  createNoCalibrationDataError,
  createAmbiguousArtifactError,
  createUnsupportedTensorTypeError,
  createNotFoundError,
  createCompilerError,
  createInternalError,
  createTransportError,
  createExternalServiceError,
  createTimeoutError,
  toAppError,
  formatError,
} from './factories'

export {
  CORRELATION_HEADER,
  generateCorrelationId,
  extractCorrelationId,
  getCurrentCorrelationId,
  runWithCorrelationId,
} from './correlation'
