/**
 * Error exports for the session client.
 */

export { GeminiError, type GeminiErrorType, type GeminiErrorOptions, type ApiErrorDetail } from './types.js';

export {
  type ApiErrorContext,
  // Configuration Errors
  MissingApiKeyError,
  InvalidBaseUrlError,
  InvalidConfigurationError,
  // Authentication Errors
  InvalidApiKeyError,
  PermissionDeniedError,
  // Request Errors
  type ValidationDetail,
  ValidationError,
  InvalidModelError,
  PayloadTooLargeError,
  // Rate Limit Errors
  TooManyRequestsError,
  QuotaExceededError,
  // Network Errors
  ConnectionError,
  TimeoutError,
  // Server Errors
  InternalServerError,
  ServiceUnavailableError,
  ModelOverloadedError,
  // Response Errors
  DeserializationError,
  StreamInterruptedError,
  MalformedChunkError,
  // Content Errors
  PromptBlockedError,
  AllCandidatesBlockedError,
  EmptyResponseError,
  // Resource Errors
  NotFoundError,
  FileUploadError,
  FileProcessingError,
  FileAccessError,
  UnsupportedMediaTypeError,
} from './categories.js';

export { mapHttpStatusToError, mapApiErrorToGeminiError, extractRetryAfter } from './mapper.js';
