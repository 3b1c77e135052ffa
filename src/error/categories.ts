/**
 * Error category classes for granular error handling.
 */

import { GeminiError } from './types.js';
import type { BlockReason } from '../types/generation.js';
import { blockReasonLabel } from '../types/generation.js';

/** Extra fields every mapped API error may carry. */
export interface ApiErrorContext {
  message?: string;
  retryAfter?: number;
  details?: Record<string, unknown>;
}

// ============================================================================
// Configuration Errors
// ============================================================================

/** Error for missing API key */
export class MissingApiKeyError extends GeminiError {
  constructor() {
    super({
      type: 'configuration_error',
      message: 'Missing API key. Set GEMINI_API_KEY or GOOGLE_API_KEY environment variable.',
      isRetryable: false,
    });
    this.name = 'MissingApiKeyError';
  }
}

/** Error for invalid base URL */
export class InvalidBaseUrlError extends GeminiError {
  public readonly url: string;

  constructor(url: string) {
    super({
      type: 'configuration_error',
      message: `Invalid base URL: ${url}`,
      isRetryable: false,
    });
    this.name = 'InvalidBaseUrlError';
    this.url = url;
  }
}

/** Error for invalid configuration */
export class InvalidConfigurationError extends GeminiError {
  public readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super({
      type: 'configuration_error',
      message: `Invalid configuration: ${message}`,
      isRetryable: false,
      details: { fields },
    });
    this.name = 'InvalidConfigurationError';
    this.fields = fields;
  }
}

// ============================================================================
// Authentication Errors
// ============================================================================

/** Error for a rejected API key */
export class InvalidApiKeyError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'authentication_error',
      message: context.message ?? 'Invalid API key',
      status: 401,
      isRetryable: false,
      details: context.details,
    });
    this.name = 'InvalidApiKeyError';
  }
}

/** Error for a key that lacks access to the resource */
export class PermissionDeniedError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'authentication_error',
      message: context.message ?? 'Permission denied',
      status: 403,
      isRetryable: false,
      details: context.details,
    });
    this.name = 'PermissionDeniedError';
  }
}

// ============================================================================
// Request Errors
// ============================================================================

/** Validation detail */
export interface ValidationDetail {
  field: string;
  description: string;
  value?: unknown;
}

/** Error for validation failures */
export class ValidationError extends GeminiError {
  public readonly validationDetails: ValidationDetail[];

  constructor(message: string, details: ValidationDetail[] = [], context: ApiErrorContext = {}) {
    super({
      type: 'validation_error',
      message: `Validation error: ${message}`,
      status: 400,
      isRetryable: false,
      details: { ...context.details, validationDetails: details },
    });
    this.name = 'ValidationError';
    this.validationDetails = details;
  }
}

/** Error for a model the API does not accept */
export class InvalidModelError extends GeminiError {
  constructor(message: string, context: ApiErrorContext = {}) {
    super({
      type: 'invalid_model',
      message: `Invalid model: ${message}`,
      status: 400,
      isRetryable: false,
      details: context.details,
    });
    this.name = 'InvalidModelError';
  }
}

/** Error for payload too large */
export class PayloadTooLargeError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'payload_too_large',
      message: context.message ?? 'Payload too large',
      status: 413,
      isRetryable: false,
      details: context.details,
    });
    this.name = 'PayloadTooLargeError';
  }
}

// ============================================================================
// Rate Limit Errors
// ============================================================================

/** Error for too many requests */
export class TooManyRequestsError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'rate_limit_error',
      message: context.message ?? 'Too many requests',
      status: 429,
      retryAfter: context.retryAfter,
      isRetryable: true,
      details: context.details,
    });
    this.name = 'TooManyRequestsError';
  }
}

/** Error for exhausted quota */
export class QuotaExceededError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'rate_limit_error',
      message: context.message ?? 'Quota exceeded',
      status: 429,
      retryAfter: context.retryAfter,
      isRetryable: true,
      details: context.details,
    });
    this.name = 'QuotaExceededError';
  }
}

// ============================================================================
// Network Errors
// ============================================================================

/** Error for connection failures */
export class ConnectionError extends GeminiError {
  constructor(message: string, cause?: unknown) {
    super({
      type: 'network_error',
      message: `Connection failed: ${message}`,
      isRetryable: true,
      cause,
    });
    this.name = 'ConnectionError';
  }
}

/** Error for timeouts */
export class TimeoutError extends GeminiError {
  public readonly duration: number;

  constructor(duration: number, phase: 'connect' | 'request' = 'request') {
    super({
      type: 'network_error',
      message:
        phase === 'connect'
          ? `No response headers within ${duration}ms`
          : `Request timed out after ${duration}ms`,
      isRetryable: true,
      details: { phase },
    });
    this.name = 'TimeoutError';
    this.duration = duration;
  }
}

// ============================================================================
// Server Errors
// ============================================================================

/** Error for internal server errors */
export class InternalServerError extends GeminiError {
  constructor(message: string, context: ApiErrorContext = {}) {
    super({
      type: 'server_error',
      message: `Internal server error: ${message}`,
      status: 500,
      isRetryable: true,
      details: context.details,
    });
    this.name = 'InternalServerError';
  }
}

/** Error for service unavailable */
export class ServiceUnavailableError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'server_error',
      message: context.message ?? 'Service unavailable',
      status: 503,
      retryAfter: context.retryAfter,
      isRetryable: true,
      details: context.details,
    });
    this.name = 'ServiceUnavailableError';
  }
}

/** Error for an overloaded model */
export class ModelOverloadedError extends GeminiError {
  constructor(context: ApiErrorContext = {}) {
    super({
      type: 'server_error',
      message: context.message ?? 'Model overloaded',
      status: 503,
      retryAfter: context.retryAfter,
      isRetryable: true,
      details: context.details,
    });
    this.name = 'ModelOverloadedError';
  }
}

// ============================================================================
// Response Errors
// ============================================================================

/** Error for bodies that are not the expected JSON shape */
export class DeserializationError extends GeminiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      type: 'response_error',
      message: `Failed to deserialize response: ${message}`,
      isRetryable: false,
      details,
    });
    this.name = 'DeserializationError';
  }
}

/** Error for a stream that broke off mid-body */
export class StreamInterruptedError extends GeminiError {
  constructor(message: string, cause?: unknown) {
    super({
      type: 'response_error',
      message: `Stream interrupted: ${message}`,
      isRetryable: true,
      cause,
    });
    this.name = 'StreamInterruptedError';
  }
}

/** Error for malformed chunks */
export class MalformedChunkError extends GeminiError {
  constructor(message: string) {
    super({
      type: 'response_error',
      message: `Malformed chunk: ${message}`,
      isRetryable: false,
    });
    this.name = 'MalformedChunkError';
  }
}

// ============================================================================
// Content Errors
// ============================================================================

/** The prompt was rejected, reported through prompt feedback */
export class PromptBlockedError extends GeminiError {
  public readonly blockReason: BlockReason;

  constructor(blockReason: BlockReason) {
    super({
      type: 'content_error',
      message: `Prompt blocked: ${blockReasonLabel(blockReason)}`,
      isRetryable: false,
      details: { blockReason },
    });
    this.name = 'PromptBlockedError';
    this.blockReason = blockReason;
  }
}

/** Every candidate came back without content */
export class AllCandidatesBlockedError extends GeminiError {
  constructor() {
    super({
      type: 'content_error',
      message: 'All candidates were blocked',
      isRetryable: false,
    });
    this.name = 'AllCandidatesBlockedError';
  }
}

/** The response had no usable candidate or text */
export class EmptyResponseError extends GeminiError {
  constructor(message = 'Empty API response') {
    super({
      type: 'content_error',
      message,
      isRetryable: false,
    });
    this.name = 'EmptyResponseError';
  }
}

// ============================================================================
// Resource Errors
// ============================================================================

/** Error for a resource (model, file) the API does not know */
export class NotFoundError extends GeminiError {
  constructor(message: string, context: ApiErrorContext = {}) {
    super({
      type: 'resource_error',
      message: `Not found: ${message}`,
      status: 404,
      isRetryable: false,
      details: context.details,
    });
    this.name = 'NotFoundError';
  }
}

/** Error raised by the upload protocol */
export class FileUploadError extends GeminiError {
  public readonly fileName: string;

  constructor(fileName: string, message: string, cause?: unknown) {
    super({
      type: 'file_error',
      message: `Upload of ${fileName} failed: ${message}`,
      isRetryable: false,
      cause,
    });
    this.name = 'FileUploadError';
    this.fileName = fileName;
  }
}

/** Error for file processing failures */
export class FileProcessingError extends GeminiError {
  public readonly fileName: string;

  constructor(fileName: string, message: string) {
    super({
      type: 'file_error',
      message: `File processing failed for ${fileName}: ${message}`,
      isRetryable: false,
      details: { reason: message },
    });
    this.name = 'FileProcessingError';
    this.fileName = fileName;
  }
}

/** Error reading a local file */
export class FileAccessError extends GeminiError {
  public readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super({
      type: 'file_error',
      message: `${message}: ${path}`,
      isRetryable: false,
      cause,
    });
    this.name = 'FileAccessError';
    this.path = path;
  }
}

/** Error for a file whose MIME type cannot be determined */
export class UnsupportedMediaTypeError extends GeminiError {
  public readonly fileName: string;

  constructor(fileName: string) {
    super({
      type: 'file_error',
      message: `Unsupported file type: ${fileName}`,
      status: 415,
      isRetryable: false,
    });
    this.name = 'UnsupportedMediaTypeError';
    this.fileName = fileName;
  }
}
