/**
 * Error mapping utilities for converting HTTP statuses and API error bodies
 * to GeminiError instances.
 */

import { GeminiError } from './types.js';
import type { ApiErrorDetail } from './types.js';
import {
  InvalidApiKeyError,
  PermissionDeniedError,
  ValidationError,
  InvalidModelError,
  PayloadTooLargeError,
  TooManyRequestsError,
  QuotaExceededError,
  InternalServerError,
  ServiceUnavailableError,
  ModelOverloadedError,
  NotFoundError,
} from './categories.js';
import type { ApiErrorContext } from './categories.js';

/**
 * Maps HTTP status code to appropriate GeminiError
 */
export function mapHttpStatusToError(
  status: number,
  message: string,
  context: Omit<ApiErrorContext, 'message'> = {}
): GeminiError {
  const lower = message.toLowerCase();
  const withMessage: ApiErrorContext = { ...context, message };

  switch (status) {
    case 400:
      if (lower.includes('api key')) {
        return new InvalidApiKeyError(withMessage);
      }
      if (lower.includes('model')) {
        return new InvalidModelError(message, context);
      }
      return new ValidationError(message, [], context);

    case 401:
      return new InvalidApiKeyError(withMessage);

    case 403:
      return new PermissionDeniedError(withMessage);

    case 404:
      return new NotFoundError(message, context);

    case 413:
      return new PayloadTooLargeError(withMessage);

    case 429:
      if (lower.includes('quota')) {
        return new QuotaExceededError(withMessage);
      }
      return new TooManyRequestsError(withMessage);

    case 500:
      return new InternalServerError(message, context);

    case 503:
      if (lower.includes('overload')) {
        return new ModelOverloadedError(withMessage);
      }
      return new ServiceUnavailableError(withMessage);

    default:
      return new GeminiError({
        type: 'unknown_error',
        message: `HTTP ${status}: ${message}`,
        status,
        retryAfter: context.retryAfter,
        isRetryable: status >= 500,
        details: context.details,
      });
  }
}

/**
 * Maps an API error body to GeminiError, using the RPC status first and the
 * HTTP status as a fallback.
 */
export function mapApiErrorToGeminiError(
  error: ApiErrorDetail,
  httpStatus: number,
  retryAfter?: number
): GeminiError {
  const message = error.message || 'Unknown error';
  const details = { apiError: error };
  const context: ApiErrorContext = { message, retryAfter, details };
  const lower = message.toLowerCase();

  switch (error.status.toUpperCase()) {
    case 'UNAUTHENTICATED':
      return new InvalidApiKeyError(context);

    case 'PERMISSION_DENIED':
      return new PermissionDeniedError(context);

    case 'INVALID_ARGUMENT':
    case 'FAILED_PRECONDITION':
      if (lower.includes('api key')) {
        return new InvalidApiKeyError(context);
      }
      return new ValidationError(message, [], context);

    case 'NOT_FOUND':
      return new NotFoundError(message, context);

    case 'RESOURCE_EXHAUSTED':
      if (lower.includes('quota')) {
        return new QuotaExceededError(context);
      }
      return new TooManyRequestsError(context);

    case 'INTERNAL':
      return new InternalServerError(message, context);

    case 'UNAVAILABLE':
      if (lower.includes('overload')) {
        return new ModelOverloadedError(context);
      }
      return new ServiceUnavailableError(context);

    case 'DEADLINE_EXCEEDED':
      return new GeminiError({
        type: 'network_error',
        message: `Deadline exceeded: ${message}`,
        status: httpStatus,
        isRetryable: true,
        details,
      });
  }

  return mapHttpStatusToError(httpStatus, message, { retryAfter, details });
}

/**
 * Extracts a retry-after value in seconds from response headers.
 */
export function extractRetryAfter(headers: Headers): number | undefined {
  const retryAfter = headers.get('retry-after');
  if (!retryAfter) {
    return undefined;
  }

  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds;
  }

  const date = new Date(retryAfter);
  if (!isNaN(date.getTime())) {
    return Math.max(0, Math.floor((date.getTime() - Date.now()) / 1000));
  }

  return undefined;
}
