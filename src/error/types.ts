/**
 * Base error type shared by every failure the session client raises.
 */

/** Error categories, used as the `type` discriminator. */
export type GeminiErrorType =
  | 'configuration_error'
  | 'authentication_error'
  | 'validation_error'
  | 'invalid_model'
  | 'payload_too_large'
  | 'rate_limit_error'
  | 'network_error'
  | 'server_error'
  | 'response_error'
  | 'content_error'
  | 'resource_error'
  | 'file_error'
  | 'unknown_error';

/** Error object as returned by the API inside `{ "error": ... }`. */
export interface ApiErrorDetail {
  code: number;
  message: string;
  status: string;
  details?: unknown[];
}

export interface GeminiErrorOptions {
  type: GeminiErrorType;
  message: string;
  status?: number;
  retryAfter?: number;
  isRetryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Base error class for all Gemini API errors.
 */
export class GeminiError extends Error {
  /** The category of error */
  public readonly type: GeminiErrorType;

  /** HTTP status code if applicable */
  public readonly status?: number;

  /** Seconds to wait before retrying */
  public readonly retryAfter?: number;

  /** Whether the same request could succeed later */
  public readonly isRetryable: boolean;

  /** Additional error details */
  public readonly details?: Record<string, unknown>;

  constructor(options: GeminiErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'GeminiError';
    this.type = options.type;
    this.status = options.status;
    this.retryAfter = options.retryAfter;
    this.isRetryable = options.isRetryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** The API's own error payload, when the error came from an error response. */
  get apiError(): ApiErrorDetail | undefined {
    const value = this.details?.apiError;
    return isApiErrorDetail(value) ? value : undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      retryAfter: this.retryAfter,
      isRetryable: this.isRetryable,
      details: this.details,
    };
  }
}

function isApiErrorDetail(value: unknown): value is ApiErrorDetail {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'number' &&
    'message' in value &&
    typeof value.message === 'string' &&
    'status' in value &&
    typeof value.status === 'string'
  );
}
