/**
 * HTTP client for making requests to the Gemini API.
 */

import type { ResolvedSessionConfig } from '../config/index.js';
import {
  ConnectionError,
  GeminiError,
  StreamInterruptedError,
  TimeoutError,
  extractRetryAfter,
  mapApiErrorToGeminiError,
  mapHttpStatusToError,
} from '../error/index.js';
import type { ApiErrorDetail } from '../error/index.js';
import type { Logger } from '../observability/logging.js';
import { redactUrl } from '../observability/logging.js';
import { ApiErrorBodySchema, parseJson } from '../types/schemas.js';
import type { Schema } from '../types/schemas.js';

/** A response whose body has been read as text. */
export interface TextResponse {
  status: number;
  headers: Headers;
  body: string;
}

interface TimerState {
  expired?: 'connect' | 'request';
}

interface OpenedRequest {
  response: Response;
  state: TimerState;
  signal: AbortSignal;
  release: () => void;
}

/**
 * A response whose body is read by the caller.
 *
 * The request timer keeps running until `release` is called. When it fires,
 * `signal` aborts and `timeoutError` returns the error to raise.
 */
export interface OpenStream {
  body: ReadableStream<Uint8Array>;
  signal: AbortSignal;
  timeoutError: () => TimeoutError | undefined;
  release: () => void;
}

/**
 * HTTP client for making requests to the Gemini API.
 *
 * Response headers must arrive within `connectTimeout` and the whole
 * request, body included, must finish within `timeout`. `stream` hands the
 * unread body to the caller with the request timer still running.
 */
export class HttpClient {
  constructor(
    private readonly config: ResolvedSessionConfig,
    private readonly logger: Logger = config.logger
  ) {}

  /**
   * Build the full URL for an endpoint.
   */
  buildUrl(endpoint: string, queryParams?: Record<string, string>): string {
    return this.withQuery(
      `${this.config.baseUrl}/${this.config.apiVersion}/${endpoint}`,
      queryParams
    );
  }

  /**
   * Build the URL of a media upload endpoint.
   */
  buildUploadUrl(endpoint: string, queryParams?: Record<string, string>): string {
    return this.withQuery(
      `${this.config.baseUrl}/upload/${this.config.apiVersion}/${endpoint}`,
      queryParams
    );
  }

  /**
   * Get headers for a request.
   */
  getHeaders(contentType?: string): Record<string, string> {
    const headers: Record<string, string> = {};

    if (this.config.authMethod === 'header') {
      headers['x-goog-api-key'] = this.config.apiKey;
    }
    if (contentType) {
      headers['Content-Type'] = contentType;
    }

    return headers;
  }

  /**
   * Make a request and return its body once the headers arrive.
   *
   * The caller must call `release` when done with the body.
   *
   * @throws {GeminiError} Mapped from the error body on a non-2xx status
   * @throws {StreamInterruptedError} If the response has no body
   */
  async stream(url: string, init: RequestInit = {}): Promise<OpenStream> {
    const { response, state, signal, release } = await this.open(url, init);

    if (!response.body) {
      release();
      throw new StreamInterruptedError('No response body in streaming response');
    }

    return {
      body: response.body,
      signal,
      timeoutError: () => (state.expired === 'request' ? new TimeoutError(this.config.timeout, 'request') : undefined),
      release,
    };
  }

  /**
   * Make a request and read the body as text.
   */
  async fetchText(url: string, init: RequestInit = {}): Promise<TextResponse> {
    const { response, state, release } = await this.open(url, init);

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.transportError(error, state);
    } finally {
      release();
    }

    this.logger.debug('Response body', { status: response.status, body });
    return { status: response.status, headers: response.headers, body };
  }

  /**
   * Make a request and validate the JSON body against a schema.
   */
  async fetchJson<T>(url: string, init: RequestInit, schema: Schema<T>, label: string): Promise<T> {
    const { body } = await this.fetchText(url, init);
    return parseJson(body, schema, label);
  }

  private withQuery(base: string, queryParams?: Record<string, string>): string {
    const url = new URL(base);

    if (this.config.authMethod === 'queryParam') {
      url.searchParams.set('key', this.config.apiKey);
    }
    if (queryParams) {
      for (const [key, value] of Object.entries(queryParams)) {
        url.searchParams.set(key, value);
      }
    }

    return url.toString();
  }

  private async open(url: string, init: RequestInit): Promise<OpenedRequest> {
    const controller = new AbortController();
    const state: TimerState = {};

    const requestTimer = setTimeout(() => {
      state.expired = 'request';
      controller.abort();
    }, this.config.timeout);
    const connectTimer = setTimeout(() => {
      state.expired = 'connect';
      controller.abort();
    }, this.config.connectTimeout);

    const release = (): void => {
      clearTimeout(requestTimer);
      clearTimeout(connectTimer);
    };

    this.logger.info('Sending request', { method: init.method ?? 'GET', url: redactUrl(url) });
    if (typeof init.body === 'string') {
      this.logger.debug('Request body', { body: init.body });
    }

    let response: Response;
    try {
      response = await this.config.fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      release();
      throw this.transportError(error, state);
    } finally {
      clearTimeout(connectTimer);
    }

    if (!response.ok) {
      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw this.transportError(error, state);
      } finally {
        release();
      }
      throw this.errorFromResponse(response, text);
    }

    return { response, state, signal: controller.signal, release };
  }

  private transportError(error: unknown, state: TimerState): GeminiError {
    if (state.expired === 'connect') {
      return new TimeoutError(this.config.connectTimeout, 'connect');
    }
    if (state.expired === 'request') {
      return new TimeoutError(this.config.timeout, 'request');
    }
    if (error instanceof GeminiError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ConnectionError(message, error);
  }

  /**
   * Handle error responses from the API.
   */
  private errorFromResponse(response: Response, text: string): GeminiError {
    const retryAfter = extractRetryAfter(response.headers);
    const detail = parseErrorBody(text);

    this.logger.warn('Request failed', {
      status: response.status,
      apiStatus: detail?.status,
      message: detail?.message ?? text,
    });

    if (detail) {
      return mapApiErrorToGeminiError(detail, response.status, retryAfter);
    }
    return mapHttpStatusToError(response.status, text || response.statusText, { retryAfter });
  }
}

function parseErrorBody(text: string): ApiErrorDetail | undefined {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return undefined;
  }

  const result = ApiErrorBodySchema.safeParse(data);
  return result.success ? result.data.error : undefined;
}
