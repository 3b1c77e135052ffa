/**
 * Content generation service.
 */

import type { GenerateContentRequest, GenerateContentResponse } from '../types/index.js';
import type { HttpClient, OpenStream } from '../client/index.js';
import type { Logger } from '../observability/logging.js';
import { GeminiError, StreamInterruptedError } from '../error/index.js';
import { ChunkedJsonParser, DEFAULT_MAX_OBJECT_SIZE } from '../streaming/index.js';
import { GenerateContentResponseSchema, parseValue } from '../types/schemas.js';
import { validateGenerateContentRequest, validateModelName } from '../validation/index.js';
import { BaseService } from './base.js';
import { checkChunkUsable, checkResponseUsable } from './safety.js';

/** Async iterable for streaming responses */
export type ContentStream = AsyncIterable<GenerateContentResponse>;

export interface StreamOptions {
  /** Largest single streamed object accepted, in bytes */
  maxJsonSize?: number;
}

/**
 * Service for content generation.
 */
export interface ContentService {
  /**
   * Generate content (non-streaming).
   *
   * @throws {PromptBlockedError} If the prompt was blocked
   * @throws {EmptyResponseError} If no candidate came back
   * @throws {AllCandidatesBlockedError} If no candidate has content
   */
  generate(model: string, request: GenerateContentRequest): Promise<GenerateContentResponse>;

  /**
   * Generate content with a streaming response. The returned promise settles
   * once response headers have arrived, so request and HTTP errors reject it
   * before iteration starts.
   */
  generateStream(
    model: string,
    request: GenerateContentRequest,
    options?: StreamOptions
  ): Promise<ContentStream>;
}

/**
 * Implementation of ContentService.
 */
export class ContentServiceImpl extends BaseService implements ContentService {
  constructor(httpClient: HttpClient, logger: Logger) {
    super(httpClient, logger);
  }

  async generate(model: string, request: GenerateContentRequest): Promise<GenerateContentResponse> {
    validateModelName(model);
    validateGenerateContentRequest(request);

    const url = this.buildUrl(`models/${model}:generateContent`);
    const data = await this.fetchJson(
      url,
      {
        method: 'POST',
        headers: this.getHeaders('application/json'),
        body: JSON.stringify(request),
      },
      GenerateContentResponseSchema,
      'GenerateContentResponse'
    );

    checkResponseUsable(data);
    return data;
  }

  async generateStream(
    model: string,
    request: GenerateContentRequest,
    options: StreamOptions = {}
  ): Promise<ContentStream> {
    validateModelName(model);
    validateGenerateContentRequest(request);

    const url = this.buildUrl(`models/${model}:streamGenerateContent`);
    const opened = await this.stream(url, {
      method: 'POST',
      headers: this.getHeaders('application/json'),
      body: JSON.stringify(request),
    });

    return this.decodeStream(opened, options.maxJsonSize ?? DEFAULT_MAX_OBJECT_SIZE);
  }

  private async *decodeStream(opened: OpenStream, maxJsonSize: number): AsyncGenerator<GenerateContentResponse> {
    const reader = opened.body.getReader();
    const decoder = new TextDecoder();
    const parser = new ChunkedJsonParser(maxJsonSize);
    let chunks = 0;
    let finished = false;

    const toResponse = (value: unknown): GenerateContentResponse => {
      const chunk = parseValue(value, GenerateContentResponseSchema, 'GenerateContentResponse chunk');
      checkChunkUsable(chunk);
      chunks++;
      return chunk;
    };

    // A pending read resolves as done once the reader is cancelled.
    const onAbort = (): void => {
      reader.cancel().catch((error: unknown) => {
        this.logger.debug('Failed to cancel stream body', { error });
      });
    };
    opened.signal.addEventListener('abort', onAbort, { once: true });

    try {
      while (true) {
        let result: ReadableStreamReadResult<Uint8Array>;
        try {
          result = await reader.read();
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          throw opened.timeoutError() ?? new StreamInterruptedError(message, error);
        }

        if (result.done) {
          const timeout = opened.timeoutError();
          if (timeout) {
            throw timeout;
          }
          finished = true;
          break;
        }

        for (const value of parser.feed(decoder.decode(result.value, { stream: true }))) {
          yield toResponse(value);
        }
      }

      const tail = decoder.decode();
      for (const value of tail ? parser.feed(tail) : []) {
        yield toResponse(value);
      }

      const last = parser.flush();
      if (last !== null) {
        yield toResponse(last);
      }

      this.logger.debug('Stream finished', { chunks });
    } catch (error) {
      if (error instanceof GeminiError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new StreamInterruptedError(message, error);
    } finally {
      opened.release();
      opened.signal.removeEventListener('abort', onAbort);
      if (!finished) {
        await reader.cancel().catch((error: unknown) => {
          this.logger.debug('Failed to cancel stream body', { error });
        });
      }
      reader.releaseLock();
    }
  }
}
