/**
 * Base service class with common functionality for all services.
 */

import type { HttpClient, OpenStream, TextResponse } from '../client/index.js';
import type { ResolvedSessionConfig } from '../config/index.js';
import type { Logger } from '../observability/logging.js';
import type { Schema } from '../types/schemas.js';

/**
 * Abstract base class for all service implementations.
 */
export abstract class BaseService {
  constructor(
    protected readonly httpClient: HttpClient,
    protected readonly logger: Logger
  ) {}

  protected buildUrl(endpoint: string, queryParams?: Record<string, string>): string {
    return this.httpClient.buildUrl(endpoint, queryParams);
  }

  protected buildUploadUrl(endpoint: string): string {
    return this.httpClient.buildUploadUrl(endpoint);
  }

  protected getHeaders(contentType?: string): Record<string, string> {
    return this.httpClient.getHeaders(contentType);
  }

  /**
   * Make a request, returning its unread body once response headers arrive.
   */
  protected async stream(url: string, init?: RequestInit): Promise<OpenStream> {
    return this.httpClient.stream(url, init);
  }

  protected async fetchText(url: string, init?: RequestInit): Promise<TextResponse> {
    return this.httpClient.fetchText(url, init);
  }

  /**
   * Make a request and validate its JSON body.
   */
  protected async fetchJson<T>(
    url: string,
    init: RequestInit,
    schema: Schema<T>,
    label: string
  ): Promise<T> {
    return this.httpClient.fetchJson(url, init, schema, label);
  }
}

/**
 * Extended base service with config access (for services that need it).
 */
export abstract class BaseServiceWithConfig extends BaseService {
  constructor(
    httpClient: HttpClient,
    protected readonly config: ResolvedSessionConfig
  ) {
    super(httpClient, config.logger);
  }
}
