/**
 * Builder for creating session instances.
 */

import type { AuthMethod, FetchFn, KnownModel, SessionConfig } from '../config/index.js';
import { apiKeyFromEnv, resolveConfig, validateConfig } from '../config/index.js';
import type { Context } from '../context/index.js';
import type { LogLevel, Logger } from '../observability/logging.js';
import { GemSession } from './session.js';

/**
 * Builder for creating sessions with a fluent API.
 *
 * @example
 * ```typescript
 * const session = GemSession.builder()
 *   .model(Models.Gemini15Flash)
 *   .timeout(60_000)
 *   .connectTimeout(10_000)
 *   .build();
 * ```
 */
export class GemSessionBuilder {
  private config: SessionConfig = {};
  private _context?: Context;

  /** Whole-request timeout in milliseconds. */
  timeout(ms: number): this {
    this.config.timeout = ms;
    return this;
  }

  /** Milliseconds allowed until response headers arrive. */
  connectTimeout(ms: number): this {
    this.config.connectTimeout = ms;
    return this;
  }

  model(model: KnownModel): this {
    this.config.model = model;
    return this;
  }

  /** Use a model that is not in `Models`. */
  customModel(name: string): this {
    this.config.model = name;
    return this;
  }

  /** Start from an existing conversation. */
  context(context: Context): this {
    this._context = context;
    return this;
  }

  apiKey(apiKey: string): this {
    this.config.apiKey = apiKey;
    return this;
  }

  baseUrl(baseUrl: string): this {
    this.config.baseUrl = baseUrl;
    return this;
  }

  apiVersion(apiVersion: string): this {
    this.config.apiVersion = apiVersion;
    return this;
  }

  authMethod(authMethod: AuthMethod): this {
    this.config.authMethod = authMethod;
    return this;
  }

  logger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  fetch(fetchImpl: FetchFn): this {
    this.config.fetch = fetchImpl;
    return this;
  }

  /** Wait between file state polls and how many waits to allow. */
  filePolling(interval: number, attempts: number): this {
    this.config.filePollInterval = interval;
    this.config.filePollAttempts = attempts;
    return this;
  }

  /**
   * Build the session. Without an explicit key, `GEMINI_API_KEY` or
   * `GOOGLE_API_KEY` is read, after loading `.env`.
   *
   * @throws {MissingApiKeyError} If no key is found
   * @throws {InvalidConfigurationError} If a setting is out of range
   */
  build(): GemSession {
    const config: SessionConfig = { ...this.config, apiKey: this.config.apiKey ?? apiKeyFromEnv() };
    validateConfig(config);
    return new GemSession(resolveConfig(config), this._context);
  }
}
