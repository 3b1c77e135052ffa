/**
 * Configuration for the session client.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  InvalidBaseUrlError,
  InvalidConfigurationError,
  MissingApiKeyError,
} from '../error/index.js';
import { LOG_LEVELS, createLogger } from '../observability/logging.js';
import type { LogLevel, Logger } from '../observability/logging.js';
import { DEFAULT_MODEL } from './models.js';
import type { ModelId } from './models.js';

export { Models, DEFAULT_MODEL, modelName, isKnownModel, type KnownModel, type ModelId } from './models.js';

/** Default Gemini API base URL */
export const DEFAULT_BASE_URL = 'https://generativelanguage.googleapis.com';

/** Default API version */
export const DEFAULT_API_VERSION = 'v1beta';

/** Default whole-request timeout (30 seconds) */
export const DEFAULT_TIMEOUT = 30_000;

/** Default time allowed until response headers arrive (30 seconds) */
export const DEFAULT_CONNECT_TIMEOUT = 30_000;

/** Default wait between file state polls (3 seconds) */
export const DEFAULT_FILE_POLL_INTERVAL = 3_000;

/** Default number of waits before an upload is reported as timed out */
export const DEFAULT_FILE_POLL_ATTEMPTS = 3;

/** Cached uploads expiring sooner than this are treated as stale (10 minutes) */
export const DEFAULT_FILE_EXPIRY_MARGIN = 10 * 60_000;

/** How the API key is sent */
export type AuthMethod = 'header' | 'queryParam';

/** Fetch implementation used for every request */
export type FetchFn = typeof fetch;

/** Configuration for a session or file manager */
export interface SessionConfig {
  /** API key; required once resolved */
  apiKey?: string;
  /** Base URL for the API */
  baseUrl?: string;
  /** API version path segment */
  apiVersion?: string;
  /** Model used for generation */
  model?: ModelId;
  /** Whole-request timeout in milliseconds */
  timeout?: number;
  /** Milliseconds allowed until response headers arrive */
  connectTimeout?: number;
  /** Authentication method */
  authMethod?: AuthMethod;
  /** Log level for the default logger */
  logLevel?: LogLevel;
  /** Custom logger; overrides `logLevel` */
  logger?: Logger;
  /** Custom fetch implementation */
  fetch?: FetchFn;
  /** Milliseconds between file state polls */
  filePollInterval?: number;
  /** Number of waits before an upload times out */
  filePollAttempts?: number;
  /** Milliseconds before expiry at which a cached upload is considered stale */
  fileExpiryMargin?: number;
}

/** Resolved configuration with all defaults applied */
export interface ResolvedSessionConfig {
  apiKey: string;
  baseUrl: string;
  apiVersion: string;
  model: ModelId;
  timeout: number;
  connectTimeout: number;
  authMethod: AuthMethod;
  logLevel: LogLevel;
  logger: Logger;
  fetch: FetchFn;
  filePollInterval: number;
  filePollAttempts: number;
  fileExpiryMargin: number;
}

const ConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().optional(),
  apiVersion: z.string().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  timeout: z.number().int().positive().optional(),
  connectTimeout: z.number().int().positive().optional(),
  authMethod: z.enum(['header', 'queryParam']).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  filePollInterval: z.number().int().nonnegative().optional(),
  filePollAttempts: z.number().int().nonnegative().optional(),
  fileExpiryMargin: z.number().int().nonnegative().optional(),
});

/**
 * Validate configuration.
 *
 * @throws {MissingApiKeyError} If no API key is set
 * @throws {InvalidBaseUrlError} If the base URL does not parse
 * @throws {InvalidConfigurationError} For any other out-of-range field
 */
export function validateConfig(config: SessionConfig): asserts config is SessionConfig & { apiKey: string } {
  if (!config.apiKey) {
    throw new MissingApiKeyError();
  }

  const result = ConfigSchema.safeParse(config);
  if (result.success) {
    return;
  }

  const issues = result.error.issues;
  if (config.baseUrl !== undefined && issues.some((issue) => issue.path[0] === 'baseUrl')) {
    throw new InvalidBaseUrlError(config.baseUrl);
  }

  const fields = issues.map((issue) => issue.path.join('.'));
  const message = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
  throw new InvalidConfigurationError(message, fields);
}

/**
 * Resolve configuration with defaults.
 */
export function resolveConfig(config: SessionConfig & { apiKey: string }): ResolvedSessionConfig {
  const logLevel = config.logLevel ?? 'info';

  return {
    apiKey: config.apiKey,
    baseUrl: (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
    apiVersion: config.apiVersion ?? DEFAULT_API_VERSION,
    model: config.model ?? DEFAULT_MODEL,
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    connectTimeout: config.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
    authMethod: config.authMethod ?? 'queryParam',
    logLevel,
    logger: config.logger ?? createLogger(logLevel),
    fetch: config.fetch ?? globalThis.fetch.bind(globalThis),
    filePollInterval: config.filePollInterval ?? DEFAULT_FILE_POLL_INTERVAL,
    filePollAttempts: config.filePollAttempts ?? DEFAULT_FILE_POLL_ATTEMPTS,
    fileExpiryMargin: config.fileExpiryMargin ?? DEFAULT_FILE_EXPIRY_MARGIN,
  };
}

/**
 * Validate and resolve in one step.
 */
export function prepareConfig(config: SessionConfig): ResolvedSessionConfig {
  validateConfig(config);
  return resolveConfig(config);
}

export interface EnvOptions {
  /** Variables to read; defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
  /** Load a `.env` file into `process.env` first (default: true when reading `process.env`) */
  loadDotenv?: boolean;
}

function parseIntegerVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidConfigurationError(`${name} must be an integer, got '${raw}'`, [name]);
  }
  return value;
}

function parseLogLevelVar(env: NodeJS.ProcessEnv): LogLevel | undefined {
  const raw = env.GEMINI_LOG_LEVEL;
  if (raw === undefined || raw === '') {
    return undefined;
  }

  const result = z.enum(LOG_LEVELS).safeParse(raw.toLowerCase());
  if (!result.success) {
    throw new InvalidConfigurationError(
      `GEMINI_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'`,
      ['GEMINI_LOG_LEVEL']
    );
  }
  return result.data;
}

/**
 * Read the API key from the environment, loading `.env` when asked.
 */
export function apiKeyFromEnv(options: EnvOptions = {}): string | undefined {
  const env = options.env ?? process.env;
  if (options.loadDotenv ?? options.env === undefined) {
    dotenv.config();
  }
  return env.GEMINI_API_KEY || env.GOOGLE_API_KEY || undefined;
}

/**
 * Create configuration from environment variables.
 *
 * @throws {MissingApiKeyError} If neither GEMINI_API_KEY nor GOOGLE_API_KEY is set
 */
export function createConfigFromEnv(options: EnvOptions = {}): SessionConfig & { apiKey: string } {
  const env = options.env ?? process.env;
  const apiKey = apiKeyFromEnv(options);

  if (!apiKey) {
    throw new MissingApiKeyError();
  }

  return {
    apiKey,
    baseUrl: env.GEMINI_BASE_URL || undefined,
    apiVersion: env.GEMINI_API_VERSION || undefined,
    model: env.GEMINI_MODEL || undefined,
    timeout: parseIntegerVar(env, 'GEMINI_TIMEOUT'),
    logLevel: parseLogLevelVar(env),
  };
}
