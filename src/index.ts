/**
 * gemini-session
 *
 * Conversation-oriented TypeScript client for the Gemini generative language API
 *
 * @example
 * ```typescript
 * import { GemSession, Settings, getText } from 'gemini-session';
 *
 * // Reads GEMINI_API_KEY (or GOOGLE_API_KEY) after loading .env
 * const session = GemSession.builder().build();
 *
 * const settings = new Settings();
 * settings.setSystemInstruction('You are a terse assistant.');
 *
 * const first = await session.sendMessage('Name a prime number.', { settings });
 * const second = await session.sendMessage('Now a larger one.', { settings });
 * console.log(getText(second));
 * ```
 */

// Session exports
export { GemSession, GemSessionBuilder, type SendOptions } from './session/index.js';

// Context exports
export {
  Context,
  Settings,
  DEFAULT_GENERATION_CONFIG,
  DEFAULT_STREAM_MAX_JSON_SIZE,
  defaultSafetySettings,
} from './context/index.js';

// Configuration exports
export {
  type SessionConfig,
  type ResolvedSessionConfig,
  type AuthMethod,
  type FetchFn,
  type EnvOptions,
  type KnownModel,
  type ModelId,
  Models,
  DEFAULT_MODEL,
  modelName,
  isKnownModel,
  resolveConfig,
  validateConfig,
  prepareConfig,
  createConfigFromEnv,
  apiKeyFromEnv,
  DEFAULT_BASE_URL,
  DEFAULT_API_VERSION,
  DEFAULT_TIMEOUT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_FILE_POLL_INTERVAL,
  DEFAULT_FILE_POLL_ATTEMPTS,
  DEFAULT_FILE_EXPIRY_MARGIN,
} from './config/index.js';

// Error exports
export * from './error/index.js';

// Type exports
export * from './types/index.js';

// Response readers
export {
  getCandidates,
  getResults,
  getText,
  getContentText,
  getUsageMetadata,
  getFeedback,
  isCandidateBlocked,
  hasSafetyConcerns,
  getSafetyRatingSummary,
  type SafetyRatingSummary,
} from './response/index.js';

// Service exports
export {
  ContentServiceImpl,
  FilesServiceImpl,
  FileManager,
  hashBytes,
  toHexHash,
  type ContentService,
  type ContentStream,
  type StreamOptions,
  type FilesService,
} from './services/index.js';

// HTTP exports
export { HttpClient, type TextResponse } from './client/index.js';

// Streaming exports
export { ChunkedJsonParser, StreamAccumulator, type AccumulatorOptions } from './streaming/index.js';

// Validation exports
export { validateGenerateContentRequest, validateModelName } from './validation/index.js';

// Logging exports
export {
  type Logger,
  type LogLevel,
  type LogConfig,
  ConsoleLogger,
  NoopLogger,
  createLogger,
  redactUrl,
} from './observability/logging.js';

/** Package version */
export const VERSION = '0.1.0';
