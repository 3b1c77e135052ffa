/**
 * Leveled logging for the session client.
 */

/** Log level. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

/** All accepted level names, in ascending severity. */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'off'] as const satisfies readonly LogLevel[];

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to prefix lines with an ISO timestamp. */
  includeTimestamps: boolean;
  /** Maximum length of a logged string value before truncation. */
  maxValueLength: number;
  /** Whether to redact API keys and similar secrets. */
  redactSensitive: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  includeTimestamps: true,
  maxValueLength: 2048,
  redactSensitive: true,
};

/**
 * Logger interface.
 */
export interface Logger {
  log(level: LogLevel, message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const SENSITIVE_KEYS = ['key', 'apikey', 'api_key', 'authorization', 'password', 'secret', 'token'];

/**
 * Strips the API key from a URL's query string.
 */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:key|api_key)=)[^&#\s]*/gi, '$1[REDACTED]');
}

/**
 * Default console logger.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  get level(): LogLevel {
    return this.config.level;
  }

  log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const parts: string[] = [];

    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(this.redactIfNeeded(message));

    if (context) {
      parts.push(JSON.stringify(this.redactContext(context)));
    }

    const output = parts.join(' ');

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
      case 'trace':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  private shouldLog(level: LogLevel): boolean {
    if (level === 'off') return false;
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private redactIfNeeded(text: string): string {
    if (!this.config.redactSensitive) return text;
    return redactUrl(text);
  }

  private redactContext(context: object): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      if (this.config.redactSensitive && SENSITIVE_KEYS.includes(key.toLowerCase())) {
        redacted[key] = '[REDACTED]';
      } else if (typeof value === 'string') {
        redacted[key] = this.truncate(this.redactIfNeeded(value));
      } else if (value instanceof Error) {
        redacted[key] = value.message;
      } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        redacted[key] = this.redactContext(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }

  private truncate(value: string): string {
    if (value.length <= this.config.maxValueLength) return value;
    return `${value.slice(0, this.config.maxValueLength)}... (${value.length} chars)`;
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  log(): void {}
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/**
 * Creates a console logger at the given level.
 */
export function createLogger(level: LogLevel = 'info', config?: Partial<LogConfig>): Logger {
  if (level === 'off') {
    return new NoopLogger();
  }
  return new ConsoleLogger({ ...config, level });
}
