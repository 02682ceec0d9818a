/**
 * Logging for the Pinecone client.
 * @module observability/logging
 */

/**
 * Log level, lowest first.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'off';

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  off: 5,
};

/**
 * Structured fields attached to a log line.
 */
export type LogContext = Record<string, unknown>;

/**
 * Console logger settings.
 */
export interface LogConfig {
  /** Minimum level that is written. */
  level: LogLevel;
  /** Prefix each line with an ISO timestamp. */
  includeTimestamps: boolean;
  /** Replace credential-looking context values with a marker. */
  redactSensitive: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  includeTimestamps: true,
  redactSensitive: true,
};

/**
 * Logger interface accepted by every client.
 */
export interface Logger {
  log(level: LogLevel, message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const SENSITIVE_KEYS = ['api-key', 'api_key', 'apikey', 'authorization', 'secret', 'token', 'password'];

export const REDACTED = '[REDACTED]';

function isSensitiveKey(key: string): boolean {
  const lowered = key.toLowerCase();
  return SENSITIVE_KEYS.some((candidate) => lowered.includes(candidate));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a copy of `context` with sensitive keys masked, recursing into
 * nested objects.
 */
export function redactContext(context: LogContext): LogContext {
  const redacted: LogContext = {};

  for (const [key, value] of Object.entries(context)) {
    if (isSensitiveKey(key)) {
      redacted[key] = REDACTED;
    } else if (isPlainObject(value)) {
      redacted[key] = redactContext(value);
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

/**
 * Logger writing single-line records to the console.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  /**
   * Formats a record without writing it.
   */
  format(level: LogLevel, message: string, context?: LogContext): string {
    const parts: string[] = [];

    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(this.config.redactSensitive ? redactContext(context) : context));
    }

    return parts.join(' ');
  }

  log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const output = this.format(level, message, context);

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

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  private shouldLog(level: LogLevel): boolean {
    return level !== 'off' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.config.level];
  }
}

/**
 * Logger that discards everything.
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
 * Creates a console logger with the given configuration.
 */
export function createLogger(config?: Partial<LogConfig>): Logger {
  return new ConsoleLogger(config);
}
