export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  redactContext,
  DEFAULT_LOG_CONFIG,
  REDACTED,
  type Logger,
  type LogLevel,
  type LogConfig,
  type LogContext,
} from './logging.js';
