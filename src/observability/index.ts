export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  formatEntry,
  redact,
  DEFAULT_LOGGING_CONFIG,
} from './logging.js';
export type { Logger, LogEntry, LogLevel, LogFormat, LoggingConfig } from './logging.js';
