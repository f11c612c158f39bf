/**
 * Logging for the transport and stream layers.
 *
 * The client only calls the five `Logger` methods, so any object with that
 * shape can be passed in; `createLogger` gives a console-backed one.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'pretty' | 'json' | 'compact';

export interface LoggingConfig {
  level: LogLevel;
  format: LogFormat;
  includeTimestamps: boolean;
}

export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

type EntryLevel = Exclude<LogLevel, 'silent'>;

export interface LogEntry {
  readonly level: EntryLevel;
  readonly message: string;
  readonly fields: Record<string, unknown>;
  readonly timestamp: string | undefined;
}

export const DEFAULT_LOGGING_CONFIG: Readonly<LoggingConfig> = Object.freeze({
  level: 'warn',
  format: 'pretty',
  includeTimestamps: true,
});

const THRESHOLD: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

const SENSITIVE_KEYS = new Set(['authtoken', 'token', 'authorization', 'password', 'apikey', 'secret']);

/**
 * Replace values of sensitive keys, one level deep
 */
export function redact(context: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : value])
  );
}

/**
 * Render one entry; `pretty` puts each field on its own indented line
 */
export function formatEntry(format: LogFormat, entry: LogEntry): string {
  const label = `[${entry.level.toUpperCase()}]`;
  const fields = Object.entries(entry.fields);

  switch (format) {
    case 'json':
      return JSON.stringify({ timestamp: entry.timestamp, level: entry.level, message: entry.message, ...entry.fields });
    case 'compact':
      return fields.length > 0
        ? `${label} ${entry.message} ${JSON.stringify(entry.fields)}`
        : `${label} ${entry.message}`;
    case 'pretty': {
      const head = entry.timestamp !== undefined ? `[${entry.timestamp}] ${label}` : label;
      const lines = fields.map(([key, value]) => `\n  ${key}: ${JSON.stringify(value)}`);
      return `${head} ${entry.message}${lines.join('')}`;
    }
  }
}

export class ConsoleLogger implements Logger {
  private readonly config: LoggingConfig;

  constructor(config: Partial<LoggingConfig> = {}) {
    this.config = { ...DEFAULT_LOGGING_CONFIG, ...config };
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

  private log(level: EntryLevel, message: string, context: Record<string, unknown> = {}): void {
    if (THRESHOLD[level] < THRESHOLD[this.config.level]) {
      return;
    }

    const line = formatEntry(this.config.format, {
      level,
      message,
      fields: redact(context),
      timestamp: this.config.includeTimestamps ? new Date().toISOString() : undefined,
    });
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    sink(line);
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  trace(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  if (config?.level === 'silent') {
    return new NoopLogger();
  }
  return new ConsoleLogger(config);
}
