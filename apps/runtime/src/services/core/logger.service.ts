import type { ILogger, LogLevel } from '@runtime/core/interfaces';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const SENSITIVE_KEYS = [
  'password',
  'token',
  'secret',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'private',
];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
  /** Defaults to process.stderr; stdout belongs to command output. */
  sink?: (line: string) => void;
}

/**
 * Structured JSON-lines logger.
 * Metadata keys that look like credentials are redacted before output.
 */
export class Logger implements ILogger {
  private readonly context: Record<string, unknown>;
  private readonly minLevel: LogLevel;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context ?? {};
    this.sink = options.sink ?? ((line) => process.stderr.write(line + '\n'));

    // LOG_LEVEL wins over configuration
    const envLevel = process.env.LOG_LEVEL;
    this.minLevel = isLogLevel(envLevel) ? envLevel : options.level ?? 'info';
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): ILogger {
    return new Logger({
      level: this.minLevel,
      context: { ...this.context, ...context },
      sink: this.sink,
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...sanitize({ ...this.context, ...meta }),
    };

    this.sink(JSON.stringify(entry));
  }
}

function sanitize(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
      result[key] = '[REDACTED]';
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isRecord(item) ? sanitize(item) : item));
    } else if (isRecord(value)) {
      result[key] = sanitize(value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !(value instanceof Error);
}
