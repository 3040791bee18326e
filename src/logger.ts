/**
 * Logger interfaces and implementations
 *
 * All output goes to stderr: stdout carries JSON-RPC frames when the stdio
 * transport is active.
 *
 * Context values whose key matches a configured redaction key (case-insensitive)
 * are replaced with [REDACTED], at any depth. Tool arguments are logged through
 * this path, so secrets passed to host methods stay out of the logs.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export const DEFAULT_REDACT_KEYS = ['password', 'token', 'secret', 'apiKey'];

const REDACTED = '[REDACTED]';
const MAX_REDACT_DEPTH = 8;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.toUpperCase();
  switch (normalized) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return undefined;
  }
}

/**
 * Replace values of sensitive keys, recursing into nested objects and arrays
 */
export function redactContext(
  data: Record<string, unknown>,
  keys: ReadonlySet<string>
): Record<string, unknown> {
  if (keys.size === 0) return data;
  return redactRecord(data, keys, 0);
}

function redactRecord(
  data: Record<string, unknown>,
  keys: ReadonlySet<string>,
  depth: number
): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    redacted[key] = keys.has(key.toLowerCase()) ? REDACTED : redactValue(value, keys, depth + 1);
  }
  return redacted;
}

function redactValue(value: unknown, keys: ReadonlySet<string>, depth: number): unknown {
  if (depth > MAX_REDACT_DEPTH) return value;
  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, keys, depth + 1));
  }
  if (isPlainRecord(value)) {
    return redactRecord(value, keys, depth);
  }
  return value;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function levelFromEnv(level?: LogLevel): LogLevel {
  if (level !== undefined) return level;
  return parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
}

function keySet(redactKeys: readonly string[]): ReadonlySet<string> {
  return new Set(redactKeys.map(k => k.toLowerCase()));
}

/**
 * Default logger - human-readable lines on stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger implements Logger {
  readonly level: LogLevel;
  private redactKeys: ReadonlySet<string>;

  constructor(level?: LogLevel, redactKeys: readonly string[] = DEFAULT_REDACT_KEYS) {
    this.level = levelFromEnv(level);
    this.redactKeys = keySet(redactKeys);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('DEBUG', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('INFO', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('WARN', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('ERROR', message, errorContext);
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const redacted = context ? redactContext(context, this.redactKeys) : undefined;
    const ctx = redacted ? ` ${JSON.stringify(redacted)}` : '';
    console.error(`[${timestamp}] ${level}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for production (one object per line)
 */
export class JsonLogger implements Logger {
  readonly level: LogLevel;
  private redactKeys: ReadonlySet<string>;

  constructor(level?: LogLevel, redactKeys: readonly string[] = DEFAULT_REDACT_KEYS) {
    this.level = levelFromEnv(level);
    this.redactKeys = keySet(redactKeys);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write('error', message, {
        error: error?.message,
        stack: error?.stack,
        ...context,
      });
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const redacted = context ? redactContext(context, this.redactKeys) : undefined;
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...redacted,
    };
    console.error(JSON.stringify(log));
  }
}

export interface LoggerOptions {
  format: 'console' | 'json';
  level?: LogLevel;
  redactKeys?: readonly string[];
}

export function createLogger(options: LoggerOptions): Logger {
  return options.format === 'json'
    ? new JsonLogger(options.level, options.redactKeys)
    : new ConsoleLogger(options.level, options.redactKeys);
}
