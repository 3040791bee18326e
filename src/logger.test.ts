/**
 * Logger tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConsoleLogger, JsonLogger, LogLevel, createLogger, parseLogLevel, redactContext } from './logger.js';

describe('ConsoleLogger', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    delete process.env.LOG_LEVEL;
  });

  it('logs info messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.info('test message', { key: 'value' });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^\[.*\] INFO: test message {"key":"value"}$/)
    );
  });

  it('filters out debug messages at INFO level', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.debug('debug message');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('logs debug messages at DEBUG level', () => {
    const logger = new ConsoleLogger(LogLevel.DEBUG);
    logger.debug('debug message');

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/\[.*\] DEBUG: debug message$/)
    );
  });

  it('logs error with message', () => {
    const logger = new ConsoleLogger(LogLevel.ERROR);
    logger.error('operation failed', new Error('test error'));

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/ERROR: operation failed.*"error":"test error"/)
    );
  });

  it('respects LOG_LEVEL env var', () => {
    process.env.LOG_LEVEL = 'WARN';
    const logger = new ConsoleLogger();

    logger.info('info message');
    logger.warn('warn message');

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringMatching(/WARN: warn message$/));
  });

  it('logs nothing at SILENT level', () => {
    const logger = new ConsoleLogger(LogLevel.SILENT);
    logger.error('hidden', new Error('boom'));

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('redacts default sensitive keys in nested context', () => {
    const logger = new ConsoleLogger(LogLevel.INFO);
    logger.info('Tool call', { arguments: { user: 'alice', password: 'test-secret' } });

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringMatching(/INFO: Tool call {"arguments":{"user":"alice","password":"\[REDACTED\]"}}$/)
    );
  });
});

describe('JsonLogger', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  function lastEntry(): Record<string, unknown> {
    const line = consoleErrorSpy.mock.calls[consoleErrorSpy.mock.calls.length - 1][0];
    return JSON.parse(String(line));
  }

  it('writes one JSON object per entry', () => {
    const logger = new JsonLogger(LogLevel.INFO);
    logger.info('started', { port: 3003 });

    const entry = lastEntry();
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('started');
    expect(entry.port).toBe(3003);
    expect(typeof entry.timestamp).toBe('string');
  });

  it('includes error message and stack', () => {
    const logger = new JsonLogger(LogLevel.ERROR);
    logger.error('failed', new Error('boom'), { toolName: 'Calc_Add' });

    const entry = lastEntry();
    expect(entry.error).toBe('boom');
    expect(entry.stack).toEqual(expect.stringContaining('Error: boom'));
    expect(entry.toolName).toBe('Calc_Add');
  });

  it('redacts configured keys case-insensitively', () => {
    const logger = new JsonLogger(LogLevel.INFO, ['sessionKey']);
    logger.info('call', { SESSIONKEY: 'test-secret', token: 'kept' });

    const entry = lastEntry();
    expect(entry.SESSIONKEY).toBe('[REDACTED]');
    expect(entry.token).toBe('kept');
  });
});

describe('redactContext', () => {
  const keys = new Set(['password', 'apikey']);

  it('redacts inside arrays of objects', () => {
    const result = redactContext({ items: [{ apiKey: 'test-secret' }, { name: 'x' }] }, keys);

    expect(result).toEqual({ items: [{ apiKey: '[REDACTED]' }, { name: 'x' }] });
  });

  it('leaves non-plain objects untouched', () => {
    const when = new Date(0);
    const result = redactContext({ when }, keys);

    expect(result.when).toBe(when);
  });

  it('returns the input when no keys are configured', () => {
    const data = { password: 'test-secret' };

    expect(redactContext(data, new Set())).toBe(data);
  });
});

describe('parseLogLevel', () => {
  it('parses names case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
  });

  it('returns undefined for unknown or missing values', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

describe('createLogger', () => {
  it('creates the logger for the requested format', () => {
    expect(createLogger({ format: 'json', level: LogLevel.INFO })).toBeInstanceOf(JsonLogger);
    expect(createLogger({ format: 'console', level: LogLevel.INFO })).toBeInstanceOf(ConsoleLogger);
  });
});
