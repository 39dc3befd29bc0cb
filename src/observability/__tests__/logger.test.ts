/**
 * Tests for loggers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, NoopLogger, createLogContext, createLogger } from '../logger.js';
import { LogLevel, parseLogLevel } from '../types.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should redact sensitive fields at any depth', () => {
    const logger = new ConsoleLogger();

    const redacted = logger.redactSensitive({
      apiKey: 'test-key',
      request: { headers: { Authorization: 'Bearer test-key', Accept: 'application/json' } },
      indexUid: 'movies',
    });

    expect(redacted).toEqual({
      apiKey: '[REDACTED]',
      request: { headers: { Authorization: '[REDACTED]', Accept: 'application/json' } },
      indexUid: 'movies',
    });
  });

  it('should summarize document arrays and serialize errors', () => {
    const logger = new ConsoleLogger();

    const redacted = logger.redactSensitive({
      documents: [{ id: 1 }, { id: 2 }],
      error: new TypeError('bad input'),
    });

    expect(redacted).toEqual({
      documents: '[documents:2]',
      error: { name: 'TypeError', message: 'bad input' },
    });
  });

  it('should honour custom sensitive fields', () => {
    const logger = new ConsoleLogger({ sensitiveFields: ['tenantToken'] });

    expect(logger.redactSensitive({ tenantToken: 'abc', uid: 1 })).toEqual({
      tenantToken: '[REDACTED]',
      uid: 1,
    });
  });

  it('should drop messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Warn, name: 'test' });

    logger.debug('hidden');
    logger.warn('shown', { batch: 2 });

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/ WARN\[test\] shown$/);
    expect(warn.mock.calls[0][1]).toEqual({ batch: 2 });
  });

  it('should write one JSON line in json mode', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ json: true, name: 'test' });

    logger.error('failed', { password: 'test-secret' });

    const line = error.mock.calls[0][0];
    expect(typeof line).toBe('string');
    const entry: unknown = JSON.parse(String(line));
    expect(entry).toMatchObject({
      level: LogLevel.Error,
      message: 'failed',
      component: 'test',
      context: { password: '[REDACTED]' },
    });
  });

  it('should change level at runtime', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.Error });

    logger.info('hidden');
    logger.setLevel(LogLevel.Info);
    logger.info('shown');

    expect(info).toHaveBeenCalledTimes(1);
  });
});

describe('createLogger', () => {
  it('should return a no-op logger when disabled', () => {
    expect(createLogger({ enabled: false })).toBeInstanceOf(NoopLogger);
    expect(createLogger({ type: 'noop' })).toBeInstanceOf(NoopLogger);
  });

  it('should default to a console logger', () => {
    expect(createLogger()).toBeInstanceOf(ConsoleLogger);
  });
});

describe('createLogContext', () => {
  it('should drop undefined values and flatten errors', () => {
    expect(
      createLogContext({
        operation: 'addDocuments',
        indexUid: undefined,
        error: new Error('boom'),
        batches: 3,
      })
    ).toEqual({
      operation: 'addDocuments',
      error: { name: 'Error', message: 'boom' },
      batches: 3,
    });
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
    expect(parseLogLevel(' warning ')).toBe(LogLevel.Warn);
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
