/**
 * Tests for configuration resolution, validation, environment loading and the builder
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_PAYLOAD_SIZE,
  DEFAULT_TASK_POLL_INTERVAL_MS,
  DEFAULT_TASK_TIMEOUT_MS,
  DEFAULT_URL,
  createDefaultConfig,
  resolveConfig,
} from '../types.js';
import { validateConfig } from '../validation.js';
import { fromEnv } from '../env.js';
import { SearchClientConfigBuilder } from '../builder.js';
import { ConfigurationError } from '../../errors/types.js';
import { LogLevel } from '../../observability/types.js';

describe('resolveConfig', () => {
  it('should apply defaults for missing options', () => {
    const config = resolveConfig();

    expect(config).toEqual(createDefaultConfig());
    expect(config.url).toBe(DEFAULT_URL);
    expect(config.dispatchMode).toBe('concurrent');
    expect(config.defaultBatchSize).toBe(DEFAULT_BATCH_SIZE);
    expect(config.maxPayloadSize).toBe(DEFAULT_MAX_PAYLOAD_SIZE);
    expect(config.taskPolling.intervalMs).toBe(DEFAULT_TASK_POLL_INTERVAL_MS);
    expect(config.taskPolling.timeoutMs).toBe(DEFAULT_TASK_TIMEOUT_MS);
  });

  it('should merge partial nested options over defaults', () => {
    const config = resolveConfig({ taskPolling: { intervalMs: 200 }, pool: { connections: 4 } });

    expect(config.taskPolling).toEqual({
      intervalMs: 200,
      timeoutMs: DEFAULT_TASK_TIMEOUT_MS,
      backoffMultiplier: 1,
      maxIntervalMs: 1000,
    });
    expect(config.pool).toEqual({ connections: 4, keepAliveTimeoutMs: 60000 });
  });

  it('should keep an explicit null task timeout', () => {
    expect(resolveConfig({ taskPolling: { timeoutMs: null } }).taskPolling.timeoutMs).toBeNull();
  });

  it('should copy headers and agents', () => {
    const headers = { 'X-Team': 'search' };
    const config = resolveConfig({ headers });

    headers['X-Team'] = 'changed';
    expect(config.headers).toEqual({ 'X-Team': 'search' });
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(() => validateConfig(createDefaultConfig())).not.toThrow();
  });

  it('should list every invalid field', () => {
    const config = resolveConfig({ timeout: -1, defaultBatchSize: 0 });

    expect(() => validateConfig(config)).toThrow(ConfigurationError);
    expect(() => validateConfig(config)).toThrow(
      'Invalid configuration: timeout: Number must be greater than 0, defaultBatchSize: Number must be greater than 0'
    );
  });

  it('should reject a zero task timeout', () => {
    const config = resolveConfig({ taskPolling: { timeoutMs: 0 } });

    expect(() => validateConfig(config)).toThrow(
      'Invalid configuration: taskPolling.timeoutMs: Number must be greater than 0'
    );
  });

  it('should reject a non-http URL', () => {
    expect(() => validateConfig(resolveConfig({ url: 'ftp://search.test' }))).toThrow(
      'Invalid configuration: url: must use http or https'
    );
  });

  it('should reject a backoff multiplier below one', () => {
    expect(() =>
      validateConfig(resolveConfig({ taskPolling: { backoffMultiplier: 0.5 } }))
    ).toThrow(ConfigurationError);
  });
});

describe('fromEnv', () => {
  it('should return no options for an empty environment', () => {
    expect(fromEnv({})).toEqual({
      timeout: undefined,
      maxConcurrency: undefined,
      defaultBatchSize: undefined,
      maxPayloadSize: undefined,
    });
  });

  it('should read every supported variable', () => {
    const options = fromEnv({
      SEARCH_URL: 'http://search.internal:7700',
      SEARCH_API_KEY: 'test-key',
      SEARCH_TIMEOUT: '5000',
      SEARCH_DISPATCH_MODE: 'Sequential',
      SEARCH_MAX_CONCURRENCY: '4',
      SEARCH_BATCH_SIZE: '250',
      SEARCH_MAX_PAYLOAD_SIZE: '1048576',
      SEARCH_TASK_POLL_INTERVAL: '100',
      SEARCH_TASK_TIMEOUT: '20000',
      SEARCH_LOG_LEVEL: 'debug',
    });

    expect(options).toEqual({
      url: 'http://search.internal:7700',
      apiKey: 'test-key',
      timeout: 5000,
      dispatchMode: 'sequential',
      maxConcurrency: 4,
      defaultBatchSize: 250,
      maxPayloadSize: 1048576,
      taskPolling: { intervalMs: 100, timeoutMs: 20000 },
      logLevel: LogLevel.Debug,
    });
  });

  it('should read none as an unlimited task timeout', () => {
    expect(fromEnv({ SEARCH_TASK_TIMEOUT: 'none' }).taskPolling).toEqual({
      intervalMs: undefined,
      timeoutMs: null,
    });
  });

  it('should reject invalid values', () => {
    expect(() => fromEnv({ SEARCH_TIMEOUT: 'soon' })).toThrow(
      "Invalid SEARCH_TIMEOUT: 'soon' is not a number"
    );
    expect(() => fromEnv({ SEARCH_DISPATCH_MODE: 'parallel' })).toThrow(ConfigurationError);
    expect(() => fromEnv({ SEARCH_LOG_LEVEL: 'loud' })).toThrow(ConfigurationError);
  });

  it('should produce options that resolve over the defaults', () => {
    const config = resolveConfig(fromEnv({ SEARCH_TASK_POLL_INTERVAL: '10' }));

    expect(config.taskPolling.intervalMs).toBe(10);
    expect(config.taskPolling.timeoutMs).toBe(DEFAULT_TASK_TIMEOUT_MS);
    expect(config.timeout).toBe(30000);
  });
});

describe('SearchClientConfigBuilder', () => {
  it('should build a validated configuration', () => {
    const config = new SearchClientConfigBuilder()
      .url('https://search.test')
      .apiKey('test-key')
      .dispatchMode('sequential')
      .batchSize(500)
      .taskPollInterval(25)
      .taskTimeout(null)
      .taskBackoff(2, 400)
      .header('X-Team', 'search')
      .clientAgent('importer')
      .logLevel(LogLevel.Info)
      .build();

    expect(config.url).toBe('https://search.test');
    expect(config.apiKey).toBe('test-key');
    expect(config.dispatchMode).toBe('sequential');
    expect(config.defaultBatchSize).toBe(500);
    expect(config.taskPolling).toEqual({
      intervalMs: 25,
      timeoutMs: null,
      backoffMultiplier: 2,
      maxIntervalMs: 400,
    });
    expect(config.headers).toEqual({ 'X-Team': 'search' });
    expect(config.clientAgents).toEqual(['importer']);
    expect(config.logLevel).toBe(LogLevel.Info);
  });

  it('should throw on invalid values at build time', () => {
    const builder = new SearchClientConfigBuilder().maxConcurrency(0);

    expect(() => builder.build()).toThrow(ConfigurationError);
  });
});
