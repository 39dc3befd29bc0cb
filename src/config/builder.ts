/**
 * Fluent configuration builder.
 * @module config/builder
 */

import type { LogLevel } from '../observability/types.js';
import type { DispatchMode, SearchClientConfig, SearchClientOptions } from './types.js';
import { resolveConfig } from './types.js';
import { validateConfig } from './validation.js';

/**
 * Configuration builder.
 *
 * @example
 * ```typescript
 * const config = new SearchClientConfigBuilder()
 *   .url('http://localhost:7700')
 *   .apiKey('test-key')
 *   .dispatchMode('sequential')
 *   .taskTimeout(10000)
 *   .build();
 * ```
 */
export class SearchClientConfigBuilder {
  private options: SearchClientOptions;

  constructor(initial: SearchClientOptions = {}) {
    this.options = { ...initial };
  }

  /**
   * Sets the server URL.
   */
  url(value: string): this {
    this.options = { ...this.options, url: value };
    return this;
  }

  /**
   * Sets the API key.
   */
  apiKey(value: string): this {
    this.options = { ...this.options, apiKey: value };
    return this;
  }

  /**
   * Sets the per-request timeout.
   */
  timeout(ms: number): this {
    this.options = { ...this.options, timeout: ms };
    return this;
  }

  /**
   * Sets how batches of a submission are dispatched.
   */
  dispatchMode(mode: DispatchMode): this {
    this.options = { ...this.options, dispatchMode: mode };
    return this;
  }

  /**
   * Caps in-flight batch requests per submission.
   */
  maxConcurrency(value: number): this {
    this.options = { ...this.options, maxConcurrency: value };
    return this;
  }

  /**
   * Sets the default fixed batch size.
   */
  batchSize(value: number): this {
    this.options = { ...this.options, defaultBatchSize: value };
    return this;
  }

  /**
   * Sets the payload ceiling for auto-sized batching.
   */
  maxPayloadSize(bytes: number): this {
    this.options = { ...this.options, maxPayloadSize: bytes };
    return this;
  }

  /**
   * Sets the task poll interval.
   */
  taskPollInterval(ms: number): this {
    this.options = { ...this.options, taskPolling: { ...this.options.taskPolling, intervalMs: ms } };
    return this;
  }

  /**
   * Sets the task wait limit; `null` waits indefinitely.
   */
  taskTimeout(ms: number | null): this {
    this.options = { ...this.options, taskPolling: { ...this.options.taskPolling, timeoutMs: ms } };
    return this;
  }

  /**
   * Enables capped exponential backoff between task polls.
   */
  taskBackoff(multiplier: number, maxIntervalMs: number): this {
    this.options = {
      ...this.options,
      taskPolling: { ...this.options.taskPolling, backoffMultiplier: multiplier, maxIntervalMs },
    };
    return this;
  }

  /**
   * Sets the number of pooled connections.
   */
  connections(value: number): this {
    this.options = { ...this.options, pool: { ...this.options.pool, connections: value } };
    return this;
  }

  /**
   * Adds a header sent on every request.
   */
  header(name: string, value: string): this {
    this.options = { ...this.options, headers: { ...this.options.headers, [name]: value } };
    return this;
  }

  /**
   * Adds a user-agent segment.
   */
  clientAgent(agent: string): this {
    this.options = {
      ...this.options,
      clientAgents: [...(this.options.clientAgents ?? []), agent],
    };
    return this;
  }

  /**
   * Sets the log level.
   */
  logLevel(level: LogLevel): this {
    this.options = { ...this.options, logLevel: level };
    return this;
  }

  /**
   * Resolves defaults and validates.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   */
  build(): SearchClientConfig {
    const config = resolveConfig(this.options);
    validateConfig(config);
    return config;
  }
}
