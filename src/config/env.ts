/**
 * Environment variable loading for client configuration.
 * @module config/env
 */

import { ConfigurationError } from '../errors/types.js';
import { parseLogLevel } from '../observability/types.js';
import type { DispatchMode, SearchClientOptions } from './types.js';

/**
 * Loads client options from environment variables.
 *
 * Supported environment variables:
 * - SEARCH_URL: server URL (e.g. 'http://localhost:7700')
 * - SEARCH_API_KEY: API key sent as a bearer token
 * - SEARCH_TIMEOUT: request timeout in milliseconds
 * - SEARCH_DISPATCH_MODE: 'concurrent' or 'sequential'
 * - SEARCH_MAX_CONCURRENCY: cap on in-flight batch requests
 * - SEARCH_BATCH_SIZE: default documents per batch
 * - SEARCH_MAX_PAYLOAD_SIZE: payload ceiling in bytes for auto-sized batches
 * - SEARCH_TASK_POLL_INTERVAL: delay between task polls in milliseconds
 * - SEARCH_TASK_TIMEOUT: task wait limit in milliseconds; 'none' waits indefinitely
 * - SEARCH_LOG_LEVEL: debug, info, warn or error
 *
 * Unset variables are left out so the defaults apply.
 *
 * @throws {ConfigurationError} If a variable is set to an invalid value
 */
export function fromEnv(env: NodeJS.ProcessEnv = process.env): SearchClientOptions {
  const options: SearchClientOptions = {};

  const url = getEnv(env, 'SEARCH_URL');
  if (url) options.url = url;

  const apiKey = getEnv(env, 'SEARCH_API_KEY');
  if (apiKey) options.apiKey = apiKey;

  options.timeout = getEnvNumber(env, 'SEARCH_TIMEOUT');
  options.maxConcurrency = getEnvNumber(env, 'SEARCH_MAX_CONCURRENCY');
  options.defaultBatchSize = getEnvNumber(env, 'SEARCH_BATCH_SIZE');
  options.maxPayloadSize = getEnvNumber(env, 'SEARCH_MAX_PAYLOAD_SIZE');

  const dispatchMode = getEnv(env, 'SEARCH_DISPATCH_MODE');
  if (dispatchMode) {
    options.dispatchMode = parseDispatchMode(dispatchMode);
  }

  const intervalMs = getEnvNumber(env, 'SEARCH_TASK_POLL_INTERVAL');
  const taskTimeout = getEnv(env, 'SEARCH_TASK_TIMEOUT');
  if (intervalMs !== undefined || taskTimeout) {
    options.taskPolling = {
      intervalMs,
      timeoutMs:
        taskTimeout === undefined
          ? undefined
          : taskTimeout.toLowerCase() === 'none'
            ? null
            : parseNumber('SEARCH_TASK_TIMEOUT', taskTimeout),
    };
  }

  const logLevel = getEnv(env, 'SEARCH_LOG_LEVEL');
  if (logLevel) {
    const level = parseLogLevel(logLevel);
    if (level === undefined) {
      throw new ConfigurationError(
        `Invalid SEARCH_LOG_LEVEL: ${logLevel}. Must be one of: debug, info, warn, error`
      );
    }
    options.logLevel = level;
  }

  return options;
}

function getEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function getEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = getEnv(env, name);
  return value === undefined ? undefined : parseNumber(name, value);
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Invalid ${name}: '${value}' is not a number`);
  }
  return parsed;
}

function parseDispatchMode(value: string): DispatchMode {
  const normalized = value.toLowerCase();
  if (normalized === 'concurrent' || normalized === 'sequential') {
    return normalized;
  }
  throw new ConfigurationError(
    `Invalid SEARCH_DISPATCH_MODE: ${value}. Must be one of: concurrent, sequential`
  );
}
