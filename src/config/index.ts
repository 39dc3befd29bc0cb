/**
 * Configuration module.
 * @module config
 */

export {
  DEFAULT_URL,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_PAYLOAD_SIZE,
  DEFAULT_TASK_POLL_INTERVAL_MS,
  DEFAULT_TASK_TIMEOUT_MS,
  DEFAULT_POOL_CONNECTIONS,
  DEFAULT_KEEP_ALIVE_TIMEOUT_MS,
  DEFAULT_TASK_POLLING,
  createDefaultConfig,
  resolveConfig,
  type DispatchMode,
  type TaskPollingConfig,
  type PoolConfig,
  type SearchClientConfig,
  type SearchClientOptions,
} from './types.js';
export { validateConfig } from './validation.js';
export { fromEnv } from './env.js';
export { SearchClientConfigBuilder } from './builder.js';
