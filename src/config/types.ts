/**
 * Configuration types for the search client.
 * @module config/types
 */

import type { LogLevel } from '../observability/types.js';

// ============================================================================
// Defaults
// ============================================================================

/** Default server URL */
export const DEFAULT_URL = 'http://localhost:7700';

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Default number of documents per batch for fixed-count batching */
export const DEFAULT_BATCH_SIZE = 1000;

/** Default payload ceiling for auto-sized batching (100 MiB, the server's default limit) */
export const DEFAULT_MAX_PAYLOAD_SIZE = 104857600;

/** Default delay between task polls in milliseconds */
export const DEFAULT_TASK_POLL_INTERVAL_MS = 50;

/** Default time to wait for a task in milliseconds */
export const DEFAULT_TASK_TIMEOUT_MS = 5000;

/** Default number of pooled connections */
export const DEFAULT_POOL_CONNECTIONS = 10;

/** Default keep-alive for idle pooled connections in milliseconds */
export const DEFAULT_KEEP_ALIVE_TIMEOUT_MS = 60000;

// ============================================================================
// Types
// ============================================================================

/**
 * How batches of a single submission are dispatched.
 * `sequential` awaits each batch before sending the next; `concurrent` overlaps them.
 */
export type DispatchMode = 'concurrent' | 'sequential';

/**
 * Task polling behaviour
 */
export interface TaskPollingConfig {
  /** Delay between polls */
  intervalMs: number;
  /** Overall wait limit, greater than zero; `null` waits indefinitely */
  timeoutMs: number | null;
  /** Multiplier applied to the interval after each poll; 1 keeps it constant */
  backoffMultiplier: number;
  /** Upper bound for the interval when backing off */
  maxIntervalMs: number;
}

/**
 * Connection pool settings
 */
export interface PoolConfig {
  connections: number;
  keepAliveTimeoutMs: number;
}

/**
 * Resolved client configuration
 */
export interface SearchClientConfig {
  /** Server base URL; a path component is kept as a prefix */
  url: string;
  /** Bearer token sent on every request */
  apiKey?: string;
  /** Per-request timeout in milliseconds */
  timeout: number;
  dispatchMode: DispatchMode;
  /** Cap on in-flight batch requests per submission; unset means unbounded */
  maxConcurrency?: number;
  defaultBatchSize: number;
  maxPayloadSize: number;
  taskPolling: TaskPollingConfig;
  pool: PoolConfig;
  /** Extra headers sent on every request */
  headers: Record<string, string>;
  /** Extra user-agent segments, e.g. an integration name */
  clientAgents: string[];
  logLevel?: LogLevel;
}

/**
 * Configuration accepted from callers. Everything except the URL has a default.
 */
export type SearchClientOptions = Partial<
  Omit<SearchClientConfig, 'taskPolling' | 'pool'>
> & {
  taskPolling?: Partial<TaskPollingConfig>;
  pool?: Partial<PoolConfig>;
};

/**
 * Default task polling configuration
 */
export const DEFAULT_TASK_POLLING: TaskPollingConfig = {
  intervalMs: DEFAULT_TASK_POLL_INTERVAL_MS,
  timeoutMs: DEFAULT_TASK_TIMEOUT_MS,
  backoffMultiplier: 1,
  maxIntervalMs: 1000,
};

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): SearchClientConfig {
  return {
    url: DEFAULT_URL,
    timeout: DEFAULT_TIMEOUT_MS,
    dispatchMode: 'concurrent',
    defaultBatchSize: DEFAULT_BATCH_SIZE,
    maxPayloadSize: DEFAULT_MAX_PAYLOAD_SIZE,
    taskPolling: { ...DEFAULT_TASK_POLLING },
    pool: {
      connections: DEFAULT_POOL_CONNECTIONS,
      keepAliveTimeoutMs: DEFAULT_KEEP_ALIVE_TIMEOUT_MS,
    },
    headers: {},
    clientAgents: [],
  };
}

/**
 * Merge caller options over the defaults. Options left undefined keep their default.
 */
export function resolveConfig(options: SearchClientOptions = {}): SearchClientConfig {
  const defaults = createDefaultConfig();
  const polling = options.taskPolling ?? {};
  const pool = options.pool ?? {};

  return {
    url: options.url ?? defaults.url,
    apiKey: options.apiKey,
    timeout: options.timeout ?? defaults.timeout,
    dispatchMode: options.dispatchMode ?? defaults.dispatchMode,
    maxConcurrency: options.maxConcurrency,
    defaultBatchSize: options.defaultBatchSize ?? defaults.defaultBatchSize,
    maxPayloadSize: options.maxPayloadSize ?? defaults.maxPayloadSize,
    taskPolling: {
      intervalMs: polling.intervalMs ?? defaults.taskPolling.intervalMs,
      // null is a meaningful value here (no limit)
      timeoutMs: polling.timeoutMs !== undefined ? polling.timeoutMs : defaults.taskPolling.timeoutMs,
      backoffMultiplier: polling.backoffMultiplier ?? defaults.taskPolling.backoffMultiplier,
      maxIntervalMs: polling.maxIntervalMs ?? defaults.taskPolling.maxIntervalMs,
    },
    pool: {
      connections: pool.connections ?? defaults.pool.connections,
      keepAliveTimeoutMs: pool.keepAliveTimeoutMs ?? defaults.pool.keepAliveTimeoutMs,
    },
    headers: { ...(options.headers ?? {}) },
    clientAgents: [...(options.clientAgents ?? [])],
    logLevel: options.logLevel,
  };
}
