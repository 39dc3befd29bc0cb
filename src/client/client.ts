/**
 * Search client.
 *
 * Entry point to the library. Owns the transport and the shared services.
 * @module client/client
 */

import { resolveConfig, type SearchClientConfig, type SearchClientOptions } from '../config/types.js';
import { validateConfig } from '../config/validation.js';
import { MutationSubmitter } from '../documents/submitter.js';
import { ConfigurationError, InvalidArgumentError } from '../errors/types.js';
import { createLogger } from '../observability/logger.js';
import type { Logger } from '../observability/types.js';
import { PluginRunner } from '../plugins/runner.js';
import type { IndexPlugins } from '../plugins/types.js';
import type { Clock, WaitOptions } from '../tasks/poller.js';
import { TasksService } from '../tasks/service.js';
import { defaultCodec, type JsonCodec } from '../transport/codec.js';
import { UndiciHttpTransport } from '../transport/pool.js';
import type { HttpTransport } from '../transport/types.js';
import { parseTaskInfo, type Task, type TaskInfo } from '../types/task.js';
import { parseWith } from '../types/parse.js';
import { SearchIndex } from './search-index.js';
import { z } from 'zod';

/**
 * Client construction options: configuration plus injectable collaborators
 */
export interface SearchClientInit extends SearchClientOptions {
  /** Use this transport instead of creating a pooled one */
  transport?: HttpTransport;
  logger?: Logger;
  /** Codec for request bodies, responses and batch sizing */
  codec?: JsonCodec;
  /** Clock used by task polling */
  clock?: Clock;
}

/**
 * Options for an index handle
 */
export interface IndexOptions {
  plugins?: IndexPlugins;
}

const healthSchema = z.object({ status: z.string() }).passthrough();

/**
 * Client for the search engine's HTTP API.
 *
 * The connection pool is acquired on construction and released by `close()`;
 * prefer {@link withClient} for scoped use.
 *
 * @example
 * ```typescript
 * const client = new SearchClient({ url: 'http://localhost:7700', apiKey: 'test-key' });
 * try {
 *   const info = await client.index('movies').addDocuments([{ id: 1, title: 'Carol' }]);
 *   await client.waitForTask(info.taskUid);
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export class SearchClient {
  readonly config: SearchClientConfig;

  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly codec: JsonCodec;
  private readonly tasksService: TasksService;
  private readonly submitter: MutationSubmitter;
  private readonly runner: PluginRunner;
  private isClosed = false;

  /**
   * @throws {ConfigurationError} If the configuration is invalid
   */
  constructor(init: SearchClientInit = {}) {
    const { transport, logger, codec, clock, ...options } = init;

    this.config = resolveConfig(options);
    validateConfig(this.config);

    this.logger = logger ?? createLogger({ level: this.config.logLevel });
    this.codec = codec ?? defaultCodec;
    this.transport =
      transport ??
      new UndiciHttpTransport({
        baseUrl: this.config.url,
        apiKey: this.config.apiKey,
        timeout: this.config.timeout,
        defaultHeaders: this.config.headers,
        clientAgents: this.config.clientAgents,
        codec: this.codec,
        logger: this.logger,
        connections: this.config.pool.connections,
        keepAliveTimeoutMs: this.config.pool.keepAliveTimeoutMs,
      });

    this.tasksService = new TasksService(this.transport, this.config.taskPolling, this.logger, clock);
    this.submitter = new MutationSubmitter(
      this.tasksService,
      { dispatchMode: this.config.dispatchMode, maxConcurrency: this.config.maxConcurrency },
      this.logger
    );
    this.runner = new PluginRunner(this.logger);

    this.logger.debug('Search client created', {
      url: this.config.url,
      dispatchMode: this.config.dispatchMode,
    });
  }

  // ==========================================================================
  // Services
  // ==========================================================================

  /**
   * Task endpoints and waiting
   */
  get tasks(): TasksService {
    this.ensureOpen();
    return this.tasksService;
  }

  /**
   * Handle to one index. Plugins apply to operations made through this handle.
   */
  index(uid: string, options: IndexOptions = {}): SearchIndex {
    this.ensureOpen();
    if (uid.trim() === '') {
      throw new InvalidArgumentError('Index uid must not be empty');
    }
    return new SearchIndex(
      uid,
      {
        transport: this.transport,
        submitter: this.submitter,
        runner: this.runner,
        config: this.config,
        codec: this.codec,
        logger: this.logger,
        ensureOpen: () => this.ensureOpen(),
      },
      options.plugins
    );
  }

  // ==========================================================================
  // Indexes
  // ==========================================================================

  /**
   * Create an index
   */
  async createIndex(uid: string, options: { primaryKey?: string } = {}): Promise<TaskInfo> {
    this.ensureOpen();
    const response = await this.transport.post('indexes', { uid, primaryKey: options.primaryKey });
    return parseTaskInfo(response.data);
  }

  /**
   * Delete an index and all its documents
   */
  async deleteIndex(uid: string): Promise<TaskInfo> {
    this.ensureOpen();
    const response = await this.transport.delete(`indexes/${encodeURIComponent(uid)}`);
    return parseTaskInfo(response.data);
  }

  /**
   * Server health
   */
  async health(): Promise<{ status: string }> {
    this.ensureOpen();
    const response = await this.transport.get('health');
    const { status } = parseWith(healthSchema, response.data, 'health status');
    return { status };
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  /**
   * Wait for one task to reach a terminal state
   */
  async waitForTask(uid: number, options?: WaitOptions): Promise<Task> {
    return this.tasks.waitForTask(uid, options);
  }

  /**
   * Wait for several tasks; results follow the order of `uids`
   */
  async waitForTasks(uids: readonly number[], options?: WaitOptions): Promise<Task[]> {
    return this.tasks.waitForTasks(uids, options);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Release the transport. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    await this.transport.close();
    this.logger.debug('Search client closed');
  }

  private ensureOpen(): void {
    if (this.isClosed) {
      throw new ConfigurationError('Client is closed');
    }
  }
}
