/**
 * Tasks service: read, cancel, delete and wait for server-side tasks.
 * @module tasks/service
 */

import type { HttpTransport } from '../transport/types.js';
import type { Logger } from '../observability/types.js';
import type { TaskPollingConfig } from '../config/types.js';
import {
  TASK_STATUSES,
  parseTask,
  parseTaskInfo,
  parseTaskList,
  type Task,
  type TaskInfo,
  type TaskList,
} from '../types/task.js';
import {
  buildTaskFilterParams,
  buildTaskQueryParams,
  isEmptyFilter,
  type TaskFilter,
  type TaskQuery,
} from './params.js';
import { TaskPoller, type TaskSource, type WaitOptions, type Clock } from './poller.js';

/**
 * Service for the `/tasks` endpoints.
 *
 * @example
 * ```typescript
 * const info = await index.addDocuments(docs);
 * const task = await client.tasks.waitForTask(info.taskUid, { timeoutMs: 10000 });
 * if (task.status === 'failed') {
 *   console.error(task.error?.message);
 * }
 * ```
 */
export class TasksService implements TaskSource {
  private readonly poller: TaskPoller;

  constructor(
    private readonly transport: HttpTransport,
    polling: TaskPollingConfig,
    private readonly logger: Logger,
    clock?: Clock
  ) {
    this.poller = new TaskPoller(this, polling, logger, clock);
  }

  /**
   * Get one task by uid
   */
  async getTask(uid: number, options: { signal?: AbortSignal } = {}): Promise<Task> {
    const response = await this.transport.get(`tasks/${uid}`, undefined, {
      signal: options.signal,
    });
    return parseTask(response.data);
  }

  /**
   * List tasks, newest first unless `reverse` is set
   */
  async getTasks(query: TaskQuery = {}, options: { signal?: AbortSignal } = {}): Promise<TaskList> {
    const response = await this.transport.get('tasks', buildTaskQueryParams(query), {
      signal: options.signal,
    });
    return parseTaskList(response.data);
  }

  /**
   * Cancel enqueued or processing tasks. Without a filter, every enqueued and
   * processing task is cancelled.
   *
   * @returns The task that performs the cancellation
   */
  async cancelTasks(filter: TaskFilter = {}): Promise<TaskInfo> {
    const effective: TaskFilter = isEmptyFilter(filter)
      ? { statuses: ['enqueued', 'processing'] }
      : filter;
    this.logger.info('Cancelling tasks', { filter: buildTaskFilterParams(effective) });
    const response = await this.transport.post('tasks/cancel', undefined, buildTaskFilterParams(effective));
    return parseTaskInfo(response.data);
  }

  /**
   * Delete finished tasks from the history. Without a filter, every task is selected.
   *
   * @returns The task that performs the deletion
   */
  async deleteTasks(filter: TaskFilter = {}): Promise<TaskInfo> {
    const effective: TaskFilter = isEmptyFilter(filter) ? { statuses: [...TASK_STATUSES] } : filter;
    this.logger.info('Deleting tasks', { filter: buildTaskFilterParams(effective) });
    const response = await this.transport.delete('tasks', undefined, buildTaskFilterParams(effective));
    return parseTaskInfo(response.data);
  }

  /**
   * Wait for one task to reach a terminal state
   */
  async waitForTask(uid: number, options?: WaitOptions): Promise<Task> {
    return this.poller.waitForTask(uid, options);
  }

  /**
   * Wait for several tasks; results follow the order of `uids`
   */
  async waitForTasks(uids: readonly number[], options?: WaitOptions): Promise<Task[]> {
    return this.poller.waitForTasks(uids, options);
  }
}
