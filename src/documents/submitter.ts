/**
 * Mutation Submitter
 *
 * Splits a mutation into batches, sends one request per batch and returns
 * the queued tasks in batch order.
 * @module documents/submitter
 */

import { createBatches } from '../batch/chunker.js';
import { BatchingPolicy } from '../batch/types.js';
import type { DispatchMode } from '../config/types.js';
import {
  BatchSubmissionError,
  CancelledError,
  InvalidArgumentError,
  TasksFailedError,
  type FailedBatch,
  type SubmittedBatch,
} from '../errors/types.js';
import { toError } from '../errors/base.js';
import type { Logger } from '../observability/types.js';
import type { TaskPoller } from '../tasks/poller.js';
import type { Task, TaskInfo } from '../types/task.js';
import type { SendBatch, SubmitAndWaitOptions, SubmitOptions } from './types.js';

/**
 * Defaults taken from the client configuration
 */
export interface SubmitterDefaults {
  dispatchMode: DispatchMode;
  maxConcurrency?: number;
}

/**
 * Dispatches batches through a pool of workers. Sequential dispatch is a pool
 * of one, so both modes share ordering and failure behaviour:
 *
 * - results are returned in batch order whatever the completion order
 * - after the first failure no further batch is started; requests already in
 *   flight are allowed to settle and the partial outcome is reported in a
 *   BatchSubmissionError
 */
export class MutationSubmitter {
  constructor(
    private readonly poller: Pick<TaskPoller, 'waitForTasks'>,
    private readonly defaults: SubmitterDefaults,
    private readonly logger: Logger
  ) {}

  /**
   * Submit `items` in batches.
   *
   * @returns One TaskInfo per batch, in batch order; empty input sends nothing
   * @throws {InvalidArgumentError} If the batching policy or concurrency is invalid
   * @throws {BatchSubmissionError} If any batch request fails or the signal aborts
   */
  async submit<T>(
    items: readonly T[],
    send: SendBatch<T>,
    options: SubmitOptions = {}
  ): Promise<TaskInfo[]> {
    const concurrency = this.resolveConcurrency(options);
    const batches = createBatches(items, options.batching ?? BatchingPolicy.none(), options.codec);

    if (batches.length === 0) {
      return [];
    }
    const { signal } = options;
    if (signal?.aborted) {
      throw new CancelledError('Submission was cancelled before it started');
    }

    this.logger.debug('Submitting batches', {
      items: items.length,
      batches: batches.length,
      concurrency: Number.isFinite(concurrency) ? concurrency : 'unbounded',
    });

    const results = new Map<number, TaskInfo>();
    const failures: FailedBatch[] = [];
    let nextIndex = 0;
    let stopped = false;

    const worker = async (): Promise<void> => {
      while (!stopped && nextIndex < batches.length) {
        if (signal?.aborted) {
          stopped = true;
          return;
        }
        const batch = batches[nextIndex++];
        try {
          results.set(batch.index, await send(batch));
        } catch (error) {
          stopped = true;
          failures.push({ batchIndex: batch.index, error: toError(error) });
        }
      }
    };

    const workers = Math.min(concurrency, batches.length);
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const submitted: SubmittedBatch[] = [...results.entries()]
      .sort(([a], [b]) => a - b)
      .map(([batchIndex, taskInfo]) => ({ batchIndex, taskInfo }));

    if (failures.length === 0 && submitted.length === batches.length) {
      return submitted.map((s) => s.taskInfo);
    }

    failures.sort((a, b) => a.batchIndex - b.batchIndex);
    const unsentBatchIndexes: number[] = [];
    for (let i = nextIndex; i < batches.length; i++) {
      unsentBatchIndexes.push(i);
    }

    const error = new BatchSubmissionError({
      totalBatches: batches.length,
      submitted,
      failures,
      unsentBatchIndexes,
      cause: failures.length === 0 ? new CancelledError('Submission was cancelled') : undefined,
    });
    this.logger.warn('Batch submission stopped', {
      accepted: submitted.length,
      failed: failures.map((f) => f.batchIndex),
      unsent: unsentBatchIndexes.length,
      error: error.cause,
    });
    throw error;
  }

  /**
   * Submit `items`, then wait for every resulting task.
   *
   * @returns Terminal tasks in batch order
   * @throws {TasksFailedError} If any task ended `failed` or `canceled`
   * @throws {TaskTimeoutError} If tasks are still pending at the deadline
   */
  async submitAndWait<T>(
    items: readonly T[],
    send: SendBatch<T>,
    options: SubmitAndWaitOptions = {}
  ): Promise<Task[]> {
    const infos = await this.submit(items, send, options);
    if (infos.length === 0) {
      return [];
    }

    const tasks = await this.poller.waitForTasks(
      infos.map((info) => info.taskUid),
      { ...options.wait, signal: options.wait?.signal ?? options.signal }
    );

    const unsuccessful = tasks.filter((task) => task.status !== 'succeeded');
    if (unsuccessful.length > 0) {
      throw new TasksFailedError(tasks, unsuccessful);
    }
    return tasks;
  }

  private resolveConcurrency(options: SubmitOptions): number {
    const dispatch = options.dispatch ?? this.defaults.dispatchMode;
    if (dispatch === 'sequential') {
      return 1;
    }
    const max = options.maxConcurrency ?? this.defaults.maxConcurrency;
    if (max === undefined) {
      return Number.POSITIVE_INFINITY;
    }
    if (!Number.isInteger(max) || max <= 0) {
      throw new InvalidArgumentError(`maxConcurrency must be a positive integer, got ${max}`);
    }
    return max;
  }
}
