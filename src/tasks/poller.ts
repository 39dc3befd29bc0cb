/**
 * Task Poller
 *
 * Polls task state until tasks reach a terminal state, a deadline passes,
 * or the caller cancels.
 * @module tasks/poller
 */

import { CancelledError, InvalidArgumentError, TaskFailedError, TaskTimeoutError } from '../errors/types.js';
import type { Logger } from '../observability/types.js';
import type { TaskPollingConfig } from '../config/types.js';
import { isTerminalStatus, type Task, type TaskList } from '../types/task.js';
import type { TaskQuery } from './params.js';

/**
 * Where the poller reads task state from
 */
export interface TaskSource {
  getTask(uid: number, options?: { signal?: AbortSignal }): Promise<Task>;
  getTasks(query: TaskQuery, options?: { signal?: AbortSignal }): Promise<TaskList>;
}

/**
 * Per-call wait options. Unset values fall back to the client's polling configuration.
 */
export interface WaitOptions {
  /** Overall limit, greater than zero; `null` waits indefinitely */
  timeoutMs?: number | null;
  intervalMs?: number;
  backoffMultiplier?: number;
  maxIntervalMs?: number;
  signal?: AbortSignal;
  /** Raise TaskFailedError when a task ends `failed` */
  throwOnFailure?: boolean;
}

/**
 * Monotonic-enough clock, replaceable in tests
 */
export interface Clock {
  now(): number;
}

const systemClock: Clock = { now: () => Date.now() };

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError('Wait for task was cancelled');
  }
}

/**
 * Sleep that rejects with CancelledError as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Wait for task was cancelled'));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Wait for task was cancelled'));
    };

    timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class TaskPoller {
  constructor(
    private readonly source: TaskSource,
    private readonly config: TaskPollingConfig,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Poll a single task until it is terminal.
   *
   * A `failed` task is returned as-is unless `throwOnFailure` is set.
   *
   * @throws {TaskTimeoutError} If the task is still pending at the deadline
   * @throws {TaskFailedError} If the task failed and `throwOnFailure` is set
   * @throws {CancelledError} If the signal aborts
   */
  async waitForTask(uid: number, options: WaitOptions = {}): Promise<Task> {
    const schedule = this.createSchedule(options);
    const { signal } = options;

    for (;;) {
      throwIfAborted(signal);
      const task = await this.source.getTask(uid, { signal });

      if (isTerminalStatus(task.status)) {
        this.logger.debug('Task reached terminal state', {
          taskUid: uid,
          status: task.status,
          polls: schedule.polls,
        });
        if (options.throwOnFailure && task.status === 'failed') {
          throw new TaskFailedError(task);
        }
        return task;
      }

      const delay = schedule.next();
      if (delay === undefined) {
        throw new TaskTimeoutError({ timeoutMs: schedule.timeoutMs ?? 0, pendingUids: [uid] });
      }
      await sleep(delay, signal);
    }
  }

  /**
   * Poll several tasks until all are terminal. Each tick issues one list
   * request for the uids still outstanding.
   *
   * @returns Tasks in the order of `uids`
   * @throws {TaskTimeoutError} Listing the uids still pending and the tasks already resolved
   * @throws {TaskFailedError} For the first failed task in input order, if `throwOnFailure` is set
   * @throws {CancelledError} If the signal aborts
   */
  async waitForTasks(uids: readonly number[], options: WaitOptions = {}): Promise<Task[]> {
    if (uids.length === 0) {
      return [];
    }

    const schedule = this.createSchedule(options);
    const { signal } = options;
    const wanted = [...new Set(uids)];
    const resolved = new Map<number, Task>();

    for (;;) {
      throwIfAborted(signal);
      const pending = wanted.filter((uid) => !resolved.has(uid));
      const page = await this.source.getTasks(
        { uids: pending, limit: pending.length },
        { signal }
      );

      for (const task of page.results) {
        if (isTerminalStatus(task.status) && !resolved.has(task.uid)) {
          resolved.set(task.uid, task);
        }
      }

      const stillPending = wanted.filter((uid) => !resolved.has(uid));
      if (stillPending.length === 0) {
        const tasks = collect(uids, resolved);
        this.logger.debug('Tasks reached terminal state', {
          tasks: tasks.length,
          polls: schedule.polls,
        });
        const failed = tasks.find((task) => task.status === 'failed');
        if (options.throwOnFailure && failed) {
          throw new TaskFailedError(failed);
        }
        return tasks;
      }

      const delay = schedule.next();
      if (delay === undefined) {
        throw new TaskTimeoutError({
          timeoutMs: schedule.timeoutMs ?? 0,
          pendingUids: stillPending,
          resolved: collect(uids, resolved),
        });
      }
      await sleep(delay, signal);
    }
  }

  private createSchedule(options: WaitOptions): PollSchedule {
    const timeoutMs = options.timeoutMs !== undefined ? options.timeoutMs : this.config.timeoutMs;
    if (timeoutMs !== null && !(timeoutMs > 0)) {
      throw new InvalidArgumentError('timeoutMs must be greater than 0; pass null to wait indefinitely', {
        timeoutMs,
      });
    }
    return new PollSchedule(
      {
        timeoutMs,
        intervalMs: options.intervalMs ?? this.config.intervalMs,
        backoffMultiplier: options.backoffMultiplier ?? this.config.backoffMultiplier,
        maxIntervalMs: options.maxIntervalMs ?? this.config.maxIntervalMs,
      },
      this.clock
    );
  }
}

/**
 * Tracks elapsed time and the current interval. `next()` returns the delay
 * before the next poll, or undefined once the deadline has passed. The delay
 * is clipped so the last poll lands on the deadline.
 */
export class PollSchedule {
  readonly timeoutMs: number | null;
  polls = 1;
  private interval: number;
  private readonly multiplier: number;
  private readonly maxIntervalMs: number;
  private readonly startedAt: number;

  constructor(
    config: TaskPollingConfig,
    private readonly clock: Clock
  ) {
    this.timeoutMs = config.timeoutMs;
    this.interval = config.intervalMs;
    this.multiplier = config.backoffMultiplier;
    this.maxIntervalMs = Math.max(config.maxIntervalMs, config.intervalMs);
    this.startedAt = clock.now();
  }

  next(): number | undefined {
    const elapsed = this.clock.now() - this.startedAt;
    if (this.timeoutMs !== null && elapsed >= this.timeoutMs) {
      return undefined;
    }
    const delay =
      this.timeoutMs === null ? this.interval : Math.min(this.interval, this.timeoutMs - elapsed);
    if (this.multiplier > 1) {
      this.interval = Math.min(this.interval * this.multiplier, this.maxIntervalMs);
    }
    this.polls++;
    return delay;
  }
}

function collect(uids: readonly number[], resolved: Map<number, Task>): Task[] {
  const tasks: Task[] = [];
  for (const uid of uids) {
    const task = resolved.get(uid);
    if (task) {
      tasks.push(task);
    }
  }
  return tasks;
}
