import { SearchClientError, type ErrorCategory } from './base.js';
import type { Task, TaskInfo } from '../types/task.js';

/**
 * Error thrown when a caller passes an invalid argument (e.g., a non-positive batch size).
 * Raised locally before any network call is made.
 */
export class InvalidArgumentError extends SearchClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'validation',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Error thrown when the client is misconfigured or used after it was closed.
 * Not retryable as it requires configuration changes.
 */
export class ConfigurationError extends SearchClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'configuration',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Transport errors
// ============================================================================

/**
 * Base class for every failure that happens while talking to the server.
 * The client surfaces these unchanged and never retries them.
 */
export class TransportError extends SearchClientError {
  constructor(options: {
    category?: ErrorCategory;
    message: string;
    statusCode?: number;
    isRetryable?: boolean;
    details?: Record<string, unknown>;
    cause?: Error;
  }) {
    super({
      category: options.category ?? 'network',
      message: options.message,
      statusCode: options.statusCode,
      isRetryable: options.isRetryable,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'TransportError';
  }
}

/**
 * Error returned by the server as a non-2xx response.
 * Carries the server's error code, type and documentation link when present.
 */
export class ApiError extends TransportError {
  /** Server error code, e.g. `index_not_found` */
  public readonly code?: string;
  /** Server error type, e.g. `invalid_request` */
  public readonly type?: string;
  /** Documentation link for the error code */
  public readonly link?: string;

  constructor(options: {
    statusCode: number;
    message: string;
    code?: string;
    type?: string;
    link?: string;
    details?: Record<string, unknown>;
  }) {
    super({
      category: 'api',
      message: options.message,
      statusCode: options.statusCode,
      isRetryable: options.statusCode === 429 || options.statusCode >= 500,
      details: options.details,
    });
    this.name = 'ApiError';
    this.code = options.code;
    this.type = options.type;
    this.link = options.link;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      code: this.code,
      type: this.type,
      link: this.link,
    };
  }
}

/**
 * Error thrown when the server cannot be reached or the connection fails mid-request.
 */
export class CommunicationError extends TransportError {
  constructor(message: string, cause?: Error) {
    super({
      category: 'network',
      message,
      isRetryable: true,
      cause,
    });
    this.name = 'CommunicationError';
  }
}

/**
 * Error thrown when a single HTTP request exceeds its timeout.
 */
export class RequestTimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, cause?: Error) {
    super({
      category: 'timeout',
      message: `Request timed out after ${timeoutMs}ms`,
      isRetryable: true,
      details: { timeoutMs },
      cause,
    });
    this.name = 'RequestTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when a response body does not have the expected shape.
 */
export class InvalidResponseError extends SearchClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      category: 'api',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'InvalidResponseError';
  }
}

/**
 * Error thrown when a document file cannot be read as a list of documents.
 */
export class InvalidDocumentError extends SearchClientError {
  constructor(message: string, options: { details?: Record<string, unknown>; cause?: Error } = {}) {
    super({
      category: 'validation',
      message,
      isRetryable: false,
      details: options.details,
      cause: options.cause,
    });
    this.name = 'InvalidDocumentError';
  }
}

// ============================================================================
// Task errors
// ============================================================================

/**
 * Error thrown when a waited-on task reaches the `failed` state and the caller
 * asked for failures to be raised.
 */
export class TaskFailedError extends SearchClientError {
  public readonly task: Task;
  /** Server error code, e.g. `invalid_document_id` */
  public readonly code?: string;
  public readonly type?: string;
  public readonly link?: string;

  constructor(task: Task) {
    super({
      category: 'task',
      message: `Task ${task.uid} failed: ${task.error?.message ?? 'unknown error'}`,
      isRetryable: false,
      details: { taskUid: task.uid, indexUid: task.indexUid, taskType: task.type },
    });
    this.name = 'TaskFailedError';
    this.task = task;
    this.code = task.error?.code;
    this.type = task.error?.type;
    this.link = task.error?.link;
  }
}

/**
 * Error thrown when tasks have not reached a terminal state before the wait deadline.
 * The tasks may still complete on the server; nothing is cancelled.
 */
export class TaskTimeoutError extends SearchClientError {
  public readonly timeoutMs: number;
  /** Uids still enqueued or processing at the deadline */
  public readonly pendingUids: number[];
  /** Tasks that had already reached a terminal state */
  public readonly resolved: Task[];

  constructor(options: { timeoutMs: number; pendingUids: number[]; resolved?: Task[] }) {
    super({
      category: 'timeout',
      message: `Timed out after ${options.timeoutMs}ms waiting for task(s) ${options.pendingUids.join(', ')}`,
      isRetryable: false,
      details: { timeoutMs: options.timeoutMs, pendingUids: options.pendingUids },
    });
    this.name = 'TaskTimeoutError';
    this.timeoutMs = options.timeoutMs;
    this.pendingUids = options.pendingUids;
    this.resolved = options.resolved ?? [];
  }
}

/**
 * Error thrown when the caller aborts an operation through its AbortSignal.
 */
export class CancelledError extends SearchClientError {
  constructor(message = 'Operation was cancelled', cause?: Error) {
    super({
      category: 'cancelled',
      message,
      isRetryable: false,
      cause,
    });
    this.name = 'CancelledError';
  }
}

/**
 * Every task resolved but at least one ended `failed` or `canceled`.
 */
export class TasksFailedError extends SearchClientError {
  /** All tasks, in submission order */
  public readonly tasks: Task[];
  /** Tasks that ended `failed` or `canceled` */
  public readonly unsuccessful: Task[];

  constructor(tasks: Task[], unsuccessful: Task[]) {
    super({
      category: 'task',
      message: `${unsuccessful.length} of ${tasks.length} task(s) did not succeed: ${unsuccessful
        .map((t) => `${t.uid} (${t.status})`)
        .join(', ')}`,
      isRetryable: false,
      details: { unsuccessfulUids: unsuccessful.map((t) => t.uid) },
    });
    this.name = 'TasksFailedError';
    this.tasks = tasks;
    this.unsuccessful = unsuccessful;
  }
}

// ============================================================================
// Batch errors
// ============================================================================

/**
 * A batch the server accepted before the submission failed.
 */
export interface SubmittedBatch {
  batchIndex: number;
  taskInfo: TaskInfo;
}

/**
 * A batch whose request failed.
 */
export interface FailedBatch {
  batchIndex: number;
  error: Error;
}

/**
 * Error thrown when one or more batch requests fail during a batched submission.
 * Batches already accepted stay accepted; nothing is rolled back.
 */
export class BatchSubmissionError extends SearchClientError {
  public readonly totalBatches: number;
  /** Accepted batches, ordered by batch index */
  public readonly submitted: SubmittedBatch[];
  /** Failed batches, ordered by batch index */
  public readonly failures: FailedBatch[];
  /** Batches that were never sent */
  public readonly unsentBatchIndexes: number[];

  constructor(options: {
    totalBatches: number;
    submitted: SubmittedBatch[];
    failures: FailedBatch[];
    unsentBatchIndexes: number[];
    /** Defaults to the first failure's error */
    cause?: Error;
  }) {
    const first = options.failures[0];
    const cause = options.cause ?? first?.error;
    const reason = first
      ? `failed at batch ${first.batchIndex + 1} of ${options.totalBatches}`
      : 'was interrupted';
    super({
      category: 'batch',
      message:
        `Batch submission ${reason}: ${cause?.message ?? 'unknown error'} ` +
        `(${options.submitted.length} accepted, ${options.unsentBatchIndexes.length} not sent)`,
      isRetryable: false,
      details: {
        totalBatches: options.totalBatches,
        failedBatchIndexes: options.failures.map((f) => f.batchIndex),
        unsentBatchIndexes: options.unsentBatchIndexes,
      },
      cause,
    });
    this.name = 'BatchSubmissionError';
    this.totalBatches = options.totalBatches;
    this.submitted = options.submitted;
    this.failures = options.failures;
    this.unsentBatchIndexes = options.unsentBatchIndexes;
  }

  /**
   * Index of the lowest-numbered failing batch
   */
  get failedBatchIndex(): number {
    return this.failures[0]?.batchIndex ?? -1;
  }

  /**
   * Task handles of the accepted batches, in batch order
   */
  get taskInfos(): TaskInfo[] {
    return this.submitted.map((s) => s.taskInfo);
  }
}
