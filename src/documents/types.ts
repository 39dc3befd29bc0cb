/**
 * Document submission types.
 */

import type { BatchingPolicy, DocumentBatch } from '../batch/types.js';
import type { DispatchMode } from '../config/types.js';
import type { WaitOptions } from '../tasks/poller.js';
import type { JsonCodec } from '../transport/codec.js';
import type { TaskInfo } from '../types/task.js';

/**
 * Sends one batch and returns the task the server queued for it
 */
export type SendBatch<T> = (batch: DocumentBatch<T>) => Promise<TaskInfo>;

/**
 * Options for a batched submission
 */
export interface SubmitOptions {
  /** How to split the input; one request for everything when unset */
  batching?: BatchingPolicy;
  /** Codec used to measure auto-sized batches and to encode bodies */
  codec?: JsonCodec;
  /** Overrides the client's dispatch mode */
  dispatch?: DispatchMode;
  /** Cap on in-flight requests in concurrent dispatch; unbounded when unset */
  maxConcurrency?: number;
  /** Stops launching batches and cancels in-flight requests */
  signal?: AbortSignal;
}

/**
 * Options for a submission followed by a wait on every resulting task
 */
export interface SubmitAndWaitOptions extends SubmitOptions {
  wait?: Omit<WaitOptions, 'throwOnFailure'>;
}
