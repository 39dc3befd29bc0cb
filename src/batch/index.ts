/**
 * Batching module.
 *
 * Splits document sequences into contiguous, ordered batches, either by a
 * fixed count or by serialized payload size.
 *
 * @example
 * ```typescript
 * import { createBatches, BatchingPolicy } from './batch';
 *
 * const batches = createBatches(documents, BatchingPolicy.auto(10 * 1024 * 1024));
 * ```
 *
 * @module batch
 */

export { BatchingPolicy, type DocumentBatch } from './types.js';
export { chunkByCount, chunkByPayloadSize, createBatches, validatePolicy } from './chunker.js';
