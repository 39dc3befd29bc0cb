/**
 * Batch chunking utilities for splitting document sequences into requests.
 */

import { InvalidArgumentError } from '../errors/types.js';
import { DEFAULT_MAX_PAYLOAD_SIZE } from '../config/types.js';
import { defaultCodec, type JsonCodec } from '../transport/codec.js';
import type { BatchingPolicy, DocumentBatch } from './types.js';

/** Bytes taken by the enclosing `[` and `]` of a JSON array payload */
const ARRAY_FRAMING_BYTES = 2;

/** Bytes taken by the `,` between two array elements */
const SEPARATOR_BYTES = 1;

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`, {
      [name]: value,
    });
  }
}

/**
 * Split an array into chunks of a fixed number of items
 *
 * @param array - Items to chunk
 * @param batchSize - Maximum number of items per chunk
 *
 * @example
 * ```typescript
 * chunkByCount([d1, d2, d3, d4, d5], 2);
 * // [[d1, d2], [d3, d4], [d5]]
 * ```
 */
export function chunkByCount<T>(array: readonly T[], batchSize: number): T[][] {
  assertPositiveInteger(batchSize, 'batchSize');

  if (array.length === 0) {
    return [];
  }

  const chunks: T[][] = [];

  for (let i = 0; i < array.length; i += batchSize) {
    chunks.push(array.slice(i, i + batchSize));
  }

  return chunks;
}

/**
 * Greedily pack items into chunks whose JSON array payload stays within
 * `maxPayloadSize` bytes.
 *
 * The size of a chunk is counted exactly as the payload the default codec
 * produces: two bracket bytes, each item's serialized bytes, and one comma
 * between items. An item too large to fit even on its own is sent as its own
 * chunk; it is never dropped or split.
 *
 * @returns Chunks with the byte size of each payload
 */
export function chunkByPayloadSize<T>(
  array: readonly T[],
  maxPayloadSize: number,
  codec: JsonCodec = defaultCodec
): Array<{ items: T[]; byteSize: number }> {
  assertPositiveInteger(maxPayloadSize, 'maxPayloadSize');

  const chunks: Array<{ items: T[]; byteSize: number }> = [];
  let current: T[] = [];
  let currentSize = ARRAY_FRAMING_BYTES;

  for (const item of array) {
    const itemSize = codec.serialize(item).byteLength;
    const added = current.length === 0 ? itemSize : itemSize + SEPARATOR_BYTES;

    if (current.length > 0 && currentSize + added > maxPayloadSize) {
      chunks.push({ items: current, byteSize: currentSize });
      current = [item];
      currentSize = ARRAY_FRAMING_BYTES + itemSize;
    } else {
      current.push(item);
      currentSize += added;
    }
  }

  if (current.length > 0) {
    chunks.push({ items: current, byteSize: currentSize });
  }

  return chunks;
}

/**
 * Check a policy's parameters without splitting anything
 *
 * @throws {InvalidArgumentError} If a size is not a positive integer
 */
export function validatePolicy(policy: BatchingPolicy): void {
  if (policy.mode === 'fixed') {
    assertPositiveInteger(policy.batchSize, 'batchSize');
  } else if (policy.mode === 'auto' && policy.maxPayloadSize !== undefined) {
    assertPositiveInteger(policy.maxPayloadSize, 'maxPayloadSize');
  }
}

/**
 * Split items into indexed batches according to a policy.
 * Concatenating the batches in index order reproduces the input.
 *
 * @example
 * ```typescript
 * const batches = createBatches(documents, BatchingPolicy.fixed(100));
 * batches.forEach((batch) => {
 *   console.log(`Batch ${batch.index}: ${batch.items.length} documents`);
 * });
 * ```
 */
export function createBatches<T>(
  items: readonly T[],
  policy: BatchingPolicy,
  codec: JsonCodec = defaultCodec
): DocumentBatch<T>[] {
  validatePolicy(policy);

  if (items.length === 0) {
    return [];
  }

  switch (policy.mode) {
    case 'none':
      return [{ index: 0, items: [...items] }];
    case 'fixed':
      return chunkByCount(items, policy.batchSize).map((chunk, index) => ({
        index,
        items: chunk,
      }));
    case 'auto':
      return chunkByPayloadSize(items, policy.maxPayloadSize ?? DEFAULT_MAX_PAYLOAD_SIZE, codec).map(
        (chunk, index) => ({ index, items: chunk.items, byteSize: chunk.byteSize })
      );
  }
}
