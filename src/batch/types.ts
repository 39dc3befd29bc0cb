/**
 * Batch types.
 */

/**
 * How a document sequence is split into requests.
 *
 * - `none`: one request carrying everything
 * - `fixed`: at most `batchSize` documents per request
 * - `auto`: as many documents as fit in `maxPayloadSize` serialized bytes
 */
export type BatchingPolicy =
  | { readonly mode: 'none' }
  | { readonly mode: 'fixed'; readonly batchSize: number }
  | { readonly mode: 'auto'; readonly maxPayloadSize?: number };

/**
 * BatchingPolicy factory functions.
 */
export const BatchingPolicy = {
  none(): BatchingPolicy {
    return { mode: 'none' };
  },
  fixed(batchSize: number): BatchingPolicy {
    return { mode: 'fixed', batchSize };
  },
  auto(maxPayloadSize?: number): BatchingPolicy {
    return { mode: 'auto', maxPayloadSize };
  },
};

/**
 * A contiguous slice of the input, sent as one request
 */
export interface DocumentBatch<T> {
  /** Position of the batch in submission order */
  index: number;
  items: T[];
  /** Serialized size of the batch payload in bytes, when measured */
  byteSize?: number;
}
