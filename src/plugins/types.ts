/**
 * Plugin hook types.
 * @module plugins/types
 */

import type { TaskInfo } from '../types/task.js';
import type { Document, DocumentId, SearchParams, SearchResults } from '../types/document.js';

/**
 * When a hook runs relative to the request
 */
export type PluginEvent = 'pre' | 'concurrent' | 'post';

/**
 * Operations that accept hooks
 */
export type PluginOperation =
  | 'addDocuments'
  | 'updateDocuments'
  | 'deleteDocument'
  | 'deleteDocuments'
  | 'deleteDocumentsByFilter'
  | 'deleteAllDocuments'
  | 'search';

/**
 * Document filter expression accepted by delete-by-filter
 */
export type DocumentFilter = string | Array<string | string[]>;

/**
 * Payload of a search call as seen by hooks
 */
export interface SearchRequest {
  query: string;
  params: SearchParams;
}

interface InvocationBase<P> {
  operation: PluginOperation;
  indexUid: string;
  payload: P;
}

/**
 * Context handed to a plugin's `run`. Post hooks also receive the result.
 */
export type PluginInvocation<P, R> =
  | (InvocationBase<P> & { event: 'pre' })
  | (InvocationBase<P> & { event: 'concurrent' })
  | (InvocationBase<P> & { event: 'post'; result: R });

/**
 * Replacement values returned by a hook. Pre hooks may replace the payload,
 * post hooks the result. Concurrent hook output is ignored.
 */
export interface PluginOutput<P, R> {
  payload?: P;
  result?: R;
}

/**
 * A hook attached to one or more index operations.
 *
 * @example
 * ```typescript
 * const stamp: Plugin<Document[], TaskInfo> = {
 *   name: 'stamp',
 *   preEvent: true,
 *   run: (ctx) => ({
 *     payload: ctx.payload.map((doc) => ({ ...doc, importedAt: '2024-01-01' })),
 *   }),
 * };
 * ```
 */
export interface Plugin<P, R> {
  /** Used in log messages */
  readonly name?: string;
  readonly preEvent?: boolean;
  readonly concurrentEvent?: boolean;
  readonly postEvent?: boolean;

  run(
    invocation: PluginInvocation<P, R>
  ): PluginOutput<P, R> | void | Promise<PluginOutput<P, R> | void>;
}

/**
 * Hooks registered per operation on an index
 */
export interface IndexPlugins {
  addDocuments?: Plugin<Document[], TaskInfo>[];
  updateDocuments?: Plugin<Document[], TaskInfo>[];
  deleteDocument?: Plugin<DocumentId, TaskInfo>[];
  deleteDocuments?: Plugin<DocumentId[], TaskInfo>[];
  deleteDocumentsByFilter?: Plugin<DocumentFilter, TaskInfo>[];
  deleteAllDocuments?: Plugin<null, TaskInfo>[];
  search?: Plugin<SearchRequest, SearchResults>[];
}
