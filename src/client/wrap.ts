/**
 * Index whatever a document-producing function returns.
 * @module client/wrap
 */

import { BatchingPolicy } from '../batch/types.js';
import type { WaitOptions } from '../tasks/poller.js';
import type { Document } from '../types/document.js';
import type { SearchClient, SearchClientInit } from './client.js';
import { withClient } from './factory.js';

export interface IndexReturnedDocumentsOptions {
  indexUid: string;
  /** Client to submit through; when absent a temporary client is created from `connection` */
  client?: SearchClient;
  connection?: SearchClientInit;
  /** One request for everything when unset */
  batching?: BatchingPolicy;
  primaryKey?: string;
  /** Wait for the resulting tasks; failures raise TasksFailedError */
  wait?: boolean | Omit<WaitOptions, 'throwOnFailure'>;
}

/**
 * Wrap an async function so the documents it returns are added to an index
 * before being handed back to the caller.
 *
 * @example
 * ```typescript
 * const loadBooks = indexReturnedDocuments(
 *   { indexUid: 'books', client, batching: BatchingPolicy.fixed(500), wait: true },
 *   async (path: string) => readBooks(path)
 * );
 * const books = await loadBooks('./books.json');
 * ```
 */
export function indexReturnedDocuments<A extends unknown[]>(
  options: IndexReturnedDocumentsOptions,
  fn: (...args: A) => Promise<Document[]>
): (...args: A) => Promise<Document[]> {
  const submit = async (client: SearchClient, documents: Document[]): Promise<void> => {
    const index = client.index(options.indexUid);
    if (options.wait) {
      await index.addDocumentsAndWait(documents, {
        batching: options.batching,
        primaryKey: options.primaryKey,
        wait: options.wait === true ? undefined : options.wait,
      });
    } else {
      await index.addDocumentsInBatches(documents, {
        batching: options.batching ?? BatchingPolicy.none(),
        primaryKey: options.primaryKey,
      });
    }
  };

  return async (...args: A): Promise<Document[]> => {
    const documents = await fn(...args);
    if (options.client) {
      await submit(options.client, documents);
    } else {
      await withClient(options.connection ?? {}, (client) => submit(client, documents));
    }
    return documents;
  };
}
