/**
 * Search Index Client
 *
 * TypeScript client for a full-text search engine's HTTP API: index-scoped
 * document operations, batched submission with sequential or concurrent
 * dispatch, and waiting on the server's asynchronous tasks.
 *
 * @example
 * ```typescript
 * import { SearchClient, BatchingPolicy } from 'search-index-client';
 *
 * const client = new SearchClient({ url: 'http://localhost:7700', apiKey: 'test-key' });
 * try {
 *   await client.index('movies').addDocumentsAndWait(movies, {
 *     batching: BatchingPolicy.auto(),
 *   });
 * } finally {
 *   await client.close();
 * }
 * ```
 *
 * @module search-index-client
 */

// Client
export * from './client/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './errors/index.js';

// Data model
export * from './types/index.js';

// Batching and submission
export * from './batch/index.js';
export * from './documents/index.js';

// Tasks
export * from './tasks/index.js';

// Plugins
export * from './plugins/index.js';

// Transport
export * from './transport/index.js';

// Observability
export * from './observability/index.js';
