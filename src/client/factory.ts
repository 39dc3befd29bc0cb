/**
 * Client factories and scoped acquisition.
 * @module client/factory
 */

import { fromEnv } from '../config/env.js';
import { SearchClient, type SearchClientInit } from './client.js';

/**
 * Create a client from explicit options
 */
export function createClient(init: SearchClientInit = {}): SearchClient {
  return new SearchClient(init);
}

/**
 * Create a client from `SEARCH_*` environment variables. Values in
 * `overrides` take precedence.
 */
export function createClientFromEnv(
  overrides: SearchClientInit = {},
  env: NodeJS.ProcessEnv = process.env
): SearchClient {
  const fromEnvironment = fromEnv(env);
  return new SearchClient({
    ...fromEnvironment,
    ...overrides,
    taskPolling: { ...fromEnvironment.taskPolling, ...overrides.taskPolling },
  });
}

/**
 * Run `fn` with a client that is closed on every exit path.
 *
 * @example
 * ```typescript
 * const tasks = await withClient({ url: 'http://localhost:7700' }, (client) =>
 *   client.index('books').addDocumentsAndWait(books)
 * );
 * ```
 */
export async function withClient<T>(
  init: SearchClientInit,
  fn: (client: SearchClient) => Promise<T>
): Promise<T> {
  const client = new SearchClient(init);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
