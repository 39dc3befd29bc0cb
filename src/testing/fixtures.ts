/**
 * Test fixtures for the search client.
 *
 * Helpers that build documents and wire-format task payloads.
 */

import type { Document } from '../types/document.js';
import type { TaskStatus } from '../types/task.js';
import { MockHttpTransport, MockSearchServer, type MockSearchServerOptions } from './mock.js';
import { ENQUEUED_AT, FINISHED_AT, STARTED_AT } from './mock.js';

/**
 * Generate `count` movie documents with ids starting at 1
 */
export function createTestDocuments(count: number, overrides?: Partial<Document>): Document[] {
  const documents: Document[] = [];
  for (let i = 0; i < count; i++) {
    documents.push({
      id: i + 1,
      title: `Movie ${i + 1}`,
      genre: i % 2 === 0 ? 'drama' : 'comedy',
      ...overrides,
    });
  }
  return documents;
}

/**
 * Wire-format TaskInfo as the server returns it when accepting a mutation
 */
export function taskInfoPayload(
  taskUid: number,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    taskUid,
    indexUid: 'movies',
    status: 'enqueued',
    type: 'documentAdditionOrUpdate',
    enqueuedAt: ENQUEUED_AT,
    ...overrides,
  };
}

/**
 * Wire-format Task in the given status
 */
export function taskPayload(
  uid: number,
  status: TaskStatus,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  const started = status !== 'enqueued';
  const finished = status === 'succeeded' || status === 'failed' || status === 'canceled';
  return {
    uid,
    batchUid: started ? uid : null,
    indexUid: 'movies',
    status,
    type: 'documentAdditionOrUpdate',
    canceledBy: null,
    details: { receivedDocuments: 1 },
    error: null,
    duration: finished ? 'PT0.2S' : null,
    enqueuedAt: ENQUEUED_AT,
    startedAt: started ? STARTED_AT : null,
    finishedAt: finished ? FINISHED_AT : null,
    ...overrides,
  };
}

/**
 * Mock transport with a task server installed
 */
export function createMockServer(options?: MockSearchServerOptions): {
  transport: MockHttpTransport;
  server: MockSearchServer;
} {
  const transport = new MockHttpTransport();
  const server = new MockSearchServer(options).install(transport);
  return { transport, server };
}
