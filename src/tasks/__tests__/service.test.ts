/**
 * Tests for the tasks service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TasksService } from '../service.js';
import { DEFAULT_TASK_POLLING } from '../../config/types.js';
import { ApiError, InvalidResponseError } from '../../errors/types.js';
import { NoopLogger } from '../../observability/logger.js';
import { MockHttpTransport } from '../../testing/mock.js';
import { taskInfoPayload, taskPayload } from '../../testing/fixtures.js';

describe('TasksService', () => {
  let transport: MockHttpTransport;
  let service: TasksService;

  beforeEach(() => {
    transport = new MockHttpTransport();
    service = new TasksService(transport, { ...DEFAULT_TASK_POLLING, intervalMs: 1 }, new NoopLogger());
  });

  describe('getTask', () => {
    it('should parse a task and its timestamps', async () => {
      transport.on('GET', '/tasks/:uid', () => ({ body: taskPayload(12, 'succeeded') }));

      const task = await service.getTask(12);

      expect(transport.requests[0].path).toBe('/tasks/12');
      expect(task).toEqual({
        uid: 12,
        batchUid: 12,
        indexUid: 'movies',
        status: 'succeeded',
        type: 'documentAdditionOrUpdate',
        canceledBy: null,
        details: { receivedDocuments: 1 },
        error: null,
        duration: 'PT0.2S',
        enqueuedAt: new Date('2024-05-01T10:00:00.123Z'),
        startedAt: new Date('2024-05-01T10:00:00.223Z'),
        finishedAt: new Date('2024-05-01T10:00:00.323Z'),
      });
    });

    it('should default fields older servers leave out', async () => {
      transport.on('GET', '/tasks/:uid', () => ({
        body: { uid: 1, status: 'enqueued', type: 'indexCreation', enqueuedAt: '2024-05-01T10:00:00Z' },
      }));

      const task = await service.getTask(1);

      expect(task.batchUid).toBeNull();
      expect(task.indexUid).toBeNull();
      expect(task.startedAt).toBeNull();
      expect(task.error).toBeNull();
    });

    it('should reject an unknown status', async () => {
      transport.on('GET', '/tasks/:uid', () => ({ body: taskPayload(1, 'succeeded', { status: 'paused' }) }));

      await expect(service.getTask(1)).rejects.toBeInstanceOf(InvalidResponseError);
    });

    it('should surface a missing task as ApiError', async () => {
      transport.on('GET', '/tasks/:uid', () => ({
        status: 404,
        body: { message: 'Task `99` not found.', code: 'task_not_found', type: 'invalid_request' },
      }));

      await expect(service.getTask(99)).rejects.toMatchObject({ name: 'ApiError', code: 'task_not_found' });
    });
  });

  describe('getTasks', () => {
    it('should send filters and pagination as query parameters', async () => {
      transport.on('GET', '/tasks', () => ({
        body: { results: [taskPayload(3, 'processing')], total: 1, limit: 20, from: 3, next: null },
      }));

      const page = await service.getTasks({
        indexUids: ['movies'],
        statuses: ['processing', 'enqueued'],
        types: [],
        limit: 20,
        reverse: true,
        afterEnqueuedAt: new Date('2024-05-01T00:00:00.000Z'),
      });

      expect(transport.requests[0].query).toEqual({
        indexUids: 'movies',
        statuses: 'processing,enqueued',
        afterEnqueuedAt: '2024-05-01T00:00:00.000Z',
        limit: '20',
        reverse: 'true',
      });
      expect(page.results.map((t) => t.uid)).toEqual([3]);
      expect(page.from).toBe(3);
      expect(page.next).toBeNull();
    });
  });

  describe('cancelTasks', () => {
    beforeEach(() => {
      transport.on('POST', '/tasks/cancel', () => ({
        status: 202,
        body: taskInfoPayload(50, { indexUid: null, type: 'taskCancelation' }),
      }));
    });

    it('should cancel pending tasks when no filter is given', async () => {
      const info = await service.cancelTasks();

      expect(transport.requests[0].query).toEqual({ statuses: 'enqueued,processing' });
      expect(transport.requests[0].body).toBeUndefined();
      expect(info.type).toBe('taskCancelation');
      expect(info.indexUid).toBeNull();
    });

    it('should cancel by uid', async () => {
      await service.cancelTasks({ uids: [1, 2] });

      expect(transport.requests[0].query).toEqual({ uids: '1,2' });
    });
  });

  describe('deleteTasks', () => {
    it('should select every status when no filter is given', async () => {
      transport.on('DELETE', '/tasks', () => ({
        status: 202,
        body: taskInfoPayload(51, { indexUid: null, type: 'taskDeletion' }),
      }));

      const info = await service.deleteTasks();

      expect(transport.requests[0].query).toEqual({
        statuses: 'enqueued,processing,succeeded,failed,canceled',
      });
      expect(info.taskUid).toBe(51);
    });

    it('should pass server errors through', async () => {
      transport.on('DELETE', '/tasks', () => ({
        status: 400,
        body: { message: 'Query parameters required', code: 'missing_task_filters', type: 'invalid_request' },
      }));

      await expect(service.deleteTasks({ beforeFinishedAt: new Date(0) })).rejects.toBeInstanceOf(ApiError);
    });
  });

  describe('waiting', () => {
    it('should wait through its poller', async () => {
      let reads = 0;
      transport.on('GET', '/tasks/:uid', () => {
        reads++;
        return { body: taskPayload(5, reads < 3 ? 'processing' : 'succeeded') };
      });

      const task = await service.waitForTask(5);

      expect(task.status).toBe('succeeded');
      expect(reads).toBe(3);
    });

    it('should wait for several tasks with one list request per tick', async () => {
      transport.on('GET', '/tasks', (request) => {
        const uids = (request.query['uids'] ?? '').split(',').map(Number);
        const results = uids.map((uid) => taskPayload(uid, 'succeeded'));
        return { body: { results, total: results.length, limit: results.length, from: null, next: null } };
      });

      const tasks = await service.waitForTasks([8, 6, 7]);

      expect(tasks.map((t) => t.uid)).toEqual([8, 6, 7]);
      expect(transport.requests).toHaveLength(1);
      expect(transport.requests[0].query).toEqual({ uids: '8,6,7', limit: '3' });
    });
  });
});
