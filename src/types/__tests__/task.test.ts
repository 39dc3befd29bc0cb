import { describe, it, expect } from 'vitest';
import { isTerminalStatus, parseTaskInfo, parseTimestamp, TASK_STATUSES } from '../task.js';
import { InvalidResponseError } from '../../errors/types.js';

describe('parseTimestamp', () => {
  it('should drop digits past milliseconds', () => {
    expect(parseTimestamp('2024-05-01T10:00:00.123456789Z')).toEqual(new Date('2024-05-01T10:00:00.123Z'));
  });

  it('should accept timestamps without fractions', () => {
    expect(parseTimestamp('2024-05-01T10:00:00Z')).toEqual(new Date('2024-05-01T10:00:00.000Z'));
  });

  it('should return undefined for garbage', () => {
    expect(parseTimestamp('yesterday')).toBeUndefined();
  });
});

describe('isTerminalStatus', () => {
  it('should treat only succeeded, failed and canceled as terminal', () => {
    expect(TASK_STATUSES.filter(isTerminalStatus)).toEqual(['succeeded', 'failed', 'canceled']);
  });
});

describe('parseTaskInfo', () => {
  it('should keep unknown task types', () => {
    const info = parseTaskInfo({
      taskUid: 1,
      indexUid: null,
      status: 'enqueued',
      type: 'exportCreation',
      enqueuedAt: '2024-05-01T10:00:00Z',
    });

    expect(info.type).toBe('exportCreation');
  });

  it('should name every invalid field', () => {
    expect(() => parseTaskInfo({ taskUid: 'x', status: 'enqueued', type: 'indexCreation', enqueuedAt: 'soon' })).toThrow(
      InvalidResponseError
    );
    expect(() => parseTaskInfo({ status: 'enqueued', type: 'indexCreation', enqueuedAt: '2024-05-01T10:00:00Z' })).toThrow(
      'Invalid task info in response: taskUid: Required'
    );
  });
});
