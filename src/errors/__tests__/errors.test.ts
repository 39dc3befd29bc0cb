/**
 * Tests for the error hierarchy and mapping
 */

import { describe, it, expect } from 'vitest';
import { isErrorCategory, isRetryableError, isSearchClientError, toError } from '../base.js';
import { mapHttpError, mapNetworkError } from '../mapper.js';
import {
  ApiError,
  BatchSubmissionError,
  CancelledError,
  CommunicationError,
  InvalidArgumentError,
  RequestTimeoutError,
  TaskTimeoutError,
} from '../types.js';

describe('mapHttpError', () => {
  it('should carry the server error fields', () => {
    const error = mapHttpError({
      status: 400,
      data: {
        message: 'Invalid filter',
        code: 'invalid_document_filter',
        type: 'invalid_request',
        link: 'https://docs.example.test/errors#invalid_document_filter',
      },
    });

    expect(error).toBeInstanceOf(ApiError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Invalid filter');
    expect(error.code).toBe('invalid_document_filter');
    expect(error.category).toBe('api');
    expect(error.toJSON()).toMatchObject({
      name: 'ApiError',
      statusCode: 400,
      code: 'invalid_document_filter',
      type: 'invalid_request',
    });
  });

  it('should fall back to a text body or the status', () => {
    expect(mapHttpError({ status: 502, data: 'Bad Gateway' }).message).toBe('Bad Gateway');
    expect(mapHttpError({ status: 500 }).message).toBe('Request failed with status 500');
    expect(mapHttpError({ status: 401, data: { error: 'missing key' } }).message).toBe('missing key');
  });

  it('should flag rate limiting and server errors as retryable', () => {
    expect(mapHttpError({ status: 429 }).isRetryable).toBe(true);
    expect(mapHttpError({ status: 500 }).isRetryable).toBe(true);
    expect(mapHttpError({ status: 404 }).isRetryable).toBe(false);
  });
});

describe('mapNetworkError', () => {
  it('should pass typed errors through', () => {
    const timeout = new RequestTimeoutError(100);

    expect(mapNetworkError(timeout)).toBe(timeout);
  });

  it('should wrap other failures in CommunicationError', () => {
    const error = mapNetworkError(new Error('socket hang up'));

    expect(error).toBeInstanceOf(CommunicationError);
    expect(error.message).toBe('Unable to reach the server: socket hang up');
    expect(error.isRetryable).toBe(true);
  });

  it('should accept non-error values', () => {
    expect(mapNetworkError('reset').message).toBe('Unable to reach the server: reset');
  });
});

describe('guards', () => {
  it('should classify errors', () => {
    const error = new InvalidArgumentError('bad');

    expect(isSearchClientError(error)).toBe(true);
    expect(isSearchClientError(new Error('plain'))).toBe(false);
    expect(isErrorCategory(error, 'validation')).toBe(true);
    expect(isRetryableError(error)).toBe(false);
    expect(isRetryableError(new CommunicationError('down'))).toBe(true);
  });

  it('should normalize thrown values', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError('text').message).toBe('text');
    expect(toError(42).message).toBe('42');
  });
});

describe('toString', () => {
  it('should include the status and cause', () => {
    const error = new CancelledError('Request was cancelled', new Error('aborted'));

    expect(error.toString()).toBe('CancelledError: Request was cancelled\nCaused by: aborted');
    expect(new ApiError({ statusCode: 404, message: 'missing' }).toString()).toBe(
      'ApiError: missing (HTTP 404)'
    );
  });
});

describe('TaskTimeoutError', () => {
  it('should list the pending uids', () => {
    const error = new TaskTimeoutError({ timeoutMs: 5000, pendingUids: [4, 5] });

    expect(error.message).toBe('Timed out after 5000ms waiting for task(s) 4, 5');
    expect(error.resolved).toEqual([]);
    expect(error.category).toBe('timeout');
  });
});

describe('BatchSubmissionError', () => {
  it('should describe the partial outcome', () => {
    const error = new BatchSubmissionError({
      totalBatches: 3,
      submitted: [],
      failures: [{ batchIndex: 0, error: new Error('payload too large') }],
      unsentBatchIndexes: [1, 2],
    });

    expect(error.message).toBe(
      'Batch submission failed at batch 1 of 3: payload too large (0 accepted, 2 not sent)'
    );
    expect(error.details).toEqual({
      totalBatches: 3,
      failedBatchIndexes: [0],
      unsentBatchIndexes: [1, 2],
    });
    expect(error.cause?.message).toBe('payload too large');
  });
});
