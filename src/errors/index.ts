/**
 * Error handling module for the search client
 *
 * Every error raised by the library extends SearchClientError:
 *
 * - Local argument, configuration and document file errors
 * - Transport errors (API responses, unreachable server, request timeouts)
 * - Task errors (failed task, wait timeout, aggregate failure)
 * - Batch submission errors carrying the partial outcome
 * - Cancellation
 *
 * @module errors
 */

// Base error class and utilities
export {
  SearchClientError,
  type ErrorCategory,
  isSearchClientError,
  isRetryableError,
  isErrorCategory,
  toError,
} from './base.js';

// Specific error types
export {
  InvalidArgumentError,
  ConfigurationError,
  TransportError,
  ApiError,
  CommunicationError,
  RequestTimeoutError,
  InvalidResponseError,
  InvalidDocumentError,
  TaskFailedError,
  TaskTimeoutError,
  CancelledError,
  TasksFailedError,
  BatchSubmissionError,
  type SubmittedBatch,
  type FailedBatch,
} from './types.js';

// Error mapping
export { mapHttpError, mapNetworkError, type HttpErrorResponse } from './mapper.js';
