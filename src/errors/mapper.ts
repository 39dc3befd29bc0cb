import { SearchClientError, toError } from './base.js';
import { ApiError, CommunicationError } from './types.js';

/**
 * HTTP response structure for error mapping
 */
export interface HttpErrorResponse {
  status: number;
  /** Decoded response body, if any */
  data?: unknown;
  headers?: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Extract error message from response data
 */
function extractErrorMessage(status: number, data: unknown): string {
  if (typeof data === 'string' && data.trim().length > 0) {
    return data;
  }
  if (isRecord(data)) {
    const message = stringField(data, 'message') ?? stringField(data, 'error');
    if (message) {
      return message;
    }
  }
  return `Request failed with status ${status}`;
}

/**
 * Map an HTTP error response to an ApiError.
 *
 * The server reports errors as `{ message, code, type, link }`; any of these may be absent.
 */
export function mapHttpError(response: HttpErrorResponse): ApiError {
  const data = response.data;
  const record = isRecord(data) ? data : undefined;

  return new ApiError({
    statusCode: response.status,
    message: extractErrorMessage(response.status, data),
    code: record ? stringField(record, 'code') : undefined,
    type: record ? stringField(record, 'type') : undefined,
    link: record ? stringField(record, 'link') : undefined,
    details: record,
  });
}

/**
 * Map a failure raised below HTTP (DNS, refused connection, reset socket) to a
 * CommunicationError. Errors that are already typed pass through unchanged.
 */
export function mapNetworkError(error: unknown): SearchClientError {
  if (error instanceof SearchClientError) {
    return error;
  }
  const cause = toError(error);
  return new CommunicationError(`Unable to reach the server: ${cause.message}`, cause);
}
