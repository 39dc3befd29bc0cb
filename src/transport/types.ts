/**
 * Transport Types
 *
 * Type definitions for the HTTP transport layer.
 * @module transport/types
 */

import type { JsonCodec } from './codec.js';
import type { Logger } from '../observability/types.js';

/**
 * HTTP methods used by the client
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Query parameter value. Arrays are sent comma-separated; dates as ISO-8601.
 */
export type QueryValue =
  | string
  | number
  | boolean
  | Date
  | null
  | undefined
  | ReadonlyArray<string | number>;

export type QueryParams = Record<string, QueryValue>;

/**
 * Per-request options shared by the method helpers
 */
export interface RequestOptions {
  /** Additional headers for this request */
  headers?: Record<string, string>;
  /** Timeout override in milliseconds */
  timeout?: number;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Codec override for this request's body and response */
  codec?: JsonCodec;
  /** Gzip the request body */
  compress?: boolean;
  /** Content type of a pre-encoded body; string and byte bodies are then sent unchanged */
  contentType?: string;
}

/**
 * HTTP request configuration
 */
export interface HttpRequest extends RequestOptions {
  method: HttpMethod;
  /** Path relative to the base URL */
  path: string;
  query?: QueryParams;
  /** Body value, serialized by the codec */
  body?: unknown;
}

/**
 * Decoded HTTP response
 */
export interface HttpResponse {
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  /** Body decoded by the codec; undefined when empty */
  data: unknown;
}

/**
 * Wire-level request handed to a transport implementation
 */
export interface WireRequest {
  method: HttpMethod;
  /** Absolute path including prefix and query string */
  path: string;
  headers: Record<string, string>;
  body?: Uint8Array;
  signal: AbortSignal;
}

/**
 * Wire-level response returned by a transport implementation
 */
export interface WireResponse {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * HTTP transport interface
 */
export interface HttpTransport {
  readonly closed: boolean;

  request(request: HttpRequest): Promise<HttpResponse>;
  get(path: string, query?: QueryParams, options?: RequestOptions): Promise<HttpResponse>;
  post(path: string, body?: unknown, query?: QueryParams, options?: RequestOptions): Promise<HttpResponse>;
  put(path: string, body?: unknown, query?: QueryParams, options?: RequestOptions): Promise<HttpResponse>;
  patch(path: string, body?: unknown, query?: QueryParams, options?: RequestOptions): Promise<HttpResponse>;
  delete(path: string, body?: unknown, query?: QueryParams, options?: RequestOptions): Promise<HttpResponse>;

  /**
   * Release the underlying connections. Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Transport configuration options
 */
export interface TransportOptions {
  /** Server base URL */
  baseUrl: string;
  /** Bearer token */
  apiKey?: string;
  /** Default request timeout in milliseconds */
  timeout?: number;
  /** Headers sent on every request */
  defaultHeaders?: Record<string, string>;
  /** Extra user-agent segments */
  clientAgents?: string[];
  /** Default codec */
  codec?: JsonCodec;
  logger?: Logger;
}

function formatQueryValue(value: Exclude<QueryValue, null | undefined>): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return value.join(',');
}

/**
 * Build a request path from a prefix, a relative path and query parameters.
 * Null and undefined parameters are omitted.
 */
export function buildPath(prefix: string, path: string, query?: QueryParams): string {
  const base = prefix.replace(/\/+$/, '');
  const relative = path.replace(/^\/+/, '');
  let result = `${base}/${relative}`;

  if (query) {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      if (value === undefined || value === null) continue;
      params.append(key, formatQueryValue(value));
    }
    const queryString = params.toString();
    if (queryString) {
      result += `?${queryString}`;
    }
  }

  return result;
}
