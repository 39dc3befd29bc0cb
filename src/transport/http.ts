/**
 * HTTP Transport Implementation
 *
 * Base HTTP transport class with common functionality for making API requests.
 * @module transport/http
 */

import { gzip } from 'node:zlib';
import { promisify } from 'node:util';
import {
  CancelledError,
  CommunicationError,
  ConfigurationError,
  InvalidResponseError,
  RequestTimeoutError,
} from '../errors/types.js';
import { mapHttpError, mapNetworkError } from '../errors/mapper.js';
import { toError } from '../errors/base.js';
import { NoopLogger } from '../observability/logger.js';
import type { Logger } from '../observability/types.js';
import { defaultCodec, type JsonCodec } from './codec.js';
import type {
  HttpRequest,
  HttpResponse,
  HttpTransport,
  QueryParams,
  RequestOptions,
  TransportOptions,
  WireRequest,
  WireResponse,
} from './types.js';
import { buildPath } from './types.js';

const gzipAsync = promisify(gzip);
const encoder = new TextEncoder();

/** Library identifier sent in the User-Agent header */
export const USER_AGENT = 'search-index-client/0.1.0';

/**
 * Strings and bytes sent under an explicit content type go out as-is;
 * anything else is serialized by the codec.
 */
function encodeBody(value: unknown, codec: JsonCodec, contentType: string | undefined): Uint8Array {
  if (contentType !== undefined) {
    if (typeof value === 'string') {
      return encoder.encode(value);
    }
    if (value instanceof Uint8Array) {
      return value;
    }
  }
  return codec.serialize(value);
}

function parseBaseUrl(value: string): URL {
  try {
    return new URL(value);
  } catch {
    throw new ConfigurationError(`Invalid base URL: ${value}`);
  }
}

// ============================================================================
// Base HTTP Transport
// ============================================================================

/**
 * Abstract base class for HTTP transport implementations.
 *
 * Provides common functionality for:
 * - Path and query construction
 * - Header management and bearer authentication
 * - Body encoding through a codec, with optional gzip
 * - Timeout and caller cancellation
 * - Mapping failures to typed errors
 *
 * Subclasses supply the wire call and the resource release.
 */
export abstract class BaseHttpTransport implements HttpTransport {
  protected readonly baseUrl: URL;
  protected readonly apiKey?: string;
  protected readonly timeout: number;
  protected readonly defaultHeaders: Record<string, string>;
  protected readonly userAgent: string;
  protected readonly codec: JsonCodec;
  protected readonly logger: Logger;

  private isClosed = false;

  constructor(options: TransportOptions) {
    this.baseUrl = parseBaseUrl(options.baseUrl);
    this.apiKey = options.apiKey;
    this.timeout = options.timeout ?? 30000;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = [USER_AGENT, ...(options.clientAgents ?? [])].join('; ');
    this.codec = options.codec ?? defaultCodec;
    this.logger = options.logger ?? new NoopLogger();
  }

  // ============================================================================
  // Abstract Methods (must be implemented by subclasses)
  // ============================================================================

  /**
   * Perform the wire call. Rejections are mapped by the caller; implementations
   * only need to honour `request.signal`.
   */
  protected abstract send(request: WireRequest): Promise<WireResponse>;

  /**
   * Release underlying resources. Called at most once.
   */
  protected abstract release(): Promise<void>;

  // ============================================================================
  // Lifecycle
  // ============================================================================

  get closed(): boolean {
    return this.isClosed;
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    await this.release();
    this.logger.debug('Transport closed', { baseUrl: this.baseUrl.origin });
  }

  // ============================================================================
  // Public API Methods
  // ============================================================================

  /**
   * Send a generic HTTP request.
   *
   * @throws {ApiError} For non-2xx responses
   * @throws {CommunicationError} When the server cannot be reached
   * @throws {RequestTimeoutError} When the request exceeds its timeout
   * @throws {CancelledError} When the caller's signal aborts
   */
  async request(request: HttpRequest): Promise<HttpResponse> {
    if (this.isClosed) {
      throw new CommunicationError('Transport is closed');
    }
    if (request.signal?.aborted) {
      throw new CancelledError('Request was cancelled before it was sent');
    }

    const codec = request.codec ?? this.codec;
    const path = buildPath(this.baseUrl.pathname, request.path, request.query);
    const headers = this.buildHeaders(request.headers);

    let body: Uint8Array | undefined;
    if (request.body !== undefined) {
      body = encodeBody(request.body, codec, request.contentType);
      headers['Content-Type'] = request.contentType ?? 'application/json';
      if (request.compress) {
        body = await this.compress(body);
        headers['Content-Encoding'] = 'gzip';
      }
    }

    const timeout = request.timeout ?? this.timeout;
    const abort = this.createAbortController(timeout, request.signal);
    const startedAt = Date.now();

    this.logger.debug('HTTP request', {
      method: request.method,
      path,
      bytes: body?.byteLength ?? 0,
    });

    let wire: WireResponse;
    try {
      wire = await this.send({ method: request.method, path, headers, body, signal: abort.signal });
    } catch (error) {
      throw this.mapSendError(error, timeout, request.signal, abort.timedOut());
    } finally {
      abort.dispose();
    }

    this.logger.debug('HTTP response', {
      method: request.method,
      path,
      status: wire.status,
      durationMs: Date.now() - startedAt,
    });

    const ok = wire.status >= 200 && wire.status < 300;
    const data = this.decodeBody(wire.body, codec, ok);

    if (!ok) {
      throw mapHttpError({ status: wire.status, data, headers: wire.headers });
    }

    return { status: wire.status, headers: wire.headers, data };
  }

  /**
   * Send a GET request.
   */
  async get(path: string, query?: QueryParams, options?: RequestOptions): Promise<HttpResponse> {
    return this.request({ ...options, method: 'GET', path, query });
  }

  /**
   * Send a POST request.
   */
  async post(
    path: string,
    body?: unknown,
    query?: QueryParams,
    options?: RequestOptions
  ): Promise<HttpResponse> {
    return this.request({ ...options, method: 'POST', path, query, body });
  }

  /**
   * Send a PUT request.
   */
  async put(
    path: string,
    body?: unknown,
    query?: QueryParams,
    options?: RequestOptions
  ): Promise<HttpResponse> {
    return this.request({ ...options, method: 'PUT', path, query, body });
  }

  /**
   * Send a PATCH request.
   */
  async patch(
    path: string,
    body?: unknown,
    query?: QueryParams,
    options?: RequestOptions
  ): Promise<HttpResponse> {
    return this.request({ ...options, method: 'PATCH', path, query, body });
  }

  /**
   * Send a DELETE request.
   */
  async delete(
    path: string,
    body?: unknown,
    query?: QueryParams,
    options?: RequestOptions
  ): Promise<HttpResponse> {
    return this.request({ ...options, method: 'DELETE', path, query, body });
  }

  // ============================================================================
  // Protected Helper Methods
  // ============================================================================

  /**
   * Build request headers by merging defaults, auth headers, and custom headers.
   */
  protected buildHeaders(customHeaders?: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': this.userAgent,
      ...this.defaultHeaders,
    };
    if (this.apiKey) {
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }
    return { ...headers, ...customHeaders };
  }

  /**
   * Create an AbortController that fires on timeout or when the caller's signal aborts.
   */
  protected createAbortController(
    timeoutMs: number,
    external?: AbortSignal
  ): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const onAbort = (): void => controller.abort();
    external?.addEventListener('abort', onAbort, { once: true });

    return {
      signal: controller.signal,
      timedOut: () => timedOut,
      dispose: () => {
        clearTimeout(timer);
        external?.removeEventListener('abort', onAbort);
      },
    };
  }

  private async compress(body: Uint8Array): Promise<Uint8Array> {
    const compressed = await gzipAsync(body);
    return new Uint8Array(compressed.buffer, compressed.byteOffset, compressed.byteLength);
  }

  private mapSendError(
    error: unknown,
    timeout: number,
    external: AbortSignal | undefined,
    timedOut: boolean
  ): Error {
    if (external?.aborted) {
      return new CancelledError('Request was cancelled', toError(error));
    }
    if (timedOut) {
      return new RequestTimeoutError(timeout, toError(error));
    }
    return mapNetworkError(error);
  }

  /**
   * Decode a response body. Error responses that are not JSON keep their text.
   */
  private decodeBody(bytes: Uint8Array, codec: JsonCodec, ok: boolean): unknown {
    if (bytes.byteLength === 0) {
      return undefined;
    }
    try {
      return codec.deserialize(bytes);
    } catch (error) {
      if (!ok) {
        return new TextDecoder().decode(bytes);
      }
      throw new InvalidResponseError(`Failed to decode response body: ${toError(error).message}`);
    }
  }
}
