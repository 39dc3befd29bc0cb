/**
 * Pooled HTTP transport.
 *
 * Uses undici's Pool to reuse keep-alive connections to the search server.
 * The pool is acquired when the transport is constructed and released once
 * by `close()`.
 *
 * @module transport/pool
 */

import { Pool } from 'undici';
import { BaseHttpTransport } from './http.js';
import type { TransportOptions, WireRequest, WireResponse } from './types.js';

/**
 * Default pool configuration values.
 */
const DEFAULT_CONNECTIONS = 10;
const DEFAULT_KEEP_ALIVE_TIMEOUT_MS = 60000;

/**
 * Options for the pooled transport
 */
export interface UndiciTransportOptions extends TransportOptions {
  /** Maximum concurrent connections to the origin */
  connections?: number;
  /** Idle keep-alive timeout in milliseconds */
  keepAliveTimeoutMs?: number;
}

/**
 * Convert undici response headers to a flat lower-cased record
 */
export function normalizeHeaders(
  raw: Record<string, string | string[] | undefined>
): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      headers[key.toLowerCase()] = value.join(', ');
    }
  }
  return headers;
}

/**
 * HTTP transport backed by an undici connection pool.
 *
 * @example
 * ```typescript
 * const transport = new UndiciHttpTransport({
 *   baseUrl: 'http://localhost:7700',
 *   apiKey: 'test-key',
 *   connections: 20,
 * });
 *
 * try {
 *   const response = await transport.get('/health');
 *   console.log('Status:', response.status);
 * } finally {
 *   await transport.close();
 * }
 * ```
 */
export class UndiciHttpTransport extends BaseHttpTransport {
  private readonly pool: Pool;

  constructor(options: UndiciTransportOptions) {
    super(options);
    this.pool = new Pool(this.baseUrl.origin, {
      connections: options.connections ?? DEFAULT_CONNECTIONS,
      pipelining: 1,
      keepAliveTimeout: options.keepAliveTimeoutMs ?? DEFAULT_KEEP_ALIVE_TIMEOUT_MS,
    });
  }

  protected async send(request: WireRequest): Promise<WireResponse> {
    const response = await this.pool.request({
      method: request.method,
      path: request.path,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
    });

    const body = new Uint8Array(await response.body.arrayBuffer());

    return {
      status: response.statusCode,
      headers: normalizeHeaders(response.headers),
      body,
    };
  }

  protected async release(): Promise<void> {
    await this.pool.close();
  }
}
