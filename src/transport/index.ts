/**
 * Transport Layer
 *
 * HTTP transport with pluggable codecs and a pooled undici implementation.
 * @module transport
 */

export type {
  HttpMethod,
  QueryValue,
  QueryParams,
  RequestOptions,
  HttpRequest,
  HttpResponse,
  WireRequest,
  WireResponse,
  HttpTransport,
  TransportOptions,
} from './types.js';
export { buildPath } from './types.js';
export {
  DefaultJsonCodec,
  defaultCodec,
  type JsonCodec,
  type DefaultJsonCodecOptions,
} from './codec.js';
export { BaseHttpTransport, USER_AGENT } from './http.js';
export { UndiciHttpTransport, normalizeHeaders, type UndiciTransportOptions } from './pool.js';
