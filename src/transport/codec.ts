/**
 * JSON codecs used to encode request bodies and decode responses.
 * @module transport/codec
 */

import { InvalidArgumentError } from '../errors/types.js';

/**
 * Encodes values to UTF-8 JSON bytes and back. Swap in a custom codec to
 * support values the default serializer cannot represent.
 */
export interface JsonCodec {
  serialize(value: unknown): Uint8Array;
  deserialize(bytes: Uint8Array): unknown;
}

/**
 * Options for the default codec
 */
export interface DefaultJsonCodecOptions {
  /** Passed to JSON.stringify */
  replacer?: (this: unknown, key: string, value: unknown) => unknown;
  /** Passed to JSON.parse */
  reviver?: (this: unknown, key: string, value: unknown) => unknown;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Codec built on the platform JSON implementation.
 *
 * @example
 * ```typescript
 * // Send bigint ids as strings
 * const codec = new DefaultJsonCodec({
 *   replacer: (_key, value) => (typeof value === 'bigint' ? value.toString() : value),
 * });
 * ```
 */
export class DefaultJsonCodec implements JsonCodec {
  private readonly replacer?: DefaultJsonCodecOptions['replacer'];
  private readonly reviver?: DefaultJsonCodecOptions['reviver'];

  constructor(options: DefaultJsonCodecOptions = {}) {
    this.replacer = options.replacer;
    this.reviver = options.reviver;
  }

  serialize(value: unknown): Uint8Array {
    let text: string | undefined;
    try {
      text = JSON.stringify(value, this.replacer);
    } catch (error) {
      throw new InvalidArgumentError(
        `Value cannot be serialized to JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    if (text === undefined) {
      throw new InvalidArgumentError('Value cannot be serialized to JSON');
    }
    return encoder.encode(text);
  }

  deserialize(bytes: Uint8Array): unknown {
    const text = decoder.decode(bytes);
    return this.reviver ? JSON.parse(text, this.reviver) : JSON.parse(text);
  }
}

/**
 * Shared default codec instance
 */
export const defaultCodec: JsonCodec = new DefaultJsonCodec();
