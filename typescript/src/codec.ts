import { BufferUnderflowError, UnrecoverableError } from "./errors";
import type { Cursor } from "./types";

/**
 * A type's encode/decode rule.
 *
 * `parse` turns a value into a freshly allocated byte sequence. `compose`
 * reads a value from `source` starting at `cursor.position` and leaves the
 * cursor immediately after the last byte it consumed, length prefixes
 * included. Both throw a `BytewireError` on failure.
 */
export interface Codec<T> {
  /** Short name used in error messages. */
  readonly name: string;

  /** Encoded size in bytes when it does not depend on the value. */
  readonly fixedSize: number | undefined;

  parse(value: T): Uint8Array;

  compose(source: Uint8Array, cursor: Cursor): T;

  /** `parse`, rethrowing any failure as an `UnrecoverableError`. */
  fparse(value: T): Uint8Array;

  /** `compose`, rethrowing any failure as an `UnrecoverableError`. */
  fcompose(source: Uint8Array, cursor: Cursor): T;
}

/**
 * Value type carried by a codec.
 */
export type CodecType<C> = C extends Codec<infer T> ? T : never;

/**
 * Base class for codecs. Subclasses supply `parse` and `compose`.
 *
 * @example
 * ```typescript
 * interface Point { x: number; y: number }
 *
 * class PointCodec extends BaseCodec<Point> {
 *   readonly name = "Point";
 *   readonly fixedSize = 4;
 *
 *   parse(value: Point): Uint8Array {
 *     return concatBytes([i16.parse(value.x), i16.parse(value.y)]);
 *   }
 *
 *   compose(source: Uint8Array, cursor: Cursor): Point {
 *     return { x: i16.compose(source, cursor), y: i16.compose(source, cursor) };
 *   }
 * }
 * ```
 */
export abstract class BaseCodec<T> implements Codec<T> {
  abstract readonly name: string;
  abstract readonly fixedSize: number | undefined;

  abstract parse(value: T): Uint8Array;

  abstract compose(source: Uint8Array, cursor: Cursor): T;

  fparse(value: T): Uint8Array {
    try {
      return this.parse(value);
    } catch (e) {
      throw new UnrecoverableError(`${this.name}.parse`, e);
    }
  }

  fcompose(source: Uint8Array, cursor: Cursor): T {
    try {
      return this.compose(source, cursor);
    } catch (e) {
      throw new UnrecoverableError(`${this.name}.compose`, e);
    }
  }
}

/**
 * Throws unless `needed` bytes are readable at the cursor.
 */
export function ensureAvailable(source: Uint8Array, cursor: Cursor, needed: number): void {
  const available = Math.max(source.length - cursor.position, 0);
  if (needed > available) {
    throw new BufferUnderflowError(needed, available);
  }
}

/**
 * Concatenates byte sequences into a new array.
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let length = 0;
  for (const part of parts) {
    length += part.length;
  }
  const out = new Uint8Array(length);
  let pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

/**
 * Encodes a value with a codec.
 */
export function marshal<T>(codec: Codec<T>, value: T): Uint8Array {
  return codec.parse(value);
}

/**
 * Decodes a value from the start of `data`.
 */
export function unmarshal<T>(codec: Codec<T>, data: Uint8Array): T {
  return codec.compose(data, { position: 0 });
}
