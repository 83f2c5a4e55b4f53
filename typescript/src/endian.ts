import { BaseCodec, concatBytes, ensureAvailable } from "./codec";
import type { Codec } from "./codec";
import type { Cursor } from "./types";

/**
 * Marks a value whose wire bytes are little-endian.
 *
 * The wire form is the byte-reversed canonical (big-endian) encoding of the
 * wrapped value.
 */
export class LE<T> {
  readonly value: T;

  constructor(value: T) {
    this.value = value;
  }

  /**
   * Returns the wrapped value.
   */
  inner(): T {
    return this.value;
  }
}

/**
 * Returns a reversed copy of `bytes`.
 */
export function reverseBytes(bytes: Uint8Array): Uint8Array {
  return Uint8Array.from(bytes).reverse();
}

/**
 * Little-endian adapter around a big-endian codec.
 *
 * Decoding reverses the inner value's span back into big-endian order. The
 * span is `fixedSize` bytes when the inner codec has one and the rest of the
 * source otherwise, so a variable-size value only decodes when it ends the
 * source.
 */
export class LittleEndianCodec<T> extends BaseCodec<LE<T>> {
  readonly name: string;
  readonly fixedSize: number | undefined;
  readonly inner: Codec<T>;

  constructor(inner: Codec<T>) {
    super();
    this.inner = inner;
    this.name = `LE<${inner.name}>`;
    this.fixedSize = inner.fixedSize;
  }

  parse(value: LE<T>): Uint8Array {
    return this.inner.parse(value.value).reverse();
  }

  compose(source: Uint8Array, cursor: Cursor): LE<T> {
    const start = cursor.position;
    const size = this.inner.fixedSize;

    if (size !== undefined) {
      ensureAvailable(source, cursor, size);
      const value = this.inner.compose(reverseBytes(source.subarray(start, start + size)), {
        position: 0,
      });
      cursor.position = start + size;
      return new LE(value);
    }

    // Variable-size inner codecs see absolute positions, so the swapped tail
    // is placed after the untouched prefix of the source.
    const swapped = concatBytes([source.subarray(0, start), reverseBytes(source.subarray(start))]);
    return new LE(this.inner.compose(swapped, cursor));
  }
}

/**
 * Wraps a codec so its values travel in little-endian order.
 */
export function le<T>(inner: Codec<T>): LittleEndianCodec<T> {
  return new LittleEndianCodec(inner);
}
