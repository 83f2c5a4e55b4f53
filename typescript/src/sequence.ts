import { BaseCodec, concatBytes, ensureAvailable } from "./codec";
import type { Codec } from "./codec";
import { DecodeError, EncodeError } from "./errors";
import { le } from "./endian";
import type { LE } from "./endian";
import { u16 } from "./primitives";
import { MaxUint16, MaxUint32 } from "./types";
import type { Cursor } from "./types";
import { encodeVarInt, varInt } from "./varint";

/** Default upper limit on the element count of a decoded sequence. */
export const DEFAULT_MAX_SEQUENCE_LENGTH = 1 << 24;

/**
 * Element count framing.
 *
 * `varint` is the default for every element type. `u16` is the fixed 16-bit
 * big-endian count used on the wire for sequences of little-endian values.
 */
export type LengthPrefix = "varint" | "u16";

/**
 * Options for sequence codecs.
 */
export interface SequenceOptions {
  /** Count framing. Default: "varint" */
  lengthPrefix?: LengthPrefix;
  /** Largest element count accepted on encode and decode. Default: 2^24 */
  maxLength?: number;
}

/**
 * Homogeneous sequence: `[count][element]...`.
 */
export class SequenceCodec<T> extends BaseCodec<T[]> {
  readonly name: string;
  readonly fixedSize = undefined;
  readonly element: Codec<T>;
  readonly lengthPrefix: LengthPrefix;
  readonly maxLength: number;

  constructor(element: Codec<T>, options: SequenceOptions = {}) {
    super();
    this.element = element;
    this.lengthPrefix = options.lengthPrefix ?? "varint";
    const prefixLimit = this.lengthPrefix === "u16" ? MaxUint16 : MaxUint32;
    this.maxLength = Math.min(options.maxLength ?? DEFAULT_MAX_SEQUENCE_LENGTH, prefixLimit);
    this.name = `${element.name}[]`;
  }

  parse(values: T[]): Uint8Array {
    if (values.length > this.maxLength) {
      throw new EncodeError(
        `${this.name} of ${values.length} elements exceeds the limit of ${this.maxLength}`
      );
    }
    const parts: Uint8Array[] = [this.parseCount(values.length)];
    for (const value of values) {
      parts.push(this.element.parse(value));
    }
    return concatBytes(parts);
  }

  compose(source: Uint8Array, cursor: Cursor): T[] {
    const count = this.composeCount(source, cursor);
    if (count > this.maxLength) {
      throw new DecodeError(
        `${this.name} declares ${count} elements, more than the limit of ${this.maxLength}`
      );
    }

    // Fail before decoding anything when fixed-size elements cannot fit.
    if (this.element.fixedSize !== undefined) {
      ensureAvailable(source, cursor, count * this.element.fixedSize);
    }

    const values: T[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.element.compose(source, cursor));
    }
    return values;
  }

  private parseCount(count: number): Uint8Array {
    return this.lengthPrefix === "u16" ? u16.parse(count) : encodeVarInt(count);
  }

  private composeCount(source: Uint8Array, cursor: Cursor): number {
    return this.lengthPrefix === "u16" ? u16.compose(source, cursor) : varInt.compose(source, cursor);
  }
}

/**
 * Sequence with a variable-length-integer count, unless `options` say otherwise.
 */
export function sequence<T>(element: Codec<T>, options: SequenceOptions = {}): SequenceCodec<T> {
  return new SequenceCodec(element, options);
}

/**
 * Sequence of little-endian values framed by a u16 big-endian count.
 */
export function leSequence<T>(
  element: Codec<T>,
  options: Omit<SequenceOptions, "lengthPrefix"> = {}
): SequenceCodec<LE<T>> {
  return new SequenceCodec(le(element), { ...options, lengthPrefix: "u16" });
}
