/**
 * Variable-length integers.
 *
 * Each byte carries 7 bits of the value, lowest group first. The top bit of a
 * byte is set when more bytes follow.
 */

import { BaseCodec } from "./codec";
import { BufferUnderflowError, EncodeError, VarIntOverflowError } from "./errors";
import { MaxUint32, MaxUint64 } from "./types";
import type { Cursor } from "./types";

/**
 * Maximum number of bytes for a 32-bit varint: ceil(32/7).
 */
export const MAX_VARINT_BYTES = 5;

/**
 * Maximum number of bytes for a 64-bit varint: ceil(64/7).
 */
export const MAX_VARLONG_BYTES = 10;

/**
 * Result of decoding a varint from a byte source.
 */
export interface VarIntResult<T> {
  value: T;
  bytesRead: number;
}

function assertUint32(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MaxUint32) {
    throw new EncodeError(`Varint value ${value} is outside 0..${MaxUint32}`);
  }
}

function assertUint64(value: bigint): void {
  if (value < 0n || value > MaxUint64) {
    throw new EncodeError(`Varlong value ${value} is outside 0..${MaxUint64}`);
  }
}

/**
 * Returns the number of bytes `encodeVarInt(value)` produces.
 */
export function varIntLength(value: number): number {
  assertUint32(value);
  let length = 1;
  while (value > 0x7f) {
    value = Math.floor(value / 128);
    length++;
  }
  return length;
}

/**
 * Encodes an unsigned 32-bit integer.
 */
export function encodeVarInt(value: number): Uint8Array {
  const out = new Uint8Array(varIntLength(value));
  let pos = 0;
  while (value > 0x7f) {
    out[pos++] = (value & 0x7f) | 0x80;
    value >>>= 7;
  }
  out[pos] = value;
  return out;
}

/**
 * Decodes an unsigned 32-bit integer starting at `offset`.
 */
export function decodeVarInt(source: Uint8Array, offset: number = 0): VarIntResult<number> {
  let result = 0;
  let shift = 0;

  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const pos = offset + i;
    if (pos >= source.length) {
      throw new BufferUnderflowError(i + 1, Math.max(source.length - offset, 0));
    }
    const b = source[pos];

    // The 5th byte only has room for the top 4 bits of a 32-bit value.
    if (i === MAX_VARINT_BYTES - 1 && (b & 0xf0) !== 0) {
      throw new VarIntOverflowError(MAX_VARINT_BYTES);
    }

    result |= (b & 0x7f) << shift;
    if ((b & 0x80) === 0) {
      return { value: result >>> 0, bytesRead: i + 1 };
    }
    shift += 7;
  }

  throw new VarIntOverflowError(MAX_VARINT_BYTES);
}

/**
 * Returns the number of bytes `encodeVarLong(value)` produces.
 */
export function varLongLength(value: bigint): number {
  assertUint64(value);
  let length = 1;
  while (value > 0x7fn) {
    value >>= 7n;
    length++;
  }
  return length;
}

/**
 * Encodes an unsigned 64-bit integer.
 */
export function encodeVarLong(value: bigint): Uint8Array {
  const out = new Uint8Array(varLongLength(value));
  let pos = 0;
  while (value > 0x7fn) {
    out[pos++] = Number(value & 0x7fn) | 0x80;
    value >>= 7n;
  }
  out[pos] = Number(value);
  return out;
}

/**
 * Decodes an unsigned 64-bit integer starting at `offset`.
 */
export function decodeVarLong(source: Uint8Array, offset: number = 0): VarIntResult<bigint> {
  let result = 0n;
  let shift = 0n;

  for (let i = 0; i < MAX_VARLONG_BYTES; i++) {
    const pos = offset + i;
    if (pos >= source.length) {
      throw new BufferUnderflowError(i + 1, Math.max(source.length - offset, 0));
    }
    const b = source[pos];

    // The 10th byte can only contribute bit 63.
    if (i === MAX_VARLONG_BYTES - 1 && b > 1) {
      throw new VarIntOverflowError(MAX_VARLONG_BYTES);
    }

    result |= BigInt(b & 0x7f) << shift;
    if ((b & 0x80) === 0) {
      return { value: result, bytesRead: i + 1 };
    }
    shift += 7n;
  }

  throw new VarIntOverflowError(MAX_VARLONG_BYTES);
}

/**
 * Unsigned 32-bit varint codec.
 */
export class VarIntCodec extends BaseCodec<number> {
  readonly name = "varint";
  readonly fixedSize = undefined;

  parse(value: number): Uint8Array {
    return encodeVarInt(value);
  }

  compose(source: Uint8Array, cursor: Cursor): number {
    const { value, bytesRead } = decodeVarInt(source, cursor.position);
    cursor.position += bytesRead;
    return value;
  }
}

/**
 * Unsigned 64-bit varint codec.
 */
export class VarLongCodec extends BaseCodec<bigint> {
  readonly name = "varlong";
  readonly fixedSize = undefined;

  parse(value: bigint): Uint8Array {
    return encodeVarLong(value);
  }

  compose(source: Uint8Array, cursor: Cursor): bigint {
    const { value, bytesRead } = decodeVarLong(source, cursor.position);
    cursor.position += bytesRead;
    return value;
  }
}

export const varInt = new VarIntCodec();
export const varLong = new VarLongCodec();
