import { EncodeError } from "./errors";

/**
 * Caller-owned read position shared across a sequence of `compose` calls.
 *
 * Codecs read from `position` and advance it past every byte they consume.
 * They never copy or keep a cursor.
 */
export interface Cursor {
  position: number;
}

/**
 * Creates a cursor starting at the given offset.
 */
export function createCursor(position: number = 0): Cursor {
  return { position };
}

/**
 * Integer bounds used by range checks.
 */
export const MaxUint16 = 0xffff;
export const MaxUint32 = 0xffffffff;
export const MaxUint64 = BigInt("0xffffffffffffffff");
export const MaxUint128 = (1n << 128n) - 1n;

export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MinInt128 = -(1n << 127n);
export const MaxInt128 = (1n << 127n) - 1n;

/**
 * Encode a signed integer using ZigZag encoding.
 * The result is an unsigned 32-bit value.
 * @throws EncodeError if n is not an integer in the 32-bit signed range
 */
export function zigzagEncode(n: number): number {
  if (!Number.isInteger(n) || n < MinInt32 || n > MaxInt32) {
    throw new EncodeError(`ZigZag value ${n} is outside ${MinInt32}..${MaxInt32}`);
  }
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws EncodeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new EncodeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return BigInt.asUintN(64, (n << 1n) ^ (n >> 63n));
}

/**
 * Decode a ZigZag encoded integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}
