/**
 * bytewire - deterministic binary codecs and a cursor buffer
 *
 * Values convert to and from a canonical big-endian byte form through
 * composable codecs that read against a caller-owned cursor.
 *
 * @example
 * ```typescript
 * import { concatBytes, createCursor, string, u16, CursorBuffer } from 'bytewire';
 *
 * // Encoding
 * const data = concatBytes([u16.parse(7), string.parse("hello")]);
 *
 * // Decoding
 * const cursor = createCursor();
 * const id = u16.compose(data, cursor);      // 7
 * const name = string.compose(data, cursor); // "hello"
 *
 * // Or through a buffer
 * const buffer = new CursorBuffer(data);
 * buffer.readUint16();  // 7
 * buffer.readString();  // "hello"
 * ```
 */

// Core types
export type { Cursor } from "./types";
export {
  createCursor,
  MaxUint16,
  MaxUint32,
  MaxUint64,
  MaxUint128,
  MinInt32,
  MaxInt32,
  MinInt64,
  MaxInt64,
  MinInt128,
  MaxInt128,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";

// Errors
export {
  BytewireError,
  EncodeError,
  DecodeError,
  BufferUnderflowError,
  NonBinaryByteError,
  InvalidUtf8Error,
  UnknownAddressTagError,
  VarIntOverflowError,
  OutOfBoundsError,
  InvalidBoundsError,
  ReadOnlyBufferError,
  UnrecoverableError,
} from "./errors";

// Codec protocol
export type { Codec, CodecType } from "./codec";
export { BaseCodec, concatBytes, ensureAvailable, marshal, unmarshal } from "./codec";

// Primitives
export {
  FixedWidthCodec,
  BoolCodec,
  u8,
  u16,
  u32,
  u64,
  u128,
  i8,
  i16,
  i32,
  i64,
  i128,
  f32,
  f64,
  bool,
} from "./primitives";

// Endianness
export { LE, LittleEndianCodec, le, reverseBytes } from "./endian";

// Strings
export type { StringCodecOptions } from "./string";
export { StringCodec, createStringCodec, decodeUtf8, string } from "./string";

// Sequences
export type { LengthPrefix, SequenceOptions } from "./sequence";
export { SequenceCodec, sequence, leSequence, DEFAULT_MAX_SEQUENCE_LENGTH } from "./sequence";

// Network addresses
export type { SocketAddress, SocketAddressV4, SocketAddressV6 } from "./address";
export {
  SocketAddressCodec,
  socketAddress,
  parseIpv4,
  parseIpv6,
  formatIpv6,
  IPV4_TAG,
  IPV6_TAG,
  IPV4_ENCODED_SIZE,
  IPV6_ENCODED_SIZE,
} from "./address";

// Variable-length integers
export type { VarIntResult } from "./varint";
export {
  MAX_VARINT_BYTES,
  MAX_VARLONG_BYTES,
  encodeVarInt,
  decodeVarInt,
  varIntLength,
  encodeVarLong,
  decodeVarLong,
  varLongLength,
  VarIntCodec,
  VarLongCodec,
  varInt,
  varLong,
} from "./varint";

// Cursor buffer
export type { Bounds } from "./buffer";
export { CursorBuffer } from "./buffer";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
