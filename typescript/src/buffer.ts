import type { Codec } from "./codec";
import {
  BufferUnderflowError,
  InvalidBoundsError,
  NonBinaryByteError,
  OutOfBoundsError,
  ReadOnlyBufferError,
} from "./errors";
import { f32, f64, i16, i32, i64, i8, u16, u32, u64, u8 } from "./primitives";
import type { FixedWidthCodec } from "./primitives";
import { string } from "./string";
import { zigzagDecode, zigzagDecode64, zigzagEncode, zigzagEncode64 } from "./types";
import { decodeVarInt, decodeVarLong, encodeVarInt, encodeVarLong } from "./varint";

/**
 * The `[lower, upper]` window of offsets a buffer currently exposes.
 */
export type Bounds = readonly [lower: number, upper: number];

/**
 * CursorBuffer is an owned, growable byte buffer read and written
 * sequentially from an internal offset.
 *
 * Invariant: `lower <= offset <= upper <= length`. Every operation that would
 * break it throws a `BytewireError` and leaves the buffer unchanged.
 *
 * @example
 * ```typescript
 * const buffer = new CursorBuffer();
 * buffer.writeUint16(7);
 * buffer.writeString("hello");
 *
 * buffer.setOffset(0);
 * buffer.readUint16(); // 7
 * buffer.readString(); // "hello"
 * ```
 */
export class CursorBuffer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private lower: number;
  private upper: number;
  private readOnly: boolean;

  /**
   * Creates a buffer holding a copy of `data`, with bounds covering all of it.
   */
  constructor(data: Uint8Array = new Uint8Array(0)) {
    this.buffer = Uint8Array.from(data);
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
    this.lower = 0;
    this.upper = this.buffer.length;
    this.readOnly = false;
  }

  /**
   * Returns the next read/write position.
   */
  get offset(): number {
    return this.pos;
  }

  get bounds(): Bounds {
    return [this.lower, this.upper];
  }

  /**
   * Returns the length of the underlying storage.
   */
  get length(): number {
    return this.buffer.length;
  }

  /**
   * Returns the number of bytes between the offset and the upper bound.
   */
  get remaining(): number {
    return this.upper - this.pos;
  }

  get hasMore(): boolean {
    return this.pos < this.upper;
  }

  /**
   * Returns true for read-only views created by {@link clamp}.
   */
  get isView(): boolean {
    return this.readOnly;
  }

  /**
   * Returns a copy of the bytes inside the bounds.
   */
  bytes(): Uint8Array {
    return this.buffer.slice(this.lower, this.upper);
  }

  /**
   * Grows the storage and the upper bound by `bytes` zero bytes.
   */
  allocate(bytes: number): void {
    if (this.readOnly) {
      throw new ReadOnlyBufferError("allocate");
    }
    if (!Number.isInteger(bytes) || bytes < 0) {
      throw new InvalidBoundsError(`Cannot allocate ${bytes} bytes`);
    }
    if (bytes === 0) {
      return;
    }

    const grown = new Uint8Array(this.buffer.length + bytes);
    grown.set(this.buffer);
    this.buffer = grown;
    this.view = new DataView(this.buffer.buffer);
    this.upper = this.buffer.length;
  }

  /**
   * Moves the offset. Returns false, changing nothing, when `offset` is
   * outside the bounds.
   */
  setOffset(offset: number): boolean {
    if (!Number.isInteger(offset) || !this.isWithinBounds(offset)) {
      return false;
    }
    this.pos = offset;
    return true;
  }

  /**
   * Advances the offset and returns the new value.
   */
  increaseOffset(amount: number = 1): number {
    const next = this.pos + amount;
    if (!Number.isInteger(amount) || !this.isWithinBounds(next)) {
      throw this.outOfBounds(`Offset ${next}`);
    }
    this.pos = next;
    return this.pos;
  }

  /**
   * Returns a read-only view of the same storage whose lower bound is
   * `lower`. This buffer is not changed.
   *
   * The view shares storage rather than copying it: writes made here through
   * {@link set} or the write methods are visible in the view until this buffer
   * reallocates on growth.
   */
  clamp(lower: number): CursorBuffer {
    if (!Number.isInteger(lower) || lower < this.lower || lower > this.upper) {
      throw new InvalidBoundsError(
        `Cannot clamp to ${lower}: must be within [${this.lower}, ${this.upper}]`
      );
    }

    const clamped = new CursorBuffer();
    clamped.buffer = this.buffer;
    clamped.view = this.view;
    clamped.lower = lower;
    clamped.upper = this.upper;
    clamped.pos = Math.max(this.pos, lower);
    clamped.readOnly = true;
    return clamped;
  }

  isWithinBounds(offset: number): boolean {
    return offset >= this.lower && offset <= this.upper && offset <= this.buffer.length;
  }

  /**
   * Returns the byte at `index`.
   */
  at(index: number): number {
    this.checkIndex(index);
    return this.buffer[index];
  }

  /**
   * Overwrites the byte at `index`.
   */
  set(index: number, value: number): void {
    if (this.readOnly) {
      throw new ReadOnlyBufferError("write");
    }
    this.checkIndex(index);
    this.buffer[index] = value & 0xff;
  }

  /**
   * Returns a copy of the bytes in `[start, end)`.
   */
  slice(start: number, end: number): Uint8Array {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start > end ||
      !this.isWithinBounds(start) ||
      !this.isWithinBounds(end)
    ) {
      throw this.outOfBounds(`Range ${start}..${end}`);
    }
    return this.buffer.slice(start, end);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < this.lower || index >= this.upper) {
      throw this.outOfBounds(`Index ${index}`);
    }
  }

  /**
   * Names the clamp only when the window is narrower than storage; a full
   * window is reported against the buffer length.
   */
  private outOfBounds(subject: string): OutOfBoundsError {
    if (this.lower !== 0 || this.upper !== this.buffer.length) {
      return new OutOfBoundsError(
        `${subject} is out of bounds due to clamp [${this.lower}, ${this.upper}]`
      );
    }
    return new OutOfBoundsError(
      `${subject} is out of bounds of ${this.buffer.length} byte buffer`
    );
  }

  /**
   * Claims `needed` readable bytes at the offset and returns where they start.
   */
  private take(needed: number): number {
    if (needed > this.remaining) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
    const start = this.pos;
    this.pos += needed;
    return start;
  }

  /**
   * Claims `needed` writable bytes at the offset, growing the buffer if the
   * write runs past the upper bound, and returns where they start.
   */
  private reserve(needed: number): number {
    if (this.readOnly) {
      throw new ReadOnlyBufferError("write");
    }
    if (needed > this.remaining) {
      this.allocate(needed - this.remaining);
    }
    const start = this.pos;
    this.pos += needed;
    return start;
  }

  // Reads

  readUint8(): number {
    return this.buffer[this.take(1)];
  }

  readInt8(): number {
    return this.view.getInt8(this.take(1));
  }

  /**
   * Reads a boolean byte, rejecting anything but 0 or 1.
   */
  readBool(): boolean {
    if (this.remaining < 1) {
      throw new BufferUnderflowError(1, this.remaining);
    }
    const byte = this.buffer[this.pos];
    if (byte > 1) {
      throw new NonBinaryByteError(byte);
    }
    this.pos += 1;
    return byte === 1;
  }

  readUint16(): number {
    return this.view.getUint16(this.take(2));
  }

  readUint16LE(): number {
    return this.view.getUint16(this.take(2), true);
  }

  readInt16(): number {
    return this.view.getInt16(this.take(2));
  }

  readInt16LE(): number {
    return this.view.getInt16(this.take(2), true);
  }

  readUint32(): number {
    return this.view.getUint32(this.take(4));
  }

  readUint32LE(): number {
    return this.view.getUint32(this.take(4), true);
  }

  readInt32(): number {
    return this.view.getInt32(this.take(4));
  }

  readInt32LE(): number {
    return this.view.getInt32(this.take(4), true);
  }

  readUint64(): bigint {
    return this.view.getBigUint64(this.take(8));
  }

  readUint64LE(): bigint {
    return this.view.getBigUint64(this.take(8), true);
  }

  readInt64(): bigint {
    return this.view.getBigInt64(this.take(8));
  }

  readInt64LE(): bigint {
    return this.view.getBigInt64(this.take(8), true);
  }

  /**
   * Reads a big-endian 64-bit signed integer as a JavaScript number.
   *
   * WARNING: JavaScript numbers can only safely represent integers
   * up to Number.MAX_SAFE_INTEGER (2^53-1). Values beyond that lose
   * precision; use readInt64() for the exact value.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readInt64AsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.readInt64();
    if (warnOnPrecisionLoss) {
      if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
          value < BigInt(Number.MIN_SAFE_INTEGER)) {
        console.warn(
          `bytewire: int64 value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Use readInt64() for full precision.`
        );
      }
    }
    return Number(value);
  }

  /**
   * Reads a big-endian 64-bit unsigned integer as a JavaScript number.
   * See {@link readInt64AsNumber} for the precision caveat.
   */
  readUint64AsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.readUint64();
    if (warnOnPrecisionLoss && value > BigInt(Number.MAX_SAFE_INTEGER)) {
      console.warn(
        `bytewire: uint64 value ${value} exceeds safe integer range ` +
        `(max ${Number.MAX_SAFE_INTEGER}), precision may be lost. ` +
        `Use readUint64() for full precision.`
      );
    }
    return Number(value);
  }

  readFloat32(): number {
    return this.view.getFloat32(this.take(4));
  }

  readFloat32LE(): number {
    return this.view.getFloat32(this.take(4), true);
  }

  readFloat64(): number {
    return this.view.getFloat64(this.take(8));
  }

  readFloat64LE(): number {
    return this.view.getFloat64(this.take(8), true);
  }

  /**
   * Reads `length` raw bytes as a copy.
   */
  readBytes(length: number): Uint8Array {
    if (!Number.isInteger(length) || length < 0) {
      throw new InvalidBoundsError(`Cannot read ${length} bytes`);
    }
    const start = this.take(length);
    return this.buffer.slice(start, start + length);
  }

  /**
   * Reads a string framed as `[u16 BE byte length][UTF-8]`.
   */
  readString(): string {
    return this.read(string);
  }

  /**
   * Reads an unsigned 32-bit varint.
   */
  readVarInt(): number {
    const { value, bytesRead } = decodeVarInt(this.window(), this.pos);
    this.pos += bytesRead;
    return value;
  }

  /**
   * Reads a ZigZag-encoded signed 32-bit varint.
   */
  readSignedVarInt(): number {
    return zigzagDecode(this.readVarInt());
  }

  /**
   * Reads an unsigned 64-bit varint.
   */
  readVarLong(): bigint {
    const { value, bytesRead } = decodeVarLong(this.window(), this.pos);
    this.pos += bytesRead;
    return value;
  }

  /**
   * Reads a ZigZag-encoded signed 64-bit varint.
   */
  readSignedVarLong(): bigint {
    return zigzagDecode64(this.readVarLong());
  }

  /**
   * Decodes a value with `codec` at the offset and advances past it.
   */
  read<T>(codec: Codec<T>): T {
    const cursor = { position: this.pos };
    const value = codec.compose(this.window(), cursor);
    this.pos = cursor.position;
    return value;
  }

  /**
   * Storage up to the upper bound, so composes see absolute offsets.
   */
  private window(): Uint8Array {
    return this.buffer.subarray(0, this.upper);
  }

  // Writes

  writeUint8(value: number): void {
    this.put(u8, value);
  }

  writeInt8(value: number): void {
    this.put(i8, value);
  }

  writeBool(value: boolean): void {
    this.writeUint8(value ? 1 : 0);
  }

  writeUint16(value: number): void {
    this.put(u16, value);
  }

  writeUint16LE(value: number): void {
    this.put(u16, value, true);
  }

  writeInt16(value: number): void {
    this.put(i16, value);
  }

  writeInt16LE(value: number): void {
    this.put(i16, value, true);
  }

  writeUint32(value: number): void {
    this.put(u32, value);
  }

  writeUint32LE(value: number): void {
    this.put(u32, value, true);
  }

  writeInt32(value: number): void {
    this.put(i32, value);
  }

  writeInt32LE(value: number): void {
    this.put(i32, value, true);
  }

  writeUint64(value: bigint): void {
    this.put(u64, value);
  }

  writeUint64LE(value: bigint): void {
    this.put(u64, value, true);
  }

  writeInt64(value: bigint): void {
    this.put(i64, value);
  }

  writeInt64LE(value: bigint): void {
    this.put(i64, value, true);
  }

  writeFloat32(value: number): void {
    this.put(f32, value);
  }

  writeFloat32LE(value: number): void {
    this.put(f32, value, true);
  }

  writeFloat64(value: number): void {
    this.put(f64, value);
  }

  writeFloat64LE(value: number): void {
    this.put(f64, value, true);
  }

  writeBytes(data: Uint8Array): void {
    const start = this.reserve(data.length);
    this.buffer.set(data, start);
  }

  writeString(value: string): void {
    this.write(string, value);
  }

  writeVarInt(value: number): void {
    this.writeBytes(encodeVarInt(value));
  }

  writeSignedVarInt(value: number): void {
    this.writeVarInt(zigzagEncode(value));
  }

  writeVarLong(value: bigint): void {
    this.writeBytes(encodeVarLong(value));
  }

  writeSignedVarLong(value: bigint): void {
    this.writeVarLong(zigzagEncode64(value));
  }

  /**
   * Encodes `value` with a fixed-width codec, so typed writes reject the same
   * out-of-range values the codec does, then writes it at the offset.
   */
  private put<T>(codec: FixedWidthCodec<T>, value: T, littleEndian: boolean = false): void {
    const bytes = codec.parse(value);
    this.writeBytes(littleEndian ? bytes.reverse() : bytes);
  }

  /**
   * Encodes `value` with `codec` at the offset.
   */
  write<T>(codec: Codec<T>, value: T): void {
    this.writeBytes(codec.parse(value));
  }
}
