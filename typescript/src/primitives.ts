/**
 * Fixed-width primitive codecs.
 *
 * Integers and floats encode as their big-endian byte representation with no
 * length prefix. Widths up to 32 bits use `number`; 64 and 128-bit integers
 * use `bigint`.
 */

import { BaseCodec, ensureAvailable } from "./codec";
import { EncodeError, NonBinaryByteError } from "./errors";
import {
  MaxInt128,
  MaxInt64,
  MaxUint128,
  MaxUint64,
  MinInt128,
  MinInt64,
} from "./types";
import type { Cursor } from "./types";

const MASK_64 = MaxUint64;

type Check<T> = (name: string, value: T) => void;
type ViewWriter<T> = (view: DataView, value: T) => void;
type ViewReader<T> = (view: DataView) => T;

function integerRange(min: number, max: number): Check<number> {
  return (name, value) => {
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new EncodeError(`${name} value ${value} is outside ${min}..${max}`);
    }
  };
}

function bigintRange(min: bigint, max: bigint): Check<bigint> {
  return (name, value) => {
    if (value < min || value > max) {
      throw new EncodeError(`${name} value ${value} is outside ${min}..${max}`);
    }
  };
}

const anyNumber: Check<number> = () => {};

/**
 * Codec for a value stored in a fixed number of big-endian bytes.
 */
export class FixedWidthCodec<T> extends BaseCodec<T> {
  readonly name: string;
  readonly fixedSize: number;
  private readonly check: Check<T>;
  private readonly writeView: ViewWriter<T>;
  private readonly readView: ViewReader<T>;

  constructor(
    name: string,
    size: number,
    check: Check<T>,
    writeView: ViewWriter<T>,
    readView: ViewReader<T>
  ) {
    super();
    this.name = name;
    this.fixedSize = size;
    this.check = check;
    this.writeView = writeView;
    this.readView = readView;
  }

  parse(value: T): Uint8Array {
    this.check(this.name, value);
    const out = new Uint8Array(this.fixedSize);
    this.writeView(new DataView(out.buffer), value);
    return out;
  }

  compose(source: Uint8Array, cursor: Cursor): T {
    ensureAvailable(source, cursor, this.fixedSize);
    const view = new DataView(
      source.buffer,
      source.byteOffset + cursor.position,
      this.fixedSize
    );
    const value = this.readView(view);
    cursor.position += this.fixedSize;
    return value;
  }
}

export const u8 = new FixedWidthCodec<number>(
  "u8",
  1,
  integerRange(0, 0xff),
  (view, value) => view.setUint8(0, value),
  (view) => view.getUint8(0)
);

export const u16 = new FixedWidthCodec<number>(
  "u16",
  2,
  integerRange(0, 0xffff),
  (view, value) => view.setUint16(0, value),
  (view) => view.getUint16(0)
);

export const u32 = new FixedWidthCodec<number>(
  "u32",
  4,
  integerRange(0, 0xffffffff),
  (view, value) => view.setUint32(0, value),
  (view) => view.getUint32(0)
);

export const u64 = new FixedWidthCodec<bigint>(
  "u64",
  8,
  bigintRange(0n, MaxUint64),
  (view, value) => view.setBigUint64(0, value),
  (view) => view.getBigUint64(0)
);

export const u128 = new FixedWidthCodec<bigint>(
  "u128",
  16,
  bigintRange(0n, MaxUint128),
  (view, value) => {
    view.setBigUint64(0, value >> 64n);
    view.setBigUint64(8, value & MASK_64);
  },
  (view) => (view.getBigUint64(0) << 64n) | view.getBigUint64(8)
);

export const i8 = new FixedWidthCodec<number>(
  "i8",
  1,
  integerRange(-0x80, 0x7f),
  (view, value) => view.setInt8(0, value),
  (view) => view.getInt8(0)
);

export const i16 = new FixedWidthCodec<number>(
  "i16",
  2,
  integerRange(-0x8000, 0x7fff),
  (view, value) => view.setInt16(0, value),
  (view) => view.getInt16(0)
);

export const i32 = new FixedWidthCodec<number>(
  "i32",
  4,
  integerRange(-0x80000000, 0x7fffffff),
  (view, value) => view.setInt32(0, value),
  (view) => view.getInt32(0)
);

export const i64 = new FixedWidthCodec<bigint>(
  "i64",
  8,
  bigintRange(MinInt64, MaxInt64),
  (view, value) => view.setBigInt64(0, value),
  (view) => view.getBigInt64(0)
);

export const i128 = new FixedWidthCodec<bigint>(
  "i128",
  16,
  bigintRange(MinInt128, MaxInt128),
  (view, value) => {
    const bits = BigInt.asUintN(128, value);
    view.setBigUint64(0, bits >> 64n);
    view.setBigUint64(8, bits & MASK_64);
  },
  (view) => BigInt.asIntN(128, (view.getBigUint64(0) << 64n) | view.getBigUint64(8))
);

export const f32 = new FixedWidthCodec<number>(
  "f32",
  4,
  anyNumber,
  (view, value) => view.setFloat32(0, value),
  (view) => view.getFloat32(0)
);

export const f64 = new FixedWidthCodec<number>(
  "f64",
  8,
  anyNumber,
  (view, value) => view.setFloat64(0, value),
  (view) => view.getFloat64(0)
);

/**
 * Single-byte boolean: 0 is false, 1 is true, anything else is rejected.
 */
export class BoolCodec extends BaseCodec<boolean> {
  readonly name = "bool";
  readonly fixedSize = 1;

  parse(value: boolean): Uint8Array {
    return new Uint8Array([value ? 1 : 0]);
  }

  compose(source: Uint8Array, cursor: Cursor): boolean {
    ensureAvailable(source, cursor, 1);
    const byte = source[cursor.position];
    if (byte > 1) {
      throw new NonBinaryByteError(byte);
    }
    cursor.position += 1;
    return byte === 1;
  }
}

export const bool = new BoolCodec();
