import { describe, it, expect } from 'vitest';
import { u8, u16, u32, u64, u128, i8, i16, i32, i64, i128, f32, f64, bool } from './primitives';
import { concatBytes } from './codec';
import { BufferUnderflowError, EncodeError, NonBinaryByteError } from './errors';
import { MaxInt64, MaxUint128, MinInt64, MinInt128 } from './types';

describe('primitives', () => {
  describe('big-endian encoding', () => {
    it('encodes u16', () => {
      expect(u16.parse(0x1234)).toEqual(new Uint8Array([0x12, 0x34]));
    });

    it('encodes u32', () => {
      expect(u32.parse(1)).toEqual(new Uint8Array([0, 0, 0, 1]));
    });

    it('encodes negative i16 in two\'s complement', () => {
      expect(i16.parse(-2)).toEqual(new Uint8Array([0xff, 0xfe]));
    });

    it('encodes u64', () => {
      expect(u64.parse(0x0102030405060708n)).toEqual(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));
    });

    it('encodes u128', () => {
      const one = new Uint8Array(16);
      one[15] = 1;
      expect(u128.parse(1n)).toEqual(one);
      expect(u128.parse(MaxUint128)).toEqual(new Uint8Array(16).fill(0xff));
    });

    it('encodes i128 -1 as all ones', () => {
      expect(i128.parse(-1n)).toEqual(new Uint8Array(16).fill(0xff));
    });

    it('encodes floats', () => {
      expect(f32.parse(1.5)).toEqual(new Uint8Array([0x3f, 0xc0, 0, 0]));
      expect(f64.parse(1)).toEqual(new Uint8Array([0x3f, 0xf0, 0, 0, 0, 0, 0, 0]));
    });

    it('reports fixed sizes', () => {
      expect([u8, u16, u32, u64, u128].map((c) => c.fixedSize)).toEqual([1, 2, 4, 8, 16]);
      expect([i8, i16, i32, i64, i128].map((c) => c.fixedSize)).toEqual([1, 2, 4, 8, 16]);
      expect([f32, f64, bool].map((c) => c.fixedSize)).toEqual([4, 8, 1]);
    });
  });

  describe('roundtrip', () => {
    it('roundtrips number primitives', () => {
      const cases: Array<[typeof u8, number[]]> = [
        [u8, [0, 1, 255]],
        [u16, [0, 258, 65535]],
        [u32, [0, 70000, 4294967295]],
        [i8, [-128, -1, 127]],
        [i16, [-32768, 0, 32767]],
        [i32, [-2147483648, -5, 2147483647]],
        [f64, [0, -1.25, Math.PI, Number.MAX_VALUE]],
      ];
      for (const [codec, values] of cases) {
        for (const value of values) {
          expect(codec.compose(codec.parse(value), { position: 0 })).toBe(value);
        }
      }
    });

    it('roundtrips f32 exactly representable values', () => {
      for (const value of [0, 1.5, -2.25, 65504]) {
        expect(f32.compose(f32.parse(value), { position: 0 })).toBe(value);
      }
    });

    it('roundtrips bigint primitives', () => {
      const cases: Array<[typeof u64, bigint[]]> = [
        [u64, [0n, 1n << 63n]],
        [i64, [MinInt64, -1n, MaxInt64]],
        [u128, [0n, (1n << 100n) + 7n, MaxUint128]],
        [i128, [MinInt128, -12345678901234567890n, 1n]],
      ];
      for (const [codec, values] of cases) {
        for (const value of values) {
          expect(codec.compose(codec.parse(value), { position: 0 })).toBe(value);
        }
      }
    });
  });

  describe('range checks', () => {
    it('rejects out-of-range values', () => {
      expect(() => u8.parse(256)).toThrow(EncodeError);
      expect(() => u8.parse(256)).toThrow('u8 value 256 is outside 0..255');
      expect(() => i8.parse(-129)).toThrow(EncodeError);
      expect(() => u16.parse(1.5)).toThrow(EncodeError);
      expect(() => u64.parse(-1n)).toThrow(EncodeError);
      expect(() => i128.parse(MaxUint128)).toThrow(EncodeError);
    });
  });

  describe('compose', () => {
    it('advances the cursor by each fixed size', () => {
      const data = concatBytes([u8.parse(1), u16.parse(2), u32.parse(3)]);
      const cursor = { position: 0 };

      expect(u8.compose(data, cursor)).toBe(1);
      expect(cursor.position).toBe(1);
      expect(u16.compose(data, cursor)).toBe(2);
      expect(cursor.position).toBe(3);
      expect(u32.compose(data, cursor)).toBe(3);
      expect(cursor.position).toBe(7);
    });

    it('reads from a subarray at its own offset', () => {
      const backing = new Uint8Array([9, 9, 0x12, 0x34]);
      expect(u16.compose(backing.subarray(2), { position: 0 })).toBe(0x1234);
    });

    it('throws on truncated input without moving the cursor', () => {
      const cursor = { position: 0 };
      expect(() => u32.compose(new Uint8Array([1, 2]), cursor)).toThrow(BufferUnderflowError);
      expect(() => u32.compose(new Uint8Array([1, 2]), cursor)).toThrow(
        'Buffer underflow: needed 4 bytes, only 2 available'
      );
      expect(cursor.position).toBe(0);
    });
  });

  describe('bool', () => {
    it('encodes true and false', () => {
      expect(bool.parse(true)).toEqual(new Uint8Array([1]));
      expect(bool.parse(false)).toEqual(new Uint8Array([0]));
    });

    it('decodes 0 and 1', () => {
      const cursor = { position: 0 };
      const data = new Uint8Array([1, 0]);
      expect(bool.compose(data, cursor)).toBe(true);
      expect(bool.compose(data, cursor)).toBe(false);
      expect(cursor.position).toBe(2);
    });

    it('rejects a non-binary byte', () => {
      const cursor = { position: 0 };
      expect(() => bool.compose(new Uint8Array([2]), cursor)).toThrow(NonBinaryByteError);
      expect(() => bool.compose(new Uint8Array([2]), cursor)).toThrow(
        'Tried composing binary from non-binary byte: 2'
      );
      expect(cursor.position).toBe(0);
    });
  });
});
