import { describe, it, expect } from 'vitest';
import {
  createCursor,
  zigzagEncode,
  zigzagDecode,
  zigzagEncode64,
  zigzagDecode64,
  MinInt64,
  MaxInt64,
} from './types';
import { EncodeError } from './errors';

describe('createCursor', () => {
  it('starts at 0 by default', () => {
    expect(createCursor()).toEqual({ position: 0 });
  });

  it('starts at the given offset', () => {
    expect(createCursor(12).position).toBe(12);
  });
});

describe('zigzag encoding (32-bit)', () => {
  it('encodes 0 to 0', () => {
    expect(zigzagEncode(0)).toBe(0);
  });

  it('encodes -1 to 1', () => {
    expect(zigzagEncode(-1)).toBe(1);
  });

  it('encodes 1 to 2', () => {
    expect(zigzagEncode(1)).toBe(2);
  });

  it('encodes -2 to 3', () => {
    expect(zigzagEncode(-2)).toBe(3);
  });

  it('encodes the extremes as unsigned values', () => {
    expect(zigzagEncode(2147483647)).toBe(4294967294);
    expect(zigzagEncode(-2147483648)).toBe(4294967295);
  });

  it('roundtrips positive values', () => {
    for (const n of [0, 1, 127, 128, 255, 256, 65535, 2147483647]) {
      expect(zigzagDecode(zigzagEncode(n))).toBe(n);
    }
  });

  it('roundtrips negative values', () => {
    for (const n of [-1, -127, -128, -255, -256, -65535, -2147483648]) {
      expect(zigzagDecode(zigzagEncode(n))).toBe(n);
    }
  });

  it('rejects values outside the int32 range', () => {
    expect(() => zigzagEncode(2147483648)).toThrow(EncodeError);
    expect(() => zigzagEncode(-2147483649)).toThrow(
      'ZigZag value -2147483649 is outside -2147483648..2147483647'
    );
  });

  it('rejects non-integers', () => {
    expect(() => zigzagEncode(1.5)).toThrow(EncodeError);
  });
});

describe('zigzag encoding (64-bit)', () => {
  it('encodes 0n to 0n', () => {
    expect(zigzagEncode64(0n)).toBe(0n);
  });

  it('encodes -1n to 1n', () => {
    expect(zigzagEncode64(-1n)).toBe(1n);
  });

  it('encodes 1n to 2n', () => {
    expect(zigzagEncode64(1n)).toBe(2n);
  });

  it('encodes MinInt64 to the largest uint64', () => {
    expect(zigzagEncode64(MinInt64)).toBe(BigInt('0xffffffffffffffff'));
  });

  it('roundtrips boundary values', () => {
    for (const n of [0n, 1n, -1n, 2147483647n, -2147483648n, MaxInt64, MinInt64]) {
      expect(zigzagDecode64(zigzagEncode64(n))).toBe(n);
    }
  });

  describe('bounds validation', () => {
    it('throws EncodeError for values larger than MaxInt64', () => {
      const tooBig = MaxInt64 + 1n;
      expect(() => zigzagEncode64(tooBig)).toThrow(EncodeError);
      expect(() => zigzagEncode64(tooBig)).toThrow(/outside valid 64-bit signed integer range/);
    });

    it('throws EncodeError for values smaller than MinInt64', () => {
      expect(() => zigzagEncode64(MinInt64 - 1n)).toThrow(EncodeError);
    });
  });
});
