import { describe, it, expect } from 'vitest';
import {
  BigInteger,
  F32,
  F64,
  Fixed,
  I8,
  I32,
  I64,
  U8,
  U32,
  U64,
  createIntegerKind,
  isBounded,
  isChecked,
  isFormattable,
} from '../src/index.js';

describe('IntegerKind', () => {
  it('should expose two\'s complement bounds', () => {
    expect([I8.minValue, I8.maxValue]).toEqual([-128, 127]);
    expect([I32.minValue, I32.maxValue]).toEqual([-2147483648, 2147483647]);
    expect([U8.minValue, U8.maxValue]).toEqual([0, 255]);
    expect(U32.maxValue).toBe(4294967295);
  });

  it('should name kinds by sign and width', () => {
    expect(I8.name).toBe('i8');
    expect(U32.name).toBe('u32');
  });

  it('should wrap plain arithmetic', () => {
    expect(I32.add(I32.maxValue, 1)).toBe(I32.minValue);
    expect(I32.sub(I32.minValue, 1)).toBe(I32.maxValue);
    expect(I32.neg(I32.minValue)).toBe(I32.minValue);
    expect(I32.mul(65536, 65536)).toBe(0);
    expect(U8.sub(0, 1)).toBe(255);
    expect(U32.mul(65536, 65535)).toBe(4294901760);
    expect(I8.mul(16, 16)).toBe(0);
  });

  it('should never produce negative zero', () => {
    expect(Object.is(I32.neg(0), 0)).toBe(true);
    expect(Object.is(I32.checkedMul(0, -5), 0)).toBe(true);
  });

  it('should normalize values on the way in', () => {
    expect(I8.from(200)).toBe(-56);
    expect(U8.from(-1)).toBe(255);
    expect(I32.from(-7.8)).toBe(-7);
    expect(I32.from(Number.NaN)).toBe(0);
    expect(I32.from(Number.POSITIVE_INFINITY)).toBe(0);
    expect(Object.is(I32.from(-0.5), 0)).toBe(true);
  });

  it('should check for overflow', () => {
    expect(I8.checkedAdd(100, 27)).toBe(127);
    expect(I8.checkedAdd(100, 28)).toBeNull();
    expect(I8.checkedMul(-16, 8)).toBe(-128);
    expect(I8.checkedMul(16, 8)).toBeNull();
    expect(I32.checkedMul(I32.maxValue, I32.maxValue)).toBeNull();
    expect(U8.checkedAdd(0, -1)).toBeNull();
  });

  it('should build custom widths', () => {
    const i4 = createIntegerKind(4, true);
    expect([i4.minValue, i4.maxValue]).toEqual([-8, 7]);
    expect(i4.add(7, 1)).toBe(-8);
  });

  it('should reject unsupported widths', () => {
    expect(() => createIntegerKind(33, true)).toThrow(
      'Invalid bits: 33. Must be an integer between 1 and 32.'
    );
    expect(() => createIntegerKind(0, false)).toThrow('Invalid bits: 0');
  });
});

describe('BigIntegerKind', () => {
  it('should wrap fixed-width bigints', () => {
    expect(I64.maxValue).toBe(2n ** 63n - 1n);
    expect(I64.add(I64.maxValue, 1n)).toBe(I64.minValue);
    expect(U64.neg(1n)).toBe(2n ** 64n - 1n);
  });

  it('should normalize bigints on the way in', () => {
    expect(U64.from(-1n)).toBe(2n ** 64n - 1n);
    expect(I64.from(2n ** 63n)).toBe(-(2n ** 63n));
    expect(BigInteger.from(2n ** 100n)).toBe(2n ** 100n);
  });

  it('should check fixed-width bigints for overflow', () => {
    expect(I64.checkedMul(2n ** 32n, 2n ** 30n)).toBe(2n ** 62n);
    expect(I64.checkedMul(2n ** 32n, 2n ** 31n)).toBeNull();
    expect(U64.checkedAdd(U64.maxValue, 1n)).toBeNull();
  });

  it('should never overflow unbounded bigints', () => {
    expect(BigInteger.checkedMul(2n ** 64n, 2n ** 64n)).toBe(2n ** 128n);
    expect(BigInteger.format(-(10n ** 20n))).toBe('-100000000000000000000');
  });
});

describe('FloatKind', () => {
  it('should use symmetric finite bounds', () => {
    expect(F64.minValue).toBe(-Number.MAX_VALUE);
    expect(F64.maxValue).toBe(Number.MAX_VALUE);
    expect(F32.maxValue).toBe(3.4028234663852886e38);
  });

  it('should round single precision results', () => {
    expect(F32.add(0.1, 0.2)).toBe(Math.fround(0.1 + 0.2));
    expect(F64.add(0.5, 0.25)).toBe(0.75);
  });

  it('should round values on the way in', () => {
    expect(F32.from(0.1)).toBe(Math.fround(0.1));
    expect(F64.from(0.1)).toBe(0.1);
  });

  it('should treat NaN as unequal to itself', () => {
    expect(F64.eq(Number.NaN, Number.NaN)).toBe(false);
    expect(F64.eq(0, -0)).toBe(true);
  });
});

describe('Capability guards', () => {
  it('should detect checked arithmetic', () => {
    expect(isChecked(I32)).toBe(true);
    expect(isChecked(BigInteger)).toBe(true);
    expect(isChecked(F64)).toBe(false);
    expect(isChecked(Fixed)).toBe(false);
  });

  it('should detect bounds', () => {
    expect(isBounded(U8)).toBe(true);
    expect(isBounded(F32)).toBe(true);
    expect(isBounded(BigInteger)).toBe(false);
    expect(isBounded(Fixed)).toBe(false);
  });

  it('should detect formatting', () => {
    expect(isFormattable(I64)).toBe(true);
    expect(isFormattable(Fixed)).toBe(true);
  });
});
