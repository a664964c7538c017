import type {
  Bounded,
  CheckedArithmetic,
  Formattable,
  Numeric,
} from '../Numeric.js';
import type { PointHasher } from '../PointHasher.js';

/**
 * Arbitrary-precision integers on `bigint`. Nothing overflows, so the
 * checked operations always produce a value.
 */
export class BigIntegerKind
  implements Numeric<bigint>, CheckedArithmetic<bigint>, Formattable<bigint>
{
  readonly zero: bigint = 0n;
  readonly one: bigint = 1n;

  constructor(readonly name: string = 'bigint') {}

  from(a: bigint): bigint {
    return a;
  }

  add(a: bigint, b: bigint): bigint {
    return a + b;
  }

  sub(a: bigint, b: bigint): bigint {
    return a - b;
  }

  mul(a: bigint, b: bigint): bigint {
    return a * b;
  }

  neg(a: bigint): bigint {
    return -a;
  }

  eq(a: bigint, b: bigint): boolean {
    return a === b;
  }

  checkedAdd(a: bigint, b: bigint): bigint | null {
    return a + b;
  }

  checkedMul(a: bigint, b: bigint): bigint | null {
    return a * b;
  }

  hashInto(hasher: PointHasher, a: bigint): void {
    hasher.addBigInt(a);
  }

  format(a: bigint): string {
    return a.toString();
  }
}

/**
 * Fixed-width two's complement integers on `bigint` (64 bits and up).
 * Plain arithmetic wraps via `BigInt.asIntN` / `BigInt.asUintN`.
 */
export class WideIntegerKind extends BigIntegerKind implements Bounded<bigint> {
  readonly minValue: bigint;
  readonly maxValue: bigint;

  constructor(
    readonly bits: number,
    readonly signed: boolean
  ) {
    super(`${signed ? 'i' : 'u'}${bits}`);
    if (!Number.isInteger(bits) || bits < 1) {
      throw new Error(`Invalid bits: ${bits}. Must be a positive integer.`);
    }
    const width = BigInt(bits);
    this.minValue = signed ? -(1n << (width - 1n)) : 0n;
    this.maxValue = signed ? (1n << (width - 1n)) - 1n : (1n << width) - 1n;
  }

  wrap(n: bigint): bigint {
    return this.signed ? BigInt.asIntN(this.bits, n) : BigInt.asUintN(this.bits, n);
  }

  contains(n: bigint): boolean {
    return n >= this.minValue && n <= this.maxValue;
  }

  override from(a: bigint): bigint {
    return this.wrap(a);
  }

  override add(a: bigint, b: bigint): bigint {
    return this.wrap(a + b);
  }

  override sub(a: bigint, b: bigint): bigint {
    return this.wrap(a - b);
  }

  override mul(a: bigint, b: bigint): bigint {
    return this.wrap(a * b);
  }

  override neg(a: bigint): bigint {
    return this.wrap(-a);
  }

  override checkedAdd(a: bigint, b: bigint): bigint | null {
    const sum = a + b;
    return this.contains(sum) ? sum : null;
  }

  override checkedMul(a: bigint, b: bigint): bigint | null {
    const product = a * b;
    return this.contains(product) ? product : null;
  }
}

export const BigInteger = new BigIntegerKind();
export const I64 = new WideIntegerKind(64, true);
export const U64 = new WideIntegerKind(64, false);
export const I128 = new WideIntegerKind(128, true);
export const U128 = new WideIntegerKind(128, false);
