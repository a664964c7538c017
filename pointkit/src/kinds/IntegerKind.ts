import type {
  Bounded,
  CheckedArithmetic,
  Formattable,
  Numeric,
} from '../Numeric.js';
import type { PointHasher } from '../PointHasher.js';

/** Largest width a `number`-backed integer kind supports */
const MAX_NUMBER_BITS = 32;

/** -0 → 0 */
const clean = (n: number): number => (n === 0 ? 0 : n);

/**
 * Fixed-width two's complement integers stored in `number`.
 *
 * Plain arithmetic wraps around like `| 0` and `Math.imul` do for 32 bits;
 * the checked variants return `null` instead of wrapping.
 */
export class IntegerKind
  implements
    Numeric<number>,
    CheckedArithmetic<number>,
    Bounded<number>,
    Formattable<number>
{
  readonly name: string;
  readonly zero: number = 0;
  readonly one: number = 1;
  readonly minValue: number;
  readonly maxValue: number;

  private readonly modulus: number;

  constructor(
    readonly bits: number,
    readonly signed: boolean
  ) {
    if (!Number.isInteger(bits) || bits < 1 || bits > MAX_NUMBER_BITS) {
      throw new Error(
        `Invalid bits: ${bits}. Must be an integer between 1 and ${MAX_NUMBER_BITS}.`
      );
    }
    this.name = `${signed ? 'i' : 'u'}${bits}`;
    this.modulus = 2 ** bits;
    this.minValue = signed ? -(2 ** (bits - 1)) : 0;
    this.maxValue = signed ? 2 ** (bits - 1) - 1 : this.modulus - 1;
  }

  /**
   * Reduce an exact integer into range, modulo 2^bits
   */
  wrap(n: number): number {
    let r = n % this.modulus;
    if (r < this.minValue) {
      r += this.modulus;
    } else if (r > this.maxValue) {
      r -= this.modulus;
    }
    return clean(r);
  }

  /** Whether `n` is representable by this kind */
  contains(n: number): boolean {
    return Number.isInteger(n) && n >= this.minValue && n <= this.maxValue;
  }

  /** Truncates toward zero and wraps; NaN and ±Infinity become 0 */
  from(a: number): number {
    return Number.isFinite(a) ? this.wrap(Math.trunc(a)) : 0;
  }

  add(a: number, b: number): number {
    return this.wrap(a + b);
  }

  sub(a: number, b: number): number {
    return this.wrap(a - b);
  }

  mul(a: number, b: number): number {
    // Low 32 bits are exact, which is all any width up to 32 needs
    return this.wrap(Math.imul(a, b));
  }

  neg(a: number): number {
    return this.wrap(-a);
  }

  eq(a: number, b: number): boolean {
    return a === b;
  }

  checkedAdd(a: number, b: number): number | null {
    const sum = a + b;
    return this.contains(sum) ? clean(sum) : null;
  }

  checkedMul(a: number, b: number): number | null {
    // Any in-range product is below 2^53, so the float product is exact there
    const product = a * b;
    return this.contains(product) ? clean(product) : null;
  }

  hashInto(hasher: PointHasher, a: number): void {
    hasher.addInt(a);
  }

  format(a: number): string {
    return String(a);
  }
}

/**
 * Create a `number`-backed integer kind of any width from 1 to 32 bits
 * @throws Error when `bits` is out of range
 */
export function createIntegerKind(bits: number, signed: boolean): IntegerKind {
  return new IntegerKind(bits, signed);
}

export const I8 = new IntegerKind(8, true);
export const I16 = new IntegerKind(16, true);
export const I32 = new IntegerKind(32, true);
export const U8 = new IntegerKind(8, false);
export const U16 = new IntegerKind(16, false);
export const U32 = new IntegerKind(32, false);
