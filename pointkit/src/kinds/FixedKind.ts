/**
 * Fixed-point numeric kind
 *
 * Deterministic decimal arithmetic backed by @hastom/fixed-point, for points
 * that must produce identical results on every platform.
 *
 * @example
 * ```typescript
 * import { Point2D, Fixed } from 'pointkit';
 *
 * const a = Point2D.of(Fixed, Fixed.fromFloat(10.5), Fixed.fromInt(2));
 * const b = Point2D.of(Fixed, Fixed.fromString('0.25'), Fixed.fromInt(1));
 *
 * a.add(b).toString(); // "( 10.75, 3 )"
 * ```
 */

import { FixedPoint } from '@hastom/fixed-point';
import type { Formattable, Numeric } from '../Numeric.js';
import type { PointHasher } from '../PointHasher.js';
import type { FixedKindOptions } from '../types.js';
import { validateFixedKindOptions } from '../config/validation.js';

export { FixedPoint };

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d*))?$/;

/**
 * FixedPoint arithmetic updates the receiver in place, so every operation
 * here works on a fresh copy and leaves its operands untouched.
 */
export class FixedKind implements Numeric<FixedPoint>, Formattable<FixedPoint> {
  readonly name: string;
  readonly precision: number;
  readonly zero: FixedPoint;
  readonly one: FixedPoint;

  private readonly scale: bigint;

  constructor(options: Partial<FixedKindOptions> = {}) {
    const { precision } = validateFixedKindOptions(options);
    this.precision = precision;
    this.name = `fixed${precision}`;
    this.scale = 10n ** BigInt(precision);
    this.zero = this.fromInt(0);
    this.one = this.fromInt(1);
  }

  // ============ Creation ============

  /**
   * Create a fixed-point number from a JavaScript number
   *
   * Goes through toFixed(15) so the decimal string, and with it the result,
   * is the same on every JavaScript engine.
   */
  fromFloat(value: number): FixedPoint {
    return this.fromString(value.toFixed(15));
  }

  /**
   * Create a fixed-point number from a string representation.
   * Digits past the kind's precision are dropped.
   * @param value - String representation (e.g., "10.5")
   * @throws Error when the string is not a plain decimal
   */
  fromString(value: string): FixedPoint {
    const match = DECIMAL_PATTERN.exec(value.trim());
    if (!match) {
      throw new Error(`Invalid decimal: "${value}"`);
    }
    const [, sign, whole, fraction = ''] = match;
    const digits = fraction.slice(0, this.precision).padEnd(this.precision, '0');
    const magnitude = BigInt(whole) * this.scale + BigInt(digits || '0');
    return new FixedPoint(sign === '-' ? -magnitude : magnitude, this.precision);
  }

  fromInt(value: number | bigint): FixedPoint {
    return new FixedPoint(BigInt(value) * this.scale, this.precision);
  }

  toFloat(value: FixedPoint): number {
    return Number(this.toDecimalString(value));
  }

  /**
   * Exact decimal rendering, without trailing zeros
   * @example Fixed.toDecimalString(Fixed.fromString('-0.050')) // "-0.05"
   */
  toDecimalString(value: FixedPoint): string {
    const base = this.rescale(value);
    const digits = (base < 0n ? -base : base).toString().padStart(this.precision + 1, '0');
    const whole = digits.slice(0, digits.length - this.precision);
    const fraction = digits.slice(digits.length - this.precision).replace(/0+$/, '');
    const sign = base < 0n ? '-' : '';
    return fraction ? `${sign}${whole}.${fraction}` : `${sign}${whole}`;
  }

  /** Copy of `a` at this kind's precision */
  from(a: FixedPoint): FixedPoint {
    return new FixedPoint(this.rescale(a), this.precision);
  }

  // ============ Arithmetic ============

  add(a: FixedPoint, b: FixedPoint): FixedPoint {
    return this.from(a).add(b);
  }

  sub(a: FixedPoint, b: FixedPoint): FixedPoint {
    return this.from(a).sub(b);
  }

  mul(a: FixedPoint, b: FixedPoint): FixedPoint {
    return this.from(a).mul(b);
  }

  neg(a: FixedPoint): FixedPoint {
    return new FixedPoint(-this.rescale(a), this.precision);
  }

  eq(a: FixedPoint, b: FixedPoint): boolean {
    return this.rescale(a) === this.rescale(b);
  }

  hashInto(hasher: PointHasher, a: FixedPoint): void {
    hasher.addBigInt(this.rescale(a));
  }

  format(a: FixedPoint): string {
    return this.toDecimalString(a);
  }

  private rescale(a: FixedPoint): bigint {
    return FixedPoint.convertToPrecision(
      a.getBase(),
      BigInt(this.precision),
      a.getPrecision()
    );
  }
}

/**
 * Create a fixed-point kind with its own precision
 * @throws Error when the precision is invalid
 */
export function createFixedKind(options: Partial<FixedKindOptions> = {}): FixedKind {
  return new FixedKind(options);
}

/** Fixed-point kind with 18 decimal places */
export const Fixed = new FixedKind();
