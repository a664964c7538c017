import type { Bounded, Formattable, Numeric } from '../Numeric.js';
import type { PointHasher } from '../PointHasher.js';

/**
 * IEEE 754 floats. Overflow saturates to ±Infinity, so there is no checked
 * arithmetic and points over a float kind have no `hypotSq`.
 */
export class FloatKind implements Numeric<number>, Bounded<number>, Formattable<number> {
  readonly zero: number = 0;
  readonly one: number = 1;
  readonly minValue: number;
  readonly maxValue: number;

  /**
   * @param name - Kind name, e.g. "f64"
   * @param round - Rounds an exact double to the kind's precision
   * @param max - Largest finite value
   */
  constructor(
    readonly name: string,
    private readonly round: (n: number) => number,
    max: number
  ) {
    this.minValue = -max;
    this.maxValue = max;
  }

  from(a: number): number {
    return this.round(a);
  }

  add(a: number, b: number): number {
    return this.round(a + b);
  }

  sub(a: number, b: number): number {
    return this.round(a - b);
  }

  mul(a: number, b: number): number {
    return this.round(a * b);
  }

  neg(a: number): number {
    return -a;
  }

  eq(a: number, b: number): boolean {
    return a === b;
  }

  hashInto(hasher: PointHasher, a: number): void {
    hasher.addFloat(a);
  }

  format(a: number): string {
    return String(a);
  }
}

/** Largest finite single-precision value */
const F32_MAX = (2 - 2 ** -23) * 2 ** 127;

export const F64 = new FloatKind('f64', (n) => n, Number.MAX_VALUE);
export const F32 = new FloatKind('f32', Math.fround, F32_MAX);
