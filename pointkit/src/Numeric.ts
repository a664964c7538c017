/**
 * Numeric capabilities
 *
 * A numeric kind is the dictionary a point carries next to its coordinates:
 * it says how values of `N` are added, compared, hashed and so on.
 * Capabilities are split so a point only asks for what an operation needs,
 * e.g. floats can be added and formatted but have no checked arithmetic.
 *
 * @example
 * ```typescript
 * import { Point2D, I32 } from 'pointkit';
 *
 * const p = Point2D.of(I32, 3, 4);
 * p.hypotSq(); // 25
 * ```
 */

import type { PointHasher } from './PointHasher.js';

/**
 * Base capability: ring-like arithmetic, equality and hashing
 */
export interface Numeric<N> {
  /** Human-readable kind name, e.g. "i32" */
  readonly name: string;
  /** Additive identity, also the default coordinate */
  readonly zero: N;
  /** Multiplicative identity */
  readonly one: N;

  /**
   * Bring any value of `N` into the kind's representable set,
   * the same way arithmetic results are. Applied to every coordinate
   * a point is constructed with.
   */
  from(a: N): N;

  add(a: N, b: N): N;
  sub(a: N, b: N): N;
  mul(a: N, b: N): N;
  neg(a: N): N;
  eq(a: N, b: N): boolean;

  /**
   * Feed a value into a hasher.
   * Values that are `eq` must feed identical input.
   */
  hashInto(hasher: PointHasher, a: N): void;
}

/**
 * Overflow-detecting arithmetic. `null` means the exact result is not representable.
 */
export interface CheckedArithmetic<N> {
  checkedAdd(a: N, b: N): N | null;
  checkedMul(a: N, b: N): N | null;
}

/**
 * Minimum and maximum representable values
 */
export interface Bounded<N> {
  readonly minValue: N;
  readonly maxValue: N;
}

/**
 * Default textual representation of a value
 */
export interface Formattable<N> {
  format(a: N): string;
}

export function isChecked<N>(
  kind: Numeric<N>
): kind is Numeric<N> & CheckedArithmetic<N> {
  return 'checkedAdd' in kind && 'checkedMul' in kind;
}

export function isBounded<N>(kind: Numeric<N>): kind is Numeric<N> & Bounded<N> {
  return 'minValue' in kind && 'maxValue' in kind;
}

export function isFormattable<N>(
  kind: Numeric<N>
): kind is Numeric<N> & Formattable<N> {
  return 'format' in kind;
}
