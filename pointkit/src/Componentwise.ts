/**
 * Componentwise helpers shared by Point2D and Point3D.
 *
 * Both point types reduce to a fixed-size coordinate array, so every
 * operator is one of: apply per coordinate, combine coordinate pairs, fold.
 */

import type { CheckedArithmetic, Numeric } from './Numeric.js';
import { PointHasher } from './PointHasher.js';
import type { DisplayOptions } from './types.js';

/** Fixed-size coordinate array of any arity */
export type Coords<N> = readonly N[];

/** Apply `fn` to every coordinate */
export function mapCoords<N, R>(coords: readonly [N, N], fn: (value: N) => R): [R, R];
export function mapCoords<N, R>(coords: readonly [N, N, N], fn: (value: N) => R): [R, R, R];
export function mapCoords<N, R>(coords: Coords<N>, fn: (value: N) => R): R[] {
  return coords.map((value) => fn(value));
}

/** Combine coordinates of `a` and `b` pairwise */
export function zipCoords<N, R>(
  a: readonly [N, N],
  b: readonly [N, N],
  fn: (left: N, right: N) => R
): [R, R];
export function zipCoords<N, R>(
  a: readonly [N, N, N],
  b: readonly [N, N, N],
  fn: (left: N, right: N) => R
): [R, R, R];
export function zipCoords<N, R>(
  a: Coords<N>,
  b: Coords<N>,
  fn: (left: N, right: N) => R
): R[] {
  return a.map((value, index) => fn(value, b[index]));
}

/** Left fold over the coordinates */
export function foldCoords<N, A>(
  coords: Coords<N>,
  init: A,
  fn: (acc: A, value: N) => A
): A {
  return coords.reduce(fn, init);
}

/** True when `predicate` holds for every coordinate pair */
export function allCoords<N>(
  a: Coords<N>,
  b: Coords<N>,
  predicate: (left: N, right: N) => boolean
): boolean {
  return a.length === b.length && a.every((value, index) => predicate(value, b[index]));
}

/**
 * Sum of squares of the coordinates using checked arithmetic.
 *
 * Returns `null` as soon as any multiplication or addition overflows;
 * the remaining coordinates are not evaluated.
 */
export function checkedSumOfSquares<N>(
  kind: Numeric<N> & CheckedArithmetic<N>,
  coords: readonly [N, ...N[]]
): N | null {
  const [first, ...rest] = coords;
  let sum = kind.checkedMul(first, first);
  if (sum === null) {
    return null;
  }
  for (const value of rest) {
    const square = kind.checkedMul(value, value);
    if (square === null) {
      return null;
    }
    sum = kind.checkedAdd(sum, square);
    if (sum === null) {
      return null;
    }
  }
  return sum;
}

/**
 * Join already formatted coordinates with the given delimiters
 */
export function renderCoords(parts: readonly string[], options: DisplayOptions): string {
  return `${options.open}${parts.join(options.separator)}${options.close}`;
}

/**
 * Hash a coordinate array: arity first, then every coordinate through the kind
 */
export function hashCoords<N>(kind: Numeric<N>, coords: Coords<N>): string {
  return foldCoords(coords, PointHasher.create().addInt(coords.length), (hasher, value) => {
    kind.hashInto(hasher, value);
    return hasher;
  }).finalize();
}
