/**
 * Pointkit Types
 * Shared shapes and configuration types
 */

/**
 * Plain coordinate record of a 2D point
 */
export interface Coords2<N> {
  x: N;
  y: N;
}

/**
 * Plain coordinate record of a 3D point
 */
export interface Coords3<N> extends Coords2<N> {
  z: N;
}

/**
 * Fixed-size coordinate arrays, ordered [x, y] and [x, y, z]
 */
export type Array2<N> = [N, N];
export type Array3<N> = [N, N, N];

/**
 * Delimiters used when rendering a point as text
 */
export interface DisplayOptions {
  /** Text before the first coordinate */
  open: string;
  /** Text between two coordinates */
  separator: string;
  /** Text after the last coordinate */
  close: string;
}

/**
 * Options for fixed-point numeric kinds
 */
export interface FixedKindOptions {
  /** Decimal places kept by every value of the kind */
  precision: number;
}
