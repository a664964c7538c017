/**
 * Point2D - a point in two dimensional space
 *
 * Generic over the coordinate type `N`; the numeric kind `K` supplies the
 * arithmetic. Methods that need more than plain arithmetic (`hypotSq`,
 * `format`, bounds) only type-check for kinds that have the capability.
 *
 * @example
 * ```typescript
 * import { Point2D, F64 } from 'pointkit';
 *
 * const p1 = Point2D.fromTuple(F64, { x: 2, y: 3 });
 * const p2 = Point2D.fromArray(F64, [4, 6]);
 *
 * const p3 = p1.add(p2); // ( 6, 9 )
 * const p4 = p3.sub(p1); // ( 4, 6 )
 * const p5 = p4.neg(); // ( -4, -6 )
 * ```
 */

import type { Bounded, CheckedArithmetic, Formattable, Numeric } from './Numeric.js';
import { isFormattable } from './Numeric.js';
import type { Array2, Coords2, DisplayOptions } from './types.js';
import {
  allCoords,
  checkedSumOfSquares,
  hashCoords,
  mapCoords,
  renderCoords,
  zipCoords,
} from './Componentwise.js';
import { DEFAULT_DISPLAY_OPTIONS } from './config/defaults.js';
import { validateDisplayOptions } from './config/validation.js';

export class Point2D<N, K extends Numeric<N> = Numeric<N>> implements Coords2<N> {
  x: N;
  y: N;

  /** Coordinates pass through `kind.from` */
  constructor(
    readonly kind: K,
    x: N,
    y: N
  ) {
    this.x = kind.from(x);
    this.y = kind.from(y);
  }

  // ============ Creation ============

  static of<N, K extends Numeric<N>>(kind: K & Numeric<N>, x: N, y: N): Point2D<N, K> {
    return new Point2D<N, K>(kind, x, y);
  }

  /** Create a point from an `[x, y]` array */
  static fromArray<N, K extends Numeric<N>>(
    kind: K & Numeric<N>,
    [x, y]: readonly [N, N]
  ): Point2D<N, K> {
    return new Point2D<N, K>(kind, x, y);
  }

  /** Create a point from an `{ x, y }` record */
  static fromTuple<N, K extends Numeric<N>>(
    kind: K & Numeric<N>,
    { x, y }: Coords2<N>
  ): Point2D<N, K> {
    return new Point2D<N, K>(kind, x, y);
  }

  /** Point with every coordinate at the kind's zero */
  static default<N, K extends Numeric<N>>(kind: K & Numeric<N>): Point2D<N, K> {
    return new Point2D<N, K>(kind, kind.zero, kind.zero);
  }

  static minValue<N, K extends Numeric<N> & Bounded<N>>(
    kind: K & Numeric<N>
  ): Point2D<N, K> {
    return new Point2D<N, K>(kind, kind.minValue, kind.minValue);
  }

  static maxValue<N, K extends Numeric<N> & Bounded<N>>(
    kind: K & Numeric<N>
  ): Point2D<N, K> {
    return new Point2D<N, K>(kind, kind.maxValue, kind.maxValue);
  }

  // ============ Conversion ============

  toArray(): Array2<N> {
    return [this.x, this.y];
  }

  toTuple(): Coords2<N> {
    return { x: this.x, y: this.y };
  }

  clone(): Point2D<N, K> {
    return new Point2D<N, K>(this.kind, this.x, this.y);
  }

  // ============ Operations ============

  add(other: Point2D<N, K>): Point2D<N, K> {
    return Point2D.fromArray<N, K>(
      this.kind,
      zipCoords(this.toArray(), other.toArray(), (a, b) => this.kind.add(a, b))
    );
  }

  sub(other: Point2D<N, K>): Point2D<N, K> {
    return Point2D.fromArray<N, K>(
      this.kind,
      zipCoords(this.toArray(), other.toArray(), (a, b) => this.kind.sub(a, b))
    );
  }

  /** In-place `+=`; returns the receiver */
  addAssign(other: Point2D<N, K>): this {
    [this.x, this.y] = zipCoords(this.toArray(), other.toArray(), (a, b) =>
      this.kind.add(a, b)
    );
    return this;
  }

  /** In-place `-=`; returns the receiver */
  subAssign(other: Point2D<N, K>): this {
    [this.x, this.y] = zipCoords(this.toArray(), other.toArray(), (a, b) =>
      this.kind.sub(a, b)
    );
    return this;
  }

  neg(): Point2D<N, K> {
    return Point2D.fromArray<N, K>(
      this.kind,
      mapCoords(this.toArray(), (a) => this.kind.neg(a))
    );
  }

  // ============ Comparison ============

  equals(other: Point2D<N, K>): boolean {
    return allCoords(this.toArray(), other.toArray(), (a, b) => this.kind.eq(a, b));
  }

  /** 8-character hex hash; equal points hash alike */
  hash(): string {
    return hashCoords(this.kind, this.toArray());
  }

  // ============ Metrics ============

  /**
   * Sum of squares of the coordinates, x*x + y*y, in checked arithmetic.
   * @returns `null` if any multiplication or addition overflows
   */
  hypotSq(this: Point2D<N, K & CheckedArithmetic<N>>): N | null {
    return checkedSumOfSquares(this.kind, this.toArray());
  }

  // ============ Display ============

  /**
   * Render as `( x, y )`
   * @param options - Delimiters overriding the defaults
   */
  format(
    this: Point2D<N, K & Formattable<N>>,
    options: Partial<DisplayOptions> = {}
  ): string {
    return renderCoords(
      mapCoords(this.toArray(), (a) => this.kind.format(a)),
      validateDisplayOptions(options)
    );
  }

  toString(): string {
    const { kind } = this;
    const parts = isFormattable(kind)
      ? mapCoords(this.toArray(), (a) => kind.format(a))
      : mapCoords(this.toArray(), (a) => String(a));
    return renderCoords(parts, DEFAULT_DISPLAY_OPTIONS);
  }
}
