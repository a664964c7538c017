/**
 * Point3D - a point in three dimensional space
 *
 * Stored as an embedded `Point2D` (`xy`) plus `z`. The `x` and `y` accessors
 * read and write straight through to `xy`, so a Point3D can be used as if it
 * had three flat fields while `xy` stays usable as a 2D point.
 * The embedded point is owned: points handed in are copied, never shared.
 *
 * @example
 * ```typescript
 * import { Point3D, I32 } from 'pointkit';
 *
 * const p = Point3D.of(I32, 1, -2, 3);
 * p.x = 5;
 * p.xy.x; // 5
 * p.hypotSq(); // 38
 * ```
 */

import type { Bounded, CheckedArithmetic, Formattable, Numeric } from './Numeric.js';
import { isFormattable } from './Numeric.js';
import { Point2D } from './Point2D.js';
import type { Array3, Coords3, DisplayOptions } from './types.js';
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

export class Point3D<N, K extends Numeric<N> = Numeric<N>> implements Coords3<N> {
  z: N;

  private planar: Point2D<N, K>;

  constructor(xy: Point2D<N, K>, z: N) {
    this.planar = xy.clone();
    this.z = xy.kind.from(z);
  }

  /** The embedded 2D point; writes to it update this point */
  get xy(): Point2D<N, K> {
    return this.planar;
  }

  /** Replaces x and y with a copy of `value` */
  set xy(value: Point2D<N, K>) {
    this.planar = value.clone();
  }

  get kind(): K {
    return this.planar.kind;
  }

  get x(): N {
    return this.xy.x;
  }

  set x(value: N) {
    this.xy.x = value;
  }

  get y(): N {
    return this.xy.y;
  }

  set y(value: N) {
    this.xy.y = value;
  }

  // ============ Creation ============

  static of<N, K extends Numeric<N>>(
    kind: K & Numeric<N>,
    x: N,
    y: N,
    z: N
  ): Point3D<N, K> {
    return new Point3D<N, K>(new Point2D<N, K>(kind, x, y), z);
  }

  /** Combine a copy of an existing 2D point with a z coordinate */
  static fromParts<N, K extends Numeric<N>>(xy: Point2D<N, K>, z: N): Point3D<N, K> {
    return new Point3D<N, K>(xy, z);
  }

  /** Create a point from an `[x, y, z]` array */
  static fromArray<N, K extends Numeric<N>>(
    kind: K & Numeric<N>,
    [x, y, z]: readonly [N, N, N]
  ): Point3D<N, K> {
    return new Point3D<N, K>(Point2D.fromArray<N, K>(kind, [x, y]), z);
  }

  /** Create a point from an `{ x, y, z }` record */
  static fromTuple<N, K extends Numeric<N>>(
    kind: K & Numeric<N>,
    { x, y, z }: Coords3<N>
  ): Point3D<N, K> {
    return new Point3D<N, K>(Point2D.fromTuple<N, K>(kind, { x, y }), z);
  }

  static default<N, K extends Numeric<N>>(kind: K & Numeric<N>): Point3D<N, K> {
    return new Point3D<N, K>(Point2D.default<N, K>(kind), kind.zero);
  }

  static minValue<N, K extends Numeric<N> & Bounded<N>>(
    kind: K & Numeric<N>
  ): Point3D<N, K> {
    return new Point3D<N, K>(Point2D.minValue<N, K>(kind), kind.minValue);
  }

  static maxValue<N, K extends Numeric<N> & Bounded<N>>(
    kind: K & Numeric<N>
  ): Point3D<N, K> {
    return new Point3D<N, K>(Point2D.maxValue<N, K>(kind), kind.maxValue);
  }

  // ============ Conversion ============

  toArray(): Array3<N> {
    const [x, y] = this.xy.toArray();
    return [x, y, this.z];
  }

  toTuple(): Coords3<N> {
    return { ...this.xy.toTuple(), z: this.z };
  }

  clone(): Point3D<N, K> {
    return new Point3D<N, K>(this.planar, this.z);
  }

  // ============ Operations ============

  add(other: Point3D<N, K>): Point3D<N, K> {
    return Point3D.fromArray<N, K>(
      this.kind,
      zipCoords(this.toArray(), other.toArray(), (a, b) => this.kind.add(a, b))
    );
  }

  sub(other: Point3D<N, K>): Point3D<N, K> {
    return Point3D.fromArray<N, K>(
      this.kind,
      zipCoords(this.toArray(), other.toArray(), (a, b) => this.kind.sub(a, b))
    );
  }

  /** In-place `+=`; `xy` keeps its identity */
  addAssign(other: Point3D<N, K>): this {
    this.xy.addAssign(other.xy);
    this.z = this.kind.add(this.z, other.z);
    return this;
  }

  /** In-place `-=`; `xy` keeps its identity */
  subAssign(other: Point3D<N, K>): this {
    this.xy.subAssign(other.xy);
    this.z = this.kind.sub(this.z, other.z);
    return this;
  }

  neg(): Point3D<N, K> {
    return Point3D.fromArray<N, K>(
      this.kind,
      mapCoords(this.toArray(), (a) => this.kind.neg(a))
    );
  }

  // ============ Comparison ============

  equals(other: Point3D<N, K>): boolean {
    return allCoords(this.toArray(), other.toArray(), (a, b) => this.kind.eq(a, b));
  }

  hash(): string {
    return hashCoords(this.kind, this.toArray());
  }

  // ============ Metrics ============

  /**
   * Sum of squares of the coordinates, x*x + y*y + z*z, in checked arithmetic.
   * @returns `null` if any multiplication or addition overflows
   */
  hypotSq(this: Point3D<N, K & CheckedArithmetic<N>>): N | null {
    return checkedSumOfSquares(this.kind, this.toArray());
  }

  // ============ Display ============

  /**
   * Render as `( x, y, z )`
   * @param options - Delimiters overriding the defaults
   */
  format(
    this: Point3D<N, K & Formattable<N>>,
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
