/**
 * Pointkit - Generic 2D/3D Point Value Types
 *
 * Lightweight coordinate values over any numeric kind: integers that wrap
 * or check for overflow, floats, bigints and deterministic fixed-point numbers.
 *
 * @packageDocumentation
 */

export { Point2D } from './Point2D.js';
export { Point3D } from './Point3D.js';

// Numeric capabilities
export { isBounded, isChecked, isFormattable } from './Numeric.js';
export type { Bounded, CheckedArithmetic, Formattable, Numeric } from './Numeric.js';

// Built-in kinds
export {
  IntegerKind,
  createIntegerKind,
  I8,
  I16,
  I32,
  U8,
  U16,
  U32,
  BigIntegerKind,
  WideIntegerKind,
  BigInteger,
  I64,
  U64,
  I128,
  U128,
  FloatKind,
  F32,
  F64,
  FixedKind,
  FixedPoint,
  createFixedKind,
  Fixed,
} from './kinds/index.js';

// Componentwise helpers
export {
  allCoords,
  checkedSumOfSquares,
  foldCoords,
  mapCoords,
  zipCoords,
} from './Componentwise.js';

export { PointHasher } from './PointHasher.js';

// Configuration
export { DEFAULT_DISPLAY_OPTIONS, DEFAULT_FIXED_KIND_OPTIONS } from './config/defaults.js';
export { validateDisplayOptions, validateFixedKindOptions } from './config/validation.js';

export type {
  Array2,
  Array3,
  Coords2,
  Coords3,
  DisplayOptions,
  FixedKindOptions,
} from './types.js';
