/**
 * Built-in numeric kinds
 */

export { IntegerKind, createIntegerKind, I8, I16, I32, U8, U16, U32 } from './IntegerKind.js';
export {
  BigIntegerKind,
  WideIntegerKind,
  BigInteger,
  I64,
  U64,
  I128,
  U128,
} from './BigIntegerKind.js';
export { FloatKind, F32, F64 } from './FloatKind.js';
export { FixedKind, FixedPoint, createFixedKind, Fixed } from './FixedKind.js';
