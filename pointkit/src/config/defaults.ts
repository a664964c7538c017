import type { DisplayOptions, FixedKindOptions } from '../types.js';

/**
 * Default point rendering: `( x, y )` / `( x, y, z )`
 */
export const DEFAULT_DISPLAY_OPTIONS: DisplayOptions = {
  open: '( ',
  separator: ', ',
  close: ' )',
};

/**
 * Default fixed-point options (18 decimal places)
 */
export const DEFAULT_FIXED_KIND_OPTIONS: FixedKindOptions = {
  precision: 18,
};

/** Largest precision accepted for fixed-point kinds */
export const MAX_FIXED_PRECISION = 36;
