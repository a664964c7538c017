import type { DisplayOptions, FixedKindOptions } from '../types.js';
import {
  DEFAULT_DISPLAY_OPTIONS,
  DEFAULT_FIXED_KIND_OPTIONS,
  MAX_FIXED_PRECISION,
} from './defaults.js';

/**
 * Validates and merges display options with defaults
 * @param userOptions - Partial display options
 * @returns Complete validated options
 */
export function validateDisplayOptions(
  userOptions: Partial<DisplayOptions> = {}
): DisplayOptions {
  const options: DisplayOptions = {
    ...DEFAULT_DISPLAY_OPTIONS,
    ...userOptions,
  };

  // Validate separator
  if (options.separator.length === 0) {
    throw new Error('separator must not be empty');
  }

  // Output stays on one line
  for (const field of ['open', 'separator', 'close'] as const) {
    if (/[\r\n]/.test(options[field])) {
      throw new Error(`Invalid ${field}: must not contain line breaks.`);
    }
  }

  return options;
}

/**
 * Validates and merges fixed-point kind options with defaults
 * @param userOptions - Partial fixed-point options
 * @returns Complete validated options
 */
export function validateFixedKindOptions(
  userOptions: Partial<FixedKindOptions> = {}
): FixedKindOptions {
  const options: FixedKindOptions = {
    ...DEFAULT_FIXED_KIND_OPTIONS,
    ...userOptions,
  };

  if (
    !Number.isInteger(options.precision) ||
    options.precision < 0 ||
    options.precision > MAX_FIXED_PRECISION
  ) {
    throw new Error(
      `Invalid precision: ${options.precision}. Must be an integer between 0 and ${MAX_FIXED_PRECISION}.`
    );
  }

  return options;
}
