/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = z.number().finite().min(0, 'Must be non-negative');

/**
 * Sampling temperature (no upper bound; 0 means greedy)
 */
export const Temperature = z.number().finite().min(0, 'Temperature must be at least 0');

/**
 * A CSV cell holding a finite number. Blank cells and anything
 * `Number()` cannot read are rejected.
 */
export const NumericCell = z
  .string()
  .trim()
  .min(1, 'Cannot be empty')
  .transform((value) => Number(value))
  .pipe(z.number().finite());

/**
 * A CSV cell holding an integer.
 */
export const IntegerCell = NumericCell.pipe(z.number().int('Must be an integer'));
