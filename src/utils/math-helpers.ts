/**
 * Math helpers for metric aggregation
 *
 * Division and averaging that return a default instead of NaN/Infinity.
 */

/**
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])   // => 2
 * safeAverage([])          // => 0
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0) / values.length;
}

/**
 * `numerator / denominator`, or `defaultValue` unless the denominator is
 * strictly positive.
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)   // => 5
 * safeDivide(10, 0)   // => 0
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (!(denominator > 0)) {
    return defaultValue;
  }

  return numerator / denominator;
}

export function safeMin(values: readonly number[], defaultValue = 0): number {
  return values.length === 0 ? defaultValue : Math.min(...values);
}

export function safeMax(values: readonly number[], defaultValue = 0): number {
  return values.length === 0 ? defaultValue : Math.max(...values);
}
