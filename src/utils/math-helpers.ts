/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero,
 * empty inputs and NaN propagation.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  const sum = values.reduce((acc, val) => acc + val, 0);
  return sum / values.length;
}

/**
 * Average of the non-null values, or null when there are none.
 */
export function averageOrNull(values: ReadonlyArray<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  return present.length === 0 ? null : safeAverage(present);
}

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Percentage (0-100) of `part` in `total`, 0 when total is 0.
 */
export function percentage(part: number, total: number): number {
  return safeDivide(part, total) * 100;
}

/**
 * Median of an array, 0 when empty. Even lengths average the middle pair.
 *
 * @example
 * ```typescript
 * median([3, 1, 2])     // => 2
 * median([4, 1, 3, 2])  // => 2.5
 * ```
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Nearest-rank percentile: element at index floor(n * p), clamped to the
 * last element. 0 when empty.
 *
 * @example
 * ```typescript
 * percentile([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 0.95) // => 10
 * ```
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.min(Math.floor(sorted.length * p), sorted.length - 1);
  return sorted[index];
}

/**
 * Round to a fixed number of decimals.
 */
export function round(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
