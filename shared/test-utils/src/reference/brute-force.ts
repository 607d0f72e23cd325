/**
 * Brute-Force Reference Statistics
 *
 * Recompute a statistic from the full list of values. Slow, obviously
 * correct, and used as the oracle for streaming estimators.
 */

export function lastN(values: readonly number[], n: number): number[] {
  return values.slice(Math.max(values.length - n, 0));
}

export function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

export function naiveSum(values: readonly number[]): number {
  return values.reduce((acc, x) => acc + x, 0);
}

export function naiveMean(values: readonly number[]): number {
  return values.length === 0 ? 0 : naiveSum(values) / values.length;
}

/**
 * Two-pass variance; 0 when there are not more than `ddof` values.
 */
export function naiveVariance(values: readonly number[], ddof = 1): number {
  if (values.length <= ddof) {
    return 0;
  }
  const mean = naiveMean(values);
  const squares = values.reduce((acc, x) => acc + (x - mean) * (x - mean), 0);
  return squares / (values.length - ddof);
}

/**
 * Linearly interpolated quantile of `values` (need not be sorted).
 */
export function naiveQuantile(values: readonly number[], q: number): number {
  if (values.length === 0) {
    throw new Error('naiveQuantile needs at least one value');
  }
  const sorted = sortedCopy(values);
  const idx = q * (sorted.length - 1);
  const lower = Math.floor(idx);
  const higher = Math.min(lower + 1, sorted.length - 1);
  return sorted[lower] + (sorted[higher] - sorted[lower]) * (idx - lower);
}
