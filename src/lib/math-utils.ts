/**
 * @fileoverview Statistical helpers shared by the risk calculator and the
 * decision history summaries.
 */

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Population standard deviation (divides by n, not n - 1).
 * Returns 0 for empty arrays.
 *
 * @example
 * populationStdDev([1, 2, 3, 4, 5]) // returns ~1.414
 */
export function populationStdDev(
  values: readonly number[],
  avg: number = mean(values),
): number {
  if (values.length === 0) return 0;
  const variance = mean(values.map((v) => (v - avg) * (v - avg)));
  return Math.sqrt(variance);
}

/**
 * Per-step simple returns: r[i] = (b[i] - b[i-1]) / b[i-1].
 * Steps whose previous value is not positive are skipped.
 */
export function stepReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    if (prev > 0) {
      returns.push((values[i] - prev) / prev);
    }
  }
  return returns;
}
