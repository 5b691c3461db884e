/**
 * Sample Statistics
 *
 * @module insert-size/statistics
 */

function requireNonEmpty(values: readonly number[], what: string): void {
  if (values.length === 0) {
    throw new RangeError(`Cannot compute ${what} of an empty sample`);
  }
}

/**
 * Arithmetic mean.
 *
 * @throws RangeError on an empty sample
 */
export function computeMean(values: readonly number[]): number {
  requireNonEmpty(values, 'mean');
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Population standard deviation (divides by N, not N - 1).
 *
 * @throws RangeError on an empty sample
 * @example computePopulationStd([300, 320, 340]) // 16.3299...
 */
export function computePopulationStd(values: readonly number[], mean = computeMean(values)): number {
  requireNonEmpty(values, 'standard deviation');
  let squares = 0;
  for (const value of values) {
    const delta = value - mean;
    squares += delta * delta;
  }
  return Math.sqrt(squares / values.length);
}

/**
 * Mean and population standard deviation in one call.
 */
export function summarizeSample(values: readonly number[]): { mean: number; std: number } {
  const mean = computeMean(values);
  return { mean, std: computePopulationStd(values, mean) };
}
