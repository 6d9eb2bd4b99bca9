/** Statistics helpers for aggregating benchmark runs. All return 0 for empty input. */

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}

/**
 * Sample standard deviation (n - 1 denominator); 0 for fewer than two values
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0
  const m = mean(values)
  const squared = values.reduce((sum, value) => sum + (value - m) ** 2, 0)
  return Math.sqrt(squared / (values.length - 1))
}

export function min(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((best, value) => (value < best ? value : best), values[0])
}

export function max(values: readonly number[]): number {
  if (values.length === 0) return 0
  return values.reduce((worst, value) => (value > worst ? value : worst), values[0])
}
