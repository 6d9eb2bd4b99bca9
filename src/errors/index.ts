/**
 * Error types and message templates
 *
 * Only two things can go wrong in a benchmark batch: the caller asked for
 * something that does not exist (ConfigurationError), or a sort produced an
 * ordering that disagrees with the reference (CorrectnessError).
 *
 * @module errors
 */

/**
 * Standardized error messages with consistent format
 * Format: ${path}: Expected ${expected}, got ${actual}
 */
export const ErrorMessages = {
  UNKNOWN_PIVOT_STRATEGY: (actual: string): string =>
    `pivotStrategy: Expected one of first, last, median_of_three, random, got "${actual}"`,
  UNKNOWN_DATASET_KIND: (actual: string): string =>
    `datasetKind: Expected one of sorted, reverse, random, nearly_sorted, duplicates_heavy, got "${actual}"`,
  UNKNOWN_ALGORITHM: (actual: string): string =>
    `algorithm: Expected one of merge, quick, got "${actual}"`,
  INVALID_SIZE: (path: string, actual: number): string =>
    `${path}: Expected non-negative integer, got ${actual}`,
  INVALID_INTEGER: (path: string, actual: string): string =>
    `${path}: Expected integer, got "${actual}"`,
  MIN_VALUE: (path: string, min: number, actual: number): string =>
    `${path}: Expected value >= ${min}, got ${actual}`,
  EMPTY_LIST: (path: string): string => `${path}: Expected at least one entry, got none`,
  SORT_MISMATCH: (label: string, index: number, expected: number, actual: number | undefined): string =>
    `${label}: Expected ${expected} at index ${index}, got ${actual ?? 'nothing'}`
}

/**
 * Invalid configuration: unknown pivot strategy, dataset kind, algorithm or a
 * malformed numeric setting. Reported to the caller immediately.
 */
export class ConfigurationError extends Error {
  readonly errors: readonly string[]

  constructor(errors: string | readonly string[]) {
    const list = typeof errors === 'string' ? [errors] : errors
    super(list.join('; '))
    this.name = 'ConfigurationError'
    this.errors = list
  }
}

/**
 * A sort returned an ordering that differs from the trusted reference
 */
export class CorrectnessError extends Error {
  readonly label: string
  readonly index: number

  constructor(label: string, index: number, expected: number, actual: number | undefined) {
    super(ErrorMessages.SORT_MISMATCH(label, index, expected, actual))
    this.name = 'CorrectnessError'
    this.label = label
    this.index = index
  }
}

/**
 * Normalizes an unknown thrown value into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
