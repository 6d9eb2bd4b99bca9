import { ConfigurationError, ErrorMessages } from '../errors/index.js'
import { ALGORITHMS, PIVOT_STRATEGIES } from './types.js'
import type { Algorithm, PivotStrategy } from './types.js'

const PIVOT_ALIASES: Readonly<Record<string, PivotStrategy>> = {
  'median-of-three': 'median_of_three'
}

export function isPivotStrategy(value: unknown): value is PivotStrategy {
  return typeof value === 'string' && PIVOT_STRATEGIES.some((strategy) => strategy === value)
}

/**
 * Parses user input into a pivot strategy
 * @throws ConfigurationError for anything that is not a known strategy
 */
export function parsePivotStrategy(value: string): PivotStrategy {
  const normalized = value.trim()
  const resolved = PIVOT_ALIASES[normalized] ?? normalized
  if (!isPivotStrategy(resolved)) {
    throw new ConfigurationError(ErrorMessages.UNKNOWN_PIVOT_STRATEGY(value))
  }
  return resolved
}

export function isAlgorithm(value: unknown): value is Algorithm {
  return typeof value === 'string' && ALGORITHMS.some((algorithm) => algorithm === value)
}

/**
 * @throws ConfigurationError for anything other than `merge` or `quick`
 */
export function parseAlgorithm(value: string): Algorithm {
  const normalized = value.trim()
  if (!isAlgorithm(normalized)) {
    throw new ConfigurationError(ErrorMessages.UNKNOWN_ALGORITHM(value))
  }
  return normalized
}
