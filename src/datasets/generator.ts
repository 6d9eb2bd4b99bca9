/**
 * Dataset Generator
 *
 * Builds integer arrays with a controlled shape for benchmarking. Output is
 * fully determined by (size, kind, seed).
 *
 * @module datasets/generator
 */

import { ConfigurationError, ErrorMessages } from '../errors/index.js'
import { createRandom } from '../utils/random.js'
import type { RandomSource } from '../utils/random.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('datasets')

export const DATASET_KINDS = [
  'sorted',
  'reverse',
  'random',
  'nearly_sorted',
  'duplicates_heavy'
] as const

export type DatasetKind = (typeof DATASET_KINDS)[number]

export function isDatasetKind(value: unknown): value is DatasetKind {
  return typeof value === 'string' && DATASET_KINDS.some((kind) => kind === value)
}

/**
 * @throws ConfigurationError for unknown kinds
 */
export function parseDatasetKind(value: string): DatasetKind {
  const normalized = value.trim()
  if (!isDatasetKind(normalized)) {
    throw new ConfigurationError(ErrorMessages.UNKNOWN_DATASET_KIND(value))
  }
  return normalized
}

/**
 * Generates `size` integers shaped by `kind`.
 *
 * - sorted: 0 .. size-1
 * - reverse: size-1 .. 0
 * - random: uniform in [0, size*10]
 * - nearly_sorted: sorted, then max(1, size/100) random pair swaps
 * - duplicates_heavy: uniform over max(1, size/10) distinct values
 *
 * @throws ConfigurationError for a negative or fractional size, or an unknown kind
 */
export function generateDataset(size: number, kind: DatasetKind, seed?: number): number[] {
  if (!Number.isInteger(size) || size < 0) {
    throw new ConfigurationError(ErrorMessages.INVALID_SIZE('size', size))
  }
  if (!isDatasetKind(kind)) {
    throw new ConfigurationError(ErrorMessages.UNKNOWN_DATASET_KIND(String(kind)))
  }

  logger('Generating %s dataset of size %d (seed=%s)', kind, size, seed ?? 'none')

  if (size === 0) {
    return []
  }

  const random = createRandom(seed)

  switch (kind) {
    case 'sorted':
      return ascendingRange(size)
    case 'reverse':
      return Array.from({ length: size }, (_, i) => size - 1 - i)
    case 'random':
      return Array.from({ length: size }, () => random.int(0, size * 10))
    case 'nearly_sorted':
      return nearlySorted(size, random)
    case 'duplicates_heavy': {
      const distinct = Math.max(1, Math.floor(size / 10))
      return Array.from({ length: size }, () => random.int(0, distinct - 1))
    }
  }
}

function ascendingRange(size: number): number[] {
  return Array.from({ length: size }, (_, i) => i)
}

function nearlySorted(size: number, random: RandomSource): number[] {
  const values = ascendingRange(size)
  const swaps = Math.max(1, Math.floor(size / 100))

  for (let n = 0; n < swaps; n++) {
    const i = random.int(0, size - 1)
    const j = random.int(0, size - 1)
    const tmp = values[i]
    values[i] = values[j]
    values[j] = tmp
  }

  return values
}
