/**
 * Sorting micro-benchmarks
 *
 * Run with: npm run bench
 */

import { bench, describe } from 'vitest'
import { mergeSort } from '../../src/algorithms/merge-sort.js'
import { quickSort } from '../../src/algorithms/quick-sort.js'
import { PIVOT_STRATEGIES } from '../../src/algorithms/types.js'
import { DATASET_KINDS, generateDataset } from '../../src/datasets/generator.js'

const SIZE = 5000

describe.each(DATASET_KINDS)('%s input', (kind) => {
  const input = generateDataset(SIZE, kind, 42)

  bench('merge sort', () => {
    mergeSort(input)
  })

  for (const pivot of PIVOT_STRATEGIES) {
    bench(`quick sort (${pivot})`, () => {
      quickSort(input, pivot, { seed: 42 })
    })
  }
})
