import { mergeSort } from './merge-sort.js'
import { quickSort } from './quick-sort.js'
import type { SortOptions } from './types.js'

/**
 * Sorts with whichever algorithm `options` names
 */
export function sort(sequence: readonly number[], options: SortOptions): number[] {
  switch (options.algorithm) {
    case 'merge':
      return mergeSort(sequence, { sink: options.sink })
    case 'quick':
      return quickSort(sequence, options.pivotStrategy, {
        sink: options.sink,
        seed: options.seed,
        random: options.random
      })
  }
}
