/**
 * Merge Sort
 *
 * Stable, out-of-place, top-down merge sort. The caller's array is never
 * written to.
 *
 * @module algorithms/merge-sort
 */

import { NOOP_SINK } from './instrumentation.js'
import type { InstrumentationSink, MergeSortOptions } from './types.js'

/**
 * Returns a sorted copy of `sequence`.
 *
 * Every head-to-head comparison while merging records one `comparison`
 * event. Merge sort never records `swap`.
 */
export function mergeSort(sequence: readonly number[], options: MergeSortOptions = {}): number[] {
  const sink = options.sink ?? NOOP_SINK
  return sortRange(sequence, 0, sequence.length, sink)
}

function sortRange(
  sequence: readonly number[],
  start: number,
  end: number,
  sink: InstrumentationSink
): number[] {
  const length = end - start
  if (length <= 1) {
    return sequence.slice(start, end)
  }

  const mid = start + Math.floor(length / 2)
  const left = sortRange(sequence, start, mid, sink)
  const right = sortRange(sequence, mid, end, sink)
  return merge(left, right, sink)
}

function merge(left: number[], right: number[], sink: InstrumentationSink): number[] {
  const result: number[] = new Array<number>(left.length + right.length)
  let i = 0
  let j = 0
  let k = 0

  while (i < left.length && j < right.length) {
    sink.record('comparison')
    // Ties take the left head to stay stable
    if (left[i] <= right[j]) {
      result[k++] = left[i++]
    } else {
      result[k++] = right[j++]
    }
  }

  // Remainder is already ordered; no events
  while (i < left.length) {
    result[k++] = left[i++]
  }
  while (j < right.length) {
    result[k++] = right[j++]
  }

  return result
}
