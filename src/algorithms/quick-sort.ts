/**
 * Quick Sort
 *
 * In-place Lomuto quick sort over a private copy of the input, with a
 * selectable pivot strategy. Not stable.
 *
 * Recursion only descends into the smaller side of each partition; the
 * larger side is handled by the loop, so stack depth stays logarithmic
 * even for sorted input with the `first` or `last` strategy.
 *
 * @module algorithms/quick-sort
 */

import { ConfigurationError, ErrorMessages } from '../errors/index.js'
import { createRandom } from '../utils/random.js'
import type { RandomSource } from '../utils/random.js'
import { NOOP_SINK } from './instrumentation.js'
import { isPivotStrategy } from './pivot.js'
import type { InstrumentationSink, PivotStrategy, QuickSortOptions } from './types.js'

interface PartitionContext {
  readonly values: number[]
  readonly strategy: PivotStrategy
  readonly sink: InstrumentationSink
  readonly random: RandomSource | undefined
}

/**
 * Returns a sorted copy of `sequence`.
 *
 * @param pivotStrategy - Validated on entry, even for empty input
 * @throws ConfigurationError when the pivot strategy is unknown
 */
export function quickSort(
  sequence: readonly number[],
  pivotStrategy: PivotStrategy,
  options: QuickSortOptions = {}
): number[] {
  if (!isPivotStrategy(pivotStrategy)) {
    throw new ConfigurationError(ErrorMessages.UNKNOWN_PIVOT_STRATEGY(String(pivotStrategy)))
  }

  const values = sequence.slice()
  if (values.length <= 1) {
    return values
  }

  const context: PartitionContext = {
    values,
    strategy: pivotStrategy,
    sink: options.sink ?? NOOP_SINK,
    // Only the random strategy draws numbers
    random: pivotStrategy === 'random' ? (options.random ?? createRandom(options.seed)) : undefined
  }

  sortRange(context, 0, values.length - 1)
  return values
}

function sortRange(context: PartitionContext, left: number, right: number): void {
  let lo = left
  let hi = right

  while (lo < hi) {
    const pivotIndex = choosePivot(context, lo, hi)
    const final = partition(context, lo, hi, pivotIndex)

    if (final - lo < hi - final) {
      sortRange(context, lo, final - 1)
      lo = final + 1
    } else {
      sortRange(context, final + 1, hi)
      hi = final - 1
    }
  }
}

/**
 * Picks the pivot index for [left, right]. Evaluated once per partition.
 */
function choosePivot(context: PartitionContext, left: number, right: number): number {
  switch (context.strategy) {
    case 'first':
      return left
    case 'last':
      return right
    case 'median_of_three':
      return medianOfThree(context.values, left, right, context.sink)
    case 'random':
      if (!context.random) {
        throw new Error('random pivot strategy requires a random source')
      }
      return context.random.int(left, right)
    default: {
      const unknown: never = context.strategy
      throw new ConfigurationError(ErrorMessages.UNKNOWN_PIVOT_STRATEGY(String(unknown)))
    }
  }
}

/**
 * Median of values[left], values[mid], values[right].
 *
 * Always records two comparisons. Branch order decides ties: mid first,
 * then left, otherwise right.
 */
export function medianOfThree(
  values: readonly number[],
  left: number,
  right: number,
  sink: InstrumentationSink
): number {
  const mid = Math.floor((left + right) / 2)
  sink.record('comparison')
  sink.record('comparison')

  const a = values[left]
  const b = values[mid]
  const c = values[right]

  if ((a <= b && b <= c) || (c <= b && b <= a)) {
    return mid
  }
  if ((b <= a && a <= c) || (c <= a && a <= b)) {
    return left
  }
  return right
}

/**
 * Lomuto partition of [left, right] around values[pivotIndex].
 * Returns the pivot's final index.
 */
function partition(
  context: PartitionContext,
  left: number,
  right: number,
  pivotIndex: number
): number {
  const { values, sink } = context
  const pivot = values[pivotIndex]

  swap(values, pivotIndex, right)
  sink.record('swap')

  let store = left
  for (let i = left; i < right; i++) {
    sink.record('comparison')
    if (values[i] <= pivot) {
      if (i !== store) {
        swap(values, i, store)
        sink.record('swap')
      }
      store++
    }
  }

  swap(values, store, right)
  sink.record('swap')

  return store
}

function swap(values: number[], i: number, j: number): void {
  const tmp = values[i]
  values[i] = values[j]
  values[j] = tmp
}
