/**
 * Sorting Type Definitions
 *
 * @module algorithms/types
 */

import type { RandomSource } from '../utils/random.js'

export const PIVOT_STRATEGIES = ['first', 'last', 'median_of_three', 'random'] as const

/**
 * Which index of a partition becomes the pivot
 */
export type PivotStrategy = (typeof PIVOT_STRATEGIES)[number]

export const ALGORITHMS = ['merge', 'quick'] as const

export type Algorithm = (typeof ALGORITHMS)[number]

export type InstrumentationEvent = 'comparison' | 'swap'

/**
 * Receives comparison and swap notifications while a sort runs.
 * Called synchronously; must not throw and must not touch the sequence.
 */
export interface InstrumentationSink {
  record(event: InstrumentationEvent): void
}

export interface MergeSortOptions {
  sink?: InstrumentationSink
}

export interface QuickSortOptions {
  sink?: InstrumentationSink
  /** Seed for the `random` pivot strategy; ignored by the others */
  seed?: number
  /** Explicit generator for the `random` pivot strategy; wins over `seed` */
  random?: RandomSource
}

/**
 * Options accepted by the `sort` dispatcher
 */
export type SortOptions =
  | ({ algorithm: 'merge' } & MergeSortOptions)
  | ({ algorithm: 'quick'; pivotStrategy: PivotStrategy } & QuickSortOptions)
