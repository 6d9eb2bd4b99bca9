/**
 * Benchmark Type Definitions
 *
 * @module benchmark/types
 */

import type { Algorithm, InstrumentationSink, PivotStrategy } from '../algorithms/types.js'
import type { DatasetKind } from '../datasets/generator.js'

/**
 * Benchmark configuration as accepted from callers; every field is optional
 */
export interface BenchmarkConfig {
  /** Algorithms to run (default: merge, quick) */
  algorithms?: Algorithm[]
  /** Pivot strategies for quick sort (default: random) */
  pivots?: PivotStrategy[]
  /** Dataset shapes (default: all five) */
  datasets?: DatasetKind[]
  /** Input sizes (default: 1000, 5000, 10000, 50000) */
  sizes?: number[]
  /** Runs per configuration (default: 5) */
  runs?: number
  /** Base seed; run r uses seed + r * 1000 (default: 42) */
  seed?: number
  /** Count comparisons and swaps (default: false) */
  instrument?: boolean
  /** Directory for bench_results.csv and summary.json (default: results) */
  outDir?: string
  /** Enable every sort-bench debug namespace (default: false) */
  verbose?: boolean
}

export type ResolvedBenchmarkConfig = Readonly<Required<BenchmarkConfig>>

/**
 * One measured sort
 */
export interface SortMetrics {
  readonly timeSeconds: number
  readonly peakMemoryBytes: number
  readonly comparisons: number
  readonly swaps: number
}

/**
 * A sort under measurement. Receives the input and the sink to report to.
 */
export type Sorter = (input: readonly number[], sink: InstrumentationSink) => number[]

/**
 * One row of bench_results.csv
 */
export interface BenchmarkRecord {
  readonly algorithm: Algorithm
  readonly pivot: PivotStrategy | null
  readonly dataset: DatasetKind
  readonly size: number
  /** 1-based run index */
  readonly run: number
  readonly time_s: number
  readonly peak_mem_bytes: number
  readonly comparisons: number | null
  readonly swaps: number | null
  readonly seed: number
}

export const RECORD_COLUMNS = [
  'algorithm',
  'pivot',
  'dataset',
  'size',
  'run',
  'time_s',
  'peak_mem_bytes',
  'comparisons',
  'swaps',
  'seed'
] as const satisfies ReadonlyArray<keyof BenchmarkRecord>

/**
 * Identifies one benchmark configuration
 */
export interface BenchmarkCase {
  readonly algorithm: Algorithm
  readonly pivot: PivotStrategy | null
  readonly dataset: DatasetKind
  readonly size: number
}

/**
 * A configuration whose rows were discarded
 */
export interface BenchmarkFailure extends BenchmarkCase {
  readonly kind: 'correctness' | 'error'
  readonly run: number | null
  readonly message: string
}

export interface BenchmarkOutcome {
  readonly records: BenchmarkRecord[]
  readonly failures: BenchmarkFailure[]
  /** True when at least one configuration failed */
  readonly failed: boolean
}

/**
 * Aggregated statistics for one (algorithm, pivot, dataset, size) group
 */
export interface AggregatedMetrics {
  time_mean_s: number
  time_std_s: number
  time_best_s: number
  time_worst_s: number
  memory_mean_bytes: number
  memory_std_bytes: number
  memory_peak_bytes: number
  runs: number
  comparisons_mean?: number
  comparisons_std?: number
  swaps_mean?: number
  swaps_std?: number
}

export interface SummaryEntry extends AggregatedMetrics {
  algorithm: Algorithm
  pivot: PivotStrategy | null
  dataset: DatasetKind
  size: number
}

export type BenchmarkSummary = Record<string, SummaryEntry>
