/**
 * Benchmark harness - main exports
 *
 * @module benchmark
 */

export type {
  AggregatedMetrics,
  BenchmarkCase,
  BenchmarkConfig,
  BenchmarkFailure,
  BenchmarkOutcome,
  BenchmarkRecord,
  BenchmarkSummary,
  ResolvedBenchmarkConfig,
  SortMetrics,
  Sorter,
  SummaryEntry
} from './types.js'
export { RECORD_COLUMNS } from './types.js'

export {
  MetricsCollector,
  DEFAULT_PROBES,
  measureSortPerformance,
  type MeasuredSort,
  type MetricsProbes
} from './MetricsCollector.js'

export {
  BenchmarkRunner,
  defaultSorterFactory,
  describeCase,
  findMismatch,
  referenceOrder,
  runSeed,
  type BenchmarkRunnerOptions,
  type SorterFactory
} from './BenchmarkRunner.js'

export { aggregateMetrics, summarizeRecords, summaryKey } from './aggregate.js'
