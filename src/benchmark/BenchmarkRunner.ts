/**
 * Benchmark Runner
 *
 * Runs every (algorithm, pivot, dataset, size) configuration for the
 * configured number of runs, checks each output against a reference
 * ordering and collects one record per run.
 *
 * A configuration that produces a wrong ordering or throws is dropped as a
 * whole and reported as a failure; the remaining configurations still run.
 *
 * @module benchmark/BenchmarkRunner
 */

import { mergeSort } from '../algorithms/merge-sort.js'
import { quickSort } from '../algorithms/quick-sort.js'
import { generateDataset } from '../datasets/generator.js'
import { CorrectnessError, errorMessage } from '../errors/index.js'
import { benchmarkLogger, errorLogger } from '../utils/logger.js'
import { MetricsCollector } from './MetricsCollector.js'
import type {
  BenchmarkCase,
  BenchmarkFailure,
  BenchmarkOutcome,
  BenchmarkRecord,
  ResolvedBenchmarkConfig,
  Sorter
} from './types.js'

/**
 * Builds the sorter for one run of a configuration
 */
export type SorterFactory = (testCase: BenchmarkCase, runSeed: number) => Sorter

export interface BenchmarkRunnerOptions {
  collector?: MetricsCollector
  sorterFactory?: SorterFactory
}

/**
 * Default sorters. Only the random pivot strategy receives the run seed.
 */
export const defaultSorterFactory: SorterFactory = (testCase, runSeed) => {
  if (testCase.algorithm === 'merge') {
    return (input, sink) => mergeSort(input, { sink })
  }

  const pivot = testCase.pivot ?? 'first'
  const seed = pivot === 'random' ? runSeed : undefined
  return (input, sink) => quickSort(input, pivot, { sink, seed })
}

/**
 * Seed for 0-based run `runIndex`; used for both the dataset and the random pivot
 */
export function runSeed(baseSeed: number, runIndex: number): number {
  return baseSeed + runIndex * 1000
}

/**
 * Trusted ascending ordering to check sort output against
 */
export function referenceOrder(input: readonly number[]): number[] {
  return [...input].sort((a, b) => a - b)
}

/**
 * Index of the first difference between two orderings, or -1 when they agree
 */
export function findMismatch(expected: readonly number[], actual: readonly number[]): number {
  const length = Math.max(expected.length, actual.length)
  for (let i = 0; i < length; i++) {
    if (expected[i] !== actual[i]) {
      return i
    }
  }
  return -1
}

export class BenchmarkRunner {
  private config: ResolvedBenchmarkConfig
  private collector: MetricsCollector
  private sorterFactory: SorterFactory
  private debug = benchmarkLogger()
  private debugError = errorLogger()

  constructor(config: ResolvedBenchmarkConfig, options: BenchmarkRunnerOptions = {}) {
    this.config = config
    this.collector = options.collector ?? new MetricsCollector()
    this.sorterFactory = options.sorterFactory ?? defaultSorterFactory
  }

  /**
   * Expands the configuration into individual cases. Merge sort ignores
   * pivots, so it appears once per dataset and size.
   */
  listCases(): BenchmarkCase[] {
    const cases: BenchmarkCase[] = []

    for (const algorithm of this.config.algorithms) {
      const pivots = algorithm === 'quick' ? this.config.pivots : [null]
      for (const pivot of pivots) {
        for (const dataset of this.config.datasets) {
          for (const size of this.config.sizes) {
            cases.push({ algorithm, pivot, dataset, size })
          }
        }
      }
    }

    return cases
  }

  /**
   * Run every case
   */
  run(): BenchmarkOutcome {
    const cases = this.listCases()
    this.debug('Running %d benchmark configurations, %d runs each', cases.length, this.config.runs)

    const records: BenchmarkRecord[] = []
    const failures: BenchmarkFailure[] = []

    for (const testCase of cases) {
      const result = this.runCase(testCase)
      if ('failure' in result) {
        failures.push(result.failure)
      } else {
        records.push(...result.records)
      }
    }

    this.debug('Benchmark finished: %d records, %d failures', records.length, failures.length)
    return { records, failures, failed: failures.length > 0 }
  }

  /**
   * Run all runs of one case. Any failed run discards the whole case.
   */
  runCase(
    testCase: BenchmarkCase
  ): { records: BenchmarkRecord[] } | { failure: BenchmarkFailure } {
    const { runs, seed, instrument } = this.config
    const label = describeCase(testCase)
    const records: BenchmarkRecord[] = []

    for (let runIndex = 0; runIndex < runs; runIndex++) {
      this.debug('Running %s run=%d/%d', label, runIndex + 1, runs)

      try {
        const currentSeed = runSeed(seed, runIndex)
        const input = generateDataset(testCase.size, testCase.dataset, currentSeed)
        const sorter = this.sorterFactory(testCase, currentSeed)
        const { output, metrics } = this.collector.measure(sorter, input, instrument)

        const expected = referenceOrder(input)
        const mismatch = findMismatch(expected, output)
        if (mismatch !== -1) {
          const error = new CorrectnessError(
            `${label} run=${runIndex + 1}`,
            mismatch,
            expected[mismatch],
            output[mismatch]
          )
          this.debugError('Correctness check failed: %s', error.message)
          return {
            failure: { ...testCase, kind: 'correctness', run: runIndex + 1, message: error.message }
          }
        }

        records.push({
          algorithm: testCase.algorithm,
          pivot: testCase.pivot,
          dataset: testCase.dataset,
          size: testCase.size,
          run: runIndex + 1,
          time_s: metrics.timeSeconds,
          peak_mem_bytes: metrics.peakMemoryBytes,
          comparisons: instrument ? metrics.comparisons : null,
          swaps: instrument ? metrics.swaps : null,
          seed
        })
      } catch (error) {
        this.debugError('Error running %s: %O', label, error)
        return {
          failure: { ...testCase, kind: 'error', run: runIndex + 1, message: errorMessage(error) }
        }
      }
    }

    return { records }
  }
}

export function describeCase(testCase: BenchmarkCase): string {
  const pivot = testCase.pivot ? `(${testCase.pivot})` : ''
  return `${testCase.algorithm}${pivot} on ${testCase.dataset} size=${testCase.size}`
}
