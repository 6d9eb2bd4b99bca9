/**
 * Metrics Collector
 *
 * Times a single sort and reads memory usage around it. Optionally counts
 * comparisons and swaps through a CountingSink.
 *
 * @module benchmark/MetricsCollector
 */

import { performance } from 'node:perf_hooks'
import { CountingSink, NOOP_SINK } from '../algorithms/instrumentation.js'
import type { SortMetrics, Sorter } from './types.js'

/**
 * Sources of time and memory readings
 */
export interface MetricsProbes {
  /** Milliseconds from an arbitrary origin */
  now: () => number
  /** Current V8 heap usage in bytes */
  heapUsed: () => number
  /** Process peak resident set size in bytes */
  maxRss: () => number
}

export const DEFAULT_PROBES: MetricsProbes = {
  now: () => performance.now(),
  heapUsed: () => process.memoryUsage().heapUsed,
  // resourceUsage reports kilobytes
  maxRss: () => process.resourceUsage().maxRSS * 1024
}

export interface MeasuredSort {
  readonly output: number[]
  readonly metrics: SortMetrics
}

export class MetricsCollector {
  private probes: MetricsProbes

  constructor(probes: Partial<MetricsProbes> = {}) {
    this.probes = { ...DEFAULT_PROBES, ...probes }
  }

  /**
   * Runs `sorter` once over `input`.
   *
   * Peak memory is the larger of the heap growth during the sort and the
   * process peak RSS afterwards. Counts are 0 when `instrument` is false.
   */
  measure(sorter: Sorter, input: readonly number[], instrument: boolean): MeasuredSort {
    const counter = instrument ? new CountingSink() : undefined
    const sink = counter ?? NOOP_SINK

    const heapBefore = this.probes.heapUsed()
    const start = this.probes.now()
    const output = sorter(input, sink)
    const end = this.probes.now()
    const heapAfter = this.probes.heapUsed()

    const metrics: SortMetrics = Object.freeze({
      timeSeconds: (end - start) / 1000,
      peakMemoryBytes: Math.max(heapAfter - heapBefore, this.probes.maxRss()),
      comparisons: counter?.comparisons ?? 0,
      swaps: counter?.swaps ?? 0
    })

    return { output, metrics }
  }
}

/**
 * Convenience wrapper using the default probes
 */
export function measureSortPerformance(
  sorter: Sorter,
  input: readonly number[],
  options: { instrument?: boolean } = {}
): MeasuredSort {
  return new MetricsCollector().measure(sorter, input, options.instrument ?? false)
}
