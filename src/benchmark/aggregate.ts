/**
 * Aggregation of per-run metrics into summary statistics
 *
 * @module benchmark/aggregate
 */

import { max, mean, min, sampleStdDev } from '../utils/statistics.js'
import type {
  AggregatedMetrics,
  BenchmarkCase,
  BenchmarkRecord,
  BenchmarkSummary,
  SortMetrics
} from './types.js'

/**
 * Aggregates a group of runs. Count statistics appear only when every run
 * carried counts.
 *
 * @returns undefined for an empty group
 */
export function aggregateMetrics(
  metrics: readonly SortMetrics[],
  counted = true
): AggregatedMetrics | undefined {
  if (metrics.length === 0) {
    return undefined
  }

  const times = metrics.map((m) => m.timeSeconds)
  const memories = metrics.map((m) => m.peakMemoryBytes)

  const result: AggregatedMetrics = {
    time_mean_s: mean(times),
    time_std_s: sampleStdDev(times),
    time_best_s: min(times),
    time_worst_s: max(times),
    memory_mean_bytes: mean(memories),
    memory_std_bytes: sampleStdDev(memories),
    memory_peak_bytes: max(memories),
    runs: metrics.length
  }

  if (counted) {
    const comparisons = metrics.map((m) => m.comparisons)
    const swaps = metrics.map((m) => m.swaps)
    result.comparisons_mean = mean(comparisons)
    result.comparisons_std = sampleStdDev(comparisons)
    result.swaps_mean = mean(swaps)
    result.swaps_std = sampleStdDev(swaps)
  }

  return result
}

/**
 * Key under which a configuration appears in summary.json
 */
export function summaryKey(group: BenchmarkCase): string {
  return `${group.algorithm}_${group.pivot ?? 'N/A'}_${group.dataset}_${group.size}`
}

/**
 * Groups records by (algorithm, pivot, dataset, size) and aggregates each group
 */
export function summarizeRecords(records: readonly BenchmarkRecord[]): BenchmarkSummary {
  const groups = new Map<string, { group: BenchmarkCase; rows: BenchmarkRecord[] }>()

  for (const record of records) {
    const key = summaryKey(record)
    const existing = groups.get(key)
    if (existing) {
      existing.rows.push(record)
    } else {
      groups.set(key, {
        group: {
          algorithm: record.algorithm,
          pivot: record.pivot,
          dataset: record.dataset,
          size: record.size
        },
        rows: [record]
      })
    }
  }

  const summary: BenchmarkSummary = {}
  for (const [key, { group, rows }] of groups) {
    const counted = rows.every((row) => row.comparisons !== null && row.swaps !== null)
    const aggregated = aggregateMetrics(rows.map(toMetrics), counted)
    if (aggregated) {
      summary[key] = { ...aggregated, ...group }
    }
  }

  return summary
}

function toMetrics(record: BenchmarkRecord): SortMetrics {
  return {
    timeSeconds: record.time_s,
    peakMemoryBytes: record.peak_mem_bytes,
    comparisons: record.comparisons ?? 0,
    swaps: record.swaps ?? 0
  }
}
