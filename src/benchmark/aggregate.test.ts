import { describe, it, expect } from 'vitest'
import { aggregateMetrics, summarizeRecords, summaryKey } from './aggregate.js'
import type { BenchmarkRecord } from './types.js'

const record = (overrides: Partial<BenchmarkRecord> = {}): BenchmarkRecord => ({
  algorithm: 'quick',
  pivot: 'first',
  dataset: 'random',
  size: 100,
  run: 1,
  time_s: 0.5,
  peak_mem_bytes: 1000,
  comparisons: 10,
  swaps: 4,
  seed: 42,
  ...overrides
})

describe('aggregateMetrics', () => {
  it('returns undefined for no runs', () => {
    expect(aggregateMetrics([])).toBeUndefined()
  })

  it('computes time and memory statistics', () => {
    const result = aggregateMetrics(
      [
        { timeSeconds: 1, peakMemoryBytes: 100, comparisons: 4, swaps: 2 },
        { timeSeconds: 3, peakMemoryBytes: 300, comparisons: 6, swaps: 2 }
      ],
      true
    )

    expect(result).toEqual({
      time_mean_s: 2,
      time_std_s: Math.SQRT2,
      time_best_s: 1,
      time_worst_s: 3,
      memory_mean_bytes: 200,
      memory_std_bytes: Math.sqrt(20000),
      memory_peak_bytes: 300,
      runs: 2,
      comparisons_mean: 5,
      comparisons_std: Math.SQRT2,
      swaps_mean: 2,
      swaps_std: 0
    })
  })

  it('reports zero deviation for a single run', () => {
    const result = aggregateMetrics([
      { timeSeconds: 0.2, peakMemoryBytes: 50, comparisons: 1, swaps: 0 }
    ])
    expect(result?.time_std_s).toBe(0)
    expect(result?.memory_std_bytes).toBe(0)
  })

  it('omits count statistics when runs were not counted', () => {
    const result = aggregateMetrics(
      [{ timeSeconds: 0.2, peakMemoryBytes: 50, comparisons: 0, swaps: 0 }],
      false
    )
    expect(result).not.toHaveProperty('comparisons_mean')
    expect(result).not.toHaveProperty('swaps_std')
  })
})

describe('summaryKey', () => {
  it('uses N/A for a missing pivot', () => {
    expect(summaryKey({ algorithm: 'merge', pivot: null, dataset: 'sorted', size: 10 })).toBe(
      'merge_N/A_sorted_10'
    )
    expect(
      summaryKey({ algorithm: 'quick', pivot: 'median_of_three', dataset: 'reverse', size: 5 })
    ).toBe('quick_median_of_three_reverse_5')
  })
})

describe('summarizeRecords', () => {
  it('groups by algorithm, pivot, dataset and size', () => {
    const summary = summarizeRecords([
      record({ run: 1, time_s: 1 }),
      record({ run: 2, time_s: 3 }),
      record({ size: 200, run: 1 }),
      record({ algorithm: 'merge', pivot: null, swaps: 0 })
    ])

    expect(Object.keys(summary).sort()).toEqual([
      'merge_N/A_random_100',
      'quick_first_random_100',
      'quick_first_random_200'
    ])

    const entry = summary['quick_first_random_100']
    expect(entry.runs).toBe(2)
    expect(entry.time_mean_s).toBe(2)
    expect(entry.algorithm).toBe('quick')
    expect(entry.pivot).toBe('first')
    expect(entry.dataset).toBe('random')
    expect(entry.size).toBe(100)
    expect(entry.comparisons_mean).toBe(10)
  })

  it('leaves out count statistics for uninstrumented rows', () => {
    const summary = summarizeRecords([record({ comparisons: null, swaps: null })])
    expect(summary['quick_first_random_100']).not.toHaveProperty('comparisons_mean')
  })

  it('returns an empty summary for no records', () => {
    expect(summarizeRecords([])).toEqual({})
  })
})
