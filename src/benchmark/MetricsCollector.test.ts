/**
 * Tests for MetricsCollector
 */

import { describe, it, expect, vi } from 'vitest'
import { MetricsCollector, measureSortPerformance } from './MetricsCollector.js'
import { mergeSort } from '../algorithms/merge-sort.js'
import { quickSort } from '../algorithms/quick-sort.js'
import type { Sorter } from './types.js'

const mergeSorter: Sorter = (input, sink) => mergeSort(input, { sink })
const quickFirst: Sorter = (input, sink) => quickSort(input, 'first', { sink })

describe('MetricsCollector', () => {
  it('converts elapsed milliseconds to seconds', () => {
    const now = vi.fn().mockReturnValueOnce(1000).mockReturnValueOnce(1250)
    const collector = new MetricsCollector({ now, heapUsed: () => 0, maxRss: () => 0 })

    const { metrics } = collector.measure(mergeSorter, [2, 1], false)

    expect(metrics.timeSeconds).toBe(0.25)
    expect(now).toHaveBeenCalledTimes(2)
  })

  it('reports the larger of heap growth and peak RSS', () => {
    const heapUsed = vi.fn().mockReturnValueOnce(1_000).mockReturnValueOnce(9_000)

    const fromHeap = new MetricsCollector({ now: () => 0, heapUsed, maxRss: () => 5_000 })
    expect(fromHeap.measure(mergeSorter, [1], false).metrics.peakMemoryBytes).toBe(8_000)

    const fromRss = new MetricsCollector({
      now: () => 0,
      heapUsed: () => 100,
      maxRss: () => 64_000
    })
    expect(fromRss.measure(mergeSorter, [1], false).metrics.peakMemoryBytes).toBe(64_000)
  })

  it('counts operations when instrumented', () => {
    const collector = new MetricsCollector({ now: () => 0, heapUsed: () => 0, maxRss: () => 0 })
    const { output, metrics } = collector.measure(quickFirst, [5, 4, 3, 2, 1], true)

    expect(output).toEqual([1, 2, 3, 4, 5])
    expect(metrics.comparisons).toBe(10)
    expect(metrics.swaps).toBe(8)
  })

  it('leaves counts at zero without instrumentation', () => {
    const collector = new MetricsCollector({ now: () => 0, heapUsed: () => 0, maxRss: () => 0 })
    const { metrics } = collector.measure(quickFirst, [5, 4, 3, 2, 1], false)

    expect(metrics.comparisons).toBe(0)
    expect(metrics.swaps).toBe(0)
  })

  it('returns frozen metrics', () => {
    const collector = new MetricsCollector({ now: () => 0, heapUsed: () => 0, maxRss: () => 0 })
    const { metrics } = collector.measure(mergeSorter, [3, 2], true)
    expect(Object.isFrozen(metrics)).toBe(true)
  })
})

describe('measureSortPerformance', () => {
  it('measures with real probes', () => {
    const { output, metrics } = measureSortPerformance(mergeSorter, [3, 1, 4, 1, 5], {
      instrument: true
    })

    expect(output).toEqual([1, 1, 3, 4, 5])
    expect(metrics.timeSeconds).toBeGreaterThanOrEqual(0)
    expect(metrics.peakMemoryBytes).toBeGreaterThan(0)
    expect(metrics.comparisons).toBe(7)
    expect(metrics.swaps).toBe(0)
  })
})
