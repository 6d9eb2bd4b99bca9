import type { InstrumentationEvent, InstrumentationSink } from './types.js'

/**
 * Sink that drops every event
 */
export const NOOP_SINK: InstrumentationSink = Object.freeze({
  record(): void {}
})

export interface OperationCounts {
  readonly comparisons: number
  readonly swaps: number
}

/**
 * Counts comparison and swap events. The caller owns the instance and
 * reads the totals once the sort has returned.
 */
export class CountingSink implements InstrumentationSink {
  private comparisonCount = 0
  private swapCount = 0

  record(event: InstrumentationEvent): void {
    if (event === 'comparison') {
      this.comparisonCount++
    } else {
      this.swapCount++
    }
  }

  get comparisons(): number {
    return this.comparisonCount
  }

  get swaps(): number {
    return this.swapCount
  }

  snapshot(): OperationCounts {
    return { comparisons: this.comparisonCount, swaps: this.swapCount }
  }

  reset(): void {
    this.comparisonCount = 0
    this.swapCount = 0
  }
}
