import { describe, it, expect } from 'vitest'
import { max, mean, min, sampleStdDev } from './statistics.js'

describe('statistics', () => {
  it('computes the mean', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5)
  })

  it('computes the sample standard deviation', () => {
    // mean 5, squared deviations sum to 32, 32 / 7
    expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 12)
  })

  it('returns 0 deviation for a single value', () => {
    expect(sampleStdDev([3.5])).toBe(0)
  })

  it('finds min and max', () => {
    expect(min([4, -2, 9])).toBe(-2)
    expect(max([4, -2, 9])).toBe(9)
  })

  it('returns 0 for empty input', () => {
    expect(mean([])).toBe(0)
    expect(sampleStdDev([])).toBe(0)
    expect(min([])).toBe(0)
    expect(max([])).toBe(0)
  })
})
