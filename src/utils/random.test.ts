import { describe, it, expect } from 'vitest'
import { createRandom, mulberry32 } from './random.js'

describe('mulberry32', () => {
  it('produces the same stream for the same seed', () => {
    const a = mulberry32(7)
    const b = mulberry32(7)
    const first = [a(), a(), a(), a()]
    const second = [b(), b(), b(), b()]
    expect(first).toEqual(second)
  })

  it('produces different streams for different seeds', () => {
    const a = mulberry32(1)
    const b = mulberry32(2)
    expect(a()).not.toBe(b())
  })

  it('stays within [0, 1)', () => {
    const next = mulberry32(123)
    for (let i = 0; i < 1000; i++) {
      const value = next()
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})

describe('createRandom', () => {
  it('draws integers inside the inclusive range', () => {
    const random = createRandom(42)
    const seen = new Set<number>()
    for (let i = 0; i < 500; i++) {
      const value = random.int(3, 6)
      expect(value).toBeGreaterThanOrEqual(3)
      expect(value).toBeLessThanOrEqual(6)
      seen.add(value)
    }
    expect([...seen].sort((x, y) => x - y)).toEqual([3, 4, 5, 6])
  })

  it('returns min when the range holds a single value', () => {
    const random = createRandom(42)
    expect(random.int(5, 5)).toBe(5)
  })

  it('rejects an inverted range', () => {
    const random = createRandom(42)
    expect(() => random.int(2, 1)).toThrow(RangeError)
  })

  it('is reproducible for a fixed seed', () => {
    const a = createRandom(99)
    const b = createRandom(99)
    const drawsA = Array.from({ length: 10 }, () => a.int(0, 1000))
    const drawsB = Array.from({ length: 10 }, () => b.int(0, 1000))
    expect(drawsA).toEqual(drawsB)
  })
})
