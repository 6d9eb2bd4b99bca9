/**
 * Seeded pseudo-random source
 *
 * Every consumer owns its generator instance, so two benchmark runs with the
 * same seed see the same sequence no matter what else is running.
 *
 * @module random
 */

export interface RandomSource {
  /** Next float in [0, 1) */
  next(): number
  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number
}

/**
 * mulberry32: 32-bit state, good enough spread for pivot picks and test data
 */
export function mulberry32(seed: number): () => number {
  let state = seed | 0
  return () => {
    state = (state + 0x6d2b79f5) | 0
    let t = Math.imul(state ^ (state >>> 15), 1 | state)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Creates a random source. Without a seed the generator starts from an
 * unpredictable state.
 */
export function createRandom(seed?: number): RandomSource {
  const next = mulberry32(seed ?? Math.floor(Math.random() * 4294967296))

  return {
    next,
    int(min: number, max: number): number {
      if (max < min) {
        throw new RangeError(`int: Expected max >= min, got [${min}, ${max}]`)
      }
      return min + Math.floor(next() * (max - min + 1))
    }
  }
}
