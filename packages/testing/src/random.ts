/**
 * Deterministic pseudo-random numbers for property tests.
 *
 * @module @ringdeque/testing
 */

export interface SeededRandom {
  /**
   * Float in `[0, 1)`.
   */
  next(): number

  /**
   * Integer in `[0, max)`.
   */
  nextInt(max: number): number
}

/**
 * Create a mulberry32 generator. The same seed always yields the same
 * sequence, so a failing property run can be replayed.
 *
 * @example
 * ```typescript
 * import { createSeededRandom } from '@ringdeque/testing';
 *
 * const random = createSeededRandom(42);
 * random.nextInt(100); // same value on every run
 * ```
 */
export function createSeededRandom(seed: number): SeededRandom {
  let state = seed >>> 0

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  return {
    next,
    nextInt: max => Math.floor(next() * max)
  }
}
