import { CapacityExceededError } from '@ringdeque/core'

/**
 * Largest length a JavaScript array can have.
 */
export const MAX_CAPACITY = 2 ** 32 - 1

/**
 * Below this many slots the backing array doubles; above it growth slows
 * down to roughly 1.25x.
 */
export const GROWTH_THRESHOLD = 256

/**
 * Pick the size of the next backing array.
 *
 * A request for more than twice the current capacity is honoured exactly.
 * Otherwise small arrays double and large arrays grow in steps of
 * `(capacity + 3 * GROWTH_THRESHOLD) / 4` until `required` fits.
 *
 * @param current - Current number of slots
 * @param required - Minimum number of slots needed
 * @throws CapacityExceededError when `required` exceeds {@link MAX_CAPACITY}
 *
 * @example
 * ```typescript
 * nextCapacity(0, 4)  // 4
 * nextCapacity(4, 5)  // 8
 * nextCapacity(8, 9)  // 16
 * nextCapacity(4, 20) // 20
 * ```
 */
export function nextCapacity(current: number, required: number): number {
  if (required > MAX_CAPACITY) {
    throw new CapacityExceededError(required, MAX_CAPACITY)
  }

  const doubled = current * 2
  if (required > doubled) {
    return required
  }
  if (current < GROWTH_THRESHOLD) {
    return Math.min(doubled, MAX_CAPACITY)
  }

  let next = current
  while (next < required) {
    next += Math.floor((next + 3 * GROWTH_THRESHOLD) / 4)
  }
  return Math.min(next, MAX_CAPACITY)
}
