/**
 * Ring layout arithmetic.
 *
 * The live elements of a ring occupy at most two contiguous runs of the
 * backing array: the front run from `head` to the end of the array (or to
 * the last element, if it comes first) and the back run from index 0.
 *
 * @module @ringdeque/deque
 */

/**
 * Half-open range `[start, end)` of physical slots.
 */
export interface Run {
  readonly start: number
  readonly end: number
}

export interface FrontBack {
  readonly front: Run
  readonly back: Run
}

/**
 * Split the live range of a ring into its front and back runs.
 *
 * @example
 * ```typescript
 * // capacity 8, head at 6, 4 elements: slots 6, 7, 0, 1
 * frontBack(6, 4, 8)
 * // { front: { start: 6, end: 8 }, back: { start: 0, end: 2 } }
 * ```
 */
export function frontBack(head: number, length: number, capacity: number): FrontBack {
  const end = Math.min(head + length, capacity)
  const rest = length - (end - head)
  return {
    front: { start: head, end },
    back: { start: 0, end: rest }
  }
}

/**
 * Physical slot of the element at logical `offset` from `head`.
 */
export function physicalIndex(head: number, offset: number, capacity: number): number {
  return (head + offset) % capacity
}

/**
 * Copy the front run then the back run of `source` into `target`,
 * starting at index 0 of `target`.
 *
 * @returns The number of elements copied
 */
export function linearize<T>(source: readonly T[], layout: FrontBack, target: T[]): number {
  let n = 0
  for (const run of [layout.front, layout.back]) {
    for (let i = run.start; i < run.end; i++) {
      target[n++] = source[i]
    }
  }
  return n
}
