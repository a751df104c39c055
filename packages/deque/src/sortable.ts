/**
 * Compare/swap view of a deque for in-place sorting.
 *
 * @module @ringdeque/deque
 */

import { IndexOutOfRangeError } from '@ringdeque/core'
import type { Deque } from './deque.js'

/**
 * Strict "less than" between two elements.
 */
export type Less<T> = (a: T, b: T) => boolean

/**
 * Element types with a natural order. A deque is sorted naturally only when
 * all of its elements share one of these types.
 */
export type Ordered = number | bigint | string

/**
 * A sequence a generic sort can permute in place, knowing only its length
 * and how to compare and exchange two positions.
 */
export interface SortableSequence {
  readonly length: number
  compareLess(i: number, j: number): boolean
  swapAt(i: number, j: number): void
}

/**
 * `<` over a single ordered primitive type, NaN first. Callers must never
 * mix element types; the public overloads below enforce that.
 */
export function orderedLess(a: Ordered, b: Ordered): boolean {
  if (typeof a === 'number' && Number.isNaN(a)) {
    return !(typeof b === 'number' && Number.isNaN(b))
  }
  return a < b
}

/**
 * Natural order of numbers, bigints and strings. NaN sorts before every
 * other number so that the order stays total. Both arguments must have the
 * same primitive type.
 */
export function naturalLess(a: number, b: number): boolean
export function naturalLess(a: bigint, b: bigint): boolean
export function naturalLess(a: string, b: string): boolean
export function naturalLess(a: Ordered, b: Ordered): boolean {
  return orderedLess(a, b)
}

/**
 * Sortable view over a deque. Holds the deque by reference; sorting through
 * the view reorders the deque itself and leaves its length and capacity
 * untouched.
 */
export class SortableDeque<T> implements SortableSequence {
  constructor(
    private readonly deque: Deque<T>,
    private readonly less: Less<T>
  ) {}

  get length(): number {
    return this.deque.length
  }

  /**
   * @throws IndexOutOfRangeError unless both indexes are integers in `[0, length)`
   */
  compareLess(i: number, j: number): boolean {
    return this.less(this.valueAt(i), this.valueAt(j))
  }

  swapAt(i: number, j: number): void {
    this.deque.swap(i, j)
  }

  private valueAt(index: number): T {
    const item = this.deque.at(index)
    if (!item.found) {
      throw new IndexOutOfRangeError(index, this.deque.length, 'compareLess')
    }
    return item.value
  }
}

/**
 * View a deque of naturally ordered elements as a {@link SortableSequence}.
 *
 * @example
 * ```typescript
 * const deque = Deque.of(9, 8, 7, 6)
 * sort(sortable(deque))
 * deque.toArray() // [6, 7, 8, 9]
 * ```
 */
export function sortable(deque: Deque<number>): SortableDeque<number>
export function sortable(deque: Deque<bigint>): SortableDeque<bigint>
export function sortable(deque: Deque<string>): SortableDeque<string>
export function sortable(deque: Deque<Ordered>): SortableSequence {
  return new SortableDeque(deque, orderedLess)
}

/**
 * View a deque as a {@link SortableSequence} ordered by `less`.
 */
export function sortableBy<T>(deque: Deque<T>, less: Less<T>): SortableDeque<T> {
  return new SortableDeque(deque, less)
}

/**
 * Invert the order of a sortable sequence, so sorting it runs descending.
 */
export function reverseOrder(data: SortableSequence): SortableSequence {
  return {
    get length() {
      return data.length
    },
    compareLess: (i, j) => data.compareLess(j, i),
    swapAt: (i, j) => data.swapAt(i, j)
  }
}
