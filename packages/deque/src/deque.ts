/**
 * Double-ended queue backed by a circular array.
 *
 * @module @ringdeque/deque
 */

import { IndexOutOfRangeError, InvalidArgumentError, resolveLogger } from '@ringdeque/core'
import type { DequeLogger } from '@ringdeque/core'
import { nextCapacity } from './capacity.js'
import { formatDeque } from './format.js'
import { backward, forward, restartable } from './iter.js'
import { frontBack, linearize, physicalIndex } from './layout.js'
import { parseDequeOptions } from './schema.js'
import { found, NOT_FOUND } from './types.js'
import type { DequeOptions, IndexedSource, Lookup } from './types.js'

/**
 * Double-ended queue with O(1) amortized pushes and removals at both ends
 * and O(1) indexed access.
 *
 * Elements live in one backing array treated as a ring: logical index `i`
 * is stored at `(head + i) % capacity`. Removing from the front only moves
 * `head`, so nothing is ever shifted. When the ring is full the backing
 * array is replaced by a larger one and the elements are laid out again
 * from slot 0.
 *
 * Not safe for concurrent mutation; keep one owner per deque.
 *
 * @template T - Type of items stored in the deque
 *
 * @example
 * ```typescript
 * const deque = Deque.of(9, 8, 7, 6)
 * sortDeque(deque)
 * for (let i = 5; i > 0; i--) {
 *   deque.pushFront(i)
 * }
 *
 * String(deque) // 'Deque{ len: 9, cap: 16, items: [1, 2, 3, 4, 5, 6, 7, 8, 9]}'
 * deque.removeBack() // { found: true, value: 9 }
 * ```
 */
export class Deque<T> implements IndexedSource<T>, Iterable<T> {
  private backing: T[] = []
  private head = 0
  private size = 0
  private readonly logger: DequeLogger

  /**
   * Create an empty deque.
   *
   * @throws InvalidArgumentError if the options fail validation
   */
  constructor(options: DequeOptions = {}) {
    const { capacity, logger } = parseDequeOptions(options)
    this.logger = resolveLogger({ logger })
    if (capacity !== undefined && capacity > 0) {
      this.grow(capacity)
    }
  }

  /**
   * Create an empty deque that can hold `capacity` elements without
   * reallocating.
   *
   * @throws InvalidArgumentError if `capacity` is negative or not an integer
   */
  static make<T>(capacity: number, options: Omit<DequeOptions, 'capacity'> = {}): Deque<T> {
    return new Deque<T>({ ...options, capacity })
  }

  /**
   * Create a deque holding `items` in order, front first.
   */
  static of<T>(...items: T[]): Deque<T> {
    const deque = new Deque<T>()
    deque.pushBackAll(items)
    return deque
  }

  /**
   * Create a deque from any iterable, front first.
   */
  static from<T>(items: Iterable<T>, options: Omit<DequeOptions, 'capacity'> = {}): Deque<T> {
    const deque = new Deque<T>(options)
    deque.pushBackAll(items)
    return deque
  }

  /**
   * Number of elements in the deque.
   */
  get length(): number {
    return this.size
  }

  /**
   * Total number of slots in the backing array, used or not.
   */
  get capacity(): number {
    return this.backing.length
  }

  /**
   * Make room for `n` more elements.
   *
   * After `grow(n)`, at least `n` elements can be pushed without another
   * reallocation.
   *
   * @throws InvalidArgumentError if `n` is negative or not an integer
   */
  grow(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new InvalidArgumentError('n', `grow() requires a non-negative integer, got ${n}`)
    }
    if (this.backing.length - this.size >= n) {
      return
    }
    this.relocate(nextCapacity(this.backing.length, this.size + n))
  }

  /**
   * Drop unused capacity so that `capacity === length`.
   */
  clip(): void {
    if (this.backing.length === this.size) {
      return
    }
    this.relocate(this.size)
  }

  pushFront(value: T): void {
    this.grow(1)
    const capacity = this.backing.length
    this.head = (this.head - 1 + capacity) % capacity
    this.size++
    this.backing[this.head] = value
  }

  pushBack(value: T): void {
    this.grow(1)
    this.backing[physicalIndex(this.head, this.size, this.backing.length)] = value
    this.size++
  }

  /**
   * Push every item to the back, in order, reallocating at most once.
   */
  pushBackAll(items: Iterable<T>): void {
    const batch = Array.from(items)
    this.grow(batch.length)
    const capacity = this.backing.length
    for (const item of batch) {
      this.backing[physicalIndex(this.head, this.size, capacity)] = item
      this.size++
    }
  }

  front(): Lookup<T> {
    return this.at(0)
  }

  back(): Lookup<T> {
    return this.at(this.size - 1)
  }

  /**
   * Element at zero-based logical index `n`, or `found: false` when there
   * is none.
   */
  at(n: number): Lookup<T> {
    if (!this.isLiveIndex(n)) {
      return NOT_FOUND
    }
    return found(this.backing[physicalIndex(this.head, n, this.backing.length)])
  }

  removeFront(): Lookup<T> {
    if (this.size === 0) {
      return NOT_FOUND
    }
    const value = this.backing[this.head]
    delete this.backing[this.head]
    this.head = (this.head + 1) % this.backing.length
    this.size--
    return found(value)
  }

  removeBack(): Lookup<T> {
    if (this.size === 0) {
      return NOT_FOUND
    }
    const tail = physicalIndex(this.head, this.size - 1, this.backing.length)
    const value = this.backing[tail]
    delete this.backing[tail]
    this.size--
    return found(value)
  }

  /**
   * Exchange the elements at logical indexes `i` and `j`.
   *
   * @throws IndexOutOfRangeError unless both indexes are integers in `[0, length)`
   */
  swap(i: number, j: number): void {
    this.assertLiveIndex(i, 'swap')
    this.assertLiveIndex(j, 'swap')
    if (i === j) {
      return
    }
    const capacity = this.backing.length
    const pi = physicalIndex(this.head, i, capacity)
    const pj = physicalIndex(this.head, j, capacity)
    const held = this.backing[pi]
    this.backing[pi] = this.backing[pj]
    this.backing[pj] = held
  }

  /**
   * Copy of the contents, front to back. Never shares storage with the deque.
   */
  toArray(): T[] {
    const items = new Array<T>(this.size)
    linearize(this.backing, frontBack(this.head, this.size, this.backing.length), items)
    return items
  }

  /**
   * Lazy `[index, value]` pairs from front to back. Each `for...of` over the
   * result starts again from index 0.
   */
  entries(): Iterable<[index: number, value: T]> {
    return restartable(() => forward(this))
  }

  /**
   * Lazy `[index, value]` pairs from back to front.
   */
  reversed(): Iterable<[index: number, value: T]> {
    return restartable(() => backward(this))
  }

  *[Symbol.iterator](): Iterator<T> {
    for (const [, value] of forward(this)) {
      yield value
    }
  }

  /**
   * Debug rendering, e.g. `Deque{ len: 2, cap: 4, items: [a, b]}`.
   */
  toString(): string {
    return formatDeque(this.size, this.backing.length, this.toArray())
  }

  private isLiveIndex(n: number): boolean {
    return Number.isInteger(n) && n >= 0 && n < this.size
  }

  private assertLiveIndex(n: number, operation: string): void {
    if (!this.isLiveIndex(n)) {
      throw new IndexOutOfRangeError(n, this.size, operation)
    }
  }

  /**
   * Move the live elements into a fresh array of `capacity` slots,
   * front run first, and reset `head` to 0.
   */
  private relocate(capacity: number): void {
    const previous = this.backing.length
    const next = new Array<T>(capacity)
    linearize(this.backing, frontBack(this.head, this.size, previous), next)
    this.backing = next
    this.head = 0
    this.logger.debug(`Reallocated backing array from ${previous} to ${capacity} slots`, {
      length: this.size
    })
  }
}
