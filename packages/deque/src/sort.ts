/**
 * In-place sorting over {@link SortableSequence}.
 *
 * The routine only talks to the sequence through `length`, `compareLess`
 * and `swapAt`, so it sorts a deque where it stands.
 *
 * @module @ringdeque/deque
 */

import type { Deque } from './deque.js'
import { orderedLess, sortableBy } from './sortable.js'
import type { Less, Ordered, SortableSequence } from './sortable.js'

/**
 * Ranges at or below this size are finished with insertion sort.
 */
const INSERTION_SORT_MAX = 12

/**
 * Sort `data` ascending in place. Not stable.
 *
 * Quicksort with a median-of-three pivot; small ranges use insertion sort
 * and ranges that recurse too deeply fall back to heapsort, so the worst
 * case stays O(n log n) comparisons.
 */
export function sort(data: SortableSequence): void {
  const n = data.length
  if (n < 2) {
    return
  }
  quickSort(data, 0, n, maxDepth(n))
}

/**
 * Whether `data` is in ascending order.
 */
export function isSorted(data: SortableSequence): boolean {
  for (let i = data.length - 1; i > 0; i--) {
    if (data.compareLess(i, i - 1)) {
      return false
    }
  }
  return true
}

/**
 * Sort a deque of numbers, bigints or strings ascending, in place.
 */
export function sortDeque(deque: Deque<number>): void
export function sortDeque(deque: Deque<bigint>): void
export function sortDeque(deque: Deque<string>): void
export function sortDeque(deque: Deque<Ordered>): void {
  sort(sortableBy(deque, orderedLess))
}

/**
 * Sort a deque in place using `less`.
 */
export function sortDequeBy<T>(deque: Deque<T>, less: Less<T>): void {
  sort(sortableBy(deque, less))
}

function maxDepth(n: number): number {
  let depth = 0
  for (let i = n; i > 0; i >>= 1) {
    depth++
  }
  return depth * 2
}

function quickSort(data: SortableSequence, a: number, b: number, depth: number): void {
  while (b - a > INSERTION_SORT_MAX) {
    if (depth === 0) {
      heapSort(data, a, b)
      return
    }
    depth--
    const p = partition(data, a, b)
    // Recurse into the smaller side, loop on the larger one
    if (p - a < b - p) {
      quickSort(data, a, p, depth)
      a = p + 1
    } else {
      quickSort(data, p + 1, b, depth)
      b = p
    }
  }
  if (b - a > 1) {
    insertionSort(data, a, b)
  }
}

function insertionSort(data: SortableSequence, a: number, b: number): void {
  for (let i = a + 1; i < b; i++) {
    for (let j = i; j > a && data.compareLess(j, j - 1); j--) {
      data.swapAt(j, j - 1)
    }
  }
}

/**
 * Order positions so that data[m0] <= data[m1] <= data[m2].
 */
function medianOfThree(data: SortableSequence, m1: number, m0: number, m2: number): void {
  if (data.compareLess(m1, m0)) {
    data.swapAt(m1, m0)
  }
  if (data.compareLess(m2, m1)) {
    data.swapAt(m2, m1)
    if (data.compareLess(m1, m0)) {
      data.swapAt(m1, m0)
    }
  }
}

/**
 * Partition `[lo, hi)` around the median of its first, middle and last
 * elements. Returns the pivot's final position.
 */
function partition(data: SortableSequence, lo: number, hi: number): number {
  medianOfThree(data, lo, lo + ((hi - lo) >> 1), hi - 1)

  // Pivot sits at lo
  let i = lo + 1
  let j = hi - 1
  for (;;) {
    while (i <= j && data.compareLess(i, lo)) {
      i++
    }
    while (i <= j && data.compareLess(lo, j)) {
      j--
    }
    if (i >= j) {
      break
    }
    data.swapAt(i, j)
    i++
    j--
  }
  data.swapAt(lo, j)
  return j
}

function siftDown(data: SortableSequence, lo: number, hi: number, first: number): void {
  let root = lo
  for (;;) {
    let child = 2 * root + 1
    if (child >= hi) {
      return
    }
    if (child + 1 < hi && data.compareLess(first + child, first + child + 1)) {
      child++
    }
    if (!data.compareLess(first + root, first + child)) {
      return
    }
    data.swapAt(first + root, first + child)
    root = child
  }
}

function heapSort(data: SortableSequence, a: number, b: number): void {
  const first = a
  const hi = b - a

  for (let i = (hi - 1) >> 1; i >= 0; i--) {
    siftDown(data, i, hi, first)
  }
  for (let i = hi - 1; i >= 0; i--) {
    data.swapAt(first, first + i)
    siftDown(data, 0, i, first)
  }
}
