import type { IndexedSource } from './types.js'

/**
 * Yield `[index, value]` from the first element to the last.
 *
 * The length is read once when iteration starts. Iteration ends early if a
 * position stops being present.
 */
export function* forward<T>(source: IndexedSource<T>): Generator<[number, T], void, undefined> {
  const length = source.length
  for (let i = 0; i < length; i++) {
    const item = source.at(i)
    if (!item.found) {
      return
    }
    yield [i, item.value]
  }
}

/**
 * Yield `[index, value]` from the last element to the first.
 */
export function* backward<T>(source: IndexedSource<T>): Generator<[number, T], void, undefined> {
  for (let i = source.length - 1; i >= 0; i--) {
    const item = source.at(i)
    if (!item.found) {
      return
    }
    yield [i, item.value]
  }
}

/**
 * Wrap a generator factory so every `for...of` starts a fresh pass.
 */
export function restartable<T>(start: () => Iterator<T>): Iterable<T> {
  return {
    [Symbol.iterator]: start
  }
}
