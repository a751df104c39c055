import type { DequeLogger } from '@ringdeque/core'

/**
 * Result of probing a position that may be empty.
 *
 * `found` is the only reliable signal: `value` may itself be `undefined`
 * when the deque holds undefined elements.
 */
export type Lookup<T> =
  | { readonly found: true; readonly value: T }
  | { readonly found: false; readonly value: undefined }

/**
 * Options accepted by the Deque constructor.
 */
export interface DequeOptions {
  /**
   * Number of slots to reserve up front.
   * @default 0
   */
  capacity?: number

  /**
   * Receives a debug line on every reallocation of the backing array.
   * @default silentLogger, or a console logger when RINGDEQUE_DEBUG is set
   */
  logger?: DequeLogger
}

/**
 * Anything that exposes a length and positional lookups.
 */
export interface IndexedSource<T> {
  readonly length: number
  at(index: number): Lookup<T>
}

export const NOT_FOUND: Lookup<never> = Object.freeze({ found: false, value: undefined })

export function found<T>(value: T): Lookup<T> {
  return { found: true, value }
}
