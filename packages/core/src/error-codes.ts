/**
 * Unified error codes for the ringdeque packages.
 *
 * Codes follow `CATEGORY_SPECIFIC_REASON`. The category prefix is what
 * {@link getErrorCategory} extracts.
 *
 * @module @ringdeque/core
 */

export const DequeErrorCodes = {
  DEQUE_INVALID_ARGUMENT: 'DEQUE_INVALID_ARGUMENT',
  DEQUE_INDEX_OUT_OF_RANGE: 'DEQUE_INDEX_OUT_OF_RANGE',
  DEQUE_CAPACITY_EXCEEDED: 'DEQUE_CAPACITY_EXCEEDED'
} as const

export const ErrorCodes = {
  ...DequeErrorCodes
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

const ERROR_CODE_VALUES: ReadonlySet<string> = new Set(Object.values(ErrorCodes))

const CATEGORY_REGEX = /^([A-Z]+)_[A-Z_]+$/

/**
 * Check whether a string is one of the known {@link ErrorCodes}.
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return ERROR_CODE_VALUES.has(code)
}

/**
 * Extract the category prefix of an error code.
 *
 * @example
 * ```typescript
 * getErrorCategory('DEQUE_INDEX_OUT_OF_RANGE') // 'DEQUE'
 * getErrorCategory('whatever')                 // 'UNKNOWN'
 * ```
 */
export function getErrorCategory(code: string): string {
  const match = CATEGORY_REGEX.exec(code)
  return match?.[1] ?? 'UNKNOWN'
}
