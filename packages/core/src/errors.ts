/**
 * Error hierarchy for the ringdeque packages.
 *
 * Only programming errors are thrown: a bad argument, an index outside the
 * live range, or a capacity the host cannot allocate. Probing an empty deque
 * or a missing index is reported through a lookup result, never through
 * these classes.
 */

import { ErrorCodes } from './error-codes.js'

export class DequeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly detail?: string
  ) {
    super(message)
    this.name = 'DequeError'
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      detail: this.detail
    }
  }
}

/**
 * A caller passed a value outside the domain of an argument,
 * such as a negative growth count or capacity hint.
 */
export class InvalidArgumentError extends DequeError {
  constructor(
    public readonly argument: string,
    message: string,
    detail?: string
  ) {
    super(message, ErrorCodes.DEQUE_INVALID_ARGUMENT, detail)
    this.name = 'InvalidArgumentError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      argument: this.argument
    }
  }
}

/**
 * An index given to an operation that requires a live element
 * was not an integer in `[0, length)`.
 */
export class IndexOutOfRangeError extends DequeError {
  constructor(
    public readonly index: number,
    public readonly length: number,
    public readonly operation: string
  ) {
    super(
      `${operation}: index ${index} out of range [0, ${length})`,
      ErrorCodes.DEQUE_INDEX_OUT_OF_RANGE
    )
    this.name = 'IndexOutOfRangeError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      index: this.index,
      length: this.length,
      operation: this.operation
    }
  }
}

export class CapacityExceededError extends DequeError {
  constructor(
    public readonly requested: number,
    public readonly limit: number
  ) {
    super(
      `Requested capacity ${requested} exceeds the maximum of ${limit}`,
      ErrorCodes.DEQUE_CAPACITY_EXCEEDED
    )
    this.name = 'CapacityExceededError'
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      requested: this.requested,
      limit: this.limit
    }
  }
}

export function isDequeError(error: unknown): error is DequeError {
  return error instanceof DequeError
}

export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError
}

export function isIndexOutOfRangeError(error: unknown): error is IndexOutOfRangeError {
  return error instanceof IndexOutOfRangeError
}

export function isCapacityExceededError(error: unknown): error is CapacityExceededError {
  return error instanceof CapacityExceededError
}
