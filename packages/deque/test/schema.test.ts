import { describe, it, expect } from 'vitest'
import { InvalidArgumentError, silentLogger } from '@ringdeque/core'
import { DequeOptionsSchema, parseDequeOptions } from '../src/schema.js'

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

describe('DequeOptionsSchema', () => {
  it('should accept a capacity hint', () => {
    const result = DequeOptionsSchema.safeParse({ capacity: 64 })

    expect(result.success).toBe(true)
    expect(result.data).toEqual({ capacity: 64 })
  })

  it('should accept an empty object', () => {
    expect(DequeOptionsSchema.safeParse({}).success).toBe(true)
  })

  it('should reject negative and fractional capacities', () => {
    expect(DequeOptionsSchema.safeParse({ capacity: -1 }).success).toBe(false)
    expect(DequeOptionsSchema.safeParse({ capacity: 2.5 }).success).toBe(false)
    expect(DequeOptionsSchema.safeParse({ capacity: '4' }).success).toBe(false)
  })

  it('should reject a logger missing methods', () => {
    expect(DequeOptionsSchema.safeParse({ logger: { debug: () => {} } }).success).toBe(false)
  })
})

describe('parseDequeOptions', () => {
  it('should treat undefined as no options', () => {
    expect(parseDequeOptions(undefined)).toEqual({})
  })

  it('should pass the logger through by reference', () => {
    const options = parseDequeOptions({ capacity: 3, logger: silentLogger })

    expect(options.capacity).toBe(3)
    expect(options.logger).toBe(silentLogger)
  })

  it('should name the offending option', () => {
    const error = captureError(() => parseDequeOptions({ capacity: -1 }))

    expect(error).toBeInstanceOf(InvalidArgumentError)
    expect(error).toMatchObject({
      argument: 'capacity',
      message: 'Invalid deque option "capacity"',
      code: 'DEQUE_INVALID_ARGUMENT'
    })
  })

  it('should list logger issues in the detail', () => {
    const error = captureError(() => parseDequeOptions({ logger: { debug: () => {} } }))

    expect(error).toMatchObject({
      argument: 'logger',
      detail: 'logger: logger must implement trace, debug, info, warn, error and fatal'
    })
  })

  it('should report a non-object as the options argument', () => {
    const error = captureError(() => parseDequeOptions('nope'))

    expect(error).toBeInstanceOf(InvalidArgumentError)
    expect(error).toMatchObject({ argument: 'options' })
  })
})
