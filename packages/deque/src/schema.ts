/**
 * Zod schema for deque construction options.
 *
 * @packageDocumentation
 */

import { z } from 'zod'
import { InvalidArgumentError, LOG_LEVELS } from '@ringdeque/core'
import type { DequeLogger } from '@ringdeque/core'

function isDequeLogger(value: unknown): value is DequeLogger {
  return (
    typeof value === 'object' &&
    value !== null &&
    LOG_LEVELS.every(method => typeof Reflect.get(value, method) === 'function')
  )
}

/**
 * Zod schema for DequeOptions
 *
 * @example
 * ```typescript
 * import { DequeOptionsSchema } from '@ringdeque/deque'
 *
 * const result = DequeOptionsSchema.safeParse({ capacity: 64 })
 * if (result.success) {
 *   console.log('Reserving', result.data.capacity)
 * }
 * ```
 */
export const DequeOptionsSchema = z.object({
  capacity: z.number().int().nonnegative().optional(),
  logger: z
    .custom<DequeLogger>(isDequeLogger, {
      message: 'logger must implement trace, debug, info, warn, error and fatal'
    })
    .optional()
})

/**
 * Type inferred from DequeOptionsSchema
 */
export type DequeOptionsSchemaType = z.infer<typeof DequeOptionsSchema>

/**
 * Validate construction options.
 *
 * @throws InvalidArgumentError naming the first offending option; `detail`
 * lists every issue zod reported
 */
export function parseDequeOptions(options: unknown): DequeOptionsSchemaType {
  const result = DequeOptionsSchema.safeParse(options ?? {})
  if (result.success) {
    return result.data
  }

  const issues = result.error.issues
  const [first] = issues
  const argument = first && first.path.length > 0 ? first.path.join('.') : 'options'
  const detail = issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')

  throw new InvalidArgumentError(argument, `Invalid deque option "${argument}"`, detail)
}
