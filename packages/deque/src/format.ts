/**
 * Debug rendering of deque contents.
 *
 * @module @ringdeque/deque
 */

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Render one element.
 *
 * Primitives and class instances use `String`. Arrays and plain objects
 * render as JSON, falling back to `String` when they cannot be serialized
 * (cycles, bigint members).
 */
export function formatValue(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return String(value)
  }
  if (Array.isArray(value) || isPlainObject(value)) {
    try {
      return JSON.stringify(value)
    } catch {
      return String(value)
    }
  }
  return String(value)
}

/**
 * Render a deque as `Deque{ len: L, cap: C, items: [a, b, c]}`.
 *
 * Meant for logs and test failures, not for parsing back.
 *
 * @example
 * ```typescript
 * formatDeque(3, 4, [1, 2, 3])
 * // 'Deque{ len: 3, cap: 4, items: [1, 2, 3]}'
 * ```
 */
export function formatDeque(length: number, capacity: number, items: Iterable<unknown>): string {
  const rendered: string[] = []
  for (const item of items) {
    rendered.push(formatValue(item))
  }
  return `Deque{ len: ${length}, cap: ${capacity}, items: [${rendered.join(', ')}]}`
}
