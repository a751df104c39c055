import { consoleLogger, createPrefixedLogger, silentLogger } from './logger.js'
import type { DequeLogger } from './logger.js'

/**
 * Environment variable that turns on reallocation logging for deques
 * created without an explicit logger.
 */
export const DEBUG_ENV_VAR = 'RINGDEQUE_DEBUG'

const TRUTHY_VALUES = new Set(['1', 'true', 'yes', 'on'])

/**
 * Read an environment variable.
 * Returns undefined where the runtime has no process environment.
 *
 * @example
 * ```typescript
 * const nodeEnv = getEnv('NODE_ENV');
 * ```
 */
export function getEnv(key: string): string | undefined {
  if (globalThis.process?.env) {
    return globalThis.process.env[key]
  }
  return undefined
}

/**
 * Whether {@link DEBUG_ENV_VAR} is set to `1`, `true`, `yes` or `on`
 * (case-insensitive).
 */
export function isDebugEnabled(): boolean {
  const value = getEnv(DEBUG_ENV_VAR)
  return value !== undefined && TRUTHY_VALUES.has(value.trim().toLowerCase())
}

export interface LoggerOptions {
  logger?: DequeLogger
}

/**
 * Pick the logger for a component.
 *
 * An explicit logger always wins. Otherwise, with debugging enabled through
 * the environment, messages go to the console under `[prefix]`; without it
 * they are discarded.
 */
export function resolveLogger(options: LoggerOptions = {}, prefix = 'deque'): DequeLogger {
  if (options.logger) {
    return options.logger
  }
  return isDebugEnabled() ? createPrefixedLogger(prefix, consoleLogger) : silentLogger
}
