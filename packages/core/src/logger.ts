/**
 * Logging interface shared by the ringdeque packages.
 *
 * Levels, from least to most severe: `trace`, `debug`, `info`, `warn`,
 * `error`, `fatal`. Any logging library can sit behind it.
 *
 * @example
 * ```typescript
 * import pino from 'pino'
 * import type { DequeLogger } from '@ringdeque/core'
 *
 * const base = pino({ level: 'debug' })
 *
 * const logger: DequeLogger = {
 *   trace: (msg, ...args) => base.trace({ args }, msg),
 *   debug: (msg, ...args) => base.debug({ args }, msg),
 *   info: (msg, ...args) => base.info({ args }, msg),
 *   warn: (msg, ...args) => base.warn({ args }, msg),
 *   error: (msg, ...args) => base.error({ args }, msg),
 *   fatal: (msg, ...args) => base.fatal({ args }, msg)
 * }
 *
 * const queue = new Deque<number>({ logger })
 * ```
 */
export interface DequeLogger {
  trace(message: string, ...args: unknown[]): void
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  fatal(message: string, ...args: unknown[]): void
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

type LogMethod = (message: string, ...args: unknown[]) => void

function buildLogger(methodFor: (level: LogLevel) => LogMethod): DequeLogger {
  return {
    trace: methodFor('trace'),
    debug: methodFor('debug'),
    info: methodFor('info'),
    warn: methodFor('warn'),
    error: methodFor('error'),
    fatal: methodFor('fatal')
  }
}

// Console has no trace or fatal channel suitable for log lines
const CONSOLE_CHANNEL: Record<LogLevel, 'debug' | 'info' | 'warn' | 'error'> = {
  trace: 'debug',
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
  fatal: 'error'
}

/**
 * Console-backed logger. Every line is prefixed with `[ringdeque:level]`;
 * `fatal` lines also carry a `FATAL:` marker.
 *
 * @example
 * ```typescript
 * consoleLogger.debug('Reallocated backing array', { from: 4, to: 8 })
 * // Output: [ringdeque:debug] Reallocated backing array { from: 4, to: 8 }
 * ```
 */
export const consoleLogger: DequeLogger = buildLogger(level => {
  const tag = level === 'fatal' ? `[ringdeque:${level}] FATAL:` : `[ringdeque:${level}]`
  return (message, ...args) => console[CONSOLE_CHANNEL[level]](`${tag} ${message}`, ...args)
})

/**
 * Logger that discards everything. Default for a deque when debugging is off.
 */
export const silentLogger: DequeLogger = buildLogger(() => () => undefined)

/**
 * Wrap `baseLogger` so every message starts with `[prefix]`.
 *
 * @example
 * ```typescript
 * const logger = createPrefixedLogger('deque')
 * logger.debug('Clipped backing array to 3 slots')
 * // Output: [ringdeque:debug] [deque] Clipped backing array to 3 slots
 * ```
 */
export function createPrefixedLogger(
  prefix: string,
  baseLogger: DequeLogger = consoleLogger
): DequeLogger {
  return buildLogger(level => (message, ...args) => baseLogger[level](`[${prefix}] ${message}`, ...args))
}
