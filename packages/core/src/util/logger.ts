/**
 * Debug logging for automata and transformations.
 * @packageDocumentation
 */

import type { TransformOptions } from '../types/automaton'

/**
 * Logger interface compatible with `console`.
 * All methods accept variadic arguments and return a string.
 *
 * @public
 */
export interface Logger {
  debug: (...args: unknown[]) => string
  log: (...args: unknown[]) => string
  warn: (...args: unknown[]) => string
  error: (...args: unknown[]) => string
}

/**
 * Console-backed logger. Each method returns its first argument as a string.
 *
 * @public
 */
export const defaultLogger: Logger = {
  debug: (...args: unknown[]) => {
    console.debug(...args)
    return String(args[0] ?? '')
  },
  log: (...args: unknown[]) => {
    console.log(...args)
    return String(args[0] ?? '')
  },
  warn: (...args: unknown[]) => {
    console.warn(...args)
    return String(args[0] ?? '')
  },
  error: (...args: unknown[]) => {
    console.error(...args)
    return String(args[0] ?? '')
  },
}

/**
 * A debug sink bound to a prefix. Calls are dropped unless debug is enabled.
 */
export type DebugLog = (...args: unknown[]) => void

/**
 * Create a prefixed debug sink from transform options.
 *
 * @param prefix - Tag written before every line, e.g. `[determinize]`
 * @param options - `debug` switch and optional logger
 */
export function createDebugLog(prefix: string, options: TransformOptions = {}): DebugLog {
  if (!options.debug) {
    return () => {}
  }

  const logger = options.logger ?? defaultLogger
  return (...args: unknown[]) => {
    logger.debug(prefix, ...args)
  }
}
