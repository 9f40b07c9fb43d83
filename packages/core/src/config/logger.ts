/**
 * Shared consola logger with one tagged child per library area.
 * @packageDocumentation
 */

import { createConsola, type ConsolaInstance } from 'consola'
import { readEnv } from './env'

/** consola's `info` level */
export const DEFAULT_LOG_LEVEL = 3

/**
 * consola's `trace` level. Per-symbol tracing checks it before building a message.
 */
export const TRACE_LEVEL = 5

const env = readEnv()

/**
 * Root logger. Tracing of construction and matching happens at `debug` and
 * `trace`, so it is silent unless `TEXTSCAN_LOG_LEVEL` raises the level.
 *
 * @public
 */
export const logger: ConsolaInstance = createConsola({
  level: env.logLevel ?? (env.isDev ? 4 : DEFAULT_LOG_LEVEL),
}).withTag('textscan')

/**
 * Area names that have their own child logger.
 * @public
 */
export type LoggerArea = 'compile' | 'match' | 'parse'

const children = new Map<LoggerArea, ConsolaInstance>()

/**
 * Get the logger for one area, creating it on first use.
 *
 * @public
 */
export function getLogger(area: LoggerArea): ConsolaInstance {
  let child = children.get(area)
  if (!child) {
    child = logger.withTag(area)
    children.set(area, child)
  }
  return child
}

/**
 * Change the level of the root logger and every area logger.
 *
 * @public
 */
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of children.values()) {
    child.level = level
  }
}
