/**
 * Logging and environment configuration.
 * @packageDocumentation
 */

export { readEnv, type TextscanEnv } from './env'
export { logger, getLogger, setLogLevel, DEFAULT_LOG_LEVEL, TRACE_LEVEL, type LoggerArea } from './logger'
