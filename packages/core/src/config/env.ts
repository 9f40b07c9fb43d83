/**
 * Environment configuration for the logging layer.
 * @packageDocumentation
 */

import { z } from 'zod'

type EnvRecord = Record<string, string | undefined>

const parseLevel = (value: unknown): number | undefined => {
  if (typeof value === 'number') return value
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number.parseInt(value, 10)
    return Number.isNaN(parsed) ? undefined : parsed
  }
  return undefined
}

// Each field falls back on its own, so one bad variable does not discard the others
const envSchema = z.object({
  TEXTSCAN_LOG_LEVEL: z.preprocess(parseLevel, z.number().int().min(0).max(5)).optional().catch(undefined),
  NODE_ENV: z.enum(['development', 'production', 'test']).optional().catch(undefined),
})

/**
 * Resolved environment settings.
 * @public
 */
export interface TextscanEnv {
  /** Explicit consola level, if one was configured */
  readonly logLevel: number | undefined
  readonly isDev: boolean
}

/**
 * Read settings from an environment record.
 *
 * Each invalid value is ignored on its own rather than thrown, so a bad variable
 * never keeps the library from loading.
 *
 * @param env - Defaults to `process.env`
 *
 * @public
 */
export function readEnv(env: EnvRecord = process.env): TextscanEnv {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    return { logLevel: undefined, isDev: false }
  }
  return {
    logLevel: parsed.data.TEXTSCAN_LOG_LEVEL,
    isDev: parsed.data.NODE_ENV === 'development',
  }
}
