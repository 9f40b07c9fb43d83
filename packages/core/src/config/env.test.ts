import { describe, it, expect, afterEach } from 'vitest'

import { readEnv } from './env'
import { getLogger, setLogLevel, logger, DEFAULT_LOG_LEVEL } from './logger'

describe('readEnv', () => {
  it('reads an explicit log level', () => {
    expect(readEnv({ TEXTSCAN_LOG_LEVEL: '5' })).toEqual({ logLevel: 5, isDev: false })
  })

  it('detects development mode', () => {
    expect(readEnv({ NODE_ENV: 'development' })).toEqual({ logLevel: undefined, isDev: true })
  })

  it('ignores out-of-range levels', () => {
    expect(readEnv({ TEXTSCAN_LOG_LEVEL: '9' })).toEqual({ logLevel: undefined, isDev: false })
  })

  it('keeps a valid level when NODE_ENV is invalid', () => {
    expect(readEnv({ TEXTSCAN_LOG_LEVEL: '5', NODE_ENV: 'staging' })).toEqual({ logLevel: 5, isDev: false })
  })

  it('keeps development mode when the level is invalid', () => {
    expect(readEnv({ TEXTSCAN_LOG_LEVEL: '9', NODE_ENV: 'development' })).toEqual({
      logLevel: undefined,
      isDev: true,
    })
  })

  it('returns defaults for an empty environment', () => {
    expect(readEnv({})).toEqual({ logLevel: undefined, isDev: false })
  })
})

describe('setLogLevel', () => {
  afterEach(() => {
    setLogLevel(DEFAULT_LOG_LEVEL)
  })

  it('updates the root and area loggers', () => {
    const match = getLogger('match')
    setLogLevel(5)

    expect(logger.level).toBe(5)
    expect(match.level).toBe(5)
    expect(getLogger('match')).toBe(match)
  })
})
