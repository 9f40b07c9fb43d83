import { describe, it, expect } from 'vitest'

import { parsePlainInput, parseWildcardInput, runPlain, runWildcard } from './input'
import { formatPatternMatches, formatWildcardMatches } from './report'
import { InputFormatError } from '../types'

describe('formatPatternMatches', () => {
  it('writes 1-based start and pattern number', () => {
    expect(
      formatPatternMatches([
        { patternIndex: 0, start: 0 },
        { patternIndex: 2, start: 5 },
      ]),
    ).toBe('1 1\n6 3\n')
  })

  it('writes nothing for no matches', () => {
    expect(formatPatternMatches([])).toBe('')
  })
})

describe('formatWildcardMatches', () => {
  it('writes 1-based starts', () => {
    expect(formatWildcardMatches([0, 4])).toBe('1\n5\n')
  })
})

describe('parsePlainInput', () => {
  it('reads text, count and patterns', () => {
    expect(parsePlainInput('ahishers\n4\nhe\nshe\nhis\nhers\n')).toEqual({
      text: 'ahishers',
      patterns: ['he', 'she', 'his', 'hers'],
    })
  })

  it('accepts CRLF line endings', () => {
    expect(parsePlainInput('abc\r\n1\r\nb\r\n')).toEqual({ text: 'abc', patterns: ['b'] })
  })

  it('rejects a non-numeric count', () => {
    expect(() => parsePlainInput('abc\nx\n')).toThrow(InputFormatError)
    expect(() => parsePlainInput('abc\nx\n')).toThrow('Invalid pattern count "x" (line 2)')
  })

  it('rejects missing patterns', () => {
    expect(() => parsePlainInput('abc\n3\na\n')).toThrow('Expected 3 patterns, got 1 (line 4)')
  })

  it('rejects input without a count', () => {
    expect(() => parsePlainInput('abc')).toThrow(InputFormatError)
  })
})

describe('parseWildcardInput', () => {
  it('reads text, pattern and wildcard', () => {
    expect(parseWildcardInput('xabcx\na?c\n?\n')).toEqual({
      text: 'xabcx',
      pattern: 'a?c',
      wildcard: '?',
      complement: undefined,
    })
  })

  it('reads an optional complement marker', () => {
    expect(parseWildcardInput('abc\na!bc\n?\n!\n').complement).toBe('!')
    expect(parseWildcardInput('abc\na!bc\n? !\n').complement).toBe('!')
  })

  it('rejects a missing wildcard', () => {
    expect(() => parseWildcardInput('abc\na?c\n')).toThrow('Missing wildcard symbol (line 3)')
  })
})

describe('runPlain', () => {
  it('solves the he/she/his/hers problem', () => {
    expect(runPlain('ahishers\n4\nhe\nshe\nhis\nhers\n')).toBe('2 3\n4 2\n5 1\n5 4\n')
  })

  it('prints nothing for empty text', () => {
    expect(runPlain('\n2\nab\nb\n')).toBe('')
  })
})

describe('runWildcard', () => {
  it('prints 1-based starts', () => {
    expect(runWildcard('xabcx\na?c\n?\n')).toBe('2\n')
  })

  it('honours the complement marker', () => {
    expect(runWildcard('abc\na!bc\n?\n!\n')).toBe('')
    expect(runWildcard('axc\na!bc\n?\n!\n')).toBe('1\n')
  })
})
