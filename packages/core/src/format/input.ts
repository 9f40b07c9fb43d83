/**
 * Readers and runners for line-oriented problem input.
 *
 * Plain mode:
 * ```
 * <text>
 * <pattern count>
 * <pattern 1>
 * ...
 * ```
 *
 * Wildcard mode:
 * ```
 * <text>
 * <pattern>
 * <wildcard symbol>
 * [<complement marker>]
 * ```
 *
 * @packageDocumentation
 */

import { InputFormatError } from '../types'
import { searchPatterns } from '../match/matcher'
import { searchWildcard } from '../match/wildcard-matcher'
import { formatPatternMatches, formatWildcardMatches } from './report'

/**
 * A plain multi-pattern problem.
 * @public
 */
export interface PlainProblem {
  readonly text: string
  readonly patterns: readonly string[]
}

/**
 * A single wildcard pattern problem.
 * @public
 */
export interface WildcardProblem {
  readonly text: string
  readonly pattern: string
  readonly wildcard: string
  readonly complement?: string
}

function splitLines(input: string): string[] {
  const lines = input.split(/\r?\n/)
  // A trailing newline does not start another line
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}

/**
 * Read a plain-mode problem.
 *
 * @throws InputFormatError if the count is missing or not a non-negative integer,
 * or fewer patterns follow than it announces
 *
 * @public
 */
export function parsePlainInput(input: string): PlainProblem {
  const lines = splitLines(input)
  if (lines.length < 2) {
    throw new InputFormatError('Expected a text line followed by a pattern count', lines.length + 1)
  }

  const countSource = lines[1].trim()
  if (!/^\d+$/.test(countSource)) {
    throw new InputFormatError(`Invalid pattern count "${countSource}"`, 2)
  }

  const count = Number.parseInt(countSource, 10)
  const patterns = lines.slice(2, 2 + count)
  if (patterns.length < count) {
    throw new InputFormatError(`Expected ${count} patterns, got ${patterns.length}`, lines.length + 1)
  }

  return { text: lines[0], patterns }
}

/**
 * Read a wildcard-mode problem.
 *
 * The wildcard and optional complement marker are the first two non-whitespace
 * symbols after the pattern line, wherever the line breaks fall.
 *
 * @throws InputFormatError if the pattern line or the wildcard is missing
 *
 * @public
 */
export function parseWildcardInput(input: string): WildcardProblem {
  const lines = splitLines(input)
  if (lines.length < 2) {
    throw new InputFormatError('Expected a text line followed by a pattern line', lines.length + 1)
  }

  const symbols = lines.slice(2).join('').replace(/\s+/g, '')
  if (symbols.length === 0) {
    throw new InputFormatError('Missing wildcard symbol', 3)
  }

  return {
    text: lines[0],
    pattern: lines[1],
    wildcard: symbols[0],
    complement: symbols.length > 1 ? symbols[1] : undefined,
  }
}

/**
 * Solve a plain-mode problem and format the answer.
 *
 * @public
 */
export function runPlain(input: string): string {
  const problem = parsePlainInput(input)
  return formatPatternMatches(searchPatterns(problem.patterns, problem.text))
}

/**
 * Solve a wildcard-mode problem and format the answer.
 *
 * @public
 */
export function runWildcard(input: string): string {
  const problem = parseWildcardInput(input)
  const starts = searchWildcard(problem.pattern, problem.text, {
    wildcard: problem.wildcard,
    complement: problem.complement,
  })
  return formatWildcardMatches(starts)
}
