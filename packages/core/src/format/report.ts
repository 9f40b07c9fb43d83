/**
 * Match reporting in the 1-based line format.
 * @packageDocumentation
 */

import type { PatternMatch } from '../types'

/**
 * Format plain-mode matches, one `"<start> <pattern>"` line each, both 1-based.
 *
 * Matches are written in the order given; see {@link comparePatternMatches}
 * for the usual order.
 *
 * @public
 */
export function formatPatternMatches(matches: readonly PatternMatch[]): string {
  return matches.map((match) => `${match.start + 1} ${match.patternIndex + 1}\n`).join('')
}

/**
 * Format wildcard-mode match starts, one 1-based offset per line.
 *
 * @public
 */
export function formatWildcardMatches(starts: readonly number[]): string {
  return starts.map((start) => `${start + 1}\n`).join('')
}
