/**
 * Pattern decomposer - splits a wildcard pattern into literal parts and complements.
 * @packageDocumentation
 */

import type { WildcardPattern, PatternPart, PatternComplement } from '../types'
import { MalformedPatternError } from '../types'
import { validateWildcardPattern } from './validator'
import { getLogger } from '../config/logger'

const log = getLogger('parse')

/**
 * Decompose a wildcard pattern.
 *
 * The pattern is scanned left to right:
 * - A maximal run of ordinary symbols becomes one {@link PatternPart}
 * - A complement marker and the symbol after it become one {@link PatternComplement}
 *   and occupy a single position
 * - Each wildcard occupies one position and produces nothing
 *
 * Offsets are compressed: the source offset minus the number of complement
 * markers seen so far. The pattern length is the source length minus the
 * number of complement markers.
 *
 * @example
 * ```ts
 * const pattern = decomposePattern('ab?!cd', '?', '!')
 * // parts: [{ offset: 0, symbols: 'ab' }, { offset: 4, symbols: 'd' }]
 * // complements: [{ offset: 3, symbol: 'c' }]
 * // length: 5
 * ```
 *
 * @param source - The pattern
 * @param wildcard - Symbol matching any single text symbol
 * @param complement - Marker for a forbidden symbol; `undefined` or `''` disables complements
 * @returns The decomposed pattern
 * @throws MalformedPatternError if {@link validateWildcardPattern} reports any error
 *
 * @public
 */
export function decomposePattern(source: string, wildcard: string, complement?: string): WildcardPattern {
  const errors = validateWildcardPattern(source, wildcard, complement)
  if (errors.length > 0) {
    throw new MalformedPatternError(source, errors)
  }

  const marker = complement === '' ? undefined : complement
  const parts: PatternPart[] = []
  const complements: PatternComplement[] = []
  let markers = 0
  let position = 0

  const isLiteral = (symbol: string): boolean => symbol !== wildcard && symbol !== marker

  while (position < source.length) {
    let end = position
    while (end < source.length && isLiteral(source[end])) {
      end++
    }

    if (end !== position) {
      const part: PatternPart = {
        offset: position - markers,
        symbols: source.slice(position, end),
        length: end - position,
      }
      parts.push(part)
      log.debug(`Part at offset ${part.offset} of length ${part.length}: "${part.symbols}"`)
    }

    position = end
    if (marker !== undefined && source[position] === marker) {
      const entry: PatternComplement = {
        offset: position - markers,
        symbol: source[position + 1],
      }
      complements.push(entry)
      log.debug(`Complement to char \`${entry.symbol}' at offset ${entry.offset}`)

      position += 2
      markers++
    }

    while (position < source.length && source[position] === wildcard) {
      position++
    }
  }

  return {
    source,
    wildcard,
    complement: marker,
    parts,
    complements,
    length: source.length - markers,
  }
}
