/**
 * Wildcard pattern matching.
 * @packageDocumentation
 */

import type { Automaton, WildcardPattern } from '../types'
import { compileWildcardPattern, type CompileOptions } from '../compile/compiler'
import { decomposePattern } from '../parse/decomposer'
import { step } from './matcher'
import { WildcardMatchAggregator } from './wildcard-aggregator'

/**
 * Default wildcard symbol.
 *
 * @public
 */
export const DEFAULT_WILDCARD = '?'

/**
 * Options for wildcard matching.
 *
 * @public
 */
export interface WildcardSearchOptions extends CompileOptions {
  /**
   * Symbol matching any single text symbol. Ignored when a decomposed pattern is passed.
   * @defaultValue '?'
   */
  wildcard?: string

  /**
   * Marker for a forbidden symbol. Complements are disabled when unset.
   * Ignored when a decomposed pattern is passed.
   */
  complement?: string
}

/**
 * A compiled wildcard pattern that can search any number of texts.
 *
 * @public
 */
export interface WildcardSearcher {
  readonly pattern: WildcardPattern
  readonly automaton: Automaton

  /** 0-based starts of every alignment that satisfies the pattern, in increasing order */
  search(text: string): number[]
}

/**
 * Compile a wildcard pattern into a reusable searcher.
 *
 * @param pattern - Pattern source, or a pattern already decomposed
 * @param options - Special symbols and construction limits
 * @throws MalformedPatternError if the pattern source is malformed
 *
 * @public
 */
export function createWildcardSearcher(
  pattern: string | WildcardPattern,
  options: WildcardSearchOptions = {},
): WildcardSearcher {
  const decomposed =
    typeof pattern === 'string'
      ? decomposePattern(pattern, options.wildcard ?? DEFAULT_WILDCARD, options.complement)
      : pattern
  const automaton = compileWildcardPattern(decomposed, options)

  return {
    pattern: decomposed,
    automaton,
    search(text: string): number[] {
      const starts: number[] = []
      const aggregator = new WildcardMatchAggregator(decomposed, text.length)
      let state = automaton.root

      for (let position = 0; position < text.length; position++) {
        const result = step(automaton, state, text[position])
        state = result.state

        const start = aggregator.feed(position, result.matched ? automaton.states[state].outputs : [])
        if (start !== undefined) {
          starts.push(start)
        }
      }

      return starts
    },
  }
}

/**
 * Find every alignment of a wildcard pattern in a text.
 *
 * @example
 * ```ts
 * searchWildcard('a?c', 'xabcx') // [1]
 * searchWildcard('a!bc', 'abc', { complement: '!' }) // []
 * ```
 *
 * @returns 0-based start offsets, in increasing order
 *
 * @public
 */
export function searchWildcard(
  pattern: string | WildcardPattern,
  text: string,
  options: WildcardSearchOptions = {},
): number[] {
  return createWildcardSearcher(pattern, options).search(text)
}
