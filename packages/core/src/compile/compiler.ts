/**
 * Automaton compiler - builds ready-to-match automata from patterns.
 * @packageDocumentation
 */

import type { Automaton, Fragment, WildcardPattern } from '../types'
import { buildForest, type ForestOptions } from './forest-builder'
import { linkFailures } from './failure-linker'

/**
 * Options for automaton compilation.
 *
 * @public
 */
export type CompileOptions = ForestOptions

/**
 * Compile arbitrary fragments into an automaton.
 *
 * @param fragments - Fragments in insertion order
 * @param options - Optional construction limits
 * @returns The linked automaton
 * @throws AutomatonLimitError if the state count exceeds the configured limit
 *
 * @public
 */
export function compileFragments(fragments: readonly Fragment[], options: CompileOptions = {}): Automaton {
  return linkFailures(buildForest(fragments, options))
}

/**
 * Compile a flat pattern list for plain multi-pattern matching.
 *
 * Each pattern is one fragment whose id is its index in the list. An empty
 * pattern ends at the root and occurs at every start `0..text.length`.
 *
 * @public
 */
export function compilePatterns(patterns: readonly string[], options: CompileOptions = {}): Automaton {
  return compileFragments(
    patterns.map((symbols, id) => ({ symbols, id })),
    options,
  )
}

/**
 * Get the fragments of a decomposed wildcard pattern.
 *
 * Parts come first with ids `0..parts.length - 1`; complement `i` follows
 * with id `parts.length + i` and its forbidden symbol as a one-symbol fragment.
 *
 * @public
 */
export function wildcardFragments(pattern: WildcardPattern): Fragment[] {
  const fragments: Fragment[] = pattern.parts.map((part, id) => ({ symbols: part.symbols, id }))
  pattern.complements.forEach((complement, i) => {
    fragments.push({ symbols: complement.symbol, id: pattern.parts.length + i })
  })
  return fragments
}

/**
 * Compile a decomposed wildcard pattern.
 *
 * @public
 */
export function compileWildcardPattern(pattern: WildcardPattern, options: CompileOptions = {}): Automaton {
  return compileFragments(wildcardFragments(pattern), options)
}
