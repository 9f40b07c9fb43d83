/**
 * Automaton matching - streams text symbols through a linked automaton.
 * @packageDocumentation
 */

import type { Automaton, FragmentMatch, PatternMatch, StepResult } from '../types'
import { compilePatterns, type CompileOptions } from '../compile/compiler'
import { getLogger, TRACE_LEVEL } from '../config/logger'

const log = getLogger('match')

/**
 * Consume one symbol.
 *
 * Follows the transition on `symbol` if the current state has one. Otherwise
 * falls back along failure links and retries. When even the root has no
 * transition the symbol is dropped: the result is the root with `matched` false.
 *
 * Each retry moves to a strictly shallower state, so a step takes at most
 * `depth + 1` lookups.
 *
 * @param automaton - Linked automaton
 * @param state - Current state id
 * @param symbol - Next text symbol
 * @returns Next state and whether the symbol was consumed by a transition
 *
 * @public
 */
export function step(automaton: Automaton, state: number, symbol: string): StepResult {
  let current = state
  const tracing = log.level >= TRACE_LEVEL

  for (;;) {
    const node = automaton.states[current]
    const target = node.transitions.get(symbol)

    if (target !== undefined) {
      if (tracing) log.trace(`Found transition from ${current} to ${target} on \`${symbol}'`)
      return { state: target, matched: true }
    }

    if (node.failure === undefined) {
      if (tracing) log.trace(`No transition from root on \`${symbol}'`)
      return { state: current, matched: false }
    }

    if (tracing) log.trace(`No transition from ${current}; fallback to ${node.failure}`)
    current = node.failure
  }
}

/**
 * Scan a text and yield every fragment occurrence, in order of end position.
 *
 * Occurrences ending at the same position come in the order of the state's
 * output list: the state's own fragments in insertion order, then the longest
 * inherited suffix fragments first. Empty fragments occur before every symbol
 * and once more after the last, with `end = start - 1`.
 *
 * @param automaton - Linked automaton
 * @param text - Text to scan
 *
 * @public
 */
export function* scanFragments(automaton: Automaton, text: string): Generator<FragmentMatch, void, undefined> {
  let state = automaton.root
  const empty = automaton.states[automaton.root].outputs

  for (let position = 0; position < text.length; position++) {
    for (const entry of empty) {
      yield { fragmentId: entry.fragmentId, start: position, end: position - 1 }
    }

    const result = step(automaton, state, text[position])
    state = result.state
    if (!result.matched) continue

    for (const entry of automaton.states[state].outputs) {
      yield {
        fragmentId: entry.fragmentId,
        start: position - entry.length + 1,
        end: position,
      }
    }
  }

  for (const entry of empty) {
    yield { fragmentId: entry.fragmentId, start: text.length, end: text.length - 1 }
  }
}

/**
 * Collect every fragment occurrence in a text.
 *
 * @public
 */
export function findFragments(automaton: Automaton, text: string): FragmentMatch[] {
  return [...scanFragments(automaton, text)]
}

/**
 * Order plain-mode matches by start offset, then pattern index.
 *
 * @public
 */
export function comparePatternMatches(a: PatternMatch, b: PatternMatch): number {
  return a.start - b.start || a.patternIndex - b.patternIndex
}

/**
 * A reusable searcher over one automaton.
 *
 * The automaton is never modified by a search, so one searcher can serve any
 * number of texts.
 *
 * @public
 */
export interface AutomatonSearcher {
  readonly automaton: Automaton

  /** Every pattern occurrence, sorted by start then pattern index */
  search(text: string): PatternMatch[]

  /** Whether any pattern occurs in the text; stops at the first occurrence */
  test(text: string): boolean
}

/**
 * Create a searcher for an automaton compiled in plain mode.
 *
 * @public
 */
export function createAutomatonSearcher(automaton: Automaton): AutomatonSearcher {
  return {
    automaton,
    search(text: string): PatternMatch[] {
      const matches: PatternMatch[] = []
      for (const match of scanFragments(automaton, text)) {
        matches.push({ patternIndex: match.fragmentId, start: match.start })
      }
      log.debug(`Found ${matches.length} matches in text of length ${text.length}`)
      return matches.sort(comparePatternMatches)
    },
    test(text: string): boolean {
      return scanFragments(automaton, text).next().done !== true
    },
  }
}

/**
 * Find every occurrence of every pattern in a text.
 *
 * Duplicate patterns each report their own occurrences. An empty pattern
 * occurs at every start from 0 to `text.length`.
 *
 * @example
 * ```ts
 * searchPatterns(['he', 'she', 'his', 'hers'], 'ahishers')
 * // [{ patternIndex: 2, start: 1 }, { patternIndex: 1, start: 3 },
 * //  { patternIndex: 0, start: 4 }, { patternIndex: 3, start: 4 }]
 * ```
 *
 * @param patterns - Literal patterns
 * @param text - Text to search
 * @param options - Optional construction limits
 * @returns Matches sorted by start offset, then pattern index
 *
 * @public
 */
export function searchPatterns(patterns: readonly string[], text: string, options: CompileOptions = {}): PatternMatch[] {
  return createAutomatonSearcher(compilePatterns(patterns, options)).search(text)
}
