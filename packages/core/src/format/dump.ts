/**
 * Textual dumps of automata and decomposed patterns, for tracing.
 * @packageDocumentation
 */

import type { Automaton, WildcardPattern } from '../types'

/**
 * Describe every state of an automaton, depth-first from the root.
 *
 * Each state prints as:
 * ```
 * State 1:
 * 	Transition on 'e' to 2
 * 	Fallback to 0
 * 	Result #0 of length 2
 * ```
 * The root has no fallback and prints `Fallback to (none)`.
 *
 * @public
 */
export function describeAutomaton(automaton: Automaton): string {
  const lines: string[] = []
  const stack = [automaton.root]

  for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
    const state = automaton.states[id]
    lines.push(`State ${state.id}:`)

    for (const [symbol, target] of state.transitions) {
      stack.push(target)
      lines.push(`\tTransition on '${symbol}' to ${target}`)
    }

    lines.push(`\tFallback to ${state.failure ?? '(none)'}`)

    for (const entry of state.outputs) {
      lines.push(`\tResult #${entry.fragmentId} of length ${entry.length}`)
    }
  }

  return lines.join('\n')
}

/**
 * Describe the parts, complements and total length of a decomposed pattern.
 *
 * @public
 */
export function describePattern(pattern: WildcardPattern): string {
  const lines: string[] = []

  for (const part of pattern.parts) {
    lines.push(`Part at offset ${part.offset} of length ${part.length}: "${part.symbols}"`)
  }
  for (const complement of pattern.complements) {
    lines.push(`Complement to char \`${complement.symbol}' at index ${complement.offset}`)
  }
  lines.push(`Total length of pattern: ${pattern.length}`)

  return lines.join('\n')
}
