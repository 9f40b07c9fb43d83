/**
 * Forest builder - inserts literal fragments into a shared prefix trie.
 * @packageDocumentation
 */

import type { Fragment, OutputEntry } from '../types'
import { AutomatonLimitError } from '../types'
import { getLogger, TRACE_LEVEL } from '../config/logger'

const log = getLogger('compile')

/**
 * Default maximum number of states before construction is aborted.
 *
 * @public
 */
export const DEFAULT_MAX_STATES = 1_000_000

/**
 * Options for forest construction.
 *
 * @public
 */
export interface ForestOptions {
  /**
   * Maximum number of states to create before throwing an error.
   * @defaultValue 1000000
   */
  maxStates?: number
}

/**
 * A state while the forest is still being grown.
 *
 * Failure links are not known yet, so this only carries the trie structure.
 *
 * @public
 */
export interface ForestState {
  readonly id: number
  readonly transitions: Map<string, number>
  readonly outputs: OutputEntry[]
  readonly depth: number
}

/**
 * Mutable forest under construction. The root is always state 0.
 *
 * @public
 */
export interface Forest {
  readonly states: ForestState[]
  readonly maxStates: number
  fragmentCount: number
}

/**
 * Create a forest holding only the root state.
 *
 * @public
 */
export function createForest(options: ForestOptions = {}): Forest {
  const forest: Forest = {
    states: [],
    maxStates: options.maxStates ?? DEFAULT_MAX_STATES,
    fragmentCount: 0,
  }
  createState(forest, 0)
  return forest
}

function createState(forest: Forest, depth: number): number {
  if (forest.states.length >= forest.maxStates) {
    throw new AutomatonLimitError(
      'STATE_LIMIT',
      `Automaton construction exceeded limit of ${forest.maxStates} states. ` +
        `Consider fewer or shorter fragments, or increasing the maxStates limit.`,
      forest.maxStates,
      forest.states.length + 1,
    )
  }

  const id = forest.states.length
  forest.states.push({ id, transitions: new Map(), outputs: [], depth })
  return id
}

/**
 * Insert one fragment, sharing every existing prefix.
 *
 * Walks from the root following the transition for each symbol, creating states
 * only where none exists, and records `(id, length)` at the final state.
 * Inserting the same symbols twice records two entries at the same state.
 *
 * @param forest - Forest to grow
 * @param symbols - Literal symbols of the fragment
 * @param id - Fragment identity reported on a match
 * @param length - Reported length, `symbols.length` unless given
 * @returns Id of the state where the fragment ends
 *
 * @public
 */
export function insertFragment(forest: Forest, symbols: string, id: number, length: number = symbols.length): number {
  let current = 0
  const tracing = log.level >= TRACE_LEVEL

  for (let i = 0; i < symbols.length; i++) {
    const symbol = symbols[i]
    const state = forest.states[current]
    const existing = state.transitions.get(symbol)

    if (existing !== undefined) {
      if (tracing) log.trace(`Found transition for \`${symbol}' to state ${existing}`)
      current = existing
    } else {
      const created = createState(forest, state.depth + 1)
      state.transitions.set(symbol, created)
      if (tracing) log.trace(`No transition for \`${symbol}'; new state ${created}`)
      current = created
    }
  }

  forest.states[current].outputs.push({ fragmentId: id, length })
  forest.fragmentCount++
  return current
}

/**
 * Build a forest from a list of fragments, inserted in order.
 *
 * @public
 */
export function buildForest(fragments: readonly Fragment[], options: ForestOptions = {}): Forest {
  const forest = createForest(options)

  for (const fragment of fragments) {
    log.debug(`Building nodes for fragment #${fragment.id} "${fragment.symbols}"`)
    insertFragment(forest, fragment.symbols, fragment.id)
  }

  return forest
}
