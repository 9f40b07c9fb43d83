// =============================================================================
// FRAGMENTS
// =============================================================================

/**
 * A literal symbol sequence to be inserted into the automaton.
 *
 * In plain mode each whole pattern is one fragment and `id` is its index in the
 * pattern list. In wildcard mode `id` indexes the decomposed parts, followed by
 * the complements.
 *
 * @public
 */
export interface Fragment {
  readonly symbols: string
  readonly id: number
}

/**
 * A fragment ending recorded at a state.
 * @public
 */
export interface OutputEntry {
  /** Identity of the fragment that ends here */
  readonly fragmentId: number

  /** Number of symbols in the fragment, used to recover its start */
  readonly length: number
}

// =============================================================================
// AUTOMATON
// =============================================================================

/**
 * An Aho-Corasick automaton stored as an arena of states.
 *
 * States refer to each other by index only, so the whole structure is plain
 * data: it can be shared between any number of independent matching passes.
 *
 * @public
 */
export interface Automaton {
  /** All states, indexed by id */
  readonly states: readonly AutomatonState[]

  /** Index of the root state */
  readonly root: number

  /** Number of fragments inserted during construction */
  readonly fragmentCount: number
}

/**
 * A state in the automaton.
 * @public
 */
export interface AutomatonState {
  /** Unique identifier for this state (index in the states array) */
  readonly id: number

  /** Outgoing transitions keyed by symbol, in insertion order */
  readonly transitions: ReadonlyMap<string, number>

  /**
   * Longest proper suffix of this state's path that is also a prefix of some
   * fragment. Undefined only for the root.
   */
  readonly failure: number | undefined

  /**
   * Fragment endings reported when this state is entered: the state's own
   * entries first, then a copy of its failure target's full list.
   */
  readonly outputs: readonly OutputEntry[]

  /** Distance from the root */
  readonly depth: number
}

/**
 * Result of consuming one symbol.
 * @public
 */
export interface StepResult {
  /** State after the step */
  readonly state: number

  /** Whether some transition consumed the symbol; false means we fell back to the root */
  readonly matched: boolean
}
