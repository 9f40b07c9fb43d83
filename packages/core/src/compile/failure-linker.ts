/**
 * Failure linker - turns a prefix forest into an Aho-Corasick automaton.
 * @packageDocumentation
 */

import type { Automaton, AutomatonState, OutputEntry } from '../types'
import type { Forest } from './forest-builder'
import { getLogger, TRACE_LEVEL } from '../config/logger'

const log = getLogger('compile')

/**
 * Compute failure links and merge output lists.
 *
 * States are visited breadth-first from the root, so when a state is reached its
 * parent's failure link is already final. For the edge `(parent, c) -> s` the
 * parent's failure chain is walked until some state has a transition on `c`;
 * its destination becomes `s.failure`, or the root if the chain runs out.
 *
 * Each state then gets a copy of its failure target's full output list appended
 * to its own entries. The target sits at a smaller depth, so its list is already
 * complete, and a match never has to walk failure links to collect outputs.
 * The root's own entries (empty fragments) are never copied: they end before
 * any symbol is consumed and are reported by {@link scanFragments} separately.
 *
 * The forest is consumed; the returned automaton shares no mutable data with it.
 *
 * @param forest - Forest built by {@link buildForest} or {@link insertFragment}
 * @returns The finished automaton
 *
 * @public
 */
export function linkFailures(forest: Forest): Automaton {
  const source = forest.states
  const failures: (number | undefined)[] = new Array<number | undefined>(source.length).fill(undefined)
  const outputs: OutputEntry[][] = source.map((state) => [...state.outputs])

  const root = 0
  const queue: number[] = [root]

  log.debug(`Processing forest with root ${root}`)

  for (let head = 0; head < queue.length; head++) {
    const stateId = queue[head]
    const fallback = failures[stateId]

    for (const [symbol, target] of source[stateId].transitions) {
      queue.push(target)

      const found = findFailureTarget(forest, failures, fallback, symbol)
      const failure = found ?? root
      failures[target] = failure

      // Failure target is shallower, so its list already includes its own fallbacks
      if (failure !== root) {
        for (const entry of outputs[failure]) {
          outputs[target].push({ ...entry })
        }
      }

      if (log.level >= TRACE_LEVEL) log.trace(`Fallback for state ${target} (transition on \`${symbol}'): ${failure}`)
    }
  }

  const states: AutomatonState[] = source.map((state) => ({
    id: state.id,
    transitions: new Map(state.transitions),
    failure: failures[state.id],
    outputs: outputs[state.id],
    depth: state.depth,
  }))

  return {
    states,
    root,
    fragmentCount: forest.fragmentCount,
  }
}

/**
 * Walk a failure chain starting at `from` until a state offers `symbol`.
 */
function findFailureTarget(
  forest: Forest,
  failures: readonly (number | undefined)[],
  from: number | undefined,
  symbol: string,
): number | undefined {
  for (let p = from; p !== undefined; p = failures[p]) {
    const target = forest.states[p].transitions.get(symbol)
    if (target !== undefined) {
      return target
    }
  }
  return undefined
}
