/**
 * Wildcard match aggregation - reassembles fragment hits into whole-pattern matches.
 * @packageDocumentation
 */

import type { OutputEntry, WildcardPattern } from '../types'
import { getLogger, TRACE_LEVEL } from '../config/logger'

const log = getLogger('match')

/**
 * Turns fragment endings into whole-pattern match starts, one text position at a time.
 *
 * Only `L = pattern.length` alignments can be undecided at once, so votes and
 * complement violations live in two ring buffers of size `L`. The slot for the
 * alignment starting at `s` is `s mod L`. It is cleared when position `s` is
 * fed, and decided right after position `s + L - 1`, just before the cursor
 * wraps back to it.
 *
 * @example
 * ```ts
 * const aggregator = new WildcardMatchAggregator(pattern, text.length)
 * let state = automaton.root
 * for (let i = 0; i < text.length; i++) {
 *   const result = step(automaton, state, text[i])
 *   state = result.state
 *   const start = aggregator.feed(i, result.matched ? automaton.states[state].outputs : [])
 *   if (start !== undefined) starts.push(start)
 * }
 * ```
 *
 * @public
 */
export class WildcardMatchAggregator {
  /** Parts matched for the alignment owning each slot */
  private readonly votes: Uint32Array

  /** Whether a complement was violated for the alignment owning each slot */
  private readonly disabled: Uint8Array

  /** Slot of the alignment starting at the next position to be fed */
  private slot = 0

  /** Next position expected by {@link feed} */
  private nextPosition = 0

  private readonly window: number
  private readonly partCount: number

  constructor(
    private readonly pattern: WildcardPattern,
    private readonly textLength: number,
  ) {
    if (pattern.length < 1) {
      throw new RangeError('Pattern must span at least one position')
    }
    this.window = pattern.length
    this.partCount = pattern.parts.length
    this.votes = new Uint32Array(this.window)
    this.disabled = new Uint8Array(this.window)
  }

  /**
   * Feed the fragment endings found at one text position.
   *
   * Output entry ids follow {@link wildcardFragments}: parts first, then
   * complements.
   *
   * @param position - 0-based text position; must be exactly one past the previous call
   * @param outputs - Output list of the state reached at `position`, or empty if no transition was taken
   * @returns 0-based start of the whole-pattern match completed at `position`, if any
   */
  feed(position: number, outputs: readonly OutputEntry[]): number | undefined {
    if (position !== this.nextPosition) {
      throw new RangeError(`Expected position ${this.nextPosition}, got ${position}`)
    }
    this.nextPosition++

    const window = this.window
    const tracing = log.level >= TRACE_LEVEL
    this.votes[this.slot] = 0
    this.disabled[this.slot] = 0

    for (const entry of outputs) {
      const isComplement = entry.fragmentId >= this.partCount
      const offset = isComplement
        ? this.pattern.complements[entry.fragmentId - this.partCount].offset
        : this.pattern.parts[entry.fragmentId].offset + entry.length - 1

      if (position < offset) continue

      const start = position - offset
      if (start + window > this.textLength) continue

      // offset < window, so this stays non-negative
      const target = (window + this.slot - offset) % window

      if (isComplement) {
        this.disabled[target] = 1
        if (tracing) log.trace(`Complement found; disabling match at ${start}`)
      } else if (this.disabled[target] === 0) {
        this.votes[target]++
        if (tracing) log.trace(`${this.votes[target]}/${this.partCount} parts matched at offset ${start}`)
      }
    }

    this.slot = (this.slot + 1) % window

    if (position + 1 >= window && this.disabled[this.slot] === 0 && this.votes[this.slot] === this.partCount) {
      const start = position + 1 - window
      log.debug(`Pattern matched at ${start}`)
      return start
    }

    return undefined
  }
}
