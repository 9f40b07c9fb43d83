import { describe, it, expect } from 'vitest'

import { WildcardMatchAggregator } from './wildcard-aggregator'
import { decomposePattern } from '../parse'
import type { WildcardPattern } from '../types'

describe('WildcardMatchAggregator', () => {
  it('reports a match once every part has voted', () => {
    const aggregator = new WildcardMatchAggregator(decomposePattern('a?c', '?'), 3)

    expect(aggregator.feed(0, [{ fragmentId: 0, length: 1 }])).toBeUndefined()
    expect(aggregator.feed(1, [])).toBeUndefined()
    expect(aggregator.feed(2, [{ fragmentId: 1, length: 1 }])).toBe(0)
  })

  it('withholds a match when a part is missing', () => {
    const aggregator = new WildcardMatchAggregator(decomposePattern('a?c', '?'), 3)

    aggregator.feed(0, [{ fragmentId: 0, length: 1 }])
    aggregator.feed(1, [])
    expect(aggregator.feed(2, [])).toBeUndefined()
  })

  it('withholds a match after a complement violation', () => {
    // parts: a@0, c@2; complement b@1
    const aggregator = new WildcardMatchAggregator(decomposePattern('a!bc', '?', '!'), 3)

    aggregator.feed(0, [{ fragmentId: 0, length: 1 }])
    aggregator.feed(1, [{ fragmentId: 2, length: 1 }])
    expect(aggregator.feed(2, [{ fragmentId: 1, length: 1 }])).toBeUndefined()
  })

  it('ignores alignments that would run past the text end', () => {
    const aggregator = new WildcardMatchAggregator(decomposePattern('a?', '?'), 2)

    aggregator.feed(0, [])
    expect(aggregator.feed(1, [{ fragmentId: 0, length: 1 }])).toBeUndefined()
  })

  it('reuses slots for later alignments', () => {
    // pattern "ab" spans 2; text "abab"
    const aggregator = new WildcardMatchAggregator(decomposePattern('ab', '?'), 4)
    const part = [{ fragmentId: 0, length: 2 }]

    expect(aggregator.feed(0, [])).toBeUndefined()
    expect(aggregator.feed(1, part)).toBe(0)
    expect(aggregator.feed(2, [])).toBeUndefined()
    expect(aggregator.feed(3, part)).toBe(2)
  })

  it('requires consecutive positions', () => {
    const aggregator = new WildcardMatchAggregator(decomposePattern('ab', '?'), 4)

    expect(() => aggregator.feed(1, [])).toThrow(RangeError)
  })

  it('rejects a pattern spanning no positions', () => {
    const empty: WildcardPattern = { source: '', wildcard: '?', parts: [], complements: [], length: 0 }

    expect(() => new WildcardMatchAggregator(empty, 5)).toThrow(RangeError)
  })
})
