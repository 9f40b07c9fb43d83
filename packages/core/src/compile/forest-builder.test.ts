import { describe, it, expect } from 'vitest'

import { createForest, insertFragment, buildForest } from './forest-builder'
import { AutomatonLimitError } from '../types'

describe('createForest', () => {
  it('starts with only the root', () => {
    const forest = createForest()

    expect(forest.states).toHaveLength(1)
    expect(forest.states[0].depth).toBe(0)
    expect(forest.fragmentCount).toBe(0)
  })
})

describe('insertFragment', () => {
  it('shares common prefixes', () => {
    const forest = createForest()

    expect(insertFragment(forest, 'he', 0)).toBe(2)
    expect(insertFragment(forest, 'hers', 1)).toBe(4)
    expect(forest.states).toHaveLength(5)
    expect(forest.states[4].depth).toBe(4)
  })

  it('records one output per insertion, even for duplicates', () => {
    const forest = createForest()
    insertFragment(forest, 'ab', 0)
    insertFragment(forest, 'ab', 1)

    expect(forest.states).toHaveLength(3)
    expect(forest.states[2].outputs).toEqual([
      { fragmentId: 0, length: 2 },
      { fragmentId: 1, length: 2 },
    ])
    expect(forest.fragmentCount).toBe(2)
  })

  it('accepts an explicit length', () => {
    const forest = createForest()
    insertFragment(forest, 'x', 7, 3)

    expect(forest.states[1].outputs).toEqual([{ fragmentId: 7, length: 3 }])
  })

  it('throws AutomatonLimitError when exceeding maxStates', () => {
    const forest = createForest({ maxStates: 3 })

    expect(() => insertFragment(forest, 'abc', 0)).toThrow(AutomatonLimitError)
    try {
      insertFragment(createForest({ maxStates: 3 }), 'abc', 0)
    } catch (error) {
      expect(error).toBeInstanceOf(AutomatonLimitError)
      if (error instanceof AutomatonLimitError) {
        expect(error.code).toBe('STATE_LIMIT')
        expect(error.limit).toBe(3)
        expect(error.actual).toBe(4)
      }
    }
  })
})

describe('buildForest', () => {
  it('builds the classic he/she/his/hers trie', () => {
    const forest = buildForest([
      { symbols: 'he', id: 0 },
      { symbols: 'she', id: 1 },
      { symbols: 'his', id: 2 },
      { symbols: 'hers', id: 3 },
    ])

    expect(forest.states).toHaveLength(10)
    expect([...forest.states[0].transitions.keys()]).toEqual(['h', 's'])
    expect([...forest.states[1].transitions.keys()]).toEqual(['e', 'i'])
    expect(forest.states[5].outputs).toEqual([{ fragmentId: 1, length: 3 }])
    expect(forest.states[9].outputs).toEqual([{ fragmentId: 3, length: 4 }])
  })

  it('builds an empty forest from no fragments', () => {
    expect(buildForest([]).states).toHaveLength(1)
  })
})
