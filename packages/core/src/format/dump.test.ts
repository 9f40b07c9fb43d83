import { describe, it, expect } from 'vitest'

import { describeAutomaton, describePattern } from './dump'
import { compilePatterns } from '../compile'
import { decomposePattern } from '../parse'

describe('describeAutomaton', () => {
  it('lists states depth-first with transitions, fallbacks and results', () => {
    const automaton = compilePatterns(['he', 'she'])

    expect(describeAutomaton(automaton).split('\n')).toEqual([
      'State 0:',
      "\tTransition on 'h' to 1",
      "\tTransition on 's' to 3",
      '\tFallback to (none)',
      'State 3:',
      "\tTransition on 'h' to 4",
      '\tFallback to 0',
      'State 4:',
      "\tTransition on 'e' to 5",
      '\tFallback to 1',
      'State 5:',
      '\tFallback to 2',
      '\tResult #1 of length 3',
      '\tResult #0 of length 2',
      'State 1:',
      "\tTransition on 'e' to 2",
      '\tFallback to 0',
      'State 2:',
      '\tFallback to 0',
      '\tResult #0 of length 2',
    ])
  })

  it('describes an empty automaton', () => {
    expect(describeAutomaton(compilePatterns([]))).toBe('State 0:\n\tFallback to (none)')
  })
})

describe('describePattern', () => {
  it('lists parts, complements and total length', () => {
    const pattern = decomposePattern('ab?!cd', '?', '!')

    expect(describePattern(pattern)).toBe(
      [
        'Part at offset 0 of length 2: "ab"',
        'Part at offset 4 of length 1: "d"',
        "Complement to char `c' at index 3",
        'Total length of pattern: 5',
      ].join('\n'),
    )
  })
})
