/**
 * Type definitions for the matching engine.
 * @packageDocumentation
 */

// Automaton types
export type { Fragment, OutputEntry, Automaton, AutomatonState, StepResult } from './automaton'

// Pattern types
export type { WildcardPattern, PatternPart, PatternComplement } from './pattern'

// Match types
export type { FragmentMatch, PatternMatch } from './match'

// Error types
export type { PatternErrorCode, PatternError } from './errors'
export { AutomatonLimitError, MalformedPatternError, InputFormatError } from './errors'
