/**
 * Multi-pattern text matching
 *
 * An Aho-Corasick automaton over literal fragments, with a single-pass wildcard
 * mode where one symbol matches any text symbol and a marker forbids a specific
 * symbol at a position.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.1.0'

// =============================================================================
// Types
// =============================================================================

export type {
  // Automaton types
  Fragment,
  OutputEntry,
  Automaton,
  AutomatonState,
  StepResult,
  // Pattern types
  WildcardPattern,
  PatternPart,
  PatternComplement,
  // Match types
  FragmentMatch,
  PatternMatch,
  // Error types
  PatternErrorCode,
  PatternError,
} from './types'
export { AutomatonLimitError, MalformedPatternError, InputFormatError } from './types'

// =============================================================================
// Parsing
// =============================================================================

export { decomposePattern, validateWildcardPattern, isValidWildcardPattern } from './parse'

// =============================================================================
// Construction
// =============================================================================

export { compileFragments, compilePatterns, compileWildcardPattern, wildcardFragments } from './compile'
export { createForest, insertFragment, buildForest, linkFailures, DEFAULT_MAX_STATES } from './compile'
export type { CompileOptions, Forest, ForestState, ForestOptions } from './compile'

// =============================================================================
// Matching
// =============================================================================

export { step, scanFragments, findFragments, comparePatternMatches } from './match'
export { createAutomatonSearcher, searchPatterns, type AutomatonSearcher } from './match'
export { WildcardMatchAggregator } from './match'
export {
  searchWildcard,
  createWildcardSearcher,
  DEFAULT_WILDCARD,
  type WildcardSearchOptions,
  type WildcardSearcher,
} from './match'

// =============================================================================
// Reporting
// =============================================================================

export { describeAutomaton, describePattern, formatPatternMatches, formatWildcardMatches } from './format'
export { parsePlainInput, parseWildcardInput, runPlain, runWildcard } from './format'
export type { PlainProblem, WildcardProblem } from './format'

// =============================================================================
// Configuration
// =============================================================================

export { logger, getLogger, setLogLevel, readEnv, DEFAULT_LOG_LEVEL, TRACE_LEVEL } from './config'
export type { LoggerArea, TextscanEnv } from './config'
