/**
 * Automaton construction utilities.
 * @packageDocumentation
 */

export { compileFragments, compilePatterns, compileWildcardPattern, wildcardFragments } from './compiler'
export type { CompileOptions } from './compiler'
export { createForest, insertFragment, buildForest, DEFAULT_MAX_STATES } from './forest-builder'
export type { Forest, ForestState, ForestOptions } from './forest-builder'
export { linkFailures } from './failure-linker'
