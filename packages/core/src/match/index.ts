/**
 * Text matching utilities.
 * @packageDocumentation
 */

export {
  step,
  scanFragments,
  findFragments,
  comparePatternMatches,
  createAutomatonSearcher,
  searchPatterns,
  type AutomatonSearcher,
} from './matcher'

export { WildcardMatchAggregator } from './wildcard-aggregator'

export {
  searchWildcard,
  createWildcardSearcher,
  DEFAULT_WILDCARD,
  type WildcardSearchOptions,
  type WildcardSearcher,
} from './wildcard-matcher'
