/**
 * Dumps, reporting and problem input.
 * @packageDocumentation
 */

export { describeAutomaton, describePattern } from './dump'
export { formatPatternMatches, formatWildcardMatches } from './report'
export {
  parsePlainInput,
  parseWildcardInput,
  runPlain,
  runWildcard,
  type PlainProblem,
  type WildcardProblem,
} from './input'
