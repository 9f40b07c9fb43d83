/**
 * Pattern parsing utilities.
 * @packageDocumentation
 */

export { decomposePattern } from './decomposer'
export { validateWildcardPattern, isValidWildcardPattern } from './validator'
