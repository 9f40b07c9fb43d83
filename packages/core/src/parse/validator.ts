/**
 * Wildcard pattern validation - rejects patterns that cannot be decomposed.
 * @packageDocumentation
 */

import type { PatternError } from '../types'

/**
 * Validate a wildcard pattern and its special symbols.
 *
 * Returns errors for:
 * - A wildcard or complement marker that is not exactly one symbol
 * - A wildcard equal to the complement marker
 * - A complement marker at the end of the pattern, with no operand
 * - An empty pattern
 *
 * A symbol following a complement marker is always its operand, even when it
 * is the wildcard or another marker.
 *
 * @param source - The pattern to validate
 * @param wildcard - Symbol matching any single text symbol
 * @param complement - Marker for a forbidden symbol; `undefined` or `''` disables complements
 * @returns Array of validation errors (empty if valid)
 *
 * @public
 */
export function validateWildcardPattern(source: string, wildcard: string, complement?: string): readonly PatternError[] {
  const errors: PatternError[] = []

  if (wildcard.length !== 1) {
    errors.push({
      code: 'INVALID_SPECIAL_CHAR',
      message: `Wildcard must be a single symbol, got "${wildcard}"`,
    })
  }

  const marker = complement === '' ? undefined : complement
  if (marker !== undefined) {
    if (marker.length !== 1) {
      errors.push({
        code: 'INVALID_SPECIAL_CHAR',
        message: `Complement marker must be a single symbol, got "${marker}"`,
      })
    } else if (marker === wildcard) {
      errors.push({
        code: 'INVALID_SPECIAL_CHAR',
        message: `Wildcard and complement marker must differ, both are "${marker}"`,
      })
    }
  }

  if (source.length === 0) {
    errors.push({
      code: 'EMPTY_PATTERN',
      message: 'Pattern is empty',
      position: 0,
      length: 0,
    })
  }

  if (marker !== undefined) {
    for (let i = 0; i < source.length; i++) {
      if (source[i] !== marker) continue

      if (i + 1 >= source.length) {
        errors.push({
          code: 'DANGLING_COMPLEMENT',
          message: `Complement marker "${marker}" at position ${i} has no operand`,
          position: i,
          length: 1,
        })
      }
      // Skip the operand
      i++
    }
  }

  return errors
}

/**
 * Check if a wildcard pattern is valid (has no errors).
 *
 * @public
 */
export function isValidWildcardPattern(source: string, wildcard: string, complement?: string): boolean {
  return validateWildcardPattern(source, wildcard, complement).length === 0
}
