/**
 * A wildcard pattern split into literal parts and complement constraints.
 *
 * Offsets are in compressed coordinates: every pattern position a text symbol
 * must fill counts once. A wildcard fills one position, and a complement marker
 * together with its operand fills one position.
 *
 * @public
 */
export interface WildcardPattern {
  /** Original source pattern */
  readonly source: string

  /** Symbol that matches any single text symbol */
  readonly wildcard: string

  /** Symbol introducing a forbidden-symbol constraint, if enabled */
  readonly complement?: string

  /** Maximal literal runs, in source order */
  readonly parts: readonly PatternPart[]

  /** Forbidden-symbol constraints, in source order */
  readonly complements: readonly PatternComplement[]

  /** Number of text symbols one alignment of the pattern spans */
  readonly length: number
}

/**
 * A maximal literal run of a wildcard pattern.
 * @public
 */
export interface PatternPart {
  /** Compressed offset of the first symbol */
  readonly offset: number

  /** The literal symbols */
  readonly symbols: string

  readonly length: number
}

/**
 * A position where one particular symbol must not occur.
 * @public
 */
export interface PatternComplement {
  /** Compressed offset of the constrained position */
  readonly offset: number

  /** The forbidden symbol */
  readonly symbol: string
}
