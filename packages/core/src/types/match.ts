/**
 * One occurrence of a fragment in the text.
 * @public
 */
export interface FragmentMatch {
  readonly fragmentId: number

  /** 0-based offset of the first matched symbol */
  readonly start: number

  /** 0-based offset of the last matched symbol */
  readonly end: number
}

/**
 * One occurrence of a whole pattern in plain multi-pattern mode.
 * @public
 */
export interface PatternMatch {
  /** 0-based index of the pattern in the input list */
  readonly patternIndex: number

  /** 0-based offset of the first matched symbol */
  readonly start: number
}
