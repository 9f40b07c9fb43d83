/**
 * Error codes for pattern validation failures.
 * @public
 */
export type PatternErrorCode =
  | 'DANGLING_COMPLEMENT' // complement marker with no operand
  | 'EMPTY_PATTERN' // pattern that occupies no text positions
  | 'INVALID_SPECIAL_CHAR' // wildcard/complement not exactly one symbol, or equal
  | 'STATE_LIMIT' // forest construction exceeded state limit

/**
 * A pattern validation error with location information.
 * @public
 */
export interface PatternError {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** Human-readable error description */
  readonly message: string

  /** Character position in source where error starts */
  readonly position?: number

  /** Length of the problematic section */
  readonly length?: number
}

/**
 * Error thrown when a pattern cannot be turned into fragments.
 *
 * Carries every validation error found, so callers can report them all at once.
 *
 * @public
 */
export class MalformedPatternError extends Error {
  /** Code of the first error */
  readonly code: PatternErrorCode

  /** The pattern that was rejected */
  readonly source: string

  readonly errors: readonly PatternError[]

  constructor(source: string, errors: readonly PatternError[]) {
    const first = errors[0]
    super(first ? `Malformed pattern "${source}": ${first.message}` : `Malformed pattern "${source}"`)
    this.name = 'MalformedPatternError'
    this.code = first ? first.code : 'EMPTY_PATTERN'
    this.source = source
    this.errors = errors
  }
}

/**
 * Error thrown when automaton construction exceeds configured limits.
 *
 * @public
 */
export class AutomatonLimitError extends Error {
  /** Error classification code */
  readonly code: PatternErrorCode

  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(code: PatternErrorCode, message: string, limit: number, actual: number) {
    super(message)
    this.name = 'AutomatonLimitError'
    this.code = code
    this.limit = limit
    this.actual = actual
  }
}

/**
 * Error thrown when problem input text does not follow the expected line layout.
 *
 * @public
 */
export class InputFormatError extends Error {
  /** 1-based line number where reading failed */
  readonly line: number

  constructor(message: string, line: number) {
    super(`${message} (line ${line})`)
    this.name = 'InputFormatError'
    this.line = line
  }
}
