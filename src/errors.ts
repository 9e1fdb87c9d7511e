/**
 * Error handling for sqlshift
 */

/**
 * Error level controls how the parser handles errors.
 */
export enum ErrorLevel {
  /** Ignore all errors (collect but continue silently) */
  IGNORE = "IGNORE",
  /** Log all errors (collect, warn, continue) */
  WARN = "WARN",
  /** Collect all errors and raise a single exception at the end */
  RAISE = "RAISE",
  /** Immediately raise an exception on the first error (default) */
  IMMEDIATE = "IMMEDIATE",
}

export type UnsupportedLevel = "IGNORE" | "WARN" | "RAISE"

export class SqlshiftError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "SqlshiftError"
  }
}

/**
 * Raised by the tokenizer on unterminated strings, identifiers and comments.
 */
export class TokenError extends SqlshiftError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly col: number,
  ) {
    super(message)
    this.name = "TokenError"
  }
}

/**
 * Error thrown by the parser when encountering invalid SQL.
 */
export class ParseError extends SqlshiftError {
  constructor(
    message: string,
    public readonly errors: ParseErrorDetail[] = [],
  ) {
    super(message)
    this.name = "ParseError"
  }
}

/**
 * Details about a specific parse error.
 */
export interface ParseErrorDetail {
  description: string
  line?: number
  col?: number
  startContext?: string
  highlight?: string
  endContext?: string
}

export class UnsupportedError extends SqlshiftError {
  constructor(message: string) {
    super(message)
    this.name = "UnsupportedError"
  }
}

/**
 * A directive table is malformed, or does not cover the directives a rewrite
 * rule needs. Raised while dialects are being defined, never at query time.
 */
export class DirectiveTableError extends SqlshiftError {
  constructor(
    message: string,
    public readonly table: string,
  ) {
    super(message)
    this.name = "DirectiveTableError"
  }
}

/**
 * A canonical directive has no token in the table a format is encoded into.
 */
export class UnmappedDirectiveError extends SqlshiftError {
  constructor(
    public readonly directive: string,
    public readonly table: string,
    /** The directive the target reads the unmapped directive's text as, if any */
    public readonly readAs?: string,
  ) {
    super(
      readAs === undefined
        ? `Format directive ${directive} has no equivalent in ${table}`
        : `Format directive ${directive} has no equivalent in ${table}, which reads ${directive} as ${readAs}`,
    )
    this.name = "UnmappedDirectiveError"
  }
}
