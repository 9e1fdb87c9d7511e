/**
 * sqlshift - SQL transpiler with date/time format transcoding
 */

export { Dialect, type DialectOptions } from "./dialect.js"
export * from "./dialects/index.js"
export type { ParseErrorDetail, UnsupportedLevel } from "./errors.js"
export {
  DirectiveTableError,
  ErrorLevel,
  ParseError,
  SqlshiftError,
  TokenError,
  UnmappedDirectiveError,
  UnsupportedError,
} from "./errors.js"
export * as exp from "./expressions.js"
export { Expression, type Node } from "./expressions.js"
export type { GenerateOptions } from "./generator.js"
export { Generator, logs } from "./generator.js"
export { Parser, type ParserOptions } from "./parser.js"
export {
  CANONICAL_DIRECTIVES,
  type CanonicalFormat,
  DirectiveTable,
  type FormatElement,
  STRFTIME,
  canonicalText,
  decode,
  encode,
  formatTime,
} from "./time.js"
export { Token, Tokenizer, TokenType } from "./tokens.js"

import { Dialect } from "./dialect.js"
import "./dialects/index.js"
import { Expression, type Node } from "./expressions.js"
import type { GenerateOptions } from "./generator.js"

// Initialize Expression.sql() method
Expression.setSqlImpl((expr, options) => {
  const genOptions: GenerateOptions = {}
  if (options.pretty !== undefined) {
    genOptions.pretty = options.pretty
  }
  return Dialect.get(options.dialect).generate(expr, genOptions)
})

export interface ParseOptions {
  dialect?: string | Dialect
}

export interface TranspileOptions {
  read?: string | Dialect
  write?: string | Dialect
  pretty?: boolean
  identify?: boolean
}

/**
 * Parse SQL string into AST
 */
export function parse(sql: string, options: ParseOptions = {}): Node[] {
  return Dialect.get(options.dialect).parse(sql)
}

/**
 * Parse a single SQL statement
 */
export function parseOne(sql: string, options: ParseOptions = {}): Node {
  return Dialect.get(options.dialect).parseOne(sql)
}

/**
 * Transpile SQL from one dialect to another
 */
export function transpile(
  sql: string,
  options: TranspileOptions = {},
): string[] {
  const readDialect = Dialect.get(options.read)
  const writeDialect = Dialect.get(options.write)

  const genOptions: GenerateOptions = {}
  if (options.pretty !== undefined) {
    genOptions.pretty = options.pretty
  }
  if (options.identify !== undefined) {
    genOptions.identify = options.identify
  }

  return readDialect.transpile(sql, writeDialect, genOptions)
}

/**
 * Transpile a single SQL statement
 */
export function transpileOne(
  sql: string,
  options: TranspileOptions = {},
): string {
  const results = transpile(sql, options)
  const [first] = results
  if (results.length !== 1 || first === undefined) {
    throw new Error(`Expected exactly one statement, got ${results.length}`)
  }
  return first
}
