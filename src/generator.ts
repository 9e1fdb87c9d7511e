/**
 * SQL generator - converts AST back to SQL strings
 */

import {
  UnmappedDirectiveError,
  UnsupportedError,
  type UnsupportedLevel,
} from "./errors.js"
import * as exp from "./expressions.js"
import type {
  Node,
  NodeKind,
  NodeMap,
  TemporalConversion,
} from "./expressions.js"
import {
  type CanonicalFormat,
  type DirectiveTable,
  STRFTIME,
  encode,
} from "./time.js"

export interface GenerateOptions {
  /** Put each clause on its own line */
  pretty?: boolean
  /** Quote every identifier, not only those that need it */
  identify?: boolean
  /** What to do when the target cannot express something (default WARN) */
  unsupportedLevel?: UnsupportedLevel
}

export type Transform<K extends NodeKind> = (
  generator: Generator,
  expression: NodeMap[K],
) => string

export type Transforms = { [K in NodeKind]?: Transform<K> }

/** Warnings emitted by generators, oldest first */
export const logs: string[] = []

const BINARY_OPERATORS: Record<exp.BinaryOperator, string> = {
  AND: "AND",
  OR: "OR",
  XOR: "XOR",
  EQ: "=",
  NEQ: "<>",
  NULLSAFE_EQ: "IS NOT DISTINCT FROM",
  GT: ">",
  GTE: ">=",
  LT: "<",
  LTE: "<=",
  ADD: "+",
  SUB: "-",
  MUL: "*",
  DIV: "/",
  INTDIV: "DIV",
  MOD: "%",
  DPIPE: "||",
}

// Function names of the canonical dialect, one per temporal conversion
const TEMPORAL_FUNCTIONS: Record<TemporalConversion["kind"], string> = {
  strtodate: "STR_TO_DATE",
  strtotime: "STR_TO_TIME",
  tsordstodate: "TS_OR_DS_TO_DATE",
  timetostr: "TIME_TO_STR",
  tochar: "TO_CHAR",
  unixtostr: "UNIX_TO_STR",
  strtounix: "STR_TO_UNIX",
}

const SAFE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

export class Generator {
  // Per-kind overrides, consulted before the built-in rendering
  static TRANSFORMS: Transforms = {}

  // The vocabulary literal formats are written in
  static TIME_TABLE: DirectiveTable = STRFTIME

  // Lowercase words that must be quoted when used as identifiers
  static RESERVED_KEYWORDS: ReadonlySet<string> = new Set()

  static IDENTIFIER_START = '"'
  static IDENTIFIER_END = '"'

  static TYPE_MAPPING: ReadonlyMap<string, string> = new Map()

  // String literal delimiters (can be overridden by dialect generators)
  static BYTE_START: string | null = null
  static BYTE_END: string | null = null

  static STRINGS_SUPPORT_ESCAPED_SEQUENCES = false
  static ESCAPED_SEQUENCES: Readonly<Record<string, string>> = {}

  protected readonly options: GenerateOptions
  protected readonly transforms: Transforms
  protected readonly settings: typeof Generator

  constructor(options: GenerateOptions = {}) {
    this.options = options
    this.settings = this.constructor as typeof Generator
    this.transforms = this.settings.TRANSFORMS
  }

  generate(expression: Node): string {
    return this.sql(expression)
  }

  unsupported(message: string): void {
    const level = this.options.unsupportedLevel ?? "WARN"
    if (level === "RAISE") {
      throw new UnsupportedError(message)
    }
    if (level !== "IGNORE") {
      logs.push(`WARNING:sqlshift:${message}`)
    }
  }

  sql(expression: Node | string | undefined): string {
    if (expression === undefined) return ""
    if (typeof expression === "string") return expression

    const transformed = this.applyTransform(expression.kind, expression)
    if (transformed !== undefined) return transformed

    return this.nodeSql(expression)
  }

  private applyTransform<K extends NodeKind>(
    kind: K,
    expression: NodeMap[K],
  ): string | undefined {
    const transform = this.transforms[kind]
    return transform ? transform(this, expression) : undefined
  }

  protected nodeSql(expression: Node): string {
    switch (expression.kind) {
      case "literal":
        return this.literal_sql(expression)
      case "bytestring":
        return this.bytestring_sql(expression)
      case "null":
        return "NULL"
      case "boolean":
        return expression.value ? "TRUE" : "FALSE"
      case "star":
        return "*"
      case "identifier":
        return this.identifier_sql(expression)
      case "column":
        return expression.table
          ? `${this.sql(expression.table)}.${this.sql(expression.name)}`
          : this.sql(expression.name)
      case "table":
        return this.table_sql(expression)
      case "alias":
        return `${this.sql(expression.expression)} AS ${this.sql(expression.alias)}`
      case "paren":
        return `(${this.sql(expression.expression)})`
      case "anonymous":
        return this.func(expression.name, ...expression.args)
      case "datatype":
        return this.datatype_sql(expression)
      case "cast":
        return this.cast_sql(expression)
      case "jsonextractscalar":
        return this.jsonextractscalar_sql(expression)
      case "binary":
        return this.binary_sql(expression)
      case "not":
        return `NOT ${this.sql(expression.expression)}`
      case "neg": {
        const operand = this.sql(expression.expression)
        // "--" would start a comment
        return operand.startsWith("-") ? `- ${operand}` : `-${operand}`
      }
      case "is":
        return `${this.sql(expression.expression)} IS ${expression.negated ? "NOT " : ""}${this.sql(expression.target)}`
      case "ordered":
        return `${this.sql(expression.expression)}${expression.desc ? " DESC" : ""}`
      case "select":
        return this.select_sql(expression)
      case "timeformat":
        return this.quoteString(this.encodeFormat(expression.format, this.settings.TIME_TABLE))
      case "unixseconds":
        return "UNIX_SECONDS()"
      case "strtodate":
      case "strtotime":
      case "tsordstodate":
      case "timetostr":
      case "tochar":
      case "unixtostr":
      case "strtounix":
        return this.temporalSql(expression)
      default: {
        const unknown: never = expression
        throw new UnsupportedError(`No handler for expression ${String(unknown)}`)
      }
    }
  }

  // ==================== Temporal conversions ====================

  /**
   * Renders a date/time parse or format call. Dialects override this with
   * their own function names and format vocabularies.
   */
  protected temporalSql(expression: TemporalConversion): string {
    return this.func(
      TEMPORAL_FUNCTIONS[expression.kind],
      expression.value,
      this.formatTime(expression),
    )
  }

  /**
   * The format argument of a temporal conversion as SQL. Literal formats are
   * encoded with `table` (this generator's own vocabulary by default); any
   * other format expression is rendered unchanged.
   */
  formatTime(
    expression: TemporalConversion,
    table: DirectiveTable = this.settings.TIME_TABLE,
  ): string | undefined {
    const format = expression.format
    if (!format) return undefined
    if (format instanceof exp.TimeFormat) {
      return this.quoteString(this.encodeFormat(format.format, table))
    }
    return this.sql(format)
  }

  protected encodeFormat(format: CanonicalFormat, table: DirectiveTable): string {
    try {
      return encode(format, table)
    } catch (error) {
      if (!(error instanceof UnmappedDirectiveError)) throw error
      this.unsupported(error.message)
    }
    try {
      return encode(format, table, { onUnmapped: "passthrough" })
    } catch (error) {
      // The directive's own text is a token of the target with another meaning
      if (!(error instanceof UnmappedDirectiveError)) throw error
      throw new UnsupportedError(error.message)
    }
  }

  /** A function call; absent arguments are skipped */
  func(name: string, ...args: Array<Node | string | undefined>): string {
    const rendered = args
      .filter((arg): arg is Node | string => arg !== undefined)
      .map((arg) => this.sql(arg))
    return `${name}(${rendered.join(", ")})`
  }

  // ==================== Core expression types ====================

  protected literal_sql(expression: exp.Literal): string {
    return expression.isString ? this.quoteString(expression.value) : expression.value
  }

  protected bytestring_sql(expression: exp.ByteString): string {
    const { BYTE_START, BYTE_END } = this.settings
    if (BYTE_START) {
      return `${BYTE_START}${this.escapeStr(expression.value)}${BYTE_END ?? ""}`
    }
    return this.quoteString(expression.value)
  }

  protected identifier_sql(expression: exp.Identifier): string {
    const name = expression.name
    if (expression.quoted || this.options.identify || this.shouldQuote(name)) {
      return this.quoteIdentifier(name)
    }
    return name
  }

  protected table_sql(expression: exp.Table): string {
    const name = expression.db
      ? `${this.sql(expression.db)}.${this.sql(expression.name)}`
      : this.sql(expression.name)
    return expression.alias ? `${name} AS ${this.sql(expression.alias)}` : name
  }

  protected datatype_sql(expression: exp.DataType): string {
    const type = this.settings.TYPE_MAPPING.get(expression.type) ?? expression.type
    if (expression.params.length === 0) return type
    return `${type}(${expression.params.map((p) => this.sql(p)).join(", ")})`
  }

  protected cast_sql(expression: exp.Cast): string {
    const name = expression.safe ? "TRY_CAST" : "CAST"
    return `${name}(${this.sql(expression.expression)} AS ${this.sql(expression.to)})`
  }

  protected jsonextractscalar_sql(expression: exp.JSONExtractScalar): string {
    return this.func("JSON_EXTRACT_SCALAR", expression.expression, expression.path)
  }

  protected binaryOperator(operator: exp.BinaryOperator): string {
    return BINARY_OPERATORS[operator]
  }

  protected binary_sql(expression: exp.Binary): string {
    return `${this.sql(expression.left)} ${this.binaryOperator(expression.operator)} ${this.sql(expression.right)}`
  }

  protected select_sql(expression: exp.Select): string {
    const projections = expression.expressions.map((e) => this.sql(e))
    const head = `SELECT${expression.distinct ? " DISTINCT" : ""}`
    const clauses = [
      this.options.pretty
        ? `${head}\n${projections.map((p) => `  ${p}`).join(",\n")}`
        : `${head} ${projections.join(", ")}`,
    ]

    if (expression.from) clauses.push(`FROM ${this.sql(expression.from)}`)
    if (expression.where) clauses.push(`WHERE ${this.sql(expression.where)}`)
    if (expression.groupBy.length > 0) {
      clauses.push(`GROUP BY ${expression.groupBy.map((e) => this.sql(e)).join(", ")}`)
    }
    if (expression.having) clauses.push(`HAVING ${this.sql(expression.having)}`)
    if (expression.orderBy === "ALL") {
      clauses.push("ORDER BY ALL")
    } else if (expression.orderBy.length > 0) {
      clauses.push(`ORDER BY ${expression.orderBy.map((e) => this.sql(e)).join(", ")}`)
    }
    if (expression.limit) clauses.push(`LIMIT ${this.sql(expression.limit)}`)

    return clauses.join(this.options.pretty ? "\n" : " ")
  }

  // ==================== Quoting ====================

  protected shouldQuote(name: string): boolean {
    if (!SAFE_IDENTIFIER.test(name)) {
      return true
    }
    return this.settings.RESERVED_KEYWORDS.has(name.toLowerCase())
  }

  protected quoteIdentifier(name: string): string {
    const { IDENTIFIER_START, IDENTIFIER_END } = this.settings
    return `${IDENTIFIER_START}${name.replaceAll(IDENTIFIER_END, IDENTIFIER_END + IDENTIFIER_END)}${IDENTIFIER_END}`
  }

  protected escapeStr(text: string): string {
    let escaped = text
    if (this.settings.STRINGS_SUPPORT_ESCAPED_SEQUENCES) {
      const sequences = this.settings.ESCAPED_SEQUENCES
      escaped = [...escaped].map((ch) => sequences[ch] ?? ch).join("")
    }
    return escaped.replaceAll("'", "''")
  }

  protected quoteString(value: string): string {
    return `'${this.escapeStr(value)}'`
  }
}
