/**
 * SingleStore dialect
 *
 * SingleStore speaks the MySQL wire protocol and most of its SQL, so the
 * dialect builds on MySQL. It adds its own date/time format tokens (the
 * Oracle-style `YYYY-MM-DD HH24:MI:SS` family used by TO_DATE, TO_TIMESTAMP
 * and TO_CHAR), the `:>` and `!:>` cast operators, the `::$` and `::%` JSON
 * extraction operators and a much longer list of reserved words.
 */

import { readFileSync } from "node:fs"

import { Dialect } from "../dialect.js"
import { SqlshiftError } from "../errors.js"
import * as exp from "../expressions.js"
import type { NodeKind, TemporalConversion } from "../expressions.js"
import { Generator } from "../generator.js"
import {
  type ColumnOperator,
  type FunctionBuilder,
  buildFormattedTime,
  requireArg,
  seqGet,
} from "../parser.js"
import { DirectiveTable } from "../time.js"
import { TokenType } from "../tokens.js"
import {
  MYSQL_TIME_TABLE,
  MySQLDialect,
  MySQLGenerator,
  MySQLParser,
  MySQLTokenizer,
} from "./mysql.js"

/**
 * SingleStore format tokens. `HH` and `HH12` both read as the 12-hour clock
 * and `RR` and `YY` both as the two-digit year; the later token of each pair
 * is the one written back.
 */
export const SINGLESTORE_TIME_TABLE = new DirectiveTable("singlestore", [
  ["D", "%u"], // day of week
  ["DD", "%d"], // day of month
  ["DY", "%a"], // abbreviated day name
  ["HH", "%I"],
  ["HH12", "%I"],
  ["HH24", "%H"],
  ["MI", "%M"],
  ["MM", "%m"],
  ["MON", "%b"],
  ["MONTH", "%B"],
  ["SS", "%S"],
  ["RR", "%y"],
  ["YY", "%y"],
  ["YYYY", "%Y"],
  ["FF6", "%f"],
])

export interface TemporalRule {
  /** Function the conversion is written as */
  name: string
  /** Vocabulary the format argument is read with */
  source: DirectiveTable
  /** Vocabulary the format argument is written with */
  target: DirectiveTable
}

// SingleStore's own functions take its own tokens; the functions it shares
// with MySQL keep MySQL's `%` specifiers.
const TEMPORAL_RULES: Readonly<Record<TemporalConversion["kind"], TemporalRule>> = {
  tsordstodate: { name: "TO_DATE", source: SINGLESTORE_TIME_TABLE, target: SINGLESTORE_TIME_TABLE },
  strtotime: { name: "TO_TIMESTAMP", source: SINGLESTORE_TIME_TABLE, target: SINGLESTORE_TIME_TABLE },
  tochar: { name: "TO_CHAR", source: SINGLESTORE_TIME_TABLE, target: SINGLESTORE_TIME_TABLE },
  strtodate: { name: "STR_TO_DATE", source: MYSQL_TIME_TABLE, target: MYSQL_TIME_TABLE },
  timetostr: { name: "DATE_FORMAT", source: MYSQL_TIME_TABLE, target: MYSQL_TIME_TABLE },
  unixtostr: { name: "FROM_UNIXTIME", source: MYSQL_TIME_TABLE, target: MYSQL_TIME_TABLE },
  strtounix: { name: "UNIX_TIMESTAMP", source: MYSQL_TIME_TABLE, target: MYSQL_TIME_TABLE },
}

/**
 * Fails with a DirectiveTableError unless every directive a rule's source
 * table can decode to has a token in its target table.
 */
export function assertTemporalRules(rules: Iterable<TemporalRule>): void {
  for (const rule of rules) {
    rule.target.assertCovers(rule.source.directives(), rule.name)
  }
}

assertTemporalRules(Object.values(TEMPORAL_RULES))

function loadReservedKeywords(): ReadonlySet<string> {
  const url = new URL("../../data/singlestore-reserved-keywords.json", import.meta.url)
  const words: unknown = JSON.parse(readFileSync(url, "utf8"))
  if (!Array.isArray(words) || !words.every((word): word is string => typeof word === "string")) {
    throw new SqlshiftError(`${url.pathname} is not a list of words`)
  }
  return new Set(words.map((word) => word.toLowerCase()))
}

export const SINGLESTORE_RESERVED_KEYWORDS = loadReservedKeywords()

export class SingleStoreTokenizer extends MySQLTokenizer {
  static override BYTE_STRINGS: ReadonlyArray<readonly [string, string]> = [
    ["e'", "'"],
    ["E'", "'"],
  ]

  static override KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ...MySQLTokenizer.KEYWORDS,
    ["BSON", TokenType.JSONB],
    ["GEOGRAPHYPOINT", TokenType.GEOGRAPHYPOINT],
    [":>", TokenType.COLON_GT],
    ["!:>", TokenType.NCOLON_GT],
    ["::$", TokenType.DCOLONDOLLAR],
    ["::%", TokenType.DCOLONPERCENT],
  ])
}

export class SingleStoreParser extends MySQLParser {
  static override FUNCTIONS: ReadonlyMap<string, FunctionBuilder> = new Map<
    string,
    FunctionBuilder
  >([
    ...MySQLParser.FUNCTIONS,
    ["TO_DATE", buildFormattedTime(exp.TsOrDsToDate, TEMPORAL_RULES.tsordstodate.source)],
    ["TO_TIMESTAMP", buildFormattedTime(exp.StrToTime, TEMPORAL_RULES.strtotime.source)],
    ["TO_CHAR", buildFormattedTime(exp.ToChar, TEMPORAL_RULES.tochar.source)],
    ["STR_TO_DATE", buildFormattedTime(exp.StrToDate, TEMPORAL_RULES.strtodate.source)],
    ["DATE_FORMAT", buildFormattedTime(exp.TimeToStr, TEMPORAL_RULES.timetostr.source)],
    ["FROM_UNIXTIME", buildFormattedTime(exp.UnixToStr, TEMPORAL_RULES.unixtostr.source)],
    [
      // DATE_FORMAT reads a bare '12:05:47' as a DATETIME and fails, so the
      // value is cast to TIME(6) first
      "TIME_FORMAT",
      (args) =>
        new exp.TimeToStr({
          value: new exp.Cast({
            expression: requireArg(args, 0, "TIME_FORMAT"),
            to: exp.DataType.build(exp.DataType.Type.TIME, [exp.Literal.number(6)]),
          }),
          format: MySQLDialect.formatTime(seqGet(args, 1)),
        }),
    ],
  ])

  static override COLUMN_OPERATORS: ReadonlyMap<TokenType, ColumnOperator> = new Map<
    TokenType,
    ColumnOperator
  >([
    ...MySQLParser.COLUMN_OPERATORS,
    [
      TokenType.COLON_GT,
      (p, left) => new exp.Cast({ expression: left, to: p.parseType() }),
    ],
    [
      TokenType.NCOLON_GT,
      (p, left) => new exp.Cast({ expression: left, to: p.parseType(), safe: true }),
    ],
    [
      TokenType.DCOLONDOLLAR,
      (p, left) =>
        new exp.JSONExtractScalar({
          expression: left,
          path: p.parseJSONKey(),
          jsonType: "STRING",
        }),
    ],
    [
      TokenType.DCOLONPERCENT,
      (p, left) =>
        new exp.JSONExtractScalar({
          expression: left,
          path: p.parseJSONKey(),
          jsonType: "DOUBLE",
        }),
    ],
  ])
}

const LOOSE_OPERANDS: ReadonlySet<NodeKind> = new Set<NodeKind>([
  "binary",
  "not",
  "neg",
  "is",
  "alias",
  "ordered",
  "select",
])

export class SingleStoreGenerator extends MySQLGenerator {
  static override TIME_TABLE = SINGLESTORE_TIME_TABLE
  static override RESERVED_KEYWORDS = SINGLESTORE_RESERVED_KEYWORDS

  static override BYTE_START: string | null = "e'"
  static override BYTE_END: string | null = "'"

  static override TYPE_MAPPING: ReadonlyMap<string, string> = new Map<string, string>([
    ...Generator.TYPE_MAPPING,
    ["JSONB", "BSON"],
  ])

  protected override temporalSql(expression: TemporalConversion): string {
    const rule = TEMPORAL_RULES[expression.kind]
    return this.func(
      rule.name,
      expression.value,
      this.formatTime(expression, rule.target),
    )
  }

  protected override cast_sql(expression: exp.Cast): string {
    const operator = expression.safe ? "!:>" : ":>"
    const operand = this.sql(expression.expression)
    // `:>` binds tighter than every prefix and binary operator
    const value = LOOSE_OPERANDS.has(expression.expression.kind) ? `(${operand})` : operand
    return `${value} ${operator} ${this.sql(expression.to)}`
  }

  protected override jsonextractscalar_sql(
    expression: exp.JSONExtractScalar,
  ): string {
    const name =
      expression.jsonType === "STRING" ? "JSON_EXTRACT_STRING" : "JSON_EXTRACT_DOUBLE"
    return this.func(name, expression.expression, expression.path)
  }
}

export class SingleStoreDialect extends MySQLDialect {
  static override readonly dialectName: string = "singlestore"
  static override TIME_TABLE = SINGLESTORE_TIME_TABLE
  static override SUPPORTS_ORDER_BY_ALL = true
  protected static override TokenizerClass = SingleStoreTokenizer
  protected static override ParserClass = SingleStoreParser
  protected static override GeneratorClass = SingleStoreGenerator
}

// Register dialect
Dialect.register(SingleStoreDialect)
