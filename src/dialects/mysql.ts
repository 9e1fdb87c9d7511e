/**
 * MySQL dialect
 */

import { Dialect } from "../dialect.js"
import * as exp from "../expressions.js"
import type { TemporalConversion } from "../expressions.js"
import { Generator, type Transforms } from "../generator.js"
import {
  type FunctionBuilder,
  Parser,
  buildFormattedTime,
  seqGet,
} from "../parser.js"
import { DirectiveTable } from "../time.js"
import { OPERATORS, TokenType, Tokenizer } from "../tokens.js"

/**
 * MySQL `%` specifiers. Most share the canonical spelling; the rest are
 * renamed. Where two specifiers mean the same thing the later one is written
 * back (`%h` for `%I`, `%s` for `%S`).
 */
export const MYSQL_TIME_TABLE = new DirectiveTable("mysql", [
  ["%%", "%%"],
  ["%a", "%a"],
  ["%b", "%b"],
  ["%d", "%d"],
  ["%f", "%f"],
  ["%H", "%H"],
  ["%I", "%I"],
  ["%j", "%j"],
  ["%m", "%m"],
  ["%p", "%p"],
  ["%S", "%S"],
  ["%U", "%U"],
  ["%w", "%w"],
  ["%Y", "%Y"],
  ["%y", "%y"],
  ["%M", "%B"],
  ["%c", "%-m"],
  ["%e", "%-d"],
  ["%h", "%I"],
  ["%i", "%M"],
  ["%s", "%S"],
  ["%u", "%W"],
  ["%k", "%-H"],
  ["%l", "%-I"],
  ["%W", "%A"],
])

// \0 \b \n \r \t \Z and \\ are the escapes MySQL string literals understand
const UNESCAPED_SEQUENCES: Readonly<Record<string, string>> = {
  "\\0": "\0",
  "\\b": "\b",
  "\\n": "\n",
  "\\r": "\r",
  "\\t": "\t",
  "\\Z": "\x1a",
  "\\\\": "\\",
}

const ESCAPED_SEQUENCES: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(UNESCAPED_SEQUENCES).map(([escaped, raw]) => [raw, escaped]),
)

export class MySQLTokenizer extends Tokenizer {
  static override QUOTES: readonly string[] = ["'", '"']
  static override IDENTIFIERS: readonly string[] = ["`"]
  static override STRING_ESCAPES: readonly string[] = ["'", '"', "\\"]
  static override UNESCAPED_SEQUENCES = UNESCAPED_SEQUENCES
  static override HASH_COMMENTS = true

  static override KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ...Tokenizer.KEYWORDS,
    ["DIV", TokenType.DIV],
    ["MOD", TokenType.MOD],
    ["XOR", TokenType.XOR],
  ])

  static override OPERATORS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
    ...OPERATORS,
    ["<=>", TokenType.NULLSAFE_EQ],
  ])
}

export class MySQLParser extends Parser {
  static override FUNCTIONS: ReadonlyMap<string, FunctionBuilder> = new Map<
    string,
    FunctionBuilder
  >([
    ...Parser.FUNCTIONS,
    ["STR_TO_DATE", buildFormattedTime(exp.StrToDate)],
    ["DATE_FORMAT", buildFormattedTime(exp.TimeToStr)],
    ["FROM_UNIXTIME", buildFormattedTime(exp.UnixToStr)],
    [
      "UNIX_TIMESTAMP",
      (args) => {
        const value = seqGet(args, 0)
        if (!value) {
          return new exp.UnixSeconds()
        }
        return new exp.StrToUnix({
          value,
          format: MySQLDialect.formatTime(seqGet(args, 1)),
        })
      },
    ],
  ])
}

export class MySQLGenerator extends Generator {
  static override TIME_TABLE = MYSQL_TIME_TABLE
  static override IDENTIFIER_START = "`"
  static override IDENTIFIER_END = "`"
  static override STRINGS_SUPPORT_ESCAPED_SEQUENCES = true
  static override ESCAPED_SEQUENCES = ESCAPED_SEQUENCES

  static override TYPE_MAPPING: ReadonlyMap<string, string> = new Map<string, string>([
    ...Generator.TYPE_MAPPING,
    ["TIMESTAMP", "DATETIME"],
    ["JSONB", "JSON"],
  ])

  static override TRANSFORMS: Transforms = {
    ...Generator.TRANSFORMS,
    unixseconds: (g) => g.func("UNIX_TIMESTAMP"),
  }

  // CAST targets MySQL only accepts under another name
  static CAST_MAPPING: Readonly<Record<string, string>> = {
    BIGINT: "SIGNED",
    INT: "SIGNED",
    TEXT: "CHAR",
    VARCHAR: "CHAR",
  }

  protected override temporalSql(expression: TemporalConversion): string {
    const value = expression.value
    switch (expression.kind) {
      case "strtodate":
      case "strtotime":
        return this.func("STR_TO_DATE", value, this.formatTime(expression))
      case "tsordstodate":
        return expression.format
          ? this.func("STR_TO_DATE", value, this.formatTime(expression))
          : this.func("DATE", value)
      case "timetostr":
      case "tochar":
        return this.func("DATE_FORMAT", value, this.formatTime(expression))
      case "unixtostr":
        return this.func("FROM_UNIXTIME", value, this.formatTime(expression))
      case "strtounix":
        return this.func("UNIX_TIMESTAMP", value, this.formatTime(expression))
    }
  }

  protected override binaryOperator(operator: exp.BinaryOperator): string {
    return operator === "NULLSAFE_EQ" ? "<=>" : super.binaryOperator(operator)
  }

  protected override cast_sql(expression: exp.Cast): string {
    // MySQL has no TRY_CAST
    const mapped = MySQLGenerator.CAST_MAPPING[expression.to.type]
    const to = mapped ? exp.DataType.build(mapped) : expression.to
    return `CAST(${this.sql(expression.expression)} AS ${this.sql(to)})`
  }

  protected override jsonextractscalar_sql(
    expression: exp.JSONExtractScalar,
  ): string {
    const path =
      expression.path instanceof exp.Literal && expression.path.isString
        ? exp.Literal.string(`$.${expression.path.value}`)
        : expression.path
    const extract = this.func("JSON_EXTRACT", expression.expression, path)
    if (expression.jsonType === "STRING") {
      return this.func("JSON_UNQUOTE", extract)
    }
    return `CAST(${extract} AS DOUBLE)`
  }
}

export class MySQLDialect extends Dialect {
  static override readonly dialectName: string = "mysql"
  static override TIME_TABLE = MYSQL_TIME_TABLE
  protected static override TokenizerClass = MySQLTokenizer
  protected static override ParserClass = MySQLParser
  protected static override GeneratorClass = MySQLGenerator
}

// Register dialect
Dialect.register(MySQLDialect)
