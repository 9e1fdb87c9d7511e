/**
 * SQL parser - turns tokens into an AST
 */

import { ErrorLevel, ParseError, type ParseErrorDetail } from "./errors.js"
import * as exp from "./expressions.js"
import type { Node } from "./expressions.js"
import { type DirectiveTable, STRFTIME, decode } from "./time.js"
import { Token, TokenType, Tokenizer } from "./tokens.js"

/**
 * The dialect settings the parser consults. Dialect implements this through
 * its static configuration.
 */
export interface DialectSettings {
  readonly name: string
  readonly TIME_TABLE: DirectiveTable
  readonly SUPPORTS_ORDER_BY_ALL: boolean
}

export type FunctionBuilder = (args: Node[], dialect: DialectSettings) => Node

export type ColumnOperator = (parser: Parser, left: Node) => Node

export interface ParserOptions {
  tokenizer?: Tokenizer
  dialect?: DialectSettings
  errorLevel?: ErrorLevel
  maxErrors?: number
}

const BASE_DIALECT: DialectSettings = {
  name: "",
  TIME_TABLE: STRFTIME,
  SUPPORTS_ORDER_BY_ALL: false,
}

/**
 * Missing or malformed function arguments. Caught by the parser and routed
 * through its error level.
 */
export class FunctionArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "FunctionArgumentError"
  }
}

export function seqGet<T>(args: readonly T[], index: number): T | undefined {
  return args[index]
}

export function requireArg(args: readonly Node[], index: number, name: string): Node {
  const arg = args[index]
  if (!arg) {
    throw new FunctionArgumentError(
      `Required argument ${index + 1} of ${name} is missing`,
    )
  }
  return arg
}

/**
 * Decodes a literal format argument into a TimeFormat. Anything that is not
 * a string literal is returned unchanged, since only literal formats can be
 * transcoded.
 */
export function formatTimeArg(
  arg: Node | undefined,
  table: DirectiveTable,
): Node | undefined {
  if (arg instanceof exp.Literal && arg.isString) {
    return new exp.TimeFormat(decode(arg.value, table))
  }
  return arg
}

/**
 * Builds a temporal conversion from `(value, format)` arguments. The format is
 * decoded with `table`, or with the parsing dialect's own table when omitted.
 */
export function buildFormattedTime(
  cls: exp.TemporalClass,
  table?: DirectiveTable,
): FunctionBuilder {
  return (args, dialect) =>
    new cls({
      value: requireArg(args, 0, cls.name),
      format: formatTimeArg(args[1], table ?? dialect.TIME_TABLE),
    })
}

const COMPARISON_OPERATORS: ReadonlyMap<TokenType, exp.BinaryOperator> = new Map([
  [TokenType.EQ, "EQ"],
  [TokenType.NEQ, "NEQ"],
  [TokenType.NULLSAFE_EQ, "NULLSAFE_EQ"],
  [TokenType.GT, "GT"],
  [TokenType.GTE, "GTE"],
  [TokenType.LT, "LT"],
  [TokenType.LTE, "LTE"],
])

const TERM_OPERATORS: ReadonlyMap<TokenType, exp.BinaryOperator> = new Map([
  [TokenType.PLUS, "ADD"],
  [TokenType.MINUS, "SUB"],
])

const FACTOR_OPERATORS: ReadonlyMap<TokenType, exp.BinaryOperator> = new Map([
  [TokenType.STAR, "MUL"],
  [TokenType.SLASH, "DIV"],
  [TokenType.PERCENT, "MOD"],
  [TokenType.MOD, "MOD"],
  [TokenType.DIV, "INTDIV"],
])

const TYPE_TOKENS: ReadonlyMap<TokenType, string> = new Map([
  [TokenType.JSON, exp.DataType.Type.JSON],
  [TokenType.JSONB, exp.DataType.Type.JSONB],
  [TokenType.GEOGRAPHYPOINT, exp.DataType.Type.GEOGRAPHYPOINT],
])

const IDENTIFIER_TOKENS: ReadonlySet<TokenType> = new Set([
  TokenType.VAR,
  TokenType.IDENTIFIER,
])

export class Parser {
  static FUNCTIONS: ReadonlyMap<string, FunctionBuilder> = new Map([
    ["STR_TO_DATE", buildFormattedTime(exp.StrToDate)],
    ["STR_TO_TIME", buildFormattedTime(exp.StrToTime)],
    ["TS_OR_DS_TO_DATE", buildFormattedTime(exp.TsOrDsToDate)],
    ["TIME_TO_STR", buildFormattedTime(exp.TimeToStr)],
    ["TO_CHAR", buildFormattedTime(exp.ToChar)],
    ["UNIX_TO_STR", buildFormattedTime(exp.UnixToStr)],
    ["STR_TO_UNIX", buildFormattedTime(exp.StrToUnix)],
  ])

  static COLUMN_OPERATORS: ReadonlyMap<TokenType, ColumnOperator> = new Map<
    TokenType,
    ColumnOperator
  >([
    [
      TokenType.DCOLON,
      (p, left) => new exp.Cast({ expression: left, to: p.parseType() }),
    ],
  ])

  protected readonly tokenizer: Tokenizer
  protected readonly functions: ReadonlyMap<string, FunctionBuilder>
  protected readonly columnOperators: ReadonlyMap<TokenType, ColumnOperator>
  protected readonly dialect: DialectSettings

  // Error handling
  protected readonly errorLevel: ErrorLevel
  protected readonly maxErrors: number
  protected errors: ParseErrorDetail[] = []
  protected errorMessageContext = 100

  protected sql = ""
  protected tokens: Token[] = []
  protected index = 0

  constructor(options: ParserOptions = {}) {
    const cls = this.constructor as typeof Parser
    this.tokenizer = options.tokenizer ?? new Tokenizer()
    this.dialect = options.dialect ?? BASE_DIALECT
    this.errorLevel = options.errorLevel ?? ErrorLevel.IMMEDIATE
    this.maxErrors = options.maxErrors ?? 3
    this.functions = cls.FUNCTIONS
    this.columnOperators = cls.COLUMN_OPERATORS
  }

  parse(sql: string): Node[] {
    this.sql = sql
    this.errors = []
    this.tokens = this.tokenizer.tokenize(sql)
    this.index = 0

    const expressions: Node[] = []

    while (!this.isEnd()) {
      if (this.match(TokenType.SEMICOLON)) continue

      expressions.push(this.parseStatement())

      if (!this.isEnd() && !this.match(TokenType.SEMICOLON)) {
        this.raiseError("Invalid expression / Unexpected token")
        while (!this.isEnd() && !this.match(TokenType.SEMICOLON)) {
          this.advance()
        }
      }
    }

    this.checkErrors()
    return expressions
  }

  parseOne(sql: string): Node {
    const expressions = this.parse(sql)
    const [first] = expressions
    if (expressions.length !== 1 || !first) {
      throw new ParseError(
        `Expected exactly one expression, got ${expressions.length}`,
      )
    }
    return first
  }

  /** Errors recorded by the last parse under the WARN and IGNORE levels */
  get recordedErrors(): readonly ParseErrorDetail[] {
    return this.errors
  }

  /**
   * Logs or raises any found errors, depending on the chosen error level setting.
   */
  protected checkErrors(): void {
    if (this.errorLevel === ErrorLevel.WARN) {
      for (const error of this.errors) {
        console.error(`Parse error: ${error.description}`)
      }
    } else if (this.errorLevel === ErrorLevel.RAISE && this.errors.length > 0) {
      const messages = this.errors
        .slice(0, this.maxErrors)
        .map((e) => e.description)
      const remaining = this.errors.length - this.maxErrors
      if (remaining > 0) {
        messages.push(`... and ${remaining} more`)
      }
      throw new ParseError(messages.join("\n\n"), this.errors)
    }
  }

  /**
   * Appends an error in the list of recorded errors or raises it, depending on the chosen
   * error level setting.
   */
  protected raiseError(message: string, token: Token = this.current): void {
    const { line, col, start, end } = token

    const contextStart = Math.max(0, start - this.errorMessageContext)
    const contextEnd = Math.min(this.sql.length, end + this.errorMessageContext)

    const startContext = this.sql.slice(contextStart, start)
    const highlight = this.sql.slice(start, end)
    const endContext = this.sql.slice(end, contextEnd)

    const errorDetail: ParseErrorDetail = {
      description: message,
      line,
      col,
      startContext,
      highlight,
      endContext,
    }

    if (this.errorLevel === ErrorLevel.IMMEDIATE) {
      throw new ParseError(
        `${message}. Line ${line}, Col: ${col}.\n  ${startContext}${highlight}${endContext}`,
        [errorDetail],
      )
    }

    this.errors.push(errorDetail)
  }

  // ==================== Token navigation ====================

  protected get current(): Token {
    return this.peek(0)
  }

  protected peek(offset = 1): Token {
    const token = this.tokens[this.index + offset] ?? this.tokens[this.tokens.length - 1]
    return token ?? new Token(TokenType.EOF, "", 1, 0, 0, 0)
  }

  protected isEnd(): boolean {
    return this.current.tokenType === TokenType.EOF
  }

  protected advance(): Token {
    const token = this.current
    if (!this.isEnd()) this.index++
    return token
  }

  protected match(...types: TokenType[]): Token | undefined {
    if (types.includes(this.current.tokenType)) {
      return this.advance()
    }
    return undefined
  }

  protected expect(type: TokenType): Token {
    const token = this.match(type)
    if (token) return token
    this.raiseError(`Expecting ${type}`)
    return this.current
  }

  // ==================== Statements ====================

  protected parseStatement(): Node {
    if (this.match(TokenType.SELECT)) {
      return this.parseSelect()
    }
    return this.parseExpression()
  }

  protected parseSelect(): exp.Select {
    const distinct = !!this.match(TokenType.DISTINCT)
    const expressions = this.parseCSV(() => this.parseProjection())

    const from = this.match(TokenType.FROM) ? this.parseTable() : undefined
    const where = this.match(TokenType.WHERE) ? this.parseExpression() : undefined

    let groupBy: Node[] = []
    if (this.match(TokenType.GROUP)) {
      this.expect(TokenType.BY)
      groupBy = this.parseCSV(() => this.parseExpression())
    }

    const having = this.match(TokenType.HAVING) ? this.parseExpression() : undefined

    let orderBy: exp.Ordered[] | "ALL" = []
    if (this.match(TokenType.ORDER)) {
      this.expect(TokenType.BY)
      orderBy = this.parseOrderBy()
    }

    const limit = this.match(TokenType.LIMIT) ? this.parseExpression() : undefined

    return new exp.Select({
      expressions,
      distinct,
      ...(from ? { from } : {}),
      ...(where ? { where } : {}),
      groupBy,
      ...(having ? { having } : {}),
      orderBy,
      ...(limit ? { limit } : {}),
    })
  }

  protected parseOrderBy(): exp.Ordered[] | "ALL" {
    if (this.current.tokenType === TokenType.ALL) {
      const token = this.advance()
      if (!this.dialect.SUPPORTS_ORDER_BY_ALL) {
        this.raiseError("ORDER BY ALL is not supported", token)
        return []
      }
      return "ALL"
    }

    return this.parseCSV(() => {
      const expression = this.parseExpression()
      if (this.match(TokenType.DESC)) return new exp.Ordered(expression, true)
      this.match(TokenType.ASC)
      return new exp.Ordered(expression)
    })
  }

  protected parseProjection(): Node {
    if (this.match(TokenType.STAR)) {
      return new exp.Star()
    }
    const expression = this.parseExpression()
    const alias = this.parseAlias()
    return alias ? new exp.Alias(expression, alias) : expression
  }

  protected parseAlias(): exp.Identifier | undefined {
    const explicit = !!this.match(TokenType.AS)
    const token = this.current
    if (IDENTIFIER_TOKENS.has(token.tokenType) || (explicit && token.tokenType === TokenType.STRING)) {
      this.advance()
      return new exp.Identifier(token.text, token.tokenType !== TokenType.VAR)
    }
    if (explicit) {
      this.raiseError("Expecting alias")
    }
    return undefined
  }

  protected parseTable(): exp.Table {
    const first = this.parseIdentifier()
    let name = first
    let db: exp.Identifier | undefined
    if (this.match(TokenType.DOT)) {
      db = first
      name = this.parseIdentifier()
    }
    const alias = this.parseAlias()
    return new exp.Table({
      name,
      ...(db ? { db } : {}),
      ...(alias ? { alias } : {}),
    })
  }

  protected parseIdentifier(): exp.Identifier {
    const token = this.current
    if (IDENTIFIER_TOKENS.has(token.tokenType)) {
      this.advance()
      return new exp.Identifier(token.text, token.tokenType === TokenType.IDENTIFIER)
    }
    this.raiseError("Expecting identifier")
    this.advance()
    return new exp.Identifier(token.text)
  }

  // ==================== Expressions ====================

  parseExpression(): Node {
    return this.parseDisjunction()
  }

  protected parseDisjunction(): Node {
    let left = this.parseExclusive()
    while (this.match(TokenType.OR)) {
      left = new exp.Binary("OR", left, this.parseExclusive())
    }
    return left
  }

  protected parseExclusive(): Node {
    let left = this.parseConjunction()
    while (this.match(TokenType.XOR)) {
      left = new exp.Binary("XOR", left, this.parseConjunction())
    }
    return left
  }

  protected parseConjunction(): Node {
    let left = this.parseNegation()
    while (this.match(TokenType.AND, TokenType.DAMP)) {
      left = new exp.Binary("AND", left, this.parseNegation())
    }
    return left
  }

  protected parseNegation(): Node {
    if (this.match(TokenType.NOT)) {
      return new exp.Not(this.parseNegation())
    }
    return this.parseComparison()
  }

  protected parseComparison(): Node {
    let left = this.parseConcat()
    while (true) {
      const operator = COMPARISON_OPERATORS.get(this.current.tokenType)
      if (operator) {
        this.advance()
        left = new exp.Binary(operator, left, this.parseConcat())
        continue
      }
      if (this.match(TokenType.IS)) {
        const negated = !!this.match(TokenType.NOT)
        left = new exp.Is(left, this.parseIsTarget(), negated)
        continue
      }
      return left
    }
  }

  private parseIsTarget(): exp.Null | exp.Boolean {
    if (this.match(TokenType.NULL)) return new exp.Null()
    if (this.match(TokenType.TRUE)) return new exp.Boolean(true)
    if (this.match(TokenType.FALSE)) return new exp.Boolean(false)
    this.raiseError("Expected NULL, TRUE, or FALSE after IS")
    return new exp.Null()
  }

  protected parseConcat(): Node {
    let left = this.parseTerm()
    while (this.match(TokenType.DPIPE)) {
      left = new exp.Binary("DPIPE", left, this.parseTerm())
    }
    return left
  }

  protected parseTerm(): Node {
    let left = this.parseFactor()
    while (true) {
      const operator = TERM_OPERATORS.get(this.current.tokenType)
      if (!operator) return left
      this.advance()
      left = new exp.Binary(operator, left, this.parseFactor())
    }
  }

  protected parseFactor(): Node {
    let left = this.parseUnary()
    while (true) {
      const operator = FACTOR_OPERATORS.get(this.current.tokenType)
      if (!operator) return left
      this.advance()
      left = new exp.Binary(operator, left, this.parseUnary())
    }
  }

  protected parseUnary(): Node {
    if (this.match(TokenType.MINUS)) {
      return new exp.Neg(this.parseUnary())
    }
    if (this.match(TokenType.PLUS)) {
      return this.parseUnary()
    }
    return this.parseColumnOps(this.parsePrimary())
  }

  protected parseColumnOps(expression: Node): Node {
    let result = expression
    while (true) {
      const operator = this.columnOperators.get(this.current.tokenType)
      if (!operator) return result
      this.advance()
      result = operator(this, result)
    }
  }

  protected parsePrimary(): Node {
    const token = this.current

    switch (token.tokenType) {
      case TokenType.NUMBER:
        this.advance()
        return exp.Literal.number(token.text)
      case TokenType.STRING:
        this.advance()
        return exp.Literal.string(token.text)
      case TokenType.BYTE_STRING:
        this.advance()
        return new exp.ByteString(token.text)
      case TokenType.NULL:
        this.advance()
        return new exp.Null()
      case TokenType.TRUE:
        this.advance()
        return new exp.Boolean(true)
      case TokenType.FALSE:
        this.advance()
        return new exp.Boolean(false)
      case TokenType.STAR:
        this.advance()
        return new exp.Star()
      case TokenType.L_PAREN: {
        this.advance()
        const inner = this.match(TokenType.SELECT)
          ? this.parseSelect()
          : this.parseExpression()
        this.expect(TokenType.R_PAREN)
        return new exp.Paren(inner)
      }
      case TokenType.CAST:
      case TokenType.TRY_CAST: {
        this.advance()
        return this.parseCast(token.tokenType === TokenType.TRY_CAST)
      }
      case TokenType.VAR:
      case TokenType.IDENTIFIER:
        this.advance()
        if (
          token.tokenType === TokenType.VAR &&
          this.current.tokenType === TokenType.L_PAREN
        ) {
          this.advance()
          return this.parseFunction(token.text)
        }
        return this.parseColumn(token)
      default:
        this.raiseError(`Unexpected token ${token.text || token.tokenType}`)
        this.advance()
        return new exp.Null()
    }
  }

  protected parseColumn(first: Token): exp.Column {
    const firstIdentifier = new exp.Identifier(
      first.text,
      first.tokenType === TokenType.IDENTIFIER,
    )
    if (this.match(TokenType.DOT)) {
      if (this.match(TokenType.STAR)) {
        this.raiseError("Qualified star is not supported")
      }
      return new exp.Column({ table: firstIdentifier, name: this.parseIdentifier() })
    }
    return new exp.Column({ name: firstIdentifier })
  }

  protected parseCast(safe: boolean): exp.Cast {
    this.expect(TokenType.L_PAREN)
    const expression = this.parseExpression()
    this.expect(TokenType.AS)
    const to = this.parseType()
    this.expect(TokenType.R_PAREN)
    return new exp.Cast({ expression, to, safe })
  }

  parseType(): exp.DataType {
    const token = this.current
    const typeName = TYPE_TOKENS.get(token.tokenType)
    let name: string
    if (typeName) {
      name = typeName
    } else if (token.tokenType === TokenType.VAR) {
      name = token.text.toUpperCase()
    } else {
      this.raiseError("Expecting data type")
      return exp.DataType.build(exp.DataType.Type.TEXT)
    }
    this.advance()

    let params: Node[] = []
    if (this.match(TokenType.L_PAREN)) {
      params = this.parseCSV(() => this.parsePrimary())
      this.expect(TokenType.R_PAREN)
    }
    return exp.DataType.build(name, params)
  }

  protected parseFunction(name: string): Node {
    const args =
      this.current.tokenType === TokenType.R_PAREN
        ? []
        : this.parseCSV(() => this.parseExpression())
    this.expect(TokenType.R_PAREN)
    return this.buildFunction(name, args)
  }

  protected buildFunction(name: string, args: Node[]): Node {
    const builder = this.functions.get(name.toUpperCase())
    if (!builder) {
      return new exp.Anonymous(name, args)
    }

    try {
      return builder(args, this.dialect)
    } catch (error) {
      if (error instanceof FunctionArgumentError) {
        this.raiseError(error.message, this.peek(-1))
        return new exp.Anonymous(name, args)
      }
      throw error
    }
  }

  /** Parses the identifier-like path after a JSON extraction operator */
  parseJSONKey(): Node {
    const token = this.current
    if (
      IDENTIFIER_TOKENS.has(token.tokenType) ||
      token.tokenType === TokenType.STRING ||
      token.tokenType === TokenType.NUMBER
    ) {
      this.advance()
      return exp.Literal.string(token.text)
    }
    this.raiseError("Expecting JSON key")
    return exp.Literal.string("")
  }

  protected parseCSV<T>(parseMethod: () => T): T[] {
    const items = [parseMethod()]
    while (this.match(TokenType.COMMA)) {
      items.push(parseMethod())
    }
    return items
  }
}
