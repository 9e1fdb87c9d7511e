/**
 * Token types and tokenizer for SQL parsing
 */

import { TokenError } from "./errors.js"
import { type Trie, longestMatch, newTrie } from "./trie.js"

export enum TokenType {
  // Literals
  NUMBER = "NUMBER",
  STRING = "STRING",
  BYTE_STRING = "BYTE_STRING",

  // Identifiers
  VAR = "VAR",
  IDENTIFIER = "IDENTIFIER",

  // Punctuation and operators
  L_PAREN = "L_PAREN",
  R_PAREN = "R_PAREN",
  COMMA = "COMMA",
  DOT = "DOT",
  SEMICOLON = "SEMICOLON",
  PLUS = "PLUS",
  MINUS = "MINUS",
  STAR = "STAR",
  SLASH = "SLASH",
  PERCENT = "PERCENT",
  AMP = "AMP",
  PIPE = "PIPE",
  CARET = "CARET",
  TILDE = "TILDE",
  DOLLAR = "DOLLAR",
  QMARK = "QMARK",
  AT = "AT",
  COLON = "COLON",
  EQ = "EQ",
  NEQ = "NEQ",
  NULLSAFE_EQ = "NULLSAFE_EQ",
  LT = "LT",
  LTE = "LTE",
  GT = "GT",
  GTE = "GTE",
  DPIPE = "DPIPE",
  DAMP = "DAMP",
  DCOLON = "DCOLON",
  COLON_EQ = "COLON_EQ",
  ARROW = "ARROW",
  DARROW = "DARROW",
  COLON_GT = "COLON_GT",
  NCOLON_GT = "NCOLON_GT",
  DCOLONDOLLAR = "DCOLONDOLLAR",
  DCOLONPERCENT = "DCOLONPERCENT",

  // Keywords
  ALL = "ALL",
  AND = "AND",
  AS = "AS",
  ASC = "ASC",
  BY = "BY",
  CAST = "CAST",
  DESC = "DESC",
  DISTINCT = "DISTINCT",
  DIV = "DIV",
  FALSE = "FALSE",
  FROM = "FROM",
  GROUP = "GROUP",
  HAVING = "HAVING",
  IS = "IS",
  LIMIT = "LIMIT",
  MOD = "MOD",
  NOT = "NOT",
  NULL = "NULL",
  OR = "OR",
  ORDER = "ORDER",
  SELECT = "SELECT",
  TRUE = "TRUE",
  TRY_CAST = "TRY_CAST",
  WHERE = "WHERE",
  XOR = "XOR",

  // Type keywords
  JSON = "JSON",
  JSONB = "JSONB",
  GEOGRAPHYPOINT = "GEOGRAPHYPOINT",

  EOF = "EOF",
}

export class Token {
  constructor(
    readonly tokenType: TokenType,
    readonly text: string,
    readonly line: number,
    readonly col: number,
    readonly start: number,
    readonly end: number,
  ) {}

  toString(): string {
    return `<Token ${this.tokenType} ${JSON.stringify(this.text)} ${this.line}:${this.col}>`
  }
}

export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ["ALL", TokenType.ALL],
  ["AND", TokenType.AND],
  ["AS", TokenType.AS],
  ["ASC", TokenType.ASC],
  ["BY", TokenType.BY],
  ["CAST", TokenType.CAST],
  ["DESC", TokenType.DESC],
  ["DISTINCT", TokenType.DISTINCT],
  ["FALSE", TokenType.FALSE],
  ["FROM", TokenType.FROM],
  ["GROUP", TokenType.GROUP],
  ["HAVING", TokenType.HAVING],
  ["IS", TokenType.IS],
  ["JSON", TokenType.JSON],
  ["LIMIT", TokenType.LIMIT],
  ["NOT", TokenType.NOT],
  ["NULL", TokenType.NULL],
  ["OR", TokenType.OR],
  ["ORDER", TokenType.ORDER],
  ["SELECT", TokenType.SELECT],
  ["TRUE", TokenType.TRUE],
  ["TRY_CAST", TokenType.TRY_CAST],
  ["WHERE", TokenType.WHERE],
])

export const SINGLE_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ["(", TokenType.L_PAREN],
  [")", TokenType.R_PAREN],
  [",", TokenType.COMMA],
  [";", TokenType.SEMICOLON],
  [".", TokenType.DOT],
  ["+", TokenType.PLUS],
  ["-", TokenType.MINUS],
  ["*", TokenType.STAR],
  ["/", TokenType.SLASH],
  ["%", TokenType.PERCENT],
  ["&", TokenType.AMP],
  ["|", TokenType.PIPE],
  ["^", TokenType.CARET],
  ["~", TokenType.TILDE],
  ["=", TokenType.EQ],
  ["<", TokenType.LT],
  [">", TokenType.GT],
  ["!", TokenType.NOT],
  ["?", TokenType.QMARK],
  [":", TokenType.COLON],
  ["@", TokenType.AT],
  ["$", TokenType.DOLLAR],
])

// Multi-character operators, matched longest first
export const OPERATORS: ReadonlyMap<string, TokenType> = new Map([
  ["<=", TokenType.LTE],
  [">=", TokenType.GTE],
  ["<>", TokenType.NEQ],
  ["!=", TokenType.NEQ],
  ["||", TokenType.DPIPE],
  ["&&", TokenType.DAMP],
  ["::", TokenType.DCOLON],
  [":=", TokenType.COLON_EQ],
  ["->", TokenType.ARROW],
  ["->>", TokenType.DARROW],
])

export interface TokenizerOptions {
  /** Extra keyword and operator registrations, keyed by literal text */
  keywords?: ReadonlyMap<string, TokenType>
}

export class Tokenizer {
  static KEYWORDS: ReadonlyMap<string, TokenType> = KEYWORDS
  static SINGLE_TOKENS: ReadonlyMap<string, TokenType> = SINGLE_TOKENS
  static OPERATORS: ReadonlyMap<string, TokenType> = OPERATORS
  static QUOTES: readonly string[] = ["'"]
  static IDENTIFIERS: readonly string[] = ['"']
  // [prefix, end quote]
  static BYTE_STRINGS: ReadonlyArray<readonly [string, string]> = []
  static STRING_ESCAPES: readonly string[] = ["'"]
  static UNESCAPED_SEQUENCES: Readonly<Record<string, string>> = {}
  static HASH_COMMENTS = false

  private sql = ""
  private pos = 0
  private line = 1
  private col = 0
  private tokens: Token[] = []
  private readonly keywords: Map<string, TokenType>
  private readonly operatorTrie: Trie<TokenType>
  private readonly settings: typeof Tokenizer

  constructor(options: TokenizerOptions = {}) {
    this.settings = this.constructor as typeof Tokenizer
    this.keywords = new Map()
    const operators = new Map([
      ...this.settings.SINGLE_TOKENS,
      ...this.settings.OPERATORS,
    ])

    // Registrations made of symbols are operators, the rest are words
    const registrations = [
      ...this.settings.KEYWORDS,
      ...(options.keywords ?? []),
    ]
    for (const [text, tokenType] of registrations) {
      if (/^[A-Za-z_]/.test(text)) {
        this.keywords.set(text.toUpperCase(), tokenType)
      } else {
        operators.set(text, tokenType)
      }
    }
    this.operatorTrie = newTrie(operators)
  }

  tokenize(sql: string): Token[] {
    this.sql = sql
    this.pos = 0
    this.line = 1
    this.col = 0
    this.tokens = []

    while (this.pos < this.sql.length) {
      this.scanToken()
    }

    this.tokens.push(
      new Token(TokenType.EOF, "", this.line, this.col, this.pos, this.pos),
    )
    return this.tokens
  }

  private get current(): string {
    return this.sql.charAt(this.pos)
  }

  private get peek(): string {
    return this.sql.charAt(this.pos + 1)
  }

  private advance(count = 1): void {
    for (let i = 0; i < count; i++) {
      if (this.current === "\n") {
        this.line++
        this.col = 0
      } else {
        this.col++
      }
      this.pos++
    }
  }

  private addToken(
    type: TokenType,
    text: string,
    start: number,
    line: number,
    col: number,
  ): void {
    this.tokens.push(new Token(type, text, line, col, start, this.pos))
  }

  private error(message: string, line = this.line, col = this.col): never {
    throw new TokenError(`${message} at line ${line}, column ${col}`, line, col)
  }

  private scanToken(): void {
    this.skipWhitespace()
    if (this.pos >= this.sql.length) return

    const ch = this.current
    const start = this.pos
    const line = this.line
    const col = this.col

    if (
      (ch === "-" && this.peek === "-") ||
      (ch === "#" && this.settings.HASH_COMMENTS)
    ) {
      while (this.pos < this.sql.length && this.current !== "\n") {
        this.advance()
      }
      return
    }

    if (ch === "/" && this.peek === "*") {
      const close = this.sql.indexOf("*/", this.pos + 2)
      if (close === -1) this.error("Unterminated comment", line, col)
      this.advance(close + 2 - this.pos)
      return
    }

    for (const [prefix, endQuote] of this.settings.BYTE_STRINGS) {
      if (this.sql.startsWith(prefix, this.pos)) {
        this.advance(prefix.length)
        const text = this.readQuoted(endQuote, line, col)
        this.addToken(TokenType.BYTE_STRING, text, start, line, col)
        return
      }
    }

    if (this.settings.QUOTES.includes(ch)) {
      this.advance()
      const text = this.readQuoted(ch, line, col)
      this.addToken(TokenType.STRING, text, start, line, col)
      return
    }

    if (this.settings.IDENTIFIERS.includes(ch)) {
      this.advance()
      const text = this.readIdentifier(ch, line, col)
      this.addToken(TokenType.IDENTIFIER, text, start, line, col)
      return
    }

    if (isDigit(ch) || (ch === "." && isDigit(this.peek))) {
      this.scanNumber(start, line, col)
      return
    }

    if (isWordStart(ch)) {
      while (this.pos < this.sql.length && isWordChar(this.current)) {
        this.advance()
      }
      const text = this.sql.slice(start, this.pos)
      const keyword = this.keywords.get(text.toUpperCase())
      this.addToken(keyword ?? TokenType.VAR, text, start, line, col)
      return
    }

    const match = longestMatch(this.operatorTrie, this.sql, this.pos)
    if (match) {
      this.advance(match.end - this.pos)
      this.addToken(
        match.value,
        this.sql.slice(start, this.pos),
        start,
        line,
        col,
      )
      return
    }

    this.error(`Unexpected character ${JSON.stringify(ch)}`, line, col)
  }

  private skipWhitespace(): void {
    while (this.pos < this.sql.length && /\s/.test(this.current)) {
      this.advance()
    }
  }

  private scanNumber(start: number, line: number, col: number): void {
    while (isDigit(this.current)) this.advance()
    if (this.current === "." && isDigit(this.peek)) {
      this.advance()
      while (isDigit(this.current)) this.advance()
    }
    if (
      (this.current === "e" || this.current === "E") &&
      (isDigit(this.peek) ||
        ((this.peek === "+" || this.peek === "-") &&
          isDigit(this.sql.charAt(this.pos + 2))))
    ) {
      this.advance(2)
      while (isDigit(this.current)) this.advance()
    }
    this.addToken(
      TokenType.NUMBER,
      this.sql.slice(start, this.pos),
      start,
      line,
      col,
    )
  }

  /** Reads a string body up to `endQuote`; the opening quote is consumed. */
  private readQuoted(endQuote: string, line: number, col: number): string {
    const escapes = this.settings.STRING_ESCAPES
    let text = ""

    while (true) {
      if (this.pos >= this.sql.length) {
        this.error("Missing closing quote", line, col)
      }
      const ch = this.current

      if (ch === endQuote) {
        if (escapes.includes(endQuote) && this.peek === endQuote) {
          text += endQuote
          this.advance(2)
          continue
        }
        this.advance()
        return text
      }

      if (ch === "\\" && escapes.includes("\\") && this.pos + 1 < this.sql.length) {
        const pair = this.sql.slice(this.pos, this.pos + 2)
        text += this.settings.UNESCAPED_SEQUENCES[pair] ?? this.peek
        this.advance(2)
        continue
      }

      text += ch
      this.advance()
    }
  }

  private readIdentifier(quote: string, line: number, col: number): string {
    let text = ""
    while (true) {
      if (this.pos >= this.sql.length) {
        this.error("Missing closing identifier quote", line, col)
      }
      if (this.current === quote) {
        if (this.peek === quote) {
          text += quote
          this.advance(2)
          continue
        }
        this.advance()
        return text
      }
      text += this.current
      this.advance()
    }
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9"
}

function isWordStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch) || ch.charCodeAt(0) > 127
}

function isWordChar(ch: string): boolean {
  return /[A-Za-z0-9_$]/.test(ch) || ch.charCodeAt(0) > 127
}
