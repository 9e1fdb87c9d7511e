import { describe, expect, it } from "vitest"

import {
  MySQLTokenizer,
  SingleStoreTokenizer,
  TokenError,
  TokenType,
  Tokenizer,
} from "../src/index.js"

function types(tokenizer: Tokenizer, sql: string): TokenType[] {
  return tokenizer.tokenize(sql).map((token) => token.tokenType)
}

describe("Tokenizer", () => {
  it("tracks line and column", () => {
    const [select, x] = new Tokenizer().tokenize("SELECT\n  x")
    expect(select).toMatchObject({ tokenType: TokenType.SELECT, line: 1, col: 0 })
    expect(x).toMatchObject({ tokenType: TokenType.VAR, text: "x", line: 2, col: 2, start: 9, end: 10 })
  })

  it("matches keywords case-insensitively and keeps the source text", () => {
    const [select] = new Tokenizer().tokenize("select")
    expect(select).toMatchObject({ tokenType: TokenType.SELECT, text: "select" })
  })

  it("reads numbers", () => {
    const tokens = new Tokenizer().tokenize("1 2.5 .5 1e10 3E-2")
    expect(tokens.map((t) => t.text)).toEqual(["1", "2.5", ".5", "1e10", "3E-2", ""])
  })

  it("unescapes doubled quotes", () => {
    const [token] = new Tokenizer().tokenize("'it''s'")
    expect(token).toMatchObject({ tokenType: TokenType.STRING, text: "it's" })
  })

  it("keeps backslashes where they are not escapes", () => {
    const [token] = new Tokenizer().tokenize("'a\\b'")
    expect(token?.text).toBe("a\\b")
  })

  it("skips comments", () => {
    expect(types(new Tokenizer(), "SELECT /* a */ 1 -- b")).toEqual([
      TokenType.SELECT,
      TokenType.NUMBER,
      TokenType.EOF,
    ])
  })

  it("raises on unterminated input", () => {
    expect(() => new Tokenizer().tokenize("'abc")).toThrow(
      "Missing closing quote at line 1, column 0",
    )
    expect(() => new Tokenizer().tokenize("SELECT /* x")).toThrow(TokenError)
    expect(() => new Tokenizer().tokenize('"abc')).toThrow(TokenError)
  })

  it("raises on characters it does not know", () => {
    expect(() => new Tokenizer().tokenize("a ` b")).toThrow('Unexpected character "`"')
  })

  it("splits operators it has no registration for", () => {
    expect(types(new Tokenizer(), "a <=> b")).toEqual([
      TokenType.VAR,
      TokenType.LTE,
      TokenType.GT,
      TokenType.VAR,
      TokenType.EOF,
    ])
  })

  it("takes extra keyword and operator registrations", () => {
    const tokenizer = new Tokenizer({
      keywords: new Map([
        ["div", TokenType.DIV],
        ["~~", TokenType.NEQ],
      ]),
    })
    expect(types(tokenizer, "a DIV b ~~ c")).toEqual([
      TokenType.VAR,
      TokenType.DIV,
      TokenType.VAR,
      TokenType.NEQ,
      TokenType.VAR,
      TokenType.EOF,
    ])
  })
})

describe("MySQLTokenizer", () => {
  it("reads the null-safe equality operator whole", () => {
    expect(types(new MySQLTokenizer(), "a <=> b")).toEqual([
      TokenType.VAR,
      TokenType.NULLSAFE_EQ,
      TokenType.VAR,
      TokenType.EOF,
    ])
  })

  it("reads backtick identifiers and double-quoted strings", () => {
    const [identifier, string] = new MySQLTokenizer().tokenize('`my col` "hi"')
    expect(identifier).toMatchObject({ tokenType: TokenType.IDENTIFIER, text: "my col" })
    expect(string).toMatchObject({ tokenType: TokenType.STRING, text: "hi" })
  })

  it("unescapes backslash sequences", () => {
    const [token] = new MySQLTokenizer().tokenize("'a\\nb\\'c\\q'")
    expect(token?.text).toBe("a\nb'cq")
  })

  it("skips hash comments", () => {
    expect(types(new MySQLTokenizer(), "SELECT 1 # note")).toEqual([
      TokenType.SELECT,
      TokenType.NUMBER,
      TokenType.EOF,
    ])
  })
})

describe("SingleStoreTokenizer", () => {
  const tokenizer = new SingleStoreTokenizer()

  it("reads cast operators whole", () => {
    expect(types(tokenizer, "a :> INT")).toEqual([
      TokenType.VAR,
      TokenType.COLON_GT,
      TokenType.VAR,
      TokenType.EOF,
    ])
    expect(types(tokenizer, "a !:> INT")).toEqual([
      TokenType.VAR,
      TokenType.NCOLON_GT,
      TokenType.VAR,
      TokenType.EOF,
    ])
  })

  it("reads JSON extraction operators whole", () => {
    expect(types(tokenizer, "doc::$k")).toEqual([
      TokenType.VAR,
      TokenType.DCOLONDOLLAR,
      TokenType.VAR,
      TokenType.EOF,
    ])
    expect(types(tokenizer, "doc::%k")).toEqual([
      TokenType.VAR,
      TokenType.DCOLONPERCENT,
      TokenType.VAR,
      TokenType.EOF,
    ])
    expect(types(tokenizer, "doc::k")).toEqual([
      TokenType.VAR,
      TokenType.DCOLON,
      TokenType.VAR,
      TokenType.EOF,
    ])
  })

  it("keeps the shorter operators", () => {
    expect(types(tokenizer, "a != b <=> c")).toEqual([
      TokenType.VAR,
      TokenType.NEQ,
      TokenType.VAR,
      TokenType.NULLSAFE_EQ,
      TokenType.VAR,
      TokenType.EOF,
    ])
  })

  it("reads type keywords", () => {
    expect(types(tokenizer, "BSON geographypoint")).toEqual([
      TokenType.JSONB,
      TokenType.GEOGRAPHYPOINT,
      TokenType.EOF,
    ])
  })

  it("reads byte strings", () => {
    const [lower, upper] = tokenizer.tokenize("e'ab' E'cd'")
    expect(lower).toMatchObject({ tokenType: TokenType.BYTE_STRING, text: "ab" })
    expect(upper).toMatchObject({ tokenType: TokenType.BYTE_STRING, text: "cd" })
  })
})
