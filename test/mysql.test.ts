import { describe, expect, it } from "vitest"

import { ParseError, exp, transpileOne } from "../src/index.js"
import { expectInstance, firstProjection } from "./helpers.js"

function mysql(sql: string): string {
  return transpileOne(sql, { read: "mysql", write: "mysql" })
}

describe("MySQL", () => {
  it("keeps its own date formats", () => {
    expect(mysql("SELECT DATE_FORMAT(created_at, '%Y-%m-%d %H:%i:%s') FROM t")).toBe(
      "SELECT DATE_FORMAT(created_at, '%Y-%m-%d %H:%i:%s') FROM t",
    )
    expect(mysql("SELECT STR_TO_DATE(x, '%M %e, %Y')")).toBe("SELECT STR_TO_DATE(x, '%M %e, %Y')")
  })

  it("writes the later of two equivalent specifiers", () => {
    expect(mysql("SELECT DATE_FORMAT(x, '%I:%S')")).toBe("SELECT DATE_FORMAT(x, '%h:%s')")
  })

  it("decodes specifiers into the canonical vocabulary", () => {
    const node = expectInstance(
      firstProjection("SELECT DATE_FORMAT(x, '%M %e %i %W')", "mysql"),
      exp.TimeToStr,
    )
    expect(expectInstance(node.format, exp.TimeFormat).text).toBe("%B %-d %M %A")
  })

  it("parses UNIX_TIMESTAMP with and without arguments", () => {
    expect(firstProjection("SELECT UNIX_TIMESTAMP()", "mysql")).toBeInstanceOf(exp.UnixSeconds)
    expect(mysql("SELECT UNIX_TIMESTAMP(), UNIX_TIMESTAMP(x), FROM_UNIXTIME(y, '%Y')")).toBe(
      "SELECT UNIX_TIMESTAMP(), UNIX_TIMESTAMP(x), FROM_UNIXTIME(y, '%Y')",
    )
  })

  it("quotes identifiers with backticks", () => {
    expect(mysql("SELECT `my col`, `a` FROM t")).toBe("SELECT `my col`, `a` FROM t")
  })

  it("reads its operators", () => {
    expect(mysql("SELECT a <=> b, 7 DIV 2, 7 MOD 2, a XOR b")).toBe(
      "SELECT a <=> b, 7 DIV 2, 7 % 2, a XOR b",
    )
  })

  it("escapes strings with backslashes", () => {
    expect(mysql("SELECT 'a\\nb', \"it's\"")).toBe("SELECT 'a\\nb', 'it''s'")
  })

  it("maps cast targets", () => {
    expect(mysql("SELECT CAST(x AS TIMESTAMP), CAST(y AS INT), TRY_CAST(z AS TEXT)")).toBe(
      "SELECT CAST(x AS DATETIME), CAST(y AS SIGNED), CAST(z AS CHAR)",
    )
  })

  it("rejects ORDER BY ALL", () => {
    expect(() => mysql("SELECT a FROM t ORDER BY ALL")).toThrow(ParseError)
  })

  it("transpiles from the canonical dialect", () => {
    expect(
      transpileOne("SELECT TIME_TO_STR(x, '%Y-%m-%d %H:%M:%S')", { write: "mysql" }),
    ).toBe("SELECT DATE_FORMAT(x, '%Y-%m-%d %H:%i:%s')")
    expect(
      transpileOne("SELECT TS_OR_DS_TO_DATE(x), TS_OR_DS_TO_DATE(y, '%d.%m.%Y')", {
        write: "mysql",
      }),
    ).toBe("SELECT DATE(x), STR_TO_DATE(y, '%d.%m.%Y')")
  })

  it("transpiles to the canonical dialect", () => {
    expect(
      transpileOne("SELECT STR_TO_DATE(x, '%d/%m/%Y %h:%i %p')", { read: "mysql" }),
    ).toBe("SELECT STR_TO_DATE(x, '%d/%m/%Y %I:%M %p')")
    expect(transpileOne("SELECT DATE_FORMAT(x, '%M %e')", { read: "mysql" })).toBe(
      "SELECT TIME_TO_STR(x, '%B %-d')",
    )
    expect(transpileOne("SELECT UNIX_TIMESTAMP()", { read: "mysql" })).toBe(
      "SELECT UNIX_SECONDS()",
    )
  })
})
