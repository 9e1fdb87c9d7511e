import { afterEach, describe, expect, it, vi } from "vitest"

import { ErrorLevel, ParseError, Parser, exp, parseOne } from "../src/index.js"
import { expectInstance, firstProjection } from "./helpers.js"

describe("Parser", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("parses a SELECT with every clause", () => {
    const select = expectInstance(
      parseOne(
        "SELECT DISTINCT a, b AS c FROM db.t AS x WHERE a > 1 GROUP BY a HAVING a < 3 ORDER BY a DESC, b LIMIT 10",
      ),
      exp.Select,
    )
    expect(select.distinct).toBe(true)
    expect(select.expressions).toHaveLength(2)
    expect(expectInstance(select.expressions[1], exp.Alias).alias.name).toBe("c")
    expect(select.from?.db?.name).toBe("db")
    expect(select.from?.name.name).toBe("t")
    expect(select.from?.alias?.name).toBe("x")
    expect(expectInstance(select.where, exp.Binary).operator).toBe("GT")
    expect(select.groupBy).toHaveLength(1)
    expect(expectInstance(select.having, exp.Binary).operator).toBe("LT")
    expect(select.orderBy).not.toBe("ALL")
    if (select.orderBy !== "ALL") {
      expect(select.orderBy.map((o) => o.desc)).toEqual([true, false])
    }
    expect(expectInstance(select.limit, exp.Literal).value).toBe("10")
  })

  it("binds multiplication tighter than addition", () => {
    const sum = expectInstance(firstProjection("SELECT 1 + 2 * 3"), exp.Binary)
    expect(sum.operator).toBe("ADD")
    expect(expectInstance(sum.right, exp.Binary).operator).toBe("MUL")
  })

  it("binds AND tighter than OR", () => {
    const or = expectInstance(firstProjection("SELECT a OR b AND c"), exp.Binary)
    expect(or.operator).toBe("OR")
    expect(expectInstance(or.right, exp.Binary).operator).toBe("AND")
  })

  it("parses IS [NOT] NULL", () => {
    const is = expectInstance(firstProjection("SELECT a IS NOT NULL"), exp.Is)
    expect(is.negated).toBe(true)
    expect(is.target).toBeInstanceOf(exp.Null)
  })

  it("decodes literal formats of temporal functions", () => {
    const node = expectInstance(firstProjection("SELECT STR_TO_DATE(x, '%Y-%m-%d')"), exp.StrToDate)
    expect(expectInstance(node.format, exp.TimeFormat).text).toBe("%Y-%m-%d")
    expect(expectInstance(node.value, exp.Column).name.name).toBe("x")
  })

  it("passes non-literal formats through", () => {
    const node = expectInstance(firstProjection("SELECT TIME_TO_STR(x, fmt)"), exp.TimeToStr)
    expect(expectInstance(node.format, exp.Column).name.name).toBe("fmt")
  })

  it("keeps unknown functions as anonymous calls", () => {
    const node = expectInstance(firstProjection("SELECT my_func(1, 'x')"), exp.Anonymous)
    expect(node.name).toBe("my_func")
    expect(node.args).toHaveLength(2)
  })

  it("reports missing function arguments", () => {
    expect(() => parseOne("SELECT STR_TO_DATE()")).toThrow(
      /Required argument 1 of StrToDate is missing/,
    )
  })

  it("rejects ORDER BY ALL unless the dialect supports it", () => {
    expect(() => parseOne("SELECT a FROM t ORDER BY ALL")).toThrow(
      /ORDER BY ALL is not supported/,
    )
  })

  it("parses casts", () => {
    const cast = expectInstance(firstProjection("SELECT CAST(x AS VARCHAR(10))"), exp.Cast)
    expect(cast.safe).toBe(false)
    expect(cast.to.type).toBe("VARCHAR")
    expect(expectInstance(cast.to.params[0], exp.Literal).value).toBe("10")

    expect(expectInstance(firstProjection("SELECT TRY_CAST(x AS INT)"), exp.Cast).safe).toBe(true)
    expect(expectInstance(firstProjection("SELECT x::int"), exp.Cast).to.type).toBe("INT")
  })

  it("finds nodes in the tree", () => {
    const tree = parseOne("SELECT STR_TO_DATE(x, '%Y') FROM t WHERE y = 1")
    expect(tree.find(exp.StrToDate)).toBeInstanceOf(exp.StrToDate)
    expect(tree.findAll(exp.Column).map((c) => c.name.name)).toEqual(["x", "y"])
    expect(tree.find(exp.Cast)).toBeUndefined()
  })

  describe("error levels", () => {
    const sql = "SELECT 1 2"

    it("raises immediately by default", () => {
      expect(() => new Parser().parse(sql)).toThrow(ParseError)
    })

    it("collects errors under IGNORE", () => {
      const parser = new Parser({ errorLevel: ErrorLevel.IGNORE })
      expect(parser.parse(sql)).toHaveLength(1)
      expect(parser.recordedErrors.map((e) => e.description)).toEqual([
        "Invalid expression / Unexpected token",
      ])
    })

    it("logs errors under WARN", () => {
      const log = vi.spyOn(console, "error").mockImplementation(() => undefined)
      new Parser({ errorLevel: ErrorLevel.WARN }).parse(sql)
      expect(log).toHaveBeenCalledWith("Parse error: Invalid expression / Unexpected token")
    })

    it("raises once with every error under RAISE", () => {
      const parser = new Parser({ errorLevel: ErrorLevel.RAISE, maxErrors: 1 })
      let error: unknown
      try {
        parser.parse("SELECT 1 2; SELECT 3 4")
      } catch (e) {
        error = e
      }
      const parseError = expectInstance(error, ParseError)
      expect(parseError.errors).toHaveLength(2)
      expect(parseError.message).toBe(
        "Invalid expression / Unexpected token\n\n... and 1 more",
      )
    })

    it("records the position of an error", () => {
      const parser = new Parser({ errorLevel: ErrorLevel.IGNORE })
      parser.parse(sql)
      expect(parser.recordedErrors[0]).toMatchObject({
        line: 1,
        col: 9,
        highlight: "2",
        startContext: "SELECT 1 ",
      })
    })
  })
})
