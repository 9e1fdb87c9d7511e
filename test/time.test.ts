import { describe, expect, it } from "vitest"

import {
  DirectiveTableError,
  MYSQL_TIME_TABLE,
  SINGLESTORE_TIME_TABLE,
  STRFTIME,
  UnmappedDirectiveError,
  canonicalText,
  decode,
  encode,
  formatTime,
} from "../src/index.js"
import { DirectiveTable, directiveTrie, directivesOf, lexFormat } from "../src/time.js"
import { newTrie } from "../src/trie.js"

const YMD = new DirectiveTable("ymd", [
  ["YYYY", "%Y"],
  ["MM", "%m"],
  ["DD", "%d"],
])

describe("DirectiveTable", () => {
  it("looks tokens up in both directions", () => {
    expect(SINGLESTORE_TIME_TABLE.reverse("HH24")).toBe("%H")
    expect(SINGLESTORE_TIME_TABLE.forward("%H")).toBe("HH24")
    expect(SINGLESTORE_TIME_TABLE.reverse("hh24")).toBeUndefined()
    expect(SINGLESTORE_TIME_TABLE.forward("%z")).toBeUndefined()
  })

  it("writes back the last token registered for a directive", () => {
    expect(SINGLESTORE_TIME_TABLE.forward("%I")).toBe("HH12")
    expect(SINGLESTORE_TIME_TABLE.forward("%y")).toBe("YY")
    expect(MYSQL_TIME_TABLE.forward("%I")).toBe("%h")
    expect(MYSQL_TIME_TABLE.forward("%S")).toBe("%s")
  })

  it("lets an inverse list pick the written token", () => {
    const table = new DirectiveTable(
      "years",
      [
        ["RR", "%y"],
        ["YY", "%y"],
      ],
      { inverse: [["%y", "RR"]] },
    )
    expect(table.forward("%y")).toBe("RR")
  })

  it("rejects an inverse entry that does not decode back", () => {
    expect(
      () => new DirectiveTable("years", [["YY", "%y"]], { inverse: [["%y", "RR"]] }),
    ).toThrow(DirectiveTableError)
  })

  it("rejects a token mapped to two directives", () => {
    expect(
      () =>
        new DirectiveTable("broken", [
          ["MM", "%m"],
          ["MM", "%M"],
        ]),
    ).toThrow("broken: token MM is mapped to both %m and %M")
  })

  it("accepts a pair registered twice", () => {
    const table = new DirectiveTable("twice", [
      ["MM", "%m"],
      ["MM", "%m"],
    ])
    expect(table.size).toBe(1)
  })

  it("rejects empty tokens and directives", () => {
    expect(() => new DirectiveTable("empty", [["", "%m"]])).toThrow(DirectiveTableError)
    expect(() => new DirectiveTable("empty", [["MM", ""]])).toThrow(DirectiveTableError)
  })

  it("is frozen", () => {
    expect(Object.isFrozen(SINGLESTORE_TIME_TABLE)).toBe(true)
  })

  it("lists its tokens and directives", () => {
    expect(YMD.tokens()).toEqual(["YYYY", "MM", "DD"])
    expect(YMD.directives()).toEqual(["%Y", "%m", "%d"])
    expect(YMD.has("MM")).toBe(true)
    expect(YMD.covers("%m")).toBe(true)
    expect(YMD.covers("%H")).toBe(false)
  })

  it("asserts coverage of the directives a rule needs", () => {
    expect(() => MYSQL_TIME_TABLE.assertCovers(YMD.directives(), "DATE_FORMAT")).not.toThrow()
    expect(() =>
      MYSQL_TIME_TABLE.assertCovers(SINGLESTORE_TIME_TABLE.directives(), "TO_CHAR"),
    ).toThrow("TO_CHAR: mysql has no token for %u")
  })
})

describe("decode", () => {
  it("keeps literal fragments between directives", () => {
    expect(decode("YYYY-MM-DD", YMD)).toEqual([
      { kind: "directive", directive: "%Y" },
      { kind: "literal", text: "-" },
      { kind: "directive", directive: "%m" },
      { kind: "literal", text: "-" },
      { kind: "directive", directive: "%d" },
    ])
  })

  it("prefers the longest token", () => {
    expect(decode("HH24", SINGLESTORE_TIME_TABLE)).toEqual([
      { kind: "directive", directive: "%H" },
    ])
    expect(decode("MONTH", SINGLESTORE_TIME_TABLE)).toEqual([
      { kind: "directive", directive: "%B" },
    ])
    expect(decode("DD", SINGLESTORE_TIME_TABLE)).toEqual([
      { kind: "directive", directive: "%d" },
    ])
  })

  it("coalesces adjacent literal characters", () => {
    expect(decode("DD of MONTH", SINGLESTORE_TIME_TABLE)).toEqual([
      { kind: "directive", directive: "%d" },
      { kind: "literal", text: " of " },
      { kind: "directive", directive: "%B" },
    ])
  })

  it("never fails", () => {
    expect(decode("", SINGLESTORE_TIME_TABLE)).toEqual([])
    expect(decode("hello", SINGLESTORE_TIME_TABLE)).toEqual([
      { kind: "literal", text: "hello" },
    ])
  })

  it("is matched case-sensitively", () => {
    expect(decode("yyyy", SINGLESTORE_TIME_TABLE)).toEqual([{ kind: "literal", text: "yyyy" }])
  })

  it("gives the same result from independently built tries", () => {
    const first = lexFormat("YYYY-MM-DD HH24:MI", newTrie(SINGLESTORE_TIME_TABLE.entries()))
    const second = lexFormat("YYYY-MM-DD HH24:MI", newTrie(SINGLESTORE_TIME_TABLE.entries()))
    expect(second).toEqual(first)
    expect(decode("YYYY-MM-DD HH24:MI", SINGLESTORE_TIME_TABLE)).toEqual(first)
  })

  it("builds each table's trie once", () => {
    expect(directiveTrie(MYSQL_TIME_TABLE)).toBe(directiveTrie(MYSQL_TIME_TABLE))
  })
})

describe("encode", () => {
  it("reproduces a decoded format with the same table", () => {
    expect(encode(decode("YYYY-MM-DD", YMD), YMD)).toBe("YYYY-MM-DD")
  })

  it("round-trips every token written back by its table", () => {
    for (const table of [STRFTIME, MYSQL_TIME_TABLE, SINGLESTORE_TIME_TABLE]) {
      for (const [token, directive] of table.entries()) {
        if (table.forward(directive) !== token) continue
        expect(encode(decode(token, table), table)).toBe(token)
      }
    }
  })

  it("normalizes tokens that share a directive", () => {
    expect(encode(decode("HH:MI RR", SINGLESTORE_TIME_TABLE), SINGLESTORE_TIME_TABLE)).toBe(
      "HH12:MI YY",
    )
  })

  it("writes another dialect's vocabulary", () => {
    expect(encode(decode("YYYY-MM-DD", SINGLESTORE_TIME_TABLE), STRFTIME)).toBe("%Y-%m-%d")
    expect(formatTime("%Y-%m-%d %H:%i:%s", MYSQL_TIME_TABLE, SINGLESTORE_TIME_TABLE)).toBe(
      "YYYY-MM-DD HH24:MI:SS",
    )
    expect(formatTime("DD-MON-YYYY", SINGLESTORE_TIME_TABLE, MYSQL_TIME_TABLE)).toBe(
      "%d-%b-%Y",
    )
  })

  it("throws on a directive the target cannot express", () => {
    const format = decode("D", SINGLESTORE_TIME_TABLE)
    expect(() => encode(format, MYSQL_TIME_TABLE)).toThrow(UnmappedDirectiveError)
    expect(() => encode(format, MYSQL_TIME_TABLE)).toThrow(
      "Format directive %u has no equivalent in mysql",
    )
  })

  it("writes the canonical directive when asked to pass unmapped ones through", () => {
    const format = decode("%z %d", STRFTIME)
    expect(encode(format, MYSQL_TIME_TABLE, { onUnmapped: "passthrough" })).toBe("%z %d")
  })

  it("refuses to pass through a directive the target reads as another one", () => {
    const format = decode("D DD", SINGLESTORE_TIME_TABLE)
    expect(() => encode(format, MYSQL_TIME_TABLE, { onUnmapped: "passthrough" })).toThrow(
      "Format directive %u has no equivalent in mysql, which reads %u as %W",
    )
  })

  it("treats %% as a literal percent sign", () => {
    expect(decode("%%Y", STRFTIME)).toEqual([
      { kind: "directive", directive: "%%" },
      { kind: "literal", text: "Y" },
    ])
    expect(formatTime("100%% %Y", STRFTIME, MYSQL_TIME_TABLE)).toBe("100%% %Y")
  })
})

describe("canonical formats", () => {
  it("renders as strftime text", () => {
    expect(canonicalText(decode("DD-MON-YYYY", SINGLESTORE_TIME_TABLE))).toBe("%d-%b-%Y")
  })

  it("lists the directives used", () => {
    expect(directivesOf(decode("DD/MM/YYYY DD", SINGLESTORE_TIME_TABLE))).toEqual([
      "%d",
      "%m",
      "%Y",
    ])
  })
})
