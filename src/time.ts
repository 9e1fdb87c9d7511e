/**
 * Time format transcoding.
 *
 * Every dialect describes its date/time format tokens with a DirectiveTable
 * that maps each token onto a canonical, strftime-style directive. A format
 * string is decoded into a CanonicalFormat with the source dialect's table
 * and encoded back with the target dialect's table.
 */

import { DirectiveTableError, UnmappedDirectiveError } from "./errors.js"
import { type Trie, longestMatch, newTrie } from "./trie.js"

export type FormatElement =
  | { readonly kind: "directive"; readonly directive: string }
  | { readonly kind: "literal"; readonly text: string }

export type CanonicalFormat = readonly FormatElement[]

export interface DirectiveTableOptions {
  /**
   * Explicit canonical -> token pairs for encoding. Directives not listed
   * here fall back to the last token registered for them.
   */
  inverse?: Iterable<readonly [string, string]>
}

export class DirectiveTable {
  private readonly reverseMap: ReadonlyMap<string, string>
  private readonly forwardMap: ReadonlyMap<string, string>

  constructor(
    readonly name: string,
    entries: Iterable<readonly [string, string]>,
    options: DirectiveTableOptions = {},
  ) {
    const reverse = new Map<string, string>()
    const forward = new Map<string, string>()

    for (const [token, directive] of entries) {
      if (!token) {
        throw new DirectiveTableError(`${name}: empty format token`, name)
      }
      if (!directive) {
        throw new DirectiveTableError(
          `${name}: token ${token} maps to an empty directive`,
          name,
        )
      }
      const existing = reverse.get(token)
      if (existing !== undefined && existing !== directive) {
        throw new DirectiveTableError(
          `${name}: token ${token} is mapped to both ${existing} and ${directive}`,
          name,
        )
      }
      reverse.set(token, directive)
      forward.set(directive, token)
    }

    for (const [directive, token] of options.inverse ?? []) {
      if (reverse.get(token) !== directive) {
        throw new DirectiveTableError(
          `${name}: inverse entry ${directive} -> ${token} does not decode back to ${directive}`,
          name,
        )
      }
      forward.set(directive, token)
    }

    this.reverseMap = reverse
    this.forwardMap = forward
    Object.freeze(this)
  }

  /** The token this table writes for a canonical directive. */
  forward(directive: string): string | undefined {
    return this.forwardMap.get(directive)
  }

  /** The canonical directive a token of this table stands for. */
  reverse(token: string): string | undefined {
    return this.reverseMap.get(token)
  }

  has(token: string): boolean {
    return this.reverseMap.has(token)
  }

  covers(directive: string): boolean {
    return this.forwardMap.has(directive)
  }

  tokens(): string[] {
    return [...this.reverseMap.keys()]
  }

  directives(): string[] {
    return [...this.forwardMap.keys()]
  }

  entries(): Array<[string, string]> {
    return [...this.reverseMap.entries()]
  }

  get size(): number {
    return this.reverseMap.size
  }

  /**
   * Fails unless every directive in `directives` can be encoded with this
   * table. Called while dialects are defined, for each rewrite rule.
   */
  assertCovers(directives: Iterable<string>, rule: string): void {
    const missing = [...new Set(directives)].filter((d) => !this.covers(d))
    if (missing.length > 0) {
      throw new DirectiveTableError(
        `${rule}: ${this.name} has no token for ${missing.join(", ")}`,
        this.name,
      )
    }
  }
}

const TRIES = new WeakMap<DirectiveTable, Trie<string>>()

export function directiveTrie(table: DirectiveTable): Trie<string> {
  let trie = TRIES.get(table)
  if (!trie) {
    trie = newTrie(table.entries())
    TRIES.set(table, trie)
  }
  return trie
}

/**
 * Splits a format string into directives and literal runs, always taking the
 * longest token available at each position.
 */
export function lexFormat(
  format: string,
  trie: Trie<string>,
): FormatElement[] {
  const elements: FormatElement[] = []
  let literal = ""
  let i = 0

  while (i < format.length) {
    const match = longestMatch(trie, format, i)
    if (match) {
      if (literal) {
        elements.push({ kind: "literal", text: literal })
        literal = ""
      }
      elements.push({ kind: "directive", directive: match.value })
      i = match.end
    } else {
      literal += format.charAt(i)
      i++
    }
  }

  if (literal) {
    elements.push({ kind: "literal", text: literal })
  }

  return elements
}

export function decode(format: string, table: DirectiveTable): CanonicalFormat {
  return lexFormat(format, directiveTrie(table))
}

export interface EncodeOptions {
  /**
   * "throw" (default) raises UnmappedDirectiveError. "passthrough" writes the
   * canonical directive instead, unless the table would read that text back
   * as a directive of its own, which still throws.
   */
  onUnmapped?: "throw" | "passthrough"
}

export function encode(
  format: CanonicalFormat,
  table: DirectiveTable,
  options: EncodeOptions = {},
): string {
  let result = ""
  for (const element of format) {
    if (element.kind === "literal") {
      result += element.text
      continue
    }
    const token = table.forward(element.directive)
    if (token === undefined) {
      if (options.onUnmapped !== "passthrough") {
        throw new UnmappedDirectiveError(element.directive, table.name)
      }
      const readAs = decode(element.directive, table).find(
        (e) => e.kind === "directive",
      )
      if (readAs?.kind === "directive") {
        throw new UnmappedDirectiveError(element.directive, table.name, readAs.directive)
      }
      result += element.directive
    } else {
      result += token
    }
  }
  return result
}

/**
 * Converts a date/time format string from one dialect's vocabulary to
 * another's.
 */
export function formatTime(
  format: string,
  source: DirectiveTable,
  target: DirectiveTable,
): string {
  return encode(decode(format, source), target)
}

/** Renders a canonical format as strftime text. */
export function canonicalText(format: CanonicalFormat): string {
  return format
    .map((e) => (e.kind === "directive" ? e.directive : e.text))
    .join("")
}

/** The directives a canonical format uses, in order of first appearance. */
export function directivesOf(format: CanonicalFormat): string[] {
  const seen = new Set<string>()
  for (const element of format) {
    if (element.kind === "directive") seen.add(element.directive)
  }
  return [...seen]
}

export const CANONICAL_DIRECTIVES = [
  "%%", // literal percent sign
  "%a", // abbreviated weekday name
  "%A", // full weekday name
  "%b", // abbreviated month name
  "%B", // full month name
  "%d", // day of month, zero-padded
  "%-d", // day of month
  "%f", // microseconds, 6 digits
  "%H", // hour 00-23
  "%-H", // hour 0-23
  "%I", // hour 01-12
  "%-I", // hour 1-12
  "%j", // day of year
  "%m", // month, zero-padded
  "%-m", // month
  "%M", // minute
  "%p", // AM/PM
  "%S", // second
  "%-S", // second, unpadded
  "%u", // ISO weekday, Monday = 1
  "%U", // week of year, Sunday first
  "%w", // weekday, Sunday = 0
  "%W", // week of year, Monday first
  "%y", // two-digit year
  "%Y", // four-digit year
  "%z", // UTC offset
  "%Z", // time zone name
] as const

/** The canonical vocabulary itself; the base dialect reads and writes it. */
export const STRFTIME = new DirectiveTable(
  "strftime",
  CANONICAL_DIRECTIVES.map((d) => [d, d] as const),
)
