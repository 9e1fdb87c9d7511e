import { expect } from "vitest"

import { type Node, exp, parseOne } from "../src/index.js"

/** Asserts `value` is an instance of `cls` and returns it narrowed */
export function expectInstance<T>(
  value: unknown,
  cls: new (...args: never[]) => T,
): T {
  expect(value).toBeInstanceOf(cls)
  if (!(value instanceof cls)) {
    throw new Error(`expected ${cls.name}`)
  }
  return value
}

/** The first projection of a single SELECT */
export function firstProjection(sql: string, dialect?: string): Node {
  const select = expectInstance(parseOne(sql, dialect ? { dialect } : {}), exp.Select)
  const [first] = select.expressions
  if (!first) {
    throw new Error("SELECT has no projections")
  }
  return first
}
