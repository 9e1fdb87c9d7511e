/**
 * Expression AST node classes for SQL parsing
 */

import { type CanonicalFormat, canonicalText } from "./time.js"

export interface SqlOptions {
  dialect?: string
  pretty?: boolean
}

type SqlImpl = (expression: Node, options: SqlOptions) => string

let sqlImpl: SqlImpl | undefined

/**
 * Base class for all SQL AST nodes
 */
export abstract class Expression {
  abstract readonly kind: keyof NodeMap

  /** Direct child nodes, in source order */
  abstract children(): Node[]

  /**
   * Wired up by the dialect module so that nodes can render themselves
   * without importing the generator.
   */
  static setSqlImpl(impl: SqlImpl): void {
    sqlImpl = impl
  }

  *walk(): Generator<Node> {
    const stack: Node[] = [...this.children()].reverse()
    while (stack.length > 0) {
      const node = stack.pop()
      if (!node) break
      yield node
      stack.push(...[...node.children()].reverse())
    }
  }

  find<E extends Node>(cls: abstract new (...args: never[]) => E): E | undefined {
    for (const node of this.walk()) {
      if (node instanceof cls) return node
    }
    return undefined
  }

  findAll<E extends Node>(cls: abstract new (...args: never[]) => E): E[] {
    const found: E[] = []
    for (const node of this.walk()) {
      if (node instanceof cls) found.push(node)
    }
    return found
  }

  sql(options: SqlOptions = {}): string {
    if (!sqlImpl) {
      throw new Error("SQL generation is not initialized, import sqlshift")
    }
    if (!isNode(this)) {
      throw new Error(`Unknown expression kind ${this.kind}`)
    }
    return sqlImpl(this, options)
  }
}

function isNode(expression: Expression): expression is Node {
  return expression.kind in NODE_KINDS
}

export class Literal extends Expression {
  readonly kind = "literal"

  constructor(
    readonly value: string,
    readonly isString: boolean,
  ) {
    super()
  }

  static string(value: string): Literal {
    return new Literal(value, true)
  }

  static number(value: number | string): Literal {
    return new Literal(`${value}`, false)
  }

  children(): Node[] {
    return []
  }
}

export class ByteString extends Expression {
  readonly kind = "bytestring"

  constructor(readonly value: string) {
    super()
  }

  children(): Node[] {
    return []
  }
}

export class Null extends Expression {
  readonly kind = "null"

  children(): Node[] {
    return []
  }
}

export class Boolean extends Expression {
  readonly kind = "boolean"

  constructor(readonly value: boolean) {
    super()
  }

  children(): Node[] {
    return []
  }
}

export class Star extends Expression {
  readonly kind = "star"

  children(): Node[] {
    return []
  }
}

export class Identifier extends Expression {
  readonly kind = "identifier"

  constructor(
    readonly name: string,
    readonly quoted = false,
  ) {
    super()
  }

  children(): Node[] {
    return []
  }
}

export class Column extends Expression {
  readonly kind = "column"
  readonly name: Identifier
  readonly table: Identifier | undefined

  constructor(args: { name: Identifier; table?: Identifier }) {
    super()
    this.name = args.name
    this.table = args.table
  }

  children(): Node[] {
    return this.table ? [this.table, this.name] : [this.name]
  }
}

export class Table extends Expression {
  readonly kind = "table"
  readonly name: Identifier
  readonly db: Identifier | undefined
  readonly alias: Identifier | undefined

  constructor(args: { name: Identifier; db?: Identifier; alias?: Identifier }) {
    super()
    this.name = args.name
    this.db = args.db
    this.alias = args.alias
  }

  children(): Node[] {
    return [this.db, this.name, this.alias].filter(isDefined)
  }
}

export class Alias extends Expression {
  readonly kind = "alias"

  constructor(
    readonly expression: Node,
    readonly alias: Identifier,
  ) {
    super()
  }

  children(): Node[] {
    return [this.expression, this.alias]
  }
}

export class Paren extends Expression {
  readonly kind = "paren"

  constructor(readonly expression: Node) {
    super()
  }

  children(): Node[] {
    return [this.expression]
  }
}

/** A function call the parser has no dedicated node for */
export class Anonymous extends Expression {
  readonly kind = "anonymous"

  constructor(
    readonly name: string,
    readonly args: Node[] = [],
  ) {
    super()
  }

  children(): Node[] {
    return [...this.args]
  }
}

export class DataType extends Expression {
  readonly kind = "datatype"

  static readonly Type = {
    BIGINT: "BIGINT",
    BOOLEAN: "BOOLEAN",
    CHAR: "CHAR",
    DATE: "DATE",
    DATETIME: "DATETIME",
    DECIMAL: "DECIMAL",
    DOUBLE: "DOUBLE",
    GEOGRAPHYPOINT: "GEOGRAPHYPOINT",
    INT: "INT",
    JSON: "JSON",
    JSONB: "JSONB",
    SIGNED: "SIGNED",
    TEXT: "TEXT",
    TIME: "TIME",
    TIMESTAMP: "TIMESTAMP",
    VARCHAR: "VARCHAR",
  } as const

  constructor(
    readonly type: string,
    readonly params: Node[] = [],
  ) {
    super()
  }

  static build(type: string, params: Node[] = []): DataType {
    return new DataType(type.toUpperCase(), params)
  }

  children(): Node[] {
    return [...this.params]
  }
}

/** CAST, or a safe cast returning NULL on failure when `safe` is set */
export class Cast extends Expression {
  readonly kind = "cast"
  readonly expression: Node
  readonly to: DataType
  readonly safe: boolean

  constructor(args: { expression: Node; to: DataType; safe?: boolean }) {
    super()
    this.expression = args.expression
    this.to = args.to
    this.safe = args.safe ?? false
  }

  children(): Node[] {
    return [this.expression, this.to]
  }
}

export type JSONScalarType = "STRING" | "DOUBLE"

export class JSONExtractScalar extends Expression {
  readonly kind = "jsonextractscalar"
  readonly expression: Node
  readonly path: Node
  readonly jsonType: JSONScalarType

  constructor(args: { expression: Node; path: Node; jsonType: JSONScalarType }) {
    super()
    this.expression = args.expression
    this.path = args.path
    this.jsonType = args.jsonType
  }

  children(): Node[] {
    return [this.expression, this.path]
  }
}

export type BinaryOperator =
  | "AND"
  | "OR"
  | "XOR"
  | "EQ"
  | "NEQ"
  | "NULLSAFE_EQ"
  | "GT"
  | "GTE"
  | "LT"
  | "LTE"
  | "ADD"
  | "SUB"
  | "MUL"
  | "DIV"
  | "INTDIV"
  | "MOD"
  | "DPIPE"

export class Binary extends Expression {
  readonly kind = "binary"

  constructor(
    readonly operator: BinaryOperator,
    readonly left: Node,
    readonly right: Node,
  ) {
    super()
  }

  children(): Node[] {
    return [this.left, this.right]
  }
}

export class Not extends Expression {
  readonly kind = "not"

  constructor(readonly expression: Node) {
    super()
  }

  children(): Node[] {
    return [this.expression]
  }
}

export class Neg extends Expression {
  readonly kind = "neg"

  constructor(readonly expression: Node) {
    super()
  }

  children(): Node[] {
    return [this.expression]
  }
}

/** `x IS [NOT] NULL|TRUE|FALSE` */
export class Is extends Expression {
  readonly kind = "is"

  constructor(
    readonly expression: Node,
    readonly target: Null | Boolean,
    readonly negated = false,
  ) {
    super()
  }

  children(): Node[] {
    return [this.expression, this.target]
  }
}

export class Ordered extends Expression {
  readonly kind = "ordered"

  constructor(
    readonly expression: Node,
    readonly desc = false,
  ) {
    super()
  }

  children(): Node[] {
    return [this.expression]
  }
}

export interface SelectArgs {
  expressions: Node[]
  distinct?: boolean
  from?: Table
  where?: Node
  groupBy?: Node[]
  having?: Node
  orderBy?: Ordered[] | "ALL"
  limit?: Node
}

export class Select extends Expression {
  readonly kind = "select"
  readonly expressions: Node[]
  readonly distinct: boolean
  readonly from: Table | undefined
  readonly where: Node | undefined
  readonly groupBy: Node[]
  readonly having: Node | undefined
  readonly orderBy: Ordered[] | "ALL"
  readonly limit: Node | undefined

  constructor(args: SelectArgs) {
    super()
    this.expressions = args.expressions
    this.distinct = args.distinct ?? false
    this.from = args.from
    this.where = args.where
    this.groupBy = args.groupBy ?? []
    this.having = args.having
    this.orderBy = args.orderBy ?? []
    this.limit = args.limit
  }

  children(): Node[] {
    const ordered = this.orderBy === "ALL" ? [] : this.orderBy
    return [
      ...this.expressions,
      this.from,
      this.where,
      ...this.groupBy,
      this.having,
      ...ordered,
      this.limit,
    ].filter(isDefined)
  }
}

/**
 * A literal date/time format, held in the canonical vocabulary. Generators
 * encode it into the vocabulary of the function they emit.
 */
export class TimeFormat extends Expression {
  readonly kind = "timeformat"

  constructor(readonly format: CanonicalFormat) {
    super()
  }

  /** The format as strftime text */
  get text(): string {
    return canonicalText(this.format)
  }

  children(): Node[] {
    return []
  }
}

/** UNIX_TIMESTAMP() without arguments */
export class UnixSeconds extends Expression {
  readonly kind = "unixseconds"

  children(): Node[] {
    return []
  }
}

export interface TemporalArgs {
  value: Node
  /** A TimeFormat for literal formats; any other expression is passed through */
  format?: Node
}

export abstract class TemporalFunc extends Expression {
  readonly value: Node
  readonly format: Node | undefined

  constructor(args: TemporalArgs) {
    super()
    this.value = args.value
    this.format = args.format
  }

  children(): Node[] {
    return this.format ? [this.value, this.format] : [this.value]
  }
}

/** Parse a string into a DATE */
export class StrToDate extends TemporalFunc {
  readonly kind = "strtodate"
}

/** Parse a string into a TIMESTAMP */
export class StrToTime extends TemporalFunc {
  readonly kind = "strtotime"
}

/** Convert a timestamp or date string into a DATE */
export class TsOrDsToDate extends TemporalFunc {
  readonly kind = "tsordstodate"
}

/** Format a temporal value with an explicit format */
export class TimeToStr extends TemporalFunc {
  readonly kind = "timetostr"
}

/** Format a value to a string */
export class ToChar extends TemporalFunc {
  readonly kind = "tochar"
}

/** Format epoch seconds */
export class UnixToStr extends TemporalFunc {
  readonly kind = "unixtostr"
}

/** Parse a string into epoch seconds */
export class StrToUnix extends TemporalFunc {
  readonly kind = "strtounix"
}

export type TemporalConversion =
  | StrToDate
  | StrToTime
  | TsOrDsToDate
  | TimeToStr
  | ToChar
  | UnixToStr
  | StrToUnix

export type TemporalClass = new (args: TemporalArgs) => TemporalConversion

export interface NodeMap {
  literal: Literal
  bytestring: ByteString
  null: Null
  boolean: Boolean
  star: Star
  identifier: Identifier
  column: Column
  table: Table
  alias: Alias
  paren: Paren
  anonymous: Anonymous
  datatype: DataType
  cast: Cast
  jsonextractscalar: JSONExtractScalar
  binary: Binary
  not: Not
  neg: Neg
  is: Is
  ordered: Ordered
  select: Select
  timeformat: TimeFormat
  unixseconds: UnixSeconds
  strtodate: StrToDate
  strtotime: StrToTime
  tsordstodate: TsOrDsToDate
  timetostr: TimeToStr
  tochar: ToChar
  unixtostr: UnixToStr
  strtounix: StrToUnix
}

export type Node = NodeMap[keyof NodeMap]

export type NodeKind = keyof NodeMap

const NODE_KINDS: Record<NodeKind, true> = {
  literal: true,
  bytestring: true,
  null: true,
  boolean: true,
  star: true,
  identifier: true,
  column: true,
  table: true,
  alias: true,
  paren: true,
  anonymous: true,
  datatype: true,
  cast: true,
  jsonextractscalar: true,
  binary: true,
  not: true,
  neg: true,
  is: true,
  ordered: true,
  select: true,
  timeformat: true,
  unixseconds: true,
  strtodate: true,
  strtotime: true,
  tsordstodate: true,
  timetostr: true,
  tochar: true,
  unixtostr: true,
  strtounix: true,
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined
}

// Helper functions for building expressions
export function column(name: string, table?: string): Column {
  return new Column({
    name: new Identifier(name),
    ...(table ? { table: new Identifier(table) } : {}),
  })
}

export function table(name: string, alias?: string): Table {
  return new Table({
    name: new Identifier(name),
    ...(alias ? { alias: new Identifier(alias) } : {}),
  })
}
