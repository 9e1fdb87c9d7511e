/**
 * Dialect system for SQL parsing and generation
 */

import type { Node } from "./expressions.js"
import { type GenerateOptions, Generator } from "./generator.js"
import { type DialectSettings, Parser, type ParserOptions, formatTimeArg } from "./parser.js"
import { type DirectiveTable, STRFTIME } from "./time.js"
import { Tokenizer, type TokenizerOptions } from "./tokens.js"

export interface DialectOptions {
  tokenizer?: TokenizerOptions
  parser?: Omit<ParserOptions, "tokenizer" | "dialect">
  generator?: GenerateOptions
}

// Registry of dialects
const DIALECTS: Map<string, Dialect> = new Map()

export class Dialect implements DialectSettings {
  static readonly dialectName: string = "sqlshift"

  // Inner class references (static for dialect inheritance)
  protected static TokenizerClass: typeof Tokenizer = Tokenizer
  protected static ParserClass: typeof Parser = Parser
  protected static GeneratorClass: typeof Generator = Generator

  // Date/time format vocabulary of this dialect's own functions
  static TIME_TABLE: DirectiveTable = STRFTIME

  static SUPPORTS_ORDER_BY_ALL = false

  /**
   * Decodes a literal format argument written in this dialect's vocabulary.
   * Non-literal formats are returned unchanged.
   */
  static formatTime(expression: Node | undefined): Node | undefined {
    return formatTimeArg(expression, this.TIME_TABLE)
  }

  constructor(protected readonly options: DialectOptions = {}) {}

  private get settings(): typeof Dialect {
    return this.constructor as typeof Dialect
  }

  get name(): string {
    return this.settings.dialectName
  }

  get TIME_TABLE(): DirectiveTable {
    return this.settings.TIME_TABLE
  }

  get SUPPORTS_ORDER_BY_ALL(): boolean {
    return this.settings.SUPPORTS_ORDER_BY_ALL
  }

  createTokenizer(): Tokenizer {
    return new this.settings.TokenizerClass(this.options.tokenizer)
  }

  createParser(): Parser {
    return new this.settings.ParserClass({
      ...this.options.parser,
      tokenizer: this.createTokenizer(),
      dialect: this,
    })
  }

  createGenerator(options?: GenerateOptions): Generator {
    return new this.settings.GeneratorClass({
      ...this.options.generator,
      ...options,
    })
  }

  parse(sql: string): Node[] {
    return this.createParser().parse(sql)
  }

  parseOne(sql: string): Node {
    return this.createParser().parseOne(sql)
  }

  generate(expression: Node, options?: GenerateOptions): string {
    return this.createGenerator(options).generate(expression)
  }

  transpile(
    sql: string,
    targetDialect: Dialect,
    options?: GenerateOptions,
  ): string[] {
    const expressions = this.parse(sql)
    return expressions.map((expr) => targetDialect.generate(expr, options))
  }

  // Static methods for dialect registry

  static register(dialectClass: typeof Dialect): void {
    DIALECTS.set(dialectClass.dialectName.toLowerCase(), new dialectClass())
  }

  static get(dialect?: string | Dialect): Dialect {
    if (dialect instanceof Dialect) {
      return dialect
    }

    if (typeof dialect === "string" && dialect.trim().length > 0) {
      return Dialect.getOrThrow(dialect.trim())
    }

    return getDefaultDialect()
  }

  static getOrThrow(dialect: string): Dialect {
    const found = DIALECTS.get(dialect.toLowerCase())
    if (!found) {
      throw new Error(`Unknown dialect: ${dialect}`)
    }
    return found
  }

  static list(): string[] {
    return [...DIALECTS.keys()].sort()
  }
}

// Default (base) dialect singleton
let defaultDialect: Dialect | undefined

function getDefaultDialect(): Dialect {
  if (!defaultDialect) {
    defaultDialect = new Dialect()
  }
  return defaultDialect
}

// Register base dialect
Dialect.register(Dialect)
