import _ from "lodash"
import StatementArguments from "./StatementArguments"
import type { NamedValues } from "./StatementArguments"
import SqlGenerationContext from "./SqlGenerationContext"
import type { PlaceholderStyle } from "./SqlGenerationContext"
import { isSqlExpression } from "./SqlExpression"
import type { SqlExpression } from "./SqlExpression"
import SqlExpressionLiteral from "./SqlExpressionLiteral"
import SqlSelectionLiteral from "./SqlSelectionLiteral"
import escapeLiteral from "./escapeLiteral"

/** Arguments can be given as StatementArguments, positional values or named values */
export type ArgumentsInput = StatementArguments | unknown[] | NamedValues

/** Nodes of the deferred tree a literal is made of */
type LiteralNode =
  | { type: "text"; sql: string; arguments: StatementArguments }
  | { type: "value"; value: unknown }
  | { type: "expression"; expr: SqlExpression }
  | { type: "concat"; parts: SqlLiteral[] }
  | { type: "join"; parts: SqlLiteral[]; separator: string }
  | { type: "flatMap"; literal: SqlLiteral; transform: (sql: string) => SqlLiteral }

const argumentsNotAllowed =
  "SqlLiteral with arguments can't be rendered in this context, which has no statement arguments to bind them to. " +
  "Inline the values in the sql text instead."

/**
 * Immutable piece of sql and the arguments it binds. Nothing is computed until
 * the literal is resolved against a SqlGenerationContext, which collects the
 * arguments in the order their placeholders appear in the sql.
 *
 *     const query = sql`select * from player where name = ${name}`.concat(" limit 1")
 *     const { sql, arguments } = query.resolveWithFreshContext()
 */
export default class SqlLiteral {
  private node: LiteralNode

  /**
   * Creates a literal from plain sql and the arguments of its placeholders.
   * The sql is not scanned: the number of placeholders must match the arguments.
   * Arguments are copied, so changing them afterwards does not change the literal.
   */
  constructor(sql?: string, args?: ArgumentsInput) {
    this.node = { type: "text", sql: sql || "", arguments: StatementArguments.from(args).clone() }
  }

  private static make(node: LiteralNode): SqlLiteral {
    const literal = new SqlLiteral()
    literal.node = node
    return literal
  }

  private static interpolated(value: unknown): SqlLiteral {
    if (value instanceof SqlLiteral) {
      return value
    }
    if (isSqlExpression(value)) {
      return SqlLiteral.make({ type: "expression", expr: value })
    }
    return SqlLiteral.make({ type: "value", value })
  }

  static fromText(sql: string, args?: ArgumentsInput): SqlLiteral {
    return new SqlLiteral(sql, args)
  }

  /** Bare strings are sql without arguments */
  static from(val: SqlLiteral | string): SqlLiteral {
    if (_.isString(val)) {
      return new SqlLiteral(val)
    }
    return val
  }

  /**
   * Creates a literal from the parts of a template. Values become arguments,
   * except literals, which are embedded, and expressions, which are rendered
   * in parenthesis.
   */
  static fromInterpolation(strings: readonly string[], values: readonly unknown[]): SqlLiteral {
    const parts: SqlLiteral[] = []

    strings.forEach((str, i) => {
      if (str.length > 0) {
        parts.push(new SqlLiteral(str))
      }
      if (i < values.length) {
        parts.push(SqlLiteral.interpolated(values[i]))
      }
    })

    if (parts.length === 1) {
      return parts[0]
    }
    return SqlLiteral.make({ type: "concat", parts })
  }

  /**
   * Concatenates literals, inserting separator between each one. The iterable
   * is only iterated once.
   */
  static join(literals: Iterable<SqlLiteral | string>, separator = ""): SqlLiteral {
    const parts = Array.from(literals, (literal) => SqlLiteral.from(literal))
    return SqlLiteral.make({ type: "join", parts, separator })
  }

  /** Renders the sql, appending arguments to the context */
  resolve(context: SqlGenerationContext): string {
    const node = this.node

    switch (node.type) {
      case "text":
        if (!context.append(node.arguments)) {
          throw new Error(argumentsNotAllowed)
        }
        return node.sql

      case "value": {
        const placeholder = context.appendValue(node.value)
        if (placeholder == null) {
          throw new Error(argumentsNotAllowed)
        }
        return placeholder
      }

      case "expression":
        return node.expr.expressionSql(context, true)

      case "concat":
        return _.map(node.parts, (part) => part.resolve(context)).join("")

      case "join":
        return _.map(node.parts, (part) => part.resolve(context)).join(node.separator)

      case "flatMap":
        return node.transform(node.literal.resolve(context)).resolve(context)
    }
  }

  /** Resolves once in a new context, returning sql and arguments together */
  resolveWithFreshContext(placeholderStyle?: PlaceholderStyle): { sql: string; arguments: StatementArguments } {
    const context = SqlGenerationContext.withArguments(placeholderStyle)
    const sql = this.resolve(context)
    return { sql, arguments: context.arguments || new StatementArguments() }
  }

  /** Sql with ? placeholders. Prefer resolveWithFreshContext when arguments are needed too */
  get sql(): string {
    return this.resolveWithFreshContext().sql
  }

  get arguments(): StatementArguments {
    return this.resolveWithFreshContext().arguments
  }

  /** Returns a new literal made of this one followed by others */
  concat(...others: (SqlLiteral | string)[]): SqlLiteral {
    const parts = [this, ..._.map(others, (other) => SqlLiteral.from(other))]
    return SqlLiteral.make({ type: "concat", parts })
  }

  /** Returns a new literal made of this one followed by plain sql and its arguments */
  appendSql(sql: string, args?: ArgumentsInput): SqlLiteral {
    return this.concat(new SqlLiteral(sql, args))
  }

  /** Returns a literal whose sql is transformed. Arguments are left as they are */
  mapSql(transform: (sql: string) => string): SqlLiteral {
    return this.flatMap((sql) => new SqlLiteral(transform(sql)))
  }

  /** Returns a literal resolved by resolving this one, then the literal made from its sql */
  flatMap(transform: (sql: string) => SqlLiteral): SqlLiteral {
    return SqlLiteral.make({ type: "flatMap", literal: this, transform })
  }

  isEmpty(): boolean {
    return this.sql.length === 0
  }

  /** Renders sql for a context that can't bind arguments. Throws if the literal has any */
  toPlainSql(): string {
    return this.resolve(SqlGenerationContext.inline())
  }

  /** Make into sql with arguments inlined */
  toInline(): string {
    const { sql, arguments: args } = this.resolveWithFreshContext()

    // All the question marks not followed by | or &
    // ?| and ?& are jsonb operators (so is ?, but it can be replaced by one of the others)
    // and all the :names not preceded by another colon (::type is a cast).
    // Unbound :names are left as is, as in 'key:value'
    let n = 0
    const inlined = sql.replace(/\?(?!\||&)|(?<!:):([A-Za-z_][A-Za-z0-9_]*)/g, (match: string, name: string | undefined) => {
      if (name != null) {
        return args.has(name) ? escapeLiteral(args.get(name)) : match
      }

      if (n >= args.count) {
        throw new Error(`Missing value for placeholder ${n + 1}`)
      }
      const value = args.values[n]
      n += 1
      return escapeLiteral(value)
    })

    if (n < args.count) {
      throw new Error(`${args.count} values for ${n} placeholders`)
    }
    return inlined
  }

  /** The literal as an expression, usable in a larger expression */
  get sqlExpression(): SqlExpressionLiteral {
    return new SqlExpressionLiteral(this)
  }

  /** The literal as a selection, such as "*" or "a, b" */
  get sqlSelectable(): SqlSelectionLiteral {
    return new SqlSelectionLiteral(this)
  }
}

/**
 * Tag for sql templates. Interpolated values are bound as arguments, never
 * spliced in the sql. Interpolated literals and expressions are embedded.
 *
 *     sql`update player set name = ${name} where id = ${id}`
 */
export function sql(strings: TemplateStringsArray, ...values: unknown[]): SqlLiteral {
  return SqlLiteral.fromInterpolation(strings, values)
}
