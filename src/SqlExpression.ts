import type SqlGenerationContext from "./SqlGenerationContext"

/** Alias of a table in a query, as used to qualify column references */
export type TableAlias = string

/** Node of an expression tree that renders as sql */
export interface SqlExpression {
  /** Renders the expression, wrapped in parenthesis if needed by the enclosing expression */
  expressionSql(context: SqlGenerationContext, wrappedInParenthesis: boolean): string

  /** Returns the expression with its column references qualified by alias */
  qualifiedExpression(alias: TableAlias): SqlExpression
}

export function isSqlExpression(value: unknown): value is SqlExpression {
  return (
    value !== null &&
    typeof value === "object" &&
    "expressionSql" in value &&
    typeof value.expressionSql === "function" &&
    "qualifiedExpression" in value &&
    typeof value.qualifiedExpression === "function"
  )
}
