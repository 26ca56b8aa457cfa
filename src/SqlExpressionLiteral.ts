import type SqlLiteral from "./SqlLiteral"
import type SqlGenerationContext from "./SqlGenerationContext"
import type StatementArguments from "./StatementArguments"
import type { SqlExpression, TableAlias } from "./SqlExpression"

/**
 * Expression made of raw sql, which may contain placeholders:
 *
 *     sql`${a} + ${b}`.sqlExpression
 *     new SqlLiteral(":one + :two", { one: 1, two: 2 }).sqlExpression
 */
export default class SqlExpressionLiteral implements SqlExpression {
  readonly sqlLiteral: SqlLiteral

  constructor(sqlLiteral: SqlLiteral) {
    this.sqlLiteral = sqlLiteral
  }

  get sql(): string {
    return this.sqlLiteral.sql
  }

  get arguments(): StatementArguments {
    return this.sqlLiteral.arguments
  }

  expressionSql(context: SqlGenerationContext, wrappedInParenthesis: boolean): string {
    if (wrappedInParenthesis) {
      return "(" + this.expressionSql(context, false) + ")"
    }
    return this.sqlLiteral.resolve(context)
  }

  // Raw sql has no column reference that could be qualified
  qualifiedExpression(alias: TableAlias): SqlExpression {
    return this
  }
}
