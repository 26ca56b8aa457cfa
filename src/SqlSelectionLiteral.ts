import type SqlLiteral from "./SqlLiteral"
import type SqlGenerationContext from "./SqlGenerationContext"
import type { TableAlias } from "./SqlExpression"
import type { SqlCount, SqlSelectable } from "./SqlSelectable"

const notCountable =
  "Selection literals can't be counted. " +
  "To resolve this error, select one or several SqlExpressionLiteral (literal.sqlExpression) instead."

const unknownColumnCount =
  "Selection literals don't know how many columns they contain. " +
  "To resolve this error, select one or several SqlExpressionLiteral (literal.sqlExpression) instead."

/** Selection made of raw sql, such as "*" or "a, b". It may expand to any number of columns */
export default class SqlSelectionLiteral implements SqlSelectable {
  readonly sqlLiteral: SqlLiteral

  constructor(sqlLiteral: SqlLiteral) {
    this.sqlLiteral = sqlLiteral
  }

  resultColumnSql(context: SqlGenerationContext): string {
    return this.sqlLiteral.resolve(context)
  }

  countedSql(context: SqlGenerationContext): string {
    throw new Error(notCountable)
  }

  count(distinct: boolean): SqlCount | null {
    throw new Error(notCountable)
  }

  columnCount(): number {
    throw new Error(unknownColumnCount)
  }

  qualifiedSelectable(alias: TableAlias): SqlSelectable {
    return this
  }
}
