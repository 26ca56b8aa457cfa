import type SqlGenerationContext from "./SqlGenerationContext"
import type { SqlExpression, TableAlias } from "./SqlExpression"

/** What a count(...) of a selection counts */
export type SqlCount = { type: "all" } | { type: "distinct"; expr: SqlExpression }

/** Node of a select list */
export interface SqlSelectable {
  /** Renders the selection as result column(s) */
  resultColumnSql(context: SqlGenerationContext): string

  /** Renders what goes in count(...) when counting rows of a query selecting this */
  countedSql(context: SqlGenerationContext): string

  /** Describes how rows selecting this are counted. null if they can't be counted with a simple count */
  count(distinct: boolean): SqlCount | null

  /** Number of result columns the selection expands to */
  columnCount(): number

  qualifiedSelectable(alias: TableAlias): SqlSelectable
}
