export { default as SqlLiteral, sql } from "./SqlLiteral"
export type { ArgumentsInput } from "./SqlLiteral"
export { default as StatementArguments } from "./StatementArguments"
export type { NamedValues } from "./StatementArguments"
export { default as SqlGenerationContext } from "./SqlGenerationContext"
export type { PlaceholderStyle, SqlGenerationContextOptions } from "./SqlGenerationContext"
export { default as SqlExpressionLiteral } from "./SqlExpressionLiteral"
export { isSqlExpression } from "./SqlExpression"
export type { SqlExpression, TableAlias } from "./SqlExpression"
export { default as SqlSelectionLiteral } from "./SqlSelectionLiteral"
export type { SqlCount, SqlSelectable } from "./SqlSelectable"
export { default as escapeLiteral } from "./escapeLiteral"
