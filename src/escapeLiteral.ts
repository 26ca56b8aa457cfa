import _ from "lodash"

/**
 * Renders a value as a postgres literal. null and undefined are null, arrays
 * are array[...], dates are ISO strings and other objects are json.
 */
export default function escapeLiteral(val: unknown): string {
  if (_.isNil(val)) {
    return "null"
  }

  switch (typeof val) {
    case "string":
      return escapeString(val)
    case "boolean":
      return val ? "TRUE" : "FALSE"
    case "bigint":
      return val.toString()
    case "number":
      // NaN and Infinity have no literal form
      if (!_.isFinite(val)) {
        throw new Error(`Unsupported literal value: ${val}`)
      }
      return String(val)
  }

  if (_.isArray(val)) {
    return `array[${val.map(escapeLiteral).join(",")}]`
  }
  if (_.isDate(val)) {
    return escapeString(val.toISOString())
  }
  if (_.isObject(val) && !_.isFunction(val)) {
    return `(${escapeString(JSON.stringify(val))}::json)`
  }

  throw new Error(`Unsupported literal value: ${String(val)}`)
}

/** Quotes a string, using an E'' string when it holds backslashes */
export function escapeString(val: string): string {
  const quoted = "'" + val.replace(/'/g, "''").replace(/\\/g, "\\\\") + "'"
  return val.includes("\\") ? "E" + quoted : quoted
}
