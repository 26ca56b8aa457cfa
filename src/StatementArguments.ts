import _ from "lodash"

/** Named values of a statement, keyed without the leading colon */
export type NamedValues = { [name: string]: unknown }

/** Ordered and/or named values bound to the placeholders of a statement */
export default class StatementArguments {
  values: unknown[]
  namedValues: NamedValues

  constructor(values?: unknown[], namedValues?: NamedValues) {
    this.values = values ? values.slice() : []
    this.namedValues = namedValues ? _.clone(namedValues) : {}
  }

  static fromValues(values: unknown[]): StatementArguments {
    return new StatementArguments(values)
  }

  static fromNamed(namedValues: NamedValues): StatementArguments {
    return new StatementArguments([], namedValues)
  }

  /** Accepts arguments, an array of positional values or a record of named values */
  static from(args?: StatementArguments | unknown[] | NamedValues): StatementArguments {
    if (args == null) {
      return new StatementArguments()
    }
    if (args instanceof StatementArguments) {
      return args
    }
    if (_.isArray(args)) {
      return new StatementArguments(args)
    }
    return new StatementArguments([], args)
  }

  /** Number of positional values */
  get count(): number {
    return this.values.length
  }

  has(name: string): boolean {
    return _.has(this.namedValues, name)
  }

  get(name: string): unknown {
    return this.has(name) ? this.namedValues[name] : undefined
  }

  /**
   * Appends positional values of other after our own and adds its named values.
   * Throws if a name is already bound to a different value.
   */
  append(other: StatementArguments): StatementArguments {
    for (const name of Object.keys(other.namedValues)) {
      if (this.has(name) && !_.isEqual(this.namedValues[name], other.namedValues[name])) {
        throw new Error(`Can't merge arguments: :${name} is already bound to a different value`)
      }
    }

    this.values.push(...other.values)
    _.extend(this.namedValues, other.namedValues)
    return this
  }

  isEmpty(): boolean {
    return this.values.length === 0 && _.isEmpty(this.namedValues)
  }

  isEqual(other: StatementArguments): boolean {
    return _.isEqual(this.values, other.values) && _.isEqual(this.namedValues, other.namedValues)
  }

  clone(): StatementArguments {
    return new StatementArguments(this.values, this.namedValues)
  }
}
