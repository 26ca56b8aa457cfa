import StatementArguments from "./StatementArguments"

/** "question" renders ? placeholders, "numbered" renders $1, $2, ... */
export type PlaceholderStyle = "question" | "numbered"

export interface SqlGenerationContextOptions {
  /** False for contexts where values can't be bound, only inlined. Default true */
  arguments?: boolean
  /** Placeholder rendered for interpolated values. Default "question" */
  placeholderStyle?: PlaceholderStyle
}

/**
 * State of a single resolution of literals into sql. Holds the arguments
 * being accumulated and decides how placeholders for interpolated values
 * are rendered. Create one per resolution.
 */
export default class SqlGenerationContext {
  /** Arguments accumulated so far. null if arguments are not accepted */
  readonly arguments: StatementArguments | null
  readonly placeholderStyle: PlaceholderStyle

  constructor(options: SqlGenerationContextOptions = {}) {
    this.arguments = options.arguments === false ? null : new StatementArguments()
    this.placeholderStyle = options.placeholderStyle || "question"
  }

  static withArguments(placeholderStyle?: PlaceholderStyle): SqlGenerationContext {
    return new SqlGenerationContext({ arguments: true, placeholderStyle })
  }

  /** Context for sql that must not need any argument */
  static inline(): SqlGenerationContext {
    return new SqlGenerationContext({ arguments: false })
  }

  acceptsArguments(): boolean {
    return this.arguments != null
  }

  /** Merges arguments. Returns false if they are not empty and this context can't hold them */
  append(args: StatementArguments): boolean {
    if (args.isEmpty()) {
      return true
    }
    if (!this.arguments) {
      return false
    }
    this.arguments.append(args)
    return true
  }

  /** Binds a single value and returns its placeholder, or null if this context can't hold it */
  appendValue(value: unknown): string | null {
    if (!this.arguments) {
      return null
    }
    this.arguments.append(new StatementArguments([value]))

    if (this.placeholderStyle === "numbered") {
      return "$" + this.arguments.count
    }
    return "?"
  }
}
