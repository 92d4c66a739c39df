/**
 * A flag the embedding program declared to its argument parser.
 */
export type DeclaredFlag = {
  /** Store key, e.g. "dry-run" for `--dry-run`. */
  key: string

  /**
   * Literal tokens selecting the flag, e.g. `["--dry-run", "-n"]`. The merge
   * treats the flag as user-specified when one of them appears in argv, also
   * as `--dry-run=…` or, for a short token, with a value attached (`-n5`).
   */
  tokens: readonly string[]

  /** Parsed value, or the parser's default when the flag was not given. */
  value: unknown
}

export type DeclaredPositional = {
  key: string

  /** `undefined` when the positional was not supplied on the command line. */
  value: unknown
}

export type ParsedArguments = {
  flags: DeclaredFlag[]
  positionals: DeclaredPositional[]

  /** Tokens the parser did not consume, in argv order. */
  unknown: string[]
}

/**
 * Wraps an externally supplied argument parser.
 *
 * Implementations must accept a pre-sliced argv (user arguments only) and
 * keep their own usage-error behaviour for malformed declared input.
 */
export interface DeclaredParser {
  readonly name: string
  parse(argv: readonly string[]): ParsedArguments
}
