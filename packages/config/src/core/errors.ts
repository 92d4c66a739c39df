export type ConfigErrorCode =
  | "already_initialized"
  | "duplicate_key"
  | "key_not_found"
  | "unsupported_operation"
  | "odd_unknown_args"
  | "malformed_key"
  | "duplicate_unknown_arg"
  | "ambiguous_source"
  | "file_access"
  | "invalid_config_file"
  | "missing_config_path"
  | "invalid_value"
  | "disallowed_value"
  | "unexpected_key"
  | "handle_not_installed"

/**
 * Contextual metadata attached to errors: the offending key, path or token.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type ConfigErrorOptions<C extends ConfigErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

/**
 * A cause that is not a ConfigError: typically the errno failure behind a
 * FileAccessError, or the yaml parse error behind an InvalidConfigFileError.
 */
export type SerializedCause = Readonly<{
  name: string
  message: string

  /** Node's errno code, e.g. "ENOENT". */
  code?: string
}>

/**
 * JSON shape of a ConfigError, as returned by `toJSON()`.
 */
export type SerializedConfigError = Readonly<{
  name: string
  code: ConfigErrorCode
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedConfigError | SerializedCause
  stack?: string
}>

export class ConfigError<C extends ConfigErrorCode = ConfigErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext

  /**
   * `true` for bad user input (argv, files), `false` for misuse by the
   * embedding program (duplicate writes, reads of missing keys).
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: ConfigErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedConfigError {
    return serializeConfigError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

export function serializeConfigError(
  err: ConfigError,
  options?: SerializeOptions,
): SerializedConfigError {
  return {
    name: err.name,
    code: err.code,
    message: err.message,
    context: { ...err.context },
    timestamp: err.timestamp.toISOString(),
    isOperational: err.isOperational,
    ...(err.cause !== undefined && { cause: serializeCause(err.cause, options) }),
    ...(options?.includeStack && err.stack !== undefined ? { stack: err.stack } : {}),
  }
}

function serializeCause(
  cause: unknown,
  options?: SerializeOptions,
): SerializedConfigError | SerializedCause {
  if (cause instanceof ConfigError) return serializeConfigError(cause, options)

  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? cause.code : undefined

    return { name: cause.name, message: cause.message, ...(code === undefined ? {} : { code }) }
  }

  return { name: "NonErrorThrown", message: String(cause) }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}

export class AlreadyInitializedError extends ConfigError<"already_initialized"> {
  constructor(what: string, keys: readonly string[] = []) {
    super(`${what} is already initialized; merging must happen once, into an empty store`, {
      code: "already_initialized",
      context: { keys: [...keys] },
      isOperational: false,
    })
  }
}

export class DuplicateKeyError extends ConfigError<"duplicate_key"> {
  constructor(key: string, existingSource: string, source: string) {
    super(`Cannot overwrite "${key}": already set by ${existingSource}, attempted by ${source}`, {
      code: "duplicate_key",
      context: { key, existingSource, source },
      isOperational: false,
    })
  }
}

export class KeyNotFoundError extends ConfigError<"key_not_found"> {
  constructor(key: string) {
    super(`"${key}" is not set`, {
      code: "key_not_found",
      context: { key },
      isOperational: false,
    })
  }
}

export class UnsupportedOperationError extends ConfigError<"unsupported_operation"> {
  constructor(operation: string, key: string) {
    super(`Cannot ${operation} "${key}": entries of a write-once store are permanent`, {
      code: "unsupported_operation",
      context: { operation, key },
      isOperational: false,
    })
  }
}

export class OddUnknownArgsError extends ConfigError<"odd_unknown_args"> {
  constructor(tokens: readonly string[]) {
    super(
      `Unknown arguments must come in "--key value" pairs, got ${tokens.length} token(s): ${tokens.join(" ")}`,
      { code: "odd_unknown_args", context: { tokens: [...tokens] } },
    )
  }
}

export class MalformedKeyError extends ConfigError<"malformed_key"> {
  constructor(token: string) {
    super(`Expected unknown argument keys to start with "--", but "${token}" does not`, {
      code: "malformed_key",
      context: { token },
    })
  }
}

export class DuplicateUnknownArgError extends ConfigError<"duplicate_unknown_arg"> {
  constructor(key: string) {
    super(`Unknown argument "--${key}" is given more than once`, {
      code: "duplicate_unknown_arg",
      context: { key },
    })
  }
}

export class AmbiguousSourceError extends ConfigError<"ambiguous_source"> {
  constructor(kind: string, candidates: readonly string[]) {
    super(`Expected at most one ${kind}, got ${candidates.length}: ${candidates.join(", ")}`, {
      code: "ambiguous_source",
      context: { kind, candidates: [...candidates] },
    })
  }
}

export class FileAccessError extends ConfigError<"file_access"> {
  constructor(operation: "read" | "write", path: string, cause?: unknown) {
    super(`Cannot ${operation} configuration file ${path}`, {
      code: "file_access",
      context: { operation, path },
      cause,
    })
  }
}

export class InvalidConfigFileError extends ConfigError<"invalid_config_file"> {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Invalid configuration file ${path}: ${reason}`, {
      code: "invalid_config_file",
      context: { path, reason },
      cause,
    })
  }
}

export class MissingConfigPathError extends ConfigError<"missing_config_path"> {
  constructor(flag: string) {
    super(`${flag} requires a path`, {
      code: "missing_config_path",
      context: { flag },
    })
  }
}

export class InvalidValueError extends ConfigError<"invalid_value"> {
  constructor(key: string, reason: string) {
    super(`Invalid value for "${key}": ${reason}`, {
      code: "invalid_value",
      context: { key, reason },
      isOperational: false,
    })
  }
}

export class DisallowedValueError extends ConfigError<"disallowed_value"> {
  constructor(key: string, value: unknown) {
    super(
      `"${key}" cannot be ${JSON.stringify(value)}. Specify a different value in the YAML file or on the command line.`,
      { code: "disallowed_value", context: { key, value } },
    )
  }
}

export class UnexpectedKeyError extends ConfigError<"unexpected_key"> {
  constructor(key: string, source: string) {
    super(`"${key}" is set (by ${source}) but was expected to be absent`, {
      code: "unexpected_key",
      context: { key, source },
    })
  }
}

export class HandleNotInstalledError extends ConfigError<"handle_not_installed"> {
  constructor() {
    super("No configuration store has been installed on this handle", {
      code: "handle_not_installed",
      isOperational: false,
    })
  }
}
