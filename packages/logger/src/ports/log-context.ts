/**
 * Structured fields attached to configuration log lines.
 */
export type LogContext = {
  service: string
  module: string

  /** Provenance name of the source being applied, e.g. "cli" or "yaml:config.yaml". */
  source: string
  key: string
  file: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
