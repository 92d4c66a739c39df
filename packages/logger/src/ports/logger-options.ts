import type { LogLevelName } from "./log-level"

/**
 * Options shared by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. "warn" suppresses the per-tier merge chatter
   * and keeps the config path mismatch warning.
   */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off when logs are
   * collected as JSON.
   */
  prettify?: boolean
}
