import type { ConfigRecord, ConfigValue } from "./value"

/**
 * Write-once key/value store holding a run's configuration.
 *
 * Keys are only ever added. Saving the store at the end of a run and loading
 * that file on the next one reproduces every value, even if the defaults
 * written in code have changed in between.
 *
 * @example
 * ```typescript
 * const config = new ConfigStore()
 * mergeConfig(config, { sources: ["run.yaml", program] })
 *
 * const lr = config.setIfAbsent("lr", 0.001)
 * config.explain("lr")  // "yaml:run.yaml", "cli", or "code"
 * saveConfig(config, "out/run.yaml")
 * ```
 */
export interface IConfigStore {
  readonly size: number

  has(key: string): boolean

  /** @throws KeyNotFoundError when the key is absent */
  get(key: string): ConfigValue

  /**
   * Stores `value` unless the key is already set, then returns the stored value.
   *
   * @param source - Provenance recorded for the key. Defaults to "code".
   */
  setIfAbsent(key: string, value: ConfigValue, source?: string): ConfigValue

  /**
   * Stores `value` for a key that must not be set yet.
   *
   * @throws DuplicateKeyError when the key is present
   */
  setOnce(key: string, value: ConfigValue, source?: string): ConfigValue

  /** @throws UnsupportedOperationError always */
  delete(key: string): never

  keys(): string[]

  /** A frozen snapshot of every entry. */
  toObject(): Readonly<ConfigRecord>

  /**
   * Names the source that wrote a key: "cli", "cli:unknown", "yaml:<file>",
   * "default", or the source passed to setIfAbsent/setOnce.
   *
   * @throws KeyNotFoundError when the key is absent
   */
  explain(key: string): string

  /** Distinct source names, in the order they first wrote a key. */
  sourcesUsed(): string[]

  /**
   * Requires the key to be set, and optionally to differ from a placeholder.
   *
   * @throws KeyNotFoundError when the key is absent
   * @throws DisallowedValueError when the value equals `options.not`
   */
  assertContains(key: string, options?: { not?: ConfigValue }): void

  /** @throws UnexpectedKeyError when the key is present */
  assertAbsent(key: string): void
}
