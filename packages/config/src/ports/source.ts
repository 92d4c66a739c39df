import type { ConfigRecord } from "./value"

/**
 * A source of configuration values for the file tier of a merge.
 *
 * A ConfigSource only *loads* a mapping. Priority between sources is decided
 * by the merge, never by the source.
 */
export interface ConfigSource {
  /**
   * Provenance name recorded for every key the source contributes.
   * Example: "yaml:config.yaml"
   */
  readonly name: string

  /**
   * Load the top-level mapping. Synchronous: merging happens once at start-up,
   * before any concurrent work.
   */
  load(): ConfigRecord
}
