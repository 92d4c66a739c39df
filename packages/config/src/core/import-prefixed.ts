import type { Logger } from "@firstwrite/logger"
import { YamlSource } from "../adapters/yaml/yaml-source"
import type { IConfigStore } from "../ports/store"
import { defaultConfigLogger } from "./default-logger"
import { InvalidValueError } from "./errors"

export type ImportPrefixedOptions = {
  /** YAML file to read, typically the saved configuration of an earlier run. */
  file: string

  /** Keys starting with any of these are imported, e.g. `["net.", "ft."]`. */
  prefixes: readonly string[]

  /** @default process.cwd() */
  cwd?: string
  logger?: Logger
}

/**
 * Copies the prefixed keys of another run's configuration into the store,
 * so that e.g. a prediction run picks up the model settings it was trained
 * with. Each key is written with `setOnce`: a value already chosen for this
 * run is a conflict, not something to override.
 *
 * @returns The imported keys, in file order.
 * @throws DuplicateKeyError when an imported key is already set
 */
export function importPrefixed(store: IConfigStore, options: ImportPrefixedOptions): string[] {
  if (options.prefixes.length === 0) {
    throw new InvalidValueError("prefixes", "at least one prefix is required")
  }

  const logger = (options.logger ?? defaultConfigLogger()).child({ file: options.file })
  const source = new YamlSource({ file: options.file, required: true, cwd: options.cwd })
  const imported: string[] = []

  logger.info(`Reading prefixed arguments from ${options.file}`)

  for (const [key, value] of Object.entries(source.load())) {
    if (!options.prefixes.some((prefix) => key.startsWith(prefix))) continue

    store.setOnce(key, value, source.name)
    imported.push(key)
    logger.debug(`Imported ${key}`, { key })
  }

  return imported
}
