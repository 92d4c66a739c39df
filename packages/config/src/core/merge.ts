import type { Logger } from "@firstwrite/logger"
import { Command } from "commander"
import { CommanderParser } from "../adapters/commander/commander-parser"
import { YamlSource } from "../adapters/yaml/yaml-source"
import { inferScalar } from "../codec/infer"
import type { DeclaredFlag, DeclaredParser, ParsedArguments } from "../ports/declared-parser"
import type { ConfigSource } from "../ports/source"
import type { IConfigStore } from "../ports/store"
import type { ConfigRecord, ConfigValue } from "../ports/value"
import { extractConfigFlag, resolveConfigFile } from "./config-path"
import { defaultConfigLogger } from "./default-logger"
import { AlreadyInitializedError, AmbiguousSourceError } from "./errors"
import { parseUnknownArgs, type UnknownArgPair } from "./unknown-args"
import { ConfigStore } from "./store"
import { toConfigValue } from "./value"

export const CLI_SOURCE = "cli"
export const UNKNOWN_CLI_SOURCE = "cli:unknown"
export const DEFAULT_SOURCE = "default"

/** The flag name reserved for selecting the configuration file. */
const RESERVED_KEY = "config"

/** A YAML file path, a DeclaredParser, or a commander Command to wrap. */
export type MergeSource = string | DeclaredParser | Command

export type MergeConfigOptions = {
  /** At most one file path and at most one parser. */
  sources?: readonly MergeSource[]

  /**
   * User arguments, without the node binary and script path.
   * @default process.argv.slice(2)
   */
  argv?: readonly string[]

  /**
   * Base directory for relative file paths.
   * @default process.cwd()
   */
  cwd?: string

  logger?: Logger
}

function splitSources(sources: readonly MergeSource[]): {
  files: string[]
  parsers: DeclaredParser[]
} {
  const files: string[] = []
  const parsers: DeclaredParser[] = []

  for (const source of sources) {
    if (typeof source === "string") files.push(source)
    else if (source instanceof Command) parsers.push(new CommanderParser(source))
    else parsers.push(source)
  }

  if (files.length > 1) throw new AmbiguousSourceError("config file", files)
  if (parsers.length > 1) {
    throw new AmbiguousSourceError(
      "declared parser",
      parsers.map((p) => p.name),
    )
  }

  return { files, parsers }
}

function selects(flagToken: string, token: string): boolean {
  if (token === flagToken) return true
  if (flagToken.startsWith("--")) return token.startsWith(`${flagToken}=`)

  // -n5
  return !token.startsWith("--") && token.startsWith(flagToken)
}

function isUserSpecified(flag: DeclaredFlag, argv: readonly string[]): boolean {
  return argv.some((token) => flag.tokens.some((t) => selects(t, token)))
}

/** Explicit CLI text is inferred; values the parser already typed are kept. */
function explicitValue(value: unknown, key: string): ConfigValue {
  return typeof value === "string" ? inferScalar(value) : toConfigValue(value, key)
}

type Plan = {
  argv: string[]
  parsed: ParsedArguments
  unknown: UnknownArgPair[]
  file: ConfigSource | undefined
  fileValues: ConfigRecord
}

/**
 * Runs every parse and load the merge needs. Nothing is written, so bad input
 * fails before the store is touched.
 */
function plan(options: MergeConfigOptions, logger: Logger): Plan {
  const cwd = options.cwd ?? process.cwd()
  const { files, parsers } = splitSources(options.sources ?? [])
  const extracted = extractConfigFlag(options.argv ?? process.argv.slice(2))

  const parser = parsers[0] ?? new CommanderParser(new Command())
  const parsed = parser.parse(extracted.argv)
  const unknown = parseUnknownArgs(parsed.unknown)

  const resolved = resolveConfigFile({
    programmatic: files[0],
    cli: extracted.file,
    cwd,
    logger,
  })

  if (resolved === undefined) {
    return { argv: extracted.argv, parsed, unknown, file: undefined, fileValues: {} }
  }

  logger.info(`Reading arguments from ${resolved}`, { file: resolved })
  const file = new YamlSource({ file: resolved, required: true, cwd })

  return { argv: extracted.argv, parsed, unknown, file, fileValues: file.load() }
}

/**
 * Collects the two explicit tiers in a scratch store and validates the
 * defaults, so a collision or a bad value fails before the target store is
 * written.
 */
function stageExplicit(
  argv: readonly string[],
  parsed: ParsedArguments,
  unknown: readonly UnknownArgPair[],
): { values: ConfigStore; defaults: [string, ConfigValue][] } {
  const values = new ConfigStore()
  const defaults: [string, ConfigValue][] = []

  for (const flag of parsed.flags) {
    if (flag.key === RESERVED_KEY) continue

    if (isUserSpecified(flag, argv)) {
      values.setOnce(flag.key, explicitValue(flag.value, flag.key), CLI_SOURCE)
    } else {
      defaults.push([flag.key, toConfigValue(flag.value, flag.key)])
    }
  }

  for (const positional of parsed.positionals) {
    if (positional.value === undefined) continue
    values.setOnce(positional.key, explicitValue(positional.value, positional.key), CLI_SOURCE)
  }

  for (const { key, raw } of unknown) {
    values.setOnce(key, inferScalar(raw), UNKNOWN_CLI_SOURCE)
  }

  return { values, defaults }
}

/**
 * Merges the command line, a YAML file and parser defaults into an empty store.
 *
 * Priority, highest first:
 * 1. declared flags present in argv, and supplied positionals (`setOnce`)
 * 2. undeclared `--key value` pairs (`setOnce`)
 * 3. top-level keys of the YAML file (`setIfAbsent`)
 * 4. defaults of declared flags not present in argv (`setIfAbsent`)
 *
 * The file is the `--config <path>` from argv when given, else the file
 * among `sources`.
 *
 * @throws AlreadyInitializedError when the store is not empty
 *
 * @example
 * ```typescript
 * const program = new Command().option("--default <value>", "", "default")
 *
 * mergeConfig(store, {
 *   sources: ["base.yaml", program],
 *   argv: ["--default", "cli", "--seed", "7"],
 * })
 *
 * store.get("default") // "cli"
 * store.get("seed")    // 7
 * ```
 */
export function mergeConfig(
  store: IConfigStore,
  options: MergeConfigOptions = {},
): IConfigStore {
  const logger = options.logger ?? defaultConfigLogger()

  if (store.size > 0) {
    const err = new AlreadyInitializedError("Config store", store.keys())
    logger.error(err.message, { err })
    throw err
  }

  const { argv, parsed, unknown, file, fileValues } = plan(options, logger)
  const explicit = stageExplicit(argv, parsed, unknown)

  for (const key of explicit.values.keys()) {
    store.setOnce(key, explicit.values.get(key), explicit.values.explain(key))
  }

  if (file) {
    for (const [key, value] of Object.entries(fileValues)) {
      store.setIfAbsent(key, value, file.name)
    }
  }

  for (const [key, value] of explicit.defaults) {
    store.setIfAbsent(key, value, DEFAULT_SOURCE)
  }

  logger.debug("Merged configuration", {
    keys: store.size,
    sources: store.sourcesUsed(),
  })

  return store
}
