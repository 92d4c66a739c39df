export { CommanderParser } from "./adapters/commander/commander-parser"
export { YamlSource, type YamlSourceOptions } from "./adapters/yaml/yaml-source"
export { inferScalar } from "./codec/infer"
export { SCALAR_RULES, type ScalarRule, toYamlTags } from "./codec/scalar-rules"
export { dumpYaml, loadYaml, parseConfigMapping } from "./codec/yaml-codec"
export {
  CONFIG_FLAG,
  type ExtractedConfigFlag,
  extractConfigFlag,
  resolveConfigFile,
} from "./core/config-path"
export { defaultConfigLogger } from "./core/default-logger"
export {
  AlreadyInitializedError,
  AmbiguousSourceError,
  ConfigError,
  type ConfigErrorCode,
  type ConfigErrorOptions,
  DisallowedValueError,
  DuplicateKeyError,
  DuplicateUnknownArgError,
  type ErrorContext,
  FileAccessError,
  HandleNotInstalledError,
  InvalidConfigFileError,
  InvalidValueError,
  isConfigError,
  KeyNotFoundError,
  MalformedKeyError,
  MissingConfigPathError,
  OddUnknownArgsError,
  type SerializedCause,
  type SerializedConfigError,
  type SerializeOptions,
  serializeConfigError,
  UnexpectedKeyError,
  UnsupportedOperationError,
} from "./core/errors"
export { ConfigHandle } from "./core/handle"
export { type ImportPrefixedOptions, importPrefixed } from "./core/import-prefixed"
export {
  CLI_SOURCE,
  DEFAULT_SOURCE,
  type MergeConfigOptions,
  type MergeSource,
  mergeConfig,
  UNKNOWN_CLI_SOURCE,
} from "./core/merge"
export { type SaveConfigOptions, saveConfig } from "./core/save"
export { CODE_SOURCE, ConfigStore } from "./core/store"
export { parseUnknownArgs, type UnknownArgPair } from "./core/unknown-args"
export { configValueSchema, toConfigValue } from "./core/value"
export type {
  DeclaredFlag,
  DeclaredParser,
  DeclaredPositional,
  ParsedArguments,
} from "./ports/declared-parser"
export type { ConfigSource } from "./ports/source"
export type { IConfigStore } from "./ports/store"
export type { ConfigRecord, ConfigValue, InferredValue } from "./ports/value"
