import { parse, type SchemaOptions, stringify } from "yaml"
import { z } from "zod"
import { InvalidConfigFileError } from "../core/errors"
import { configValueSchema } from "../core/value"
import type { ConfigRecord, ConfigValue } from "../ports/value"
import { toYamlTags } from "./scalar-rules"

// failsafe provides maps, sequences and strings; every other scalar comes from the table.
const yamlOptions: SchemaOptions = {
  schema: "failsafe",
  customTags: toYamlTags(),
}

const configMappingSchema = z.record(z.string(), configValueSchema)

/**
 * Parses a YAML document. Plain scalars resolve through the scalar table,
 * quoted scalars are strings, and an empty document is `null`.
 */
export function loadYaml(text: string): ConfigValue {
  const value: unknown = parse(text, yamlOptions)

  return configValueSchema.parse(value ?? null)
}

/**
 * Serializes a value with the same scalar table. Strings that would resolve to
 * another type are quoted, mapping keys are sorted.
 */
export function dumpYaml(value: ConfigValue): string {
  return stringify(value, { ...yamlOptions, sortMapEntries: true })
}

/**
 * Loads a configuration document whose top level must be a mapping.
 *
 * @param file - Used in error messages only.
 */
export function parseConfigMapping(text: string, file: string): ConfigRecord {
  let value: unknown

  try {
    value = parse(text, yamlOptions)
  } catch (err) {
    throw new InvalidConfigFileError(file, err instanceof Error ? err.message : String(err), err)
  }

  if (value === null || value === undefined) return {}

  const result = configMappingSchema.safeParse(value)

  if (!result.success) {
    throw new InvalidConfigFileError(
      file,
      `top level must be a mapping of plain values\n${z.prettifyError(result.error)}`,
    )
  }

  return result.data
}
