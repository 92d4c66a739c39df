import type { ScalarTag } from "yaml"
import type { InferredValue } from "../ports/value"

/**
 * One row of the scalar-resolution table. `resolve` is only called on tokens
 * that pass `test`; `identify` and `format` drive the reverse direction.
 */
export type ScalarRule = {
  tag: string
  test: RegExp
  resolve: (raw: string) => InferredValue
  identify: (value: unknown) => boolean
  format: (value: unknown) => string
}

const INT = /^[-+]?\d+$/
const FLOAT = /^(?:[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/
const NULL = /^(?:~|null|Null|NULL|None)?$/
const TRUE = /^(?:true|True|TRUE)$/
const BOOL = /^(?:true|True|TRUE|false|False|FALSE)$/

function resolveInt(raw: string): InferredValue {
  const n = Number(raw)

  return Number.isSafeInteger(n) ? n : raw
}

function resolveFloat(raw: string): InferredValue {
  const lower = raw.toLowerCase()

  if (lower.endsWith(".inf")) return lower.startsWith("-") ? -Infinity : Infinity
  if (lower === ".nan") return Number.NaN

  return Number(raw)
}

function formatNumber(value: unknown): string {
  if (typeof value !== "number") return String(value)
  if (Number.isNaN(value)) return ".nan"
  if (value === Infinity) return ".inf"
  if (value === -Infinity) return "-.inf"

  return String(value)
}

/**
 * Resolution order: numbers, then null, then booleans.
 *
 * Only the canonical spellings are booleans; `yes`, `no`, `on` and `off` in any
 * case fall through to strings.
 */
export const SCALAR_RULES: readonly ScalarRule[] = [
  {
    tag: "tag:yaml.org,2002:int",
    test: INT,
    resolve: resolveInt,
    identify: (value) => typeof value === "number" && Number.isInteger(value),
    format: formatNumber,
  },
  {
    tag: "tag:yaml.org,2002:float",
    test: FLOAT,
    resolve: resolveFloat,
    identify: (value) => typeof value === "number",
    format: formatNumber,
  },
  {
    tag: "tag:yaml.org,2002:null",
    test: NULL,
    resolve: () => null,
    identify: (value) => value === null || value === undefined,
    format: () => "null",
  },
  {
    tag: "tag:yaml.org,2002:bool",
    test: BOOL,
    resolve: (raw) => TRUE.test(raw),
    identify: (value) => typeof value === "boolean",
    format: (value) => (value ? "true" : "false"),
  },
]

/** Exposes the table through the yaml library's `customTags` hook. */
export function toYamlTags(rules: readonly ScalarRule[] = SCALAR_RULES): ScalarTag[] {
  return rules.map((rule) => ({
    tag: rule.tag,
    default: true,
    test: rule.test,
    identify: rule.identify,
    resolve: (raw) => rule.resolve(raw),
    stringify: (item) => rule.format(item.value),
  }))
}
