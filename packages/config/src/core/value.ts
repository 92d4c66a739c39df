import { z } from "zod"
import type { ConfigValue } from "../ports/value"
import { InvalidValueError } from "./errors"

// z.number() rejects NaN and the infinities, which `.nan` and `.inf` resolve to.
const numberSchema = z.custom<number>((value) => typeof value === "number", {
  message: "Expected number",
})

export const configValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    numberSchema,
    z.boolean(),
    z.null(),
    z.array(configValueSchema),
    z.record(z.string(), configValueSchema),
  ]),
)

/**
 * Validates a value from a parser or from program code against the
 * ConfigValue domain. `undefined` becomes `null`.
 */
export function toConfigValue(value: unknown, key: string): ConfigValue {
  const result = configValueSchema.safeParse(value === undefined ? null : value)

  if (!result.success) {
    throw new InvalidValueError(key, z.prettifyError(result.error))
  }

  return result.data
}

export function deepFreeze<T extends ConfigValue>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }

  return value
}
