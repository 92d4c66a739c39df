import type { InferredValue } from "../ports/value"
import { SCALAR_RULES } from "./scalar-rules"

/**
 * Infers the most specific value for a raw CLI token, using the same table the
 * YAML codec resolves plain scalars with.
 *
 * @example
 * inferScalar("42")    // 42
 * inferScalar("3.14")  // 3.14
 * inferScalar("None")  // null
 * inferScalar("True")  // true
 * inferScalar("yes")   // "yes"
 */
export function inferScalar(raw: string): InferredValue {
  // An explicitly passed empty argument stays a string; in YAML an empty value is null.
  if (raw === "") return raw

  const rule = SCALAR_RULES.find((r) => r.test.test(raw))

  return rule ? rule.resolve(raw) : raw
}
