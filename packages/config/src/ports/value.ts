/**
 * Scalars produced by type inference on a raw CLI token or YAML plain scalar.
 *
 * Integers and floats share `number`; an integer token outside the safe
 * integer range is kept as its original string.
 */
export type InferredValue = number | boolean | null | string

export type ConfigValue = InferredValue | ConfigValue[] | { [key: string]: ConfigValue }

/** A top-level mapping, as loaded from a configuration file or dumped from a store. */
export type ConfigRecord = { [key: string]: ConfigValue }
