import { isDeepStrictEqual } from "node:util"
import type { IConfigStore } from "../ports/store"
import type { ConfigRecord, ConfigValue } from "../ports/value"
import {
  DisallowedValueError,
  DuplicateKeyError,
  KeyNotFoundError,
  UnexpectedKeyError,
  UnsupportedOperationError,
} from "./errors"
import { deepFreeze, toConfigValue } from "./value"

export const CODE_SOURCE = "code"

type Entry = {
  value: ConfigValue
  source: string
}

export class ConfigStore implements IConfigStore {
  private readonly entries = new Map<string, Entry>()

  get size(): number {
    return this.entries.size
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  get(key: string): ConfigValue {
    return this.entry(key).value
  }

  setIfAbsent(key: string, value: ConfigValue, source: string = CODE_SOURCE): ConfigValue {
    const existing = this.entries.get(key)

    if (existing) return existing.value

    return this.insert(key, value, source)
  }

  setOnce(key: string, value: ConfigValue, source: string = CODE_SOURCE): ConfigValue {
    const existing = this.entries.get(key)

    if (existing) {
      throw new DuplicateKeyError(key, existing.source, source)
    }

    return this.insert(key, value, source)
  }

  delete(key: string): never {
    throw new UnsupportedOperationError("delete", key)
  }

  keys(): string[] {
    return [...this.entries.keys()]
  }

  toObject(): Readonly<ConfigRecord> {
    const out: ConfigRecord = {}

    for (const [key, { value }] of this.entries) {
      out[key] = value
    }

    return Object.freeze(out)
  }

  explain(key: string): string {
    return this.entry(key).source
  }

  sourcesUsed(): string[] {
    const sources = [...this.entries.values()].map((e) => e.source)

    return [...new Set(sources)]
  }

  assertContains(key: string, options: { not?: ConfigValue } = {}): void {
    const { value } = this.entry(key)

    if ("not" in options && isDeepStrictEqual(value, options.not)) {
      throw new DisallowedValueError(key, value)
    }
  }

  assertAbsent(key: string): void {
    const existing = this.entries.get(key)

    if (existing) {
      throw new UnexpectedKeyError(key, existing.source)
    }
  }

  toString(): string {
    return JSON.stringify(this.toObject())
  }

  private entry(key: string): Entry {
    const entry = this.entries.get(key)

    if (!entry) throw new KeyNotFoundError(key)

    return entry
  }

  private insert(key: string, value: ConfigValue, source: string): ConfigValue {
    // validated copy, deep-frozen
    const stored = deepFreeze(toConfigValue(value, key))

    this.entries.set(key, { value: stored, source })

    return stored
  }
}
