import {
  DisallowedValueError,
  DuplicateKeyError,
  KeyNotFoundError,
  UnexpectedKeyError,
  UnsupportedOperationError,
} from "../errors"
import { CODE_SOURCE, ConfigStore } from "../store"

describe("ConfigStore", () => {
  let store: ConfigStore

  beforeEach(() => {
    store = new ConfigStore()
  })

  describe("setIfAbsent", () => {
    it("stores and returns a new value", () => {
      expect(store.setIfAbsent("lr", 0.1)).toBe(0.1)
      expect(store.get("lr")).toBe(0.1)
    })

    it("returns the existing value and ignores the new one", () => {
      store.setIfAbsent("lr", 0.1)

      expect(store.setIfAbsent("lr", 0.5)).toBe(0.1)
      expect(store.get("lr")).toBe(0.1)
    })

    it("keeps the source of the first write", () => {
      store.setIfAbsent("lr", 0.1, "cli")
      store.setIfAbsent("lr", 0.5, "default")

      expect(store.explain("lr")).toBe("cli")
    })

    it("records code as the default source", () => {
      store.setIfAbsent("lr", 0.1)

      expect(store.explain("lr")).toBe(CODE_SOURCE)
    })

    it("stores null as a present value", () => {
      expect(store.setIfAbsent("resume", null)).toBeNull()
      expect(store.has("resume")).toBe(true)
      expect(store.setIfAbsent("resume", "ckpt.pt")).toBeNull()
    })
  })

  describe("setOnce", () => {
    it("stores a value for a new key", () => {
      expect(store.setOnce("seed", 7, "cli")).toBe(7)
      expect(store.explain("seed")).toBe("cli")
    })

    it("throws DuplicateKeyError for a present key and keeps the value", () => {
      store.setOnce("seed", 7, "cli")

      expect(() => store.setOnce("seed", 8, "cli:unknown")).toThrow(DuplicateKeyError)
      expect(() => store.setOnce("seed", 8, "cli:unknown")).toThrow(
        'Cannot overwrite "seed": already set by cli, attempted by cli:unknown',
      )
      expect(store.get("seed")).toBe(7)
    })

    it("throws even when the value is equal", () => {
      store.setOnce("seed", 7)

      expect(() => store.setOnce("seed", 7)).toThrow(DuplicateKeyError)
    })
  })

  describe("reads", () => {
    it("get throws KeyNotFoundError for a missing key", () => {
      expect(() => store.get("missing")).toThrow(KeyNotFoundError)
      expect(() => store.get("missing")).toThrow('"missing" is not set')
    })

    it("explain throws KeyNotFoundError for a missing key", () => {
      expect(() => store.explain("missing")).toThrow(KeyNotFoundError)
    })

    it("has reports presence", () => {
      store.setIfAbsent("a", 1)

      expect(store.has("a")).toBe(true)
      expect(store.has("b")).toBe(false)
    })

    it("keys and size follow insertion order", () => {
      store.setIfAbsent("b", 1)
      store.setOnce("a", 2)

      expect(store.keys()).toEqual(["b", "a"])
      expect(store.size).toBe(2)
    })
  })

  describe("delete", () => {
    it("always throws and leaves the entry", () => {
      store.setIfAbsent("a", 1)

      expect(() => store.delete("a")).toThrow(UnsupportedOperationError)
      expect(() => store.delete("missing")).toThrow(UnsupportedOperationError)
      expect(store.get("a")).toBe(1)
    })
  })

  describe("stored values", () => {
    it("copies and freezes collections", () => {
      const input = { layers: [64, 32] }
      const stored = store.setIfAbsent("net", input)

      input.layers.push(16)

      expect(store.get("net")).toEqual({ layers: [64, 32] })
      expect(Object.isFrozen(stored)).toBe(true)
    })
  })

  describe("snapshot", () => {
    it("toObject returns a frozen copy", () => {
      store.setIfAbsent("a", 1)

      const snapshot = store.toObject()

      expect(snapshot).toEqual({ a: 1 })
      expect(Object.isFrozen(snapshot)).toBe(true)

      store.setIfAbsent("b", 2)
      expect(snapshot).toEqual({ a: 1 })
    })

    it("toString renders JSON", () => {
      store.setIfAbsent("a", 1)
      store.setIfAbsent("b", "x")

      expect(String(store)).toBe('{"a":1,"b":"x"}')
    })

    it("sourcesUsed lists distinct sources in first-write order", () => {
      store.setOnce("a", 1, "cli")
      store.setIfAbsent("b", 2, "yaml:run.yaml")
      store.setOnce("c", 3, "cli")
      store.setIfAbsent("d", 4)

      expect(store.sourcesUsed()).toEqual(["cli", "yaml:run.yaml", "code"])
    })
  })

  describe("assertions", () => {
    it("assertContains passes for a present key", () => {
      store.setIfAbsent("data", "train.csv")

      expect(() => store.assertContains("data")).not.toThrow()
      expect(() => store.assertContains("data", { not: "CHANGE_ME" })).not.toThrow()
    })

    it("assertContains throws KeyNotFoundError for a missing key", () => {
      expect(() => store.assertContains("data")).toThrow(KeyNotFoundError)
    })

    it("assertContains rejects the placeholder value", () => {
      store.setIfAbsent("data", "CHANGE_ME")

      expect(() => store.assertContains("data", { not: "CHANGE_ME" })).toThrow(DisallowedValueError)
    })

    it("assertContains compares null placeholders", () => {
      store.setIfAbsent("data", null)

      expect(() => store.assertContains("data", { not: null })).toThrow(DisallowedValueError)
    })

    it("assertContains compares collections structurally", () => {
      store.setIfAbsent("sizes", [1, 2])

      expect(() => store.assertContains("sizes", { not: [1, 2] })).toThrow(DisallowedValueError)
      expect(() => store.assertContains("sizes", { not: [2, 1] })).not.toThrow()
    })

    it("assertAbsent names the source of an unexpected key", () => {
      store.setOnce("legacy", true, "cli:unknown")

      expect(() => store.assertAbsent("legacy")).toThrow(UnexpectedKeyError)
      expect(() => store.assertAbsent("legacy")).toThrow('"legacy" is set (by cli:unknown)')
      expect(() => store.assertAbsent("other")).not.toThrow()
    })
  })
})
