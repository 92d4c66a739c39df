import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { createNullLogger } from "@firstwrite/logger"
import { DuplicateKeyError, FileAccessError, InvalidValueError } from "../errors"
import { importPrefixed } from "../import-prefixed"
import { ConfigStore } from "../store"

describe("importPrefixed", () => {
  const logger = createNullLogger()
  let cwd: string
  let store: ConfigStore

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "import-test-"))
    store = new ConfigStore()
    await fs.writeFile(
      path.join(cwd, "train.yaml"),
      "net.depth: 4\nlr: 0.1\nnet.act: relu\nft.epochs: 3\n",
    )
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("imports the keys matching any prefix, in file order", () => {
    const imported = importPrefixed(store, {
      file: "train.yaml",
      prefixes: ["net.", "ft."],
      cwd,
      logger,
    })

    expect(imported).toEqual(["net.depth", "net.act", "ft.epochs"])
    expect(store.toObject()).toEqual({ "net.depth": 4, "net.act": "relu", "ft.epochs": 3 })
    expect(store.explain("net.act")).toBe("yaml:train.yaml")
    expect(store.has("lr")).toBe(false)
  })

  it("rejects a key that is already set", () => {
    store.setOnce("net.depth", 8, "cli")

    expect(() =>
      importPrefixed(store, { file: "train.yaml", prefixes: ["net."], cwd, logger }),
    ).toThrow(DuplicateKeyError)
    expect(store.get("net.depth")).toBe(8)
  })

  it("requires at least one prefix", () => {
    expect(() => importPrefixed(store, { file: "train.yaml", prefixes: [], cwd, logger })).toThrow(
      InvalidValueError,
    )
  })

  it("requires the file to exist", () => {
    expect(() =>
      importPrefixed(store, { file: "missing.yaml", prefixes: ["net."], cwd, logger }),
    ).toThrow(FileAccessError)
  })
})
