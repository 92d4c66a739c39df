import type { Logger } from "@firstwrite/logger"
import { mock } from "vitest-mock-extended"
import { extractConfigFlag, resolveConfigFile } from "../config-path"
import { AmbiguousSourceError, MissingConfigPathError } from "../errors"

describe("extractConfigFlag", () => {
  it("removes --config and its path", () => {
    expect(extractConfigFlag(["--lr", "0.1", "--config", "run.yaml", "--seed", "7"])).toEqual({
      file: "run.yaml",
      argv: ["--lr", "0.1", "--seed", "7"],
    })
  })

  it("reads the --config=path form", () => {
    expect(extractConfigFlag(["--config=run.yaml", "data.csv"])).toEqual({
      file: "run.yaml",
      argv: ["data.csv"],
    })
  })

  it("returns argv unchanged without --config", () => {
    expect(extractConfigFlag(["--lr", "0.1"])).toEqual({ file: undefined, argv: ["--lr", "0.1"] })
  })

  it("leaves tokens after -- alone", () => {
    expect(extractConfigFlag(["a", "--", "--config", "x.yaml"])).toEqual({
      file: undefined,
      argv: ["a", "--", "--config", "x.yaml"],
    })
  })

  it("requires a path", () => {
    expect(() => extractConfigFlag(["--config"])).toThrow(MissingConfigPathError)
    expect(() => extractConfigFlag(["--config="])).toThrow("--config requires a path")
  })

  it("rejects more than one path", () => {
    expect(() => extractConfigFlag(["--config", "a.yaml", "--config=b.yaml"])).toThrow(
      AmbiguousSourceError,
    )
    expect(() => extractConfigFlag(["--config", "a.yaml", "--config=b.yaml"])).toThrow(
      "Expected at most one --config path, got 2: a.yaml, b.yaml",
    )
  })
})

describe("resolveConfigFile", () => {
  const cwd = "/work"

  it("returns undefined without any path", () => {
    const logger = mock<Logger>()

    expect(resolveConfigFile({ programmatic: undefined, cli: undefined, cwd, logger })).toBe(
      undefined,
    )
  })

  it("uses the programmatic path alone", () => {
    const logger = mock<Logger>()

    expect(resolveConfigFile({ programmatic: "a.yaml", cli: undefined, cwd, logger })).toBe(
      "a.yaml",
    )
  })

  it("prefers the command line path and warns", () => {
    const logger = mock<Logger>()

    expect(resolveConfigFile({ programmatic: "a.yaml", cli: "b.yaml", cwd, logger })).toBe(
      "b.yaml",
    )
    expect(logger.warn).toHaveBeenCalledWith("Config file a.yaml is overridden by --config b.yaml", {
      file: "b.yaml",
      overridden: "a.yaml",
    })
  })

  it("does not warn when both name the same file", () => {
    const logger = mock<Logger>()

    expect(resolveConfigFile({ programmatic: "./a.yaml", cli: "/work/a.yaml", cwd, logger })).toBe(
      "/work/a.yaml",
    )
    expect(logger.warn).not.toHaveBeenCalled()
  })
})
