import fs from "node:fs"
import path from "node:path"
import { parseConfigMapping } from "../../codec/yaml-codec"
import { FileAccessError } from "../../core/errors"
import type { ConfigSource } from "../../ports/source"
import type { ConfigRecord } from "../../ports/value"

/**
 * Options for creating a YAML configuration source.
 */
export type YamlSourceOptions = {
  /**
   * Path to the YAML file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.yaml", "./runs/baseline.yaml"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws FileAccessError if the file cannot be read.
   * - `false`: Returns an empty mapping if the file is missing.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class YamlSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: YamlSourceOptions) {
    this.name = `yaml:${opts.file}`
  }

  load(): ConfigRecord {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)
    let content: string

    try {
      content = fs.readFileSync(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw new FileAccessError("read", filePath, err)
    }

    return parseConfigMapping(content, filePath)
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
