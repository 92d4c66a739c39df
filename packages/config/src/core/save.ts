import fs from "node:fs"
import path from "node:path"
import type { Logger } from "@firstwrite/logger"
import { dumpYaml } from "../codec/yaml-codec"
import type { IConfigStore } from "../ports/store"
import { defaultConfigLogger } from "./default-logger"
import { FileAccessError } from "./errors"

export type SaveConfigOptions = {
  /** @default process.cwd() */
  cwd?: string
  logger?: Logger
}

/**
 * Writes every entry of the store to a YAML file, creating parent
 * directories. Loading that file with `--config` on a later run reproduces
 * this run's values.
 *
 * @returns The absolute path written.
 */
export function saveConfig(
  store: IConfigStore,
  file: string,
  options: SaveConfigOptions = {},
): string {
  const logger = options.logger ?? defaultConfigLogger()
  const filePath = path.resolve(options.cwd ?? process.cwd(), file)
  const text = dumpYaml({ ...store.toObject() })

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    fs.writeFileSync(filePath, text, "utf-8")
  } catch (err) {
    throw new FileAccessError("write", filePath, err)
  }

  logger.info(`Saved arguments to ${filePath}`, { file: filePath })

  return filePath
}
