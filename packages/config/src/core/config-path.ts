import path from "node:path"
import type { Logger } from "@firstwrite/logger"
import { AmbiguousSourceError, MissingConfigPathError } from "./errors"

export const CONFIG_FLAG = "--config"

export type ExtractedConfigFlag = {
  /** Path given with `--config`, if any. */
  file: string | undefined

  /** argv with the `--config` tokens removed. */
  argv: string[]
}

/**
 * Removes the reserved `--config <path>` (or `--config=<path>`) from argv.
 */
export function extractConfigFlag(argv: readonly string[]): ExtractedConfigFlag {
  const rest: string[] = []
  const found: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? ""

    if (token === "--") {
      rest.push(...argv.slice(i))
      break
    }

    if (token.startsWith(`${CONFIG_FLAG}=`)) {
      const value = token.slice(CONFIG_FLAG.length + 1)

      if (value === "") throw new MissingConfigPathError(CONFIG_FLAG)
      found.push(value)
      continue
    }

    if (token === CONFIG_FLAG) {
      const value = argv[i + 1]

      if (value === undefined || value === "") throw new MissingConfigPathError(CONFIG_FLAG)
      found.push(value)
      i += 1
      continue
    }

    rest.push(token)
  }

  if (found.length > 1) {
    throw new AmbiguousSourceError(`${CONFIG_FLAG} path`, found)
  }

  return { file: found[0], argv: rest }
}

export type ResolveConfigFileOptions = {
  /** Path passed programmatically to the merge. */
  programmatic: string | undefined

  /** Path given on the command line. */
  cli: string | undefined

  cwd: string
  logger: Logger
}

/**
 * Picks the one file the merge reads. The command line wins; a differing
 * programmatic path is reported as a warning.
 */
export function resolveConfigFile({
  programmatic,
  cli,
  cwd,
  logger,
}: ResolveConfigFileOptions): string | undefined {
  if (cli === undefined) return programmatic
  if (programmatic === undefined) return cli

  if (path.resolve(cwd, programmatic) !== path.resolve(cwd, cli)) {
    logger.warn(`Config file ${programmatic} is overridden by ${CONFIG_FLAG} ${cli}`, {
      file: cli,
      overridden: programmatic,
    })
  }

  return cli
}
