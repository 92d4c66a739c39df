import { DuplicateUnknownArgError, MalformedKeyError, OddUnknownArgsError } from "./errors"

export type UnknownArgPair = {
  key: string
  raw: string
}

/**
 * Reads residual argv tokens as `--key value` pairs.
 *
 * The whole list is validated before anything is returned, so a malformed
 * token never leaves a half-applied tier behind.
 */
export function parseUnknownArgs(tokens: readonly string[]): UnknownArgPair[] {
  if (tokens.length % 2 !== 0) {
    throw new OddUnknownArgsError(tokens)
  }

  const pairs: UnknownArgPair[] = []
  const seen = new Set<string>()

  for (let i = 0; i < tokens.length; i += 2) {
    const token = tokens[i] ?? ""
    const raw = tokens[i + 1] ?? ""

    if (!token.startsWith("--") || token.length === 2) {
      throw new MalformedKeyError(token)
    }

    const key = token.slice(2)

    if (seen.has(key)) {
      throw new DuplicateUnknownArgError(key)
    }
    seen.add(key)

    pairs.push({ key, raw })
  }

  return pairs
}
