import type { Command, Option } from "commander"
import type { DeclaredFlag, DeclaredParser, ParsedArguments } from "../../ports/declared-parser"

const HELP_TOKENS = new Set(["-h", "--help"])
const NEGATIVE_NUMBER = /^-\d/

function looksLikeOption(token: string): boolean {
  return token.length > 1 && token.startsWith("-") && !NEGATIVE_NUMBER.test(token)
}

function optionTokens(option: Option): string[] {
  return [option.long, option.short].filter((t): t is string => t !== undefined)
}

/** `--dry-run` and its negation `--no-dry-run` both key "dry-run". */
function optionKey(option: Option): string {
  return option.negate ? option.name().replace(/^no-/, "") : option.name()
}

function takesValue(option: Option): boolean {
  return option.required || option.optional
}

/** `-n5`: a short option with its value attached. */
function isAttachedShort(token: string): boolean {
  return token.length > 2 && token.startsWith("-") && !token.startsWith("--")
}

/**
 * Adapts a commander `Command` to the DeclaredParser port.
 *
 * Commander files every token after the first unknown option as unknown, so
 * argv is split up front: tokens the command declares are parsed by
 * commander, everything else is returned as `unknown` for the merge to read
 * as `--key value` pairs.
 *
 * A short option may carry its value attached (`-n5`). Grouped short flags
 * (`-abc`) are not split and end up as unknown tokens.
 *
 * The same command can back several merges: commander restores its option
 * values to their defaults on every `parse()`.
 *
 * @example
 * ```typescript
 * const program = new Command()
 *   .option("--lr <rate>", "learning rate", "0.001")
 *   .argument("<dataset>")
 *
 * mergeConfig(store, { sources: [new CommanderParser(program)] })
 * ```
 */
export class CommanderParser implements DeclaredParser {
  readonly name: string

  constructor(private readonly command: Command) {
    this.name = `commander:${command.name() || "program"}`
  }

  parse(argv: readonly string[]): ParsedArguments {
    const { declared, unknown } = this.partition(argv)

    this.command.parse(declared, { from: "user" })

    const flags: DeclaredFlag[] = this.command.options.map((option) => ({
      key: optionKey(option),
      tokens: optionTokens(option),
      value: this.command.getOptionValue(option.attributeName()),
    }))

    // processedArgs holds argument defaults too; only supplied operands count.
    const values: unknown[] = this.command.processedArgs
    const supplied = this.command.args.length
    const positionals = this.command.registeredArguments.map((argument, index) => ({
      key: argument.name(),
      value: index < supplied ? values[index] : undefined,
    }))

    return { flags, positionals, unknown }
  }

  private partition(argv: readonly string[]): { declared: string[]; unknown: string[] } {
    const declared: string[] = []
    const unknown: string[] = []
    const rest = [...argv]
    const capacity = this.positionalCapacity()
    let operands = 0

    for (let token = rest.shift(); token !== undefined; token = rest.shift()) {
      if (token === "--") {
        const room = Math.max(0, capacity - operands)

        declared.push(token, ...rest.slice(0, room))
        unknown.push(...rest.slice(room))
        break
      }

      const option = this.findOption(token)

      if (option) {
        declared.push(token, ...this.takeOptionValues(option, token, rest))
        continue
      }

      if (HELP_TOKENS.has(token)) {
        declared.push(token)
        continue
      }

      if (looksLikeOption(token)) {
        const eq = token.indexOf("=")

        if (token.startsWith("--") && eq > 2) {
          unknown.push(token.slice(0, eq), token.slice(eq + 1))
          continue
        }

        const value = rest.shift()
        unknown.push(token, ...(value === undefined ? [] : [value]))
        continue
      }

      if (operands < capacity) {
        declared.push(token)
        operands += 1
      } else {
        unknown.push(token)
      }
    }

    return { declared, unknown }
  }

  private findOption(token: string): Option | undefined {
    if (isAttachedShort(token)) {
      const short = token.slice(0, 2)

      return this.command.options.find((o) => o.short === short && takesValue(o))
    }

    const name = token.startsWith("--") ? token.split("=", 1)[0] : token

    return this.command.options.find((o) => o.long === name || o.short === name)
  }

  /** Removes and returns the tokens commander will read as the option's value. */
  private takeOptionValues(option: Option, token: string, rest: string[]): string[] {
    if (token.includes("=") || isAttachedShort(token) || !takesValue(option)) return []

    const taken: string[] = []

    while (rest.length > 0) {
      const next = rest[0]

      if (next === undefined) break
      // A required value is taken even when it starts with a dash, as commander does.
      if (looksLikeOption(next) && !(option.required && taken.length === 0)) break

      taken.push(next)
      rest.shift()

      if (!option.variadic) break
    }

    return taken
  }

  private positionalCapacity(): number {
    const args = this.command.registeredArguments

    return args.some((a) => a.variadic) ? Number.POSITIVE_INFINITY : args.length
  }
}
