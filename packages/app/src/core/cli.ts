import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for crate-waste
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ source is set
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "report" | "summary"

export type CliSource =
  | { readonly _tag: "Listing"; readonly paths: ReadonlyArray<string> }
  | { readonly _tag: "Directory"; readonly path: string }

export interface CliArgs {
  readonly command: CliCommand
  readonly source: CliSource
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly sourceRoot: string | undefined
  readonly essential: ReadonlyArray<string>
  readonly outPath: string | undefined
  readonly failOnWaste: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

interface ParsingArgs {
  readonly command: CliCommand
  readonly inputs: ReadonlyArray<string> | undefined
  readonly dir: string | undefined
  readonly configPath: string
  readonly configPathExplicit: boolean
  readonly sourceRoot: string | undefined
  readonly essential: ReadonlyArray<string>
  readonly outPath: string | undefined
  readonly failOnWaste: boolean
  readonly silent: boolean
  readonly verbose: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

export const defaultConfigPath = "./.crate-waste.json"

const isFlag = (value: string): boolean => value.startsWith("-")

const splitList = (value: string): ReadonlyArray<string> =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("report", () => Either.right<CliCommand>("report")),
    Match.when("summary", () => Either.right<CliCommand>("summary")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const defaultArgs = (command: CliCommand): ParsingArgs => ({
  command,
  inputs: undefined,
  dir: undefined,
  configPath: defaultConfigPath,
  configPathExplicit: false,
  sourceRoot: undefined,
  essential: [],
  outPath: undefined,
  failOnWaste: false,
  silent: false,
  verbose: false
})

const readFlagValue = (
  flagName: string,
  inlineValue: string | undefined,
  nextValue: string | undefined
): Either.Either<string, CliError> => {
  if (inlineValue !== undefined) {
    return Either.right(inlineValue)
  }
  if (nextValue === undefined || isFlag(nextValue)) {
    return Either.left(cliError(`Missing value for --${flagName}`))
  }
  return Either.right(nextValue)
}

type ParsedFlag = Either.Either<{ readonly next: ParsingArgs; readonly consumed: number }, CliError>

const setParsedFlag = (next: ParsingArgs, consumed: number): ParsedFlag => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: ParsingArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: ParsingArgs, value: string) => ParsingArgs
): ParsedFlag =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

type FlagParser = (
  current: ParsingArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => ParsedFlag

const flagParsers: Record<string, FlagParser> = {
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  verbose: (current) => setParsedFlag({ ...current, verbose: true }, 1),
  "fail-on-waste": (current) => setParsedFlag({ ...current, failOnWaste: true }, 1),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      inputs: splitList(value)
    })),
  dir: (current, inlineValue, nextValue) =>
    parseValueFlag("dir", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      dir: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configPathExplicit: true
    })),
  "source-root": (current, inlineValue, nextValue) =>
    parseValueFlag("source-root", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      sourceRoot: value
    })),
  essential: (current, inlineValue, nextValue) =>
    parseValueFlag("essential", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      essential: splitList(value)
    })),
  out: (current, inlineValue, nextValue) =>
    parseValueFlag("out", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      outPath: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: ParsingArgs
): ParsedFlag => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const body = raw.slice(2)
  const separator = body.indexOf("=")
  const name = separator === -1 ? body : body.slice(0, separator)
  const inlineValue = separator === -1 ? undefined : body.slice(separator + 1)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue, nextValue)
}

interface ParsedCommand {
  readonly command: CliCommand
  readonly startIndex: number
}

const parseCommandFromArgs = (
  rawArgs: ReadonlyArray<string>
): Either.Either<ParsedCommand, CliError> => {
  const first = rawArgs[0]
  if (first === undefined || isFlag(first)) {
    return Either.right({ command: "report", startIndex: 0 })
  }
  return Either.map(parseCommand(first), (command) => ({ command, startIndex: 1 }))
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: ParsingArgs
): Either.Either<ParsingArgs, CliError> => {
  let args = initial
  let index = startIndex
  while (index < rawArgs.length) {
    const current = rawArgs[index]
    if (current === undefined) {
      return Either.left(cliError("Unexpected end of arguments"))
    }
    if (!isFlag(current)) {
      return Either.left(cliError(`Unexpected positional argument: ${current}`))
    }
    const nextValue = rawArgs[index + 1]
    const parsed = parseFlag(current, nextValue, args)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    args = parsed.right.next
    index += parsed.right.consumed
  }
  return Either.right(args)
}

const resolveSource = (args: ParsingArgs): Either.Either<CliSource, CliError> => {
  if (args.inputs !== undefined && args.dir !== undefined) {
    return Either.left(cliError("Use either --input or --dir, not both"))
  }
  if (args.dir !== undefined) {
    if (args.command === "summary") {
      return Either.left(cliError("summary reads listings only; use --input"))
    }
    return Either.right<CliSource>({ _tag: "Directory", path: args.dir })
  }
  if (args.inputs === undefined || args.inputs.length === 0) {
    return Either.left(cliError("Missing --input or --dir"))
  }
  if (args.command === "report" && args.inputs.length > 1) {
    return Either.left(cliError("report takes a single --input; use summary for several listings"))
  }
  return Either.right<CliSource>({ _tag: "Listing", paths: args.inputs })
}

const finalize = (args: ParsingArgs): Either.Either<CliArgs, CliError> =>
  Either.map(resolveSource(args), (source) => ({
    command: args.command,
    source,
    configPath: args.configPath,
    configPathExplicit: args.configPathExplicit,
    sourceRoot: args.sourceRoot,
    essential: args.essential,
    outPath: args.outPath,
    failOnWaste: args.failOnWaste,
    silent: args.silent,
    verbose: args.verbose
  }))

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to report when omitted
 * @complexity O(n)
 */
export const parseCliArgs = (
  argv: ReadonlyArray<string>
): Either.Either<CliArgs, CliError> => {
  const rawArgs = argv.slice(2)
  const commandEither = parseCommandFromArgs(rawArgs)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  const parsed = commandEither.right
  return Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), finalize)
}
