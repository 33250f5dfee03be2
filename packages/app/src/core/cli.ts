import { Match } from "effect"
import * as Either from "effect/Either"

// CHANGE: implement deterministic CLI parsing for the transcoding tool
// WHY: keep CLI decoding pure and testable at the boundary
// REF: req-cli-parse-1
// SOURCE: n/a
// FORMAT THEOREM: ∀argv: parse(argv) = Right(args) → args.command ∈ Commands ∧ args.input ≠ ""
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: unknown flags are rejected
// COMPLEXITY: O(n) where n = argv length

export type CliCommand = "print" | "audit"

export type InputVia = "value" | "node"

export interface CliArgs {
  readonly command: CliCommand
  readonly input: string
  readonly output: string | undefined
  readonly via: InputVia | undefined
  readonly bigDecimals: boolean | undefined
  readonly pretty: boolean | undefined
  readonly escapeNonAscii: boolean | undefined
  readonly failOnLossy: boolean | undefined
  readonly maxDepth: number | undefined
  readonly configPath: string | undefined
  readonly configExplicit: boolean
  readonly json: boolean
  readonly silent: boolean
}

export type CliError = { readonly _tag: "CliError"; readonly message: string }

const cliError = (message: string): CliError => ({ _tag: "CliError", message })

const isFlag = (value: string): boolean => value.startsWith("-")

const parseBoolean = (value: string): Either.Either<boolean, CliError> => {
  if (value === "true" || value === "1") {
    return Either.right(true)
  }
  if (value === "false" || value === "0") {
    return Either.right(false)
  }
  return Either.left(cliError(`Invalid boolean value: ${value}`))
}

const parseCommand = (value: string): Either.Either<CliCommand, CliError> =>
  Match.value(value).pipe(
    Match.when("print", () => Either.right<CliCommand>("print")),
    Match.when("audit", () => Either.right<CliCommand>("audit")),
    Match.orElse(() => Either.left(cliError(`Unknown command: ${value}`)))
  )

const parseVia = (value: string): Either.Either<InputVia, CliError> =>
  Match.value(value).pipe(
    Match.when("value", () => Either.right<InputVia>("value")),
    Match.when("node", () => Either.right<InputVia>("node")),
    Match.orElse(() => Either.left(cliError(`Invalid value for --via: ${value}`)))
  )

const parsePositiveInt = (flagName: string, value: string): Either.Either<number, CliError> =>
  /^[1-9]\d*$/u.test(value) && Number.isSafeInteger(Number(value))
    ? Either.right(Number(value))
    : Either.left(cliError(`Invalid value for --${flagName}: ${value}`))

const defaultArgs = (command: CliCommand): CliArgs => ({
  command,
  input: "",
  output: undefined,
  via: undefined,
  bigDecimals: undefined,
  pretty: undefined,
  escapeNonAscii: undefined,
  failOnLossy: undefined,
  maxDepth: undefined,
  configPath: undefined,
  configExplicit: false,
  json: false,
  silent: false
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

const setParsedFlag = (
  next: CliArgs,
  consumed: number
): Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError> => Either.right({ next, consumed })

const parseValueFlag = (
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: string) => CliArgs
): Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError> =>
  Either.map(readFlagValue(flagName, inlineValue, nextValue), (value) => ({
    next: update(current, value),
    consumed: inlineValue === undefined ? 2 : 1
  }))

const parseOptionalBooleanFlag = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  update: (args: CliArgs, value: boolean) => CliArgs
): Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError> => {
  const useNext = inlineValue === undefined && nextValue !== undefined && !isFlag(nextValue)
  const nextValueResolved = inlineValue ?? (useNext ? nextValue : "true")
  return Either.map(parseBoolean(nextValueResolved), (value) => ({
    next: update(current, value),
    consumed: useNext ? 2 : 1
  }))
}

type FlagParser = (
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined
) => Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError>

const parseDecodedFlag = <A>(
  flagName: string,
  current: CliArgs,
  inlineValue: string | undefined,
  nextValue: string | undefined,
  decode: (value: string) => Either.Either<A, CliError>,
  update: (args: CliArgs, value: A) => CliArgs
): Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError> =>
  Either.flatMap(readFlagValue(flagName, inlineValue, nextValue), (raw) =>
    Either.map(decode(raw), (value) => ({
      next: update(current, value),
      consumed: inlineValue === undefined ? 2 : 1
    })))

const flagParsers: Record<string, FlagParser> = {
  json: (current) => setParsedFlag({ ...current, json: true }, 1),
  silent: (current) => setParsedFlag({ ...current, silent: true }, 1),
  input: (current, inlineValue, nextValue) =>
    parseValueFlag("input", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      input: value
    })),
  output: (current, inlineValue, nextValue) =>
    parseValueFlag("output", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      output: value
    })),
  config: (current, inlineValue, nextValue) =>
    parseValueFlag("config", current, inlineValue, nextValue, (args, value) => ({
      ...args,
      configPath: value,
      configExplicit: true
    })),
  via: (current, inlineValue, nextValue) =>
    parseDecodedFlag("via", current, inlineValue, nextValue, parseVia, (args, value) => ({
      ...args,
      via: value
    })),
  "max-depth": (current, inlineValue, nextValue) =>
    parseDecodedFlag(
      "max-depth",
      current,
      inlineValue,
      nextValue,
      (value) => parsePositiveInt("max-depth", value),
      (args, value) => ({ ...args, maxDepth: value })
    ),
  "big-decimals": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      bigDecimals: value
    })),
  pretty: (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      pretty: value
    })),
  "escape-non-ascii": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      escapeNonAscii: value
    })),
  "fail-on-lossy": (current, inlineValue, nextValue) =>
    parseOptionalBooleanFlag(current, inlineValue, nextValue, (args, value) => ({
      ...args,
      failOnLossy: value
    }))
}

const parseFlag = (
  raw: string,
  nextValue: string | undefined,
  current: CliArgs
): Either.Either<{ readonly next: CliArgs; readonly consumed: number }, CliError> => {
  if (!raw.startsWith("--")) {
    return Either.left(cliError(`Unknown flag: ${raw}`))
  }
  const [name = "", inlineValue] = raw.slice(2).split("=", 2)
  const parser = flagParsers[name]
  if (parser === undefined) {
    return Either.left(cliError(`Unknown flag: --${name}`))
  }
  return parser(current, inlineValue === undefined ? undefined : inlineValue, nextValue)
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
    return Either.right({ command: "print", startIndex: 0 })
  }
  const commandEither = parseCommand(first)
  if (Either.isLeft(commandEither)) {
    return Either.left(commandEither.left)
  }
  return Either.right({ command: commandEither.right, startIndex: 1 })
}

const parseFlags = (
  rawArgs: ReadonlyArray<string>,
  startIndex: number,
  initial: CliArgs
): Either.Either<CliArgs, CliError> => {
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

const requireInput = (args: CliArgs): Either.Either<CliArgs, CliError> =>
  args.input.length > 0 ? Either.right(args) : Either.left(cliError("Missing required flag: --input"))

/**
 * Parse CLI arguments into a typed configuration.
 *
 * @param argv - Raw process.argv array.
 * @returns Either with parsed CliArgs or CliError.
 *
 * @pure true
 * @invariant command defaults to print when omitted
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
  return Either.flatMap(parseFlags(rawArgs, parsed.startIndex, defaultArgs(parsed.command)), requireInput)
}
