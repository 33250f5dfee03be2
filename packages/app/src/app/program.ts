import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Effect, Match } from "effect"
import type * as Either from "effect/Either"

import type { FidelityReport } from "../core/audit.js"
import { auditValue, hasLossyNumbers, renderHumanReport, renderJsonReport } from "../core/audit.js"
import type { CliArgs } from "../core/cli.js"
import { parseCliArgs } from "../core/cli.js"
import type { ResolvedConfig } from "../core/config.js"
import { defaultConfigPath, resolveConfig } from "../core/config.js"
import { nodeToValueBounded, valueToNodeBounded } from "../core/depth.js"
import type { AppError } from "../core/errors.js"
import type { JsonValue } from "../core/json.js"
import { printToBytes } from "../core/printer.js"
import { loadConfigFile } from "../shell/config-file.js"
import { readInput, writeOutput } from "../shell/input.js"

// CHANGE: orchestrate CLI modes with functional core + imperative shell
// WHY: enforce single entrypoint with typed errors and deterministic outputs
// REF: req-program-1
// SOURCE: n/a
// FORMAT THEOREM: ∀mode: run(mode) returns exitCode ∈ {0,2}
// PURITY: SHELL
// EFFECT: Effect<ProgramResult, AppError, FileSystem>
// INVARIANT: stdout receives at most one payload
// COMPLEXITY: O(n)

export interface ProgramResult {
  readonly report: FidelityReport
  readonly output: string | undefined
  readonly exitCode: number
}

const writeStdout = (payload: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(payload.endsWith("\n") ? payload : `${payload}\n`)
  })

const fromEither = <A, E>(either: Either.Either<A, E>): Effect.Effect<A, E> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

export const lossyExitCode = 2
export const failureExitCode = 1

const exitCodeFor = (report: FidelityReport, config: ResolvedConfig): number =>
  config.failOnLossy && hasLossyNumbers(report) ? lossyExitCode : 0

const warnIfLossy = (report: FidelityReport): Effect.Effect<void> =>
  hasLossyNumbers(report)
    ? Effect.logWarning(`${report.notes.length} number(s) do not survive the node model unchanged`)
    : Effect.void

const handlePrint = (
  cli: CliArgs,
  config: ResolvedConfig,
  value: JsonValue
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const node = yield* _(fromEither(valueToNodeBounded(value, config.maxDepth)))
    const back = yield* _(fromEither(nodeToValueBounded(node, config.maxDepth)))
    const bytes = printToBytes(back, { indent: config.pretty, escapeNonAscii: config.escapeNonAscii })
    const output = bytes.decode()
    if (cli.output === undefined) {
      if (!cli.silent) {
        yield* _(writeStdout(output))
      }
    } else {
      yield* _(writeOutput(cli.output, bytes.toUint8Array()))
    }
    const report = auditValue(value)
    yield* _(warnIfLossy(report))
    return { report, output, exitCode: exitCodeFor(report, config) }
  })

const handleAudit = (
  cli: CliArgs,
  config: ResolvedConfig,
  value: JsonValue
): Effect.Effect<ProgramResult, AppError> =>
  Effect.gen(function*(_) {
    const report = auditValue(value)
    if (!cli.silent) {
      yield* _(writeStdout(cli.json ? renderJsonReport(report) : renderHumanReport(report)))
    }
    return { report, output: undefined, exitCode: exitCodeFor(report, config) }
  })

const executeCommand = (
  cli: CliArgs,
  config: ResolvedConfig,
  value: JsonValue
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Match.value(cli.command).pipe(
    Match.when("print", () => handlePrint(cli, config, value)),
    Match.when("audit", () => handleAudit(cli, config, value)),
    Match.exhaustive
  )

/**
 * Run CLI program with the provided argv.
 *
 * @param argv - process.argv array.
 * @returns ProgramResult with the fidelity report and exit code.
 *
 * @pure false
 * @effect FileSystem, Console
 * @invariant exitCode is deterministic for fixed inputs
 * @complexity O(n)
 */
export const runCli = (
  argv: ReadonlyArray<string>
): Effect.Effect<ProgramResult, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const cli = yield* _(fromEither(parseCliArgs(argv)))
    const fileConfig = yield* _(loadConfigFile(cli.configPath ?? defaultConfigPath, cli.configExplicit))
    const config = resolveConfig(cli, fileConfig)
    const value = yield* _(readInput(cli.input, config))
    return yield* _(executeCommand(cli, config, value))
  })

/**
 * One-line description of a failure for the log.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeError = (error: AppError): string =>
  Match.value(error).pipe(
    Match.tag("InputParseError", (failure) => `${failure.file}: ${failure.message}`),
    Match.tag("TooDeep", (failure) => `Input nests ${failure.depth} levels deep; the limit is ${failure.maxDepth}`),
    Match.orElse((failure) => failure.message)
  )

/**
 * Run the CLI and settle on the process exit code.
 *
 * @returns 0 on success, lossyExitCode for lossy numbers under failOnLossy,
 * failureExitCode after logging any AppError.
 *
 * @pure false
 * @effect FileSystem, Console
 * @complexity O(n)
 */
export const runCliExitCode = (
  argv: ReadonlyArray<string>
): Effect.Effect<number, never, FileSystemService> =>
  runCli(argv).pipe(
    Effect.map((result) => result.exitCode),
    Effect.catchAll((error) => Effect.as(Effect.logError(describeError(error)), failureExitCode))
  )
