import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as Effect from "effect/Effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import type { InputVia } from "../core/cli.js"
import { checkValueDepth, nodeToValueBounded } from "../core/depth.js"
import type { AppError } from "../core/errors.js"
import { fileError, inputParseError } from "../core/errors.js"
import type { JsonValue } from "../core/json.js"
import type { JsonParseError } from "../core/parse.js"
import { parseNode, parseValue } from "../core/parse.js"

// CHANGE: read JSON input files into value trees and write printed output
// WHY: isolate filesystem IO from the pure converters
// REF: req-input-io-1
// SOURCE: n/a
// FORMAT THEOREM: ∀p: load(p) = Right(v) → depth(v) ≤ maxDepth
// PURITY: SHELL
// EFFECT: Effect<JsonValue, AppError, FileSystem>
// INVARIANT: the depth bound is checked before any recursive conversion
// COMPLEXITY: O(n)

export interface InputOptions {
  readonly via: InputVia
  readonly bigDecimals: boolean
  readonly maxDepth: number
}

const fromEither = <A>(either: Either.Either<A, AppError>): Effect.Effect<A, AppError> =>
  either._tag === "Left" ? Effect.fail(either.left) : Effect.succeed(either.right)

const toInputError = (file: string) => (error: JsonParseError): AppError =>
  inputParseError(file, error.offset, error.message)

/**
 * Decode JSON text into a value tree through the selected parser.
 *
 * With `via: "node"` the text is read as a node tree first and converted with
 * the bounded node → value converter.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeInput = (
  file: string,
  text: string,
  options: InputOptions
): Either.Either<JsonValue, AppError> => {
  if (options.via === "node") {
    return pipe(
      parseNode(text, { useBigDecimalForFloats: options.bigDecimals }),
      Either.mapLeft(toInputError(file)),
      Either.flatMap((node): Either.Either<JsonValue, AppError> => nodeToValueBounded(node, options.maxDepth))
    )
  }
  return pipe(
    parseValue(text),
    Either.mapLeft(toInputError(file)),
    Either.flatMap((value): Either.Either<JsonValue, AppError> => checkValueDepth(value, options.maxDepth))
  )
}

export const readInput = (
  path: string,
  options: InputOptions
): Effect.Effect<JsonValue, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const text = yield* _(
      fs.readFileString(path).pipe(Effect.mapError((error) => fileError(String(error))))
    )
    yield* _(Effect.logDebug(`Read ${text.length} characters from ${path} via ${options.via}`))
    return yield* _(fromEither(decodeInput(path, text, options)))
  })

export const writeOutput = (
  path: string,
  bytes: Uint8Array
): Effect.Effect<void, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    yield* _(
      fs.writeFile(path, bytes).pipe(Effect.mapError((error) => fileError(String(error))))
    )
  })
