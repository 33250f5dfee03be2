import type { CliError } from "./cli.js"

// CHANGE: unify error algebra for the transcoding tool
// WHY: provide typed failures for program flow and exit codes
// REF: req-errors-1
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ AppError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: error tags are unique
// COMPLEXITY: O(1)/O(1)

export type ConfigError = { readonly _tag: "ConfigError"; readonly message: string }
export type FileError = { readonly _tag: "FileError"; readonly message: string }
export type InputParseError = {
  readonly _tag: "InputParseError"
  readonly file: string
  readonly offset: number
  readonly message: string
}
export type TooDeep = {
  readonly _tag: "TooDeep"
  readonly depth: number
  readonly maxDepth: number
}

export type AppError =
  | CliError
  | ConfigError
  | FileError
  | InputParseError
  | TooDeep

export const configError = (message: string): ConfigError => ({
  _tag: "ConfigError",
  message
})

export const fileError = (message: string): FileError => ({
  _tag: "FileError",
  message
})

export const inputParseError = (file: string, offset: number, message: string): InputParseError => ({
  _tag: "InputParseError",
  file,
  offset,
  message
})

export const tooDeep = (depth: number, maxDepth: number): TooDeep => ({
  _tag: "TooDeep",
  depth,
  maxDepth
})
