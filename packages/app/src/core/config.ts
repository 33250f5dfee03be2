import type { CliArgs, InputVia } from "./cli.js"

// CHANGE: define config merging rules and defaults
// WHY: ensure CLI flags override config file and defaults deterministically
// REF: req-config-merge-1
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth is a positive integer
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly maxDepth?: number
  readonly via?: InputVia
  readonly bigDecimals?: boolean
  readonly pretty?: boolean
  readonly escapeNonAscii?: boolean
  readonly failOnLossy?: boolean
}

export interface ResolvedConfig {
  readonly maxDepth: number
  readonly via: InputVia
  readonly bigDecimals: boolean
  readonly pretty: boolean
  readonly escapeNonAscii: boolean
  readonly failOnLossy: boolean
}

export const defaultMaxDepth = 512

export const defaultConfigPath = "./.json-node-bridge.json"

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .json-node-bridge.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @invariant maxDepth ≥ 1
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultMaxDepth,
  via: cli.via ?? fileConfig?.via ?? "value",
  bigDecimals: cli.bigDecimals ?? fileConfig?.bigDecimals ?? false,
  pretty: cli.pretty ?? fileConfig?.pretty ?? false,
  escapeNonAscii: cli.escapeNonAscii ?? fileConfig?.escapeNonAscii ?? false,
  failOnLossy: cli.failOnLossy ?? fileConfig?.failOnLossy ?? false
})
