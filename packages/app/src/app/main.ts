import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect } from "effect"

import { runCliExitCode } from "./program.js"

// CHANGE: run the transcoding CLI on the Node runtime and publish its exit code
// WHY: lossy output and failures must be visible to shell scripts
// REF: req-main-1
// SOURCE: n/a
// FORMAT THEOREM: exitCode ∈ {0, failureExitCode, lossyExitCode}
// PURITY: SHELL
// EFFECT: Effect<void, never, NodeContext>
// INVARIANT: the process exit code is set only when it is non-zero
// COMPLEXITY: O(n)

const setExitCode = (code: number): Effect.Effect<void> =>
  code === 0 ? Effect.void : Effect.sync(() => {
    process.exitCode = code
  })

NodeRuntime.runMain(
  runCliExitCode(process.argv).pipe(
    Effect.flatMap(setExitCode),
    Effect.provide(NodeContext.layer)
  )
)
