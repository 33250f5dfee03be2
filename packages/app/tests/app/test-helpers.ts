import { NodeContext } from "@effect/platform-node"
import type { PlatformError } from "@effect/platform/Error"
import { FileSystem, type FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { Path, type Path as PathService } from "@effect/platform/Path"
import { Effect } from "effect"

export interface FixtureDir {
  readonly fs: FileSystemService
  readonly resolve: (name: string) => string
  readonly write: (name: string, contents: string) => Effect.Effect<string, PlatformError>
}

export const withTempDir = <A, E, R>(
  use: (fixture: FixtureDir) => Effect.Effect<A, E, R>
): Effect.Effect<A, E | PlatformError, R | FileSystemService | PathService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const path = yield* _(Path)
    const tempDir = yield* _(fs.makeTempDirectory({ prefix: "json-node-bridge-" }))
    const resolve = (name: string): string => path.join(tempDir, name)
    const write = (name: string, contents: string): Effect.Effect<string, PlatformError> =>
      fs.writeFileString(resolve(name), contents).pipe(Effect.as(resolve(name)))
    return yield* _(use({ fs, resolve, write }))
  })

export const cliArgv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "json-node-bridge", ...args]

export const provideNodeContext = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  effect.pipe(Effect.provide(NodeContext.layer))
