/**
 * PathClassifierService - decides what currently sits at a link path.
 *
 * Classification is total: every I/O failure maps to one of the PathState
 * cases, so `classify` cannot fail. A link is checked before anything else,
 * and a link whose target is gone counts as SymlinkWrong.
 */

import { Context, Effect, Layer, Option, pipe } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { PathState } from "@domain/PathState"
import { errorMessage } from "@lib/ioError"

export interface PathClassifierService {
  readonly classify: (linkPath: string, targetPath: string) => Effect.Effect<PathState>
}

export class PathClassifierServiceTag extends Context.Tag("PathClassifierService")<
  PathClassifierServiceTag,
  PathClassifierService
>() {}

export const PathClassifierServiceLive = Layer.effect(
  PathClassifierServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    // A target that does not exist yet compares by its absolute form
    const canonicalTarget = (targetPath: string) =>
      pipe(fs.realPath(targetPath), Effect.orElseSucceed(() => path.resolve(targetPath)))

    const classifyLink = (linkPath: string, targetPath: string, currentTarget: string) =>
      pipe(
        Effect.all([fs.realPath(linkPath), canonicalTarget(targetPath)]),
        Effect.map(([resolvedLink, resolvedTarget]) =>
          resolvedLink === resolvedTarget
            ? PathState.SymlinkCorrect()
            : PathState.SymlinkWrong({ currentTarget })
        ),
        // Broken or unreadable links get the same remediation as a wrong target
        Effect.catchAll((e) =>
          pipe(
            Effect.logDebug(`Cannot resolve ${linkPath}: ${errorMessage(e)}`),
            Effect.as(PathState.SymlinkWrong({ currentTarget }))
          )
        )
      )

    const classifyEntry = (linkPath: string) =>
      Effect.gen(function* () {
        const exists = yield* pipe(fs.exists(linkPath), Effect.orElseSucceed(() => false))
        if (!exists) {
          return PathState.Missing()
        }

        const info = yield* Effect.option(fs.stat(linkPath))
        if (Option.isNone(info) || info.value.type !== "Directory") {
          return PathState.NonDirectoryFile()
        }

        // An unlistable directory is treated as having contents
        const entries = yield* Effect.option(fs.readDirectory(linkPath))
        return Option.match(entries, {
          onNone: () => PathState.NonEmptyDirectory(),
          onSome: (names) =>
            names.length === 0 ? PathState.EmptyDirectory() : PathState.NonEmptyDirectory(),
        })
      })

    return {
      classify: (linkPath: string, targetPath: string) =>
        pipe(
          fs.readLink(linkPath),
          Effect.matchEffect({
            onFailure: () => classifyEntry(linkPath),
            onSuccess: (currentTarget) => classifyLink(linkPath, targetPath, currentTarget),
          })
        ),
    }
  })
)
