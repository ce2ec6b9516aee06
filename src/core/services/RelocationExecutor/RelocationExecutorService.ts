/**
 * RelocationExecutorService - applies one relocation operation to the disk.
 *
 * The link path is classified first. The matching transition then runs, and
 * the dispatch is exhaustive over PathState. Nothing is changed before a
 * required confirmation is granted. If the final link cannot be created after
 * the old entry was removed, the old entry is put back where possible, and the
 * `Failed` message says what was left on disk.
 *
 * `execute` never fails: every error becomes a `Failed` result, so one broken
 * subdirectory does not stop the rest of the plan.
 */

import { Context, Data, Effect, Layer, Match, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { PathState } from "@domain/PathState"
import type { RelocationOperation, RelocationPlan } from "@domain/RelocationPlan"
import { errorMessage } from "@lib/ioError"
import { PathClassifierServiceTag } from "../PathClassifier"
import { TransferServiceTag, type MoveFailure } from "../TransferService"
import { ConfirmServiceTag } from "../ConfirmService"
import { DestinationUnavailable } from "../RelocationPlanner"
import {
  LinkServiceTag,
  PathRemovalFailed,
  type InsufficientPrivilege,
  type LinkCreationFailed,
  type LinkError,
} from "../LinkService"

// =============================================================================
// Errors and results
// =============================================================================

export class PathNotADirectory extends Data.TaggedError("PathNotADirectory")<{
  readonly path: string
}> {}

/** A link failure after the old entry was already changed */
class LinkFailedAfterChange extends Data.TaggedError("LinkFailedAfterChange")<{
  readonly error: LinkError
  readonly leftover: string
}> {}

export type RelocationError =
  | DestinationUnavailable
  | InsufficientPrivilege
  | LinkCreationFailed
  | MoveFailure
  | PathNotADirectory
  | PathRemovalFailed

export type RelocationResult = Data.TaggedEnum<{
  Succeeded: {
    readonly operation: RelocationOperation
    readonly state: PathState
    readonly message: string
  }
  Skipped: {
    readonly operation: RelocationOperation
    readonly state: PathState
    readonly message: string
  }
  Failed: {
    readonly operation: RelocationOperation
    readonly state: PathState
    readonly message: string
    readonly error: RelocationError
  }
}>

export const RelocationResult = Data.taggedEnum<RelocationResult>()

export const privilegeRemediation = (platform: NodeJS.Platform): string =>
  platform === "win32"
    ? [
        "To fix this, either:",
        "1. Run this application as Administrator, OR",
        "2. Enable Developer Mode in Windows Settings:",
        "   Settings > Update & Security > For developers > Developer Mode",
      ].join("\n")
    : "Check that you can write to the steamapps directory and that its filesystem supports symbolic links."

export const describeRelocationError = Match.typeTags<RelocationError>()({
  DestinationUnavailable: (e) => `Cannot prepare destination ${e.path}: ${e.reason}`,
  InsufficientPrivilege: (e) =>
    [
      "Failed to create symlink due to insufficient privileges.",
      privilegeRemediation(e.platform),
      "",
      `Target: ${e.linkPath} -> ${e.targetPath}`,
    ].join("\n"),
  LinkCreationFailed: (e) =>
    `Failed to create symlink: ${e.reason}\nTarget: ${e.linkPath} -> ${e.targetPath}`,
  MoveFailure: (e) =>
    `Failed to move contents of ${e.source} to ${e.destination} (${e.moved} entries moved): ${e.reason}`,
  PathNotADirectory: (e) => `Path exists and is not a directory: ${e.path}`,
  PathRemovalFailed: (e) => `Cannot remove ${e.path}: ${e.reason}`,
})

// =============================================================================
// Service interface
// =============================================================================

export interface ExecutePlanOptions {
  /** Called after each operation, in plan order */
  readonly onResult?: (result: RelocationResult) => Effect.Effect<void>
}

export interface RelocationExecutorService {
  readonly execute: (operation: RelocationOperation) => Effect.Effect<RelocationResult>
  readonly executePlan: (
    plan: RelocationPlan,
    options?: ExecutePlanOptions
  ) => Effect.Effect<ReadonlyArray<RelocationResult>>
}

export class RelocationExecutorServiceTag extends Context.Tag("RelocationExecutorService")<
  RelocationExecutorServiceTag,
  RelocationExecutorService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const RelocationExecutorServiceLive = Layer.effect(
  RelocationExecutorServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const classifier = yield* PathClassifierServiceTag
    const transfer = yield* TransferServiceTag
    const links = yield* LinkServiceTag
    const confirm = yield* ConfirmServiceTag

    const ensureTarget = (targetPath: string) =>
      pipe(
        fs.makeDirectory(targetPath, { recursive: true }),
        Effect.mapError((e) => new DestinationUnavailable({ path: targetPath, reason: errorMessage(e) }))
      )

    const removeDirectory = (path: string) =>
      pipe(
        links.removeEmptyDirectory(path),
        // Stray entries (e.g. written by Steam mid-move) still have to go
        Effect.orElse(() =>
          pipe(
            fs.remove(path, { recursive: true }),
            Effect.mapError((e) => new PathRemovalFailed({ path, reason: errorMessage(e) }))
          )
        )
      )

    const linkOrRestore = (
      operation: RelocationOperation,
      restore: Effect.Effect<void, unknown>,
      leftover: { readonly restored?: string; readonly notRestored: string }
    ) =>
      pipe(
        links.createDirectoryLink(operation.linkPath, operation.targetPath),
        Effect.catchAll((error) =>
          pipe(
            restore,
            Effect.tap(() => Effect.logInfo(`Restored previous entry at ${operation.linkPath}`)),
            Effect.as(leftover.restored),
            Effect.catchAll((e) =>
              pipe(
                Effect.logWarning(`Could not restore ${operation.linkPath}: ${errorMessage(e)}`),
                Effect.as(leftover.notRestored)
              )
            ),
            Effect.flatMap((note) =>
              Effect.fail(note === undefined ? error : new LinkFailedAfterChange({ error, leftover: note }))
            )
          )
        )
      )

    const transition = (
      operation: RelocationOperation,
      state: PathState
    ): Effect.Effect<RelocationResult, RelocationError | LinkFailedAfterChange> => {
      const { linkPath, targetPath } = operation
      const arrow = `${linkPath} -> ${targetPath}`
      const succeeded = (message: string) => RelocationResult.Succeeded({ operation, state, message })
      const skipped = (message: string) => RelocationResult.Skipped({ operation, state, message })

      return PathState.$match(state, {
        SymlinkCorrect: () => Effect.succeed(succeeded(`OK: ${linkPath} already linked to ${targetPath}`)),

        SymlinkWrong: ({ currentTarget }) =>
          Effect.gen(function* () {
            const approved = yield* confirm.confirm({
              title: "Replace symlink",
              message: `${linkPath} is a symlink to a different target (${currentTarget}). Replace it?`,
            })
            if (!approved) {
              return skipped(`Skipped replacing symlink: ${linkPath}`)
            }

            yield* ensureTarget(targetPath)
            yield* links.removeLink(linkPath)
            yield* linkOrRestore(operation, links.createDirectoryLink(linkPath, currentTarget), {
              notRestored: `The previous link to ${currentTarget} was removed and could not be restored.`,
            })
            return succeeded(`Replaced symlink: ${arrow}`)
          }),

        EmptyDirectory: () =>
          Effect.gen(function* () {
            yield* ensureTarget(targetPath)
            yield* links.removeEmptyDirectory(linkPath)
            yield* linkOrRestore(operation, fs.makeDirectory(linkPath), {
              notRestored: `The empty directory at ${linkPath} was removed and could not be recreated.`,
            })
            return succeeded(`Linked (empty replaced): ${arrow}`)
          }),

        NonEmptyDirectory: () =>
          Effect.gen(function* () {
            const approved = yield* confirm.confirm({
              title: "Move contents?",
              message: `${linkPath} is a non-empty directory. Move its contents to ${targetPath} and replace with a symlink?`,
            })
            if (!approved) {
              return skipped(`Skipped: left existing directory: ${linkPath}`)
            }

            yield* transfer.moveContents(linkPath, targetPath)
            yield* removeDirectory(linkPath)
            yield* linkOrRestore(operation, fs.makeDirectory(linkPath), {
              restored: `Contents are now in ${targetPath}; ${linkPath} was recreated empty.`,
              notRestored: `Contents are now in ${targetPath}; ${linkPath} could not be recreated.`,
            })
            return succeeded(`Moved contents and linked: ${arrow}`)
          }),

        NonDirectoryFile: () => Effect.fail(new PathNotADirectory({ path: linkPath })),

        Missing: () =>
          Effect.gen(function* () {
            yield* ensureTarget(targetPath)
            yield* links.createDirectoryLink(linkPath, targetPath)
            return succeeded(`Linked: ${arrow}`)
          }),
      })
    }

    const execute = (operation: RelocationOperation) =>
      Effect.gen(function* () {
        const state = yield* classifier.classify(operation.linkPath, operation.targetPath)
        yield* Effect.logDebug(`${operation.linkPath}: ${state._tag}`)

        return yield* pipe(
          transition(operation, state),
          Effect.catchAll((error) =>
            Effect.succeed(
              error._tag === "LinkFailedAfterChange"
                ? RelocationResult.Failed({
                    operation,
                    state,
                    message: `${describeRelocationError(error.error)}\n${error.leftover}`,
                    error: error.error,
                  })
                : RelocationResult.Failed({ operation, state, message: describeRelocationError(error), error })
            )
          )
        )
      })

    const executePlan = (plan: RelocationPlan, options?: ExecutePlanOptions) =>
      Effect.forEach(plan.operations, (operation) =>
        pipe(
          execute(operation),
          Effect.tap((result) => options?.onResult?.(result) ?? Effect.void)
        )
      )

    return { execute, executePlan }
  })
)
