/**
 * TransferService - moves the contents of a directory onto another volume.
 *
 * Each entry is renamed into place. Across filesystems a rename fails with
 * EXDEV, in which case the entry is copied and the source removed. Entries run
 * one at a time in name order, and an entry that already exists at the
 * destination is never overwritten.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { errorMessage, isCrossDevice } from "@lib/ioError"

// =============================================================================
// Service errors
// =============================================================================

export class MoveFailure extends Data.TaggedError("MoveFailure")<{
  readonly source: string
  readonly destination: string
  /** Entries already moved before the failure */
  readonly moved: number
  readonly reason: string
}> {}

// =============================================================================
// Types
// =============================================================================

export interface TransferReport {
  readonly moved: number
}

export interface TransferService {
  /** Move every entry of `sourceDir` into `destinationDir`, creating it if needed */
  readonly moveContents: (
    sourceDir: string,
    destinationDir: string
  ) => Effect.Effect<TransferReport, MoveFailure>
}

export class TransferServiceTag extends Context.Tag("TransferService")<
  TransferServiceTag,
  TransferService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const TransferServiceLive = Layer.effect(
  TransferServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const copyAcrossDevices = (from: string, to: string) =>
      pipe(
        Effect.logDebug(`Cross-device move, copying ${from} -> ${to}`),
        Effect.zipRight(fs.copy(from, to, { preserveTimestamps: true })),
        Effect.zipRight(fs.remove(from, { recursive: true }))
      )

    const moveEntry = (from: string, to: string): Effect.Effect<void, string> =>
      pipe(
        fs.exists(to),
        Effect.mapError(errorMessage),
        Effect.filterOrFail(
          (taken) => !taken,
          () => `destination already has an entry named ${path.basename(to)}`
        ),
        Effect.zipRight(
          pipe(
            fs.rename(from, to),
            Effect.catchAll((e) => (isCrossDevice(e) ? copyAcrossDevices(from, to) : Effect.fail(e))),
            Effect.mapError(errorMessage)
          )
        )
      )

    const moveContents = (sourceDir: string, destinationDir: string) =>
      Effect.gen(function* () {
        const failure = (moved: number, reason: string) =>
          new MoveFailure({ source: sourceDir, destination: destinationDir, moved, reason })

        yield* pipe(
          fs.makeDirectory(destinationDir, { recursive: true }),
          Effect.mapError((e) => failure(0, errorMessage(e)))
        )

        const entries = yield* pipe(
          fs.readDirectory(sourceDir),
          Effect.map((names) => [...names].sort()),
          Effect.mapError((e) => failure(0, errorMessage(e)))
        )

        // Sequential, so the index is the number of entries already moved
        yield* Effect.forEach(entries, (entry, index) =>
          pipe(
            moveEntry(path.join(sourceDir, entry), path.join(destinationDir, entry)),
            Effect.mapError((reason) => failure(index, `${entry}: ${reason}`))
          )
        )

        yield* Effect.logDebug(`Moved ${entries.length} entries from ${sourceDir} to ${destinationDir}`)
        return { moved: entries.length }
      })

    return { moveContents }
  })
)
