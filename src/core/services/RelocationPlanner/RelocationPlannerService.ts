/**
 * RelocationPlannerService - turns a chosen library and destination into a plan.
 *
 * `plan` creates the destination scaffold (base and `<library>_symlink` root)
 * but never a link. `inspect` builds the same plan without touching the disk.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem, Path } from "@effect/platform"
import { derivePlan, type RelocationPlan } from "@domain/RelocationPlan"
import type { TargetSelection } from "@domain/RelocationTarget"
import { errorMessage } from "@lib/ioError"

// =============================================================================
// Service errors
// =============================================================================

export class InvalidSource extends Data.TaggedError("InvalidSource")<{
  readonly path: string
  readonly reason: string
}> {}

export class DestinationUnavailable extends Data.TaggedError("DestinationUnavailable")<{
  readonly path: string
  readonly reason: string
}> {}

export type PlanError = InvalidSource | DestinationUnavailable

// =============================================================================
// Service interface
// =============================================================================

export interface RelocationPlannerService {
  readonly inspect: (
    steamappsDir: string,
    destinationBase: string,
    selection: TargetSelection
  ) => Effect.Effect<RelocationPlan, InvalidSource>
  readonly plan: (
    steamappsDir: string,
    destinationBase: string,
    selection: TargetSelection
  ) => Effect.Effect<RelocationPlan, PlanError>
}

export class RelocationPlannerServiceTag extends Context.Tag("RelocationPlannerService")<
  RelocationPlannerServiceTag,
  RelocationPlannerService
>() {}

// =============================================================================
// Live implementation
// =============================================================================

export const RelocationPlannerServiceLive = Layer.effect(
  RelocationPlannerServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const validateSource = (steamappsDir: string): Effect.Effect<void, InvalidSource> =>
      pipe(
        fs.stat(steamappsDir),
        Effect.mapError((e) => {
          const missing = e._tag === "SystemError" && e.reason === "NotFound"
          return new InvalidSource({ path: steamappsDir, reason: missing ? "does not exist" : errorMessage(e) })
        }),
        Effect.filterOrFail(
          (info) => info.type === "Directory",
          () => new InvalidSource({ path: steamappsDir, reason: "is not a directory" })
        ),
        Effect.asVoid
      )

    const ensureDirectory = (dir: string): Effect.Effect<void, DestinationUnavailable> =>
      pipe(
        fs.makeDirectory(dir, { recursive: true }),
        Effect.mapError((e) => new DestinationUnavailable({ path: dir, reason: errorMessage(e) }))
      )

    const inspect = (steamappsDir: string, destinationBase: string, selection: TargetSelection) =>
      pipe(
        validateSource(path.resolve(steamappsDir)),
        Effect.as(derivePlan(path.resolve(steamappsDir), path.resolve(destinationBase), selection))
      )

    const plan = (steamappsDir: string, destinationBase: string, selection: TargetSelection) =>
      Effect.gen(function* () {
        const relocationPlan = yield* inspect(steamappsDir, destinationBase, selection)

        yield* ensureDirectory(relocationPlan.destinationBase)
        yield* ensureDirectory(relocationPlan.destinationRoot)

        yield* Effect.logDebug(
          `Planned ${relocationPlan.operations.length} operation(s) into ${relocationPlan.destinationRoot}`
        )
        return relocationPlan
      })

    return { inspect, plan }
  })
)
