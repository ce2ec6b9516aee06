/**
 * ConfigParserService - reads library roots out of libraryfolders.vdf files.
 *
 * Parsing is best-effort: a file that cannot be read yields no roots and the
 * failure is only logged at debug level.
 */

import { Context, Data, Effect, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import { HostServiceTag } from "../HostService"
import { expandPath } from "@lib/expandPath"
import { extractLibraryPaths } from "@lib/libraryFolders"
import { errorMessage } from "@lib/ioError"

export class DiscoveryReadFailure extends Data.TaggedError("DiscoveryReadFailure")<{
  readonly path: string
  readonly reason: string
}> {}

export interface ConfigParserService {
  /** Existing, expanded library roots listed in a config file, in file order */
  readonly parse: (configFile: string) => Effect.Effect<ReadonlyArray<string>>
}

export class ConfigParserServiceTag extends Context.Tag("ConfigParserService")<
  ConfigParserServiceTag,
  ConfigParserService
>() {}

export const ConfigParserServiceLive = Layer.effect(
  ConfigParserServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const host = yield* HostServiceTag

    const readConfig = (configFile: string): Effect.Effect<string, DiscoveryReadFailure> =>
      pipe(
        fs.readFileString(configFile),
        Effect.mapError((e) => new DiscoveryReadFailure({ path: configFile, reason: errorMessage(e) }))
      )

    const exists = (path: string) => pipe(fs.exists(path), Effect.orElseSucceed(() => false))

    return {
      parse: (configFile: string) =>
        pipe(
          readConfig(configFile),
          Effect.map((text) => extractLibraryPaths(text).map((raw) => expandPath(raw, host))),
          Effect.flatMap((roots) => Effect.filter(roots, exists)),
          Effect.tap((roots) =>
            Effect.logDebug(`${configFile}: ${roots.length} library root(s)`)
          ),
          Effect.catchTag("DiscoveryReadFailure", (failure) =>
            pipe(
              Effect.logDebug(`Ignoring unreadable library config ${failure.path}: ${failure.reason}`),
              Effect.as([])
            )
          )
        ),
    }
  })
)
