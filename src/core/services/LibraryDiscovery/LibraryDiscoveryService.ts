/**
 * LibraryDiscoveryService - finds every steamapps directory on the host.
 *
 * Merges the well-known Steam install locations with the library roots listed
 * in libraryfolders.vdf. Read-only and never fails: anything unreadable is
 * simply not a candidate.
 */

import { Context, Effect, Layer, pipe } from "effect"
import { FileSystem, Path } from "@effect/platform"
import * as NodePath from "node:path"
import { HostServiceTag, type Host } from "../HostService"
import { ConfigParserServiceTag } from "../ConfigParser"
import { STEAMAPPS_DIR_NAME } from "@domain/RelocationPlan"

export interface LibraryDiscoveryService {
  /** Existing steamapps directories, canonical, deduplicated and sorted */
  readonly discover: () => Effect.Effect<ReadonlyArray<string>>
}

export class LibraryDiscoveryServiceTag extends Context.Tag("LibraryDiscoveryService")<
  LibraryDiscoveryServiceTag,
  LibraryDiscoveryService
>() {}

// =============================================================================
// Well-known locations
// =============================================================================

export const defaultSteamRoots = (host: Host): ReadonlyArray<string> => {
  const home = (...segments: string[]) => NodePath.join(host.homeDir, ...segments)

  switch (host.platform) {
    case "win32": {
      const programFilesX86 = host.env["ProgramFiles(x86)"] ?? "C:\\Program Files (x86)"
      const programFiles = host.env["ProgramFiles"] ?? "C:\\Program Files"
      return [NodePath.win32.join(programFilesX86, "Steam"), NodePath.win32.join(programFiles, "Steam")]
    }
    case "darwin":
      return [home("Library", "Application Support", "Steam")]
    default:
      return [
        home(".local", "share", "Steam"),
        home(".steam", "steam"),
        // Flatpak
        home(".var", "app", "com.valvesoftware.Steam", ".local", "share", "Steam"),
      ]
  }
}

/** Places Steam keeps libraryfolders.vdf, older clients under steamapps/, newer under config/ */
export const libraryConfigFiles = (host: Host): ReadonlyArray<string> =>
  defaultSteamRoots(host).flatMap((root) => [
    NodePath.join(root, STEAMAPPS_DIR_NAME, "libraryfolders.vdf"),
    NodePath.join(root, "config", "libraryfolders.vdf"),
  ])

// =============================================================================
// Live implementation
// =============================================================================

export const LibraryDiscoveryServiceLive = Layer.effect(
  LibraryDiscoveryServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const host = yield* HostServiceTag
    const parser = yield* ConfigParserServiceTag

    const isType = (type: FileSystem.File.Type) => (candidate: string) =>
      pipe(
        fs.stat(candidate),
        Effect.map((info) => info.type === type),
        Effect.orElseSucceed(() => false)
      )

    const canonical = (candidate: string) =>
      pipe(fs.realPath(candidate), Effect.orElseSucceed(() => path.resolve(candidate)))

    const discover = () =>
      Effect.gen(function* () {
        const defaults = defaultSteamRoots(host).map((root) => path.join(root, STEAMAPPS_DIR_NAME))

        const configFiles = yield* Effect.filter(libraryConfigFiles(host), isType("File"))
        const libraryRoots = yield* Effect.forEach(configFiles, parser.parse)
        const fromConfig = libraryRoots.flat().map((root) => path.join(root, STEAMAPPS_DIR_NAME))

        const existing = yield* Effect.filter([...defaults, ...fromConfig], isType("Directory"))
        const resolved = yield* Effect.forEach(existing, canonical)
        const steamapps = Array.from(new Set(resolved)).sort()

        yield* Effect.logDebug(
          `Discovered ${steamapps.length} steamapps dir(s) from ${configFiles.length} config file(s)`
        )
        return steamapps
      })

    return { discover }
  })
)
