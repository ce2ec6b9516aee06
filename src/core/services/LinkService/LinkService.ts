/**
 * LinkService - the link primitives the relocation needs.
 *
 * @effect/platform's FileSystem cannot ask for a directory link and its
 * `remove` deletes non-empty directories, so these wrap node:fs directly.
 * All errors are converted to typed errors.
 */

import { Context, Data, Effect, Layer } from "effect"
import { rmdir, symlink, unlink } from "node:fs/promises"
import { HostServiceTag } from "../HostService"
import { errorMessage, isPermissionError } from "@lib/ioError"

// =============================================================================
// Typed errors
// =============================================================================

/** The host refused to create a symbolic link without elevated rights */
export class InsufficientPrivilege extends Data.TaggedError("InsufficientPrivilege")<{
  readonly linkPath: string
  readonly targetPath: string
  readonly platform: NodeJS.Platform
  readonly reason: string
}> {}

export class LinkCreationFailed extends Data.TaggedError("LinkCreationFailed")<{
  readonly linkPath: string
  readonly targetPath: string
  readonly reason: string
}> {}

export class PathRemovalFailed extends Data.TaggedError("PathRemovalFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type LinkError = InsufficientPrivilege | LinkCreationFailed

// =============================================================================
// Service interface
// =============================================================================

export interface LinkService {
  /** Create `linkPath` as a directory symbolic link pointing at `targetPath` */
  readonly createDirectoryLink: (linkPath: string, targetPath: string) => Effect.Effect<void, LinkError>
  /** Remove a symbolic link, never what it points at */
  readonly removeLink: (linkPath: string) => Effect.Effect<void, PathRemovalFailed>
  /** Remove a directory only if it is empty */
  readonly removeEmptyDirectory: (path: string) => Effect.Effect<void, PathRemovalFailed>
}

export class LinkServiceTag extends Context.Tag("LinkService")<LinkServiceTag, LinkService>() {}

export const toLinkError = (
  linkPath: string,
  targetPath: string,
  platform: NodeJS.Platform,
  error: unknown
): LinkError =>
  isPermissionError(error)
    ? new InsufficientPrivilege({ linkPath, targetPath, platform, reason: errorMessage(error) })
    : new LinkCreationFailed({ linkPath, targetPath, reason: errorMessage(error) })

const removal = (path: string, remove: () => Promise<void>) =>
  Effect.tryPromise({
    try: remove,
    catch: (e) => new PathRemovalFailed({ path, reason: errorMessage(e) }),
  })

// =============================================================================
// Live implementation (node:fs/promises)
// =============================================================================

export const LinkServiceLive = Layer.effect(
  LinkServiceTag,
  Effect.map(HostServiceTag, (host) => ({
    createDirectoryLink: (linkPath: string, targetPath: string) =>
      Effect.tryPromise({
        // "dir" only matters on Windows, where file and directory links differ
        try: () => symlink(targetPath, linkPath, "dir"),
        catch: (e) => toLinkError(linkPath, targetPath, host.platform, e),
      }),
    removeLink: (linkPath: string) => removal(linkPath, () => unlink(linkPath)),
    removeEmptyDirectory: (path: string) => removal(path, () => rmdir(path)),
  }))
)
