/**
 * DiskStatsService - free and total space of the volume holding a path.
 *
 * Only used to show how much room the destination has before the user agrees
 * to move anything, so callers treat failures as "unknown".
 */

import { Context, Data, Effect, Layer, pipe } from "effect";
import checkDiskSpace from "check-disk-space";
import { errorMessage, isPermissionError } from "@lib/ioError";

export class DiskStatsPermissionDenied extends Data.TaggedError("DiskStatsPermissionDenied")<{
  readonly path: string;
}> {}

export class DiskStatsUnknownError extends Data.TaggedError("DiskStatsUnknownError")<{
  readonly path: string;
  readonly cause: string;
}> {}

export type DiskStatsError = DiskStatsPermissionDenied | DiskStatsUnknownError;

export interface DiskStats {
  readonly free: number;
  readonly size: number;
}

export interface DiskStatsService {
  readonly getStats: (path: string) => Effect.Effect<DiskStats, DiskStatsError>;
}

export class DiskStatsServiceTag extends Context.Tag("DiskStatsService")<
  DiskStatsServiceTag,
  DiskStatsService
>() {}

export const toDiskStatsError = (path: string, error: unknown): DiskStatsError =>
  isPermissionError(error)
    ? new DiskStatsPermissionDenied({ path })
    : new DiskStatsUnknownError({ path, cause: errorMessage(error) });

export const DiskStatsServiceLive = Layer.succeed(DiskStatsServiceTag, {
  getStats: (path: string) =>
    pipe(
      Effect.tryPromise({
        try: () => checkDiskSpace(path),
        catch: (e) => toDiskStatsError(path, e)
      }),
      Effect.map(({ free, size }) => ({ free, size }))
    )
});
