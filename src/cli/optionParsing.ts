import { Data, Effect, pipe } from "effect"
import { FileSystem } from "@effect/platform"

export class MissingInput extends Data.TaggedError("MissingInput")<{
  readonly option: string
  readonly detail: string
}> {}

// Where removable and secondary volumes usually get mounted
const DESTINATION_HINTS = ["/mnt", "/media", "/run/media"] as const

/** First mount root that exists, offered as the default destination */
export const suggestDestination = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem

  for (const hint of DESTINATION_HINTS) {
    const exists = yield* pipe(fs.exists(hint), Effect.orElseSucceed(() => false))
    if (exists) return hint
  }
  return undefined
})

export const requireInput = (
  value: string | undefined,
  option: string,
  detail: string
): Effect.Effect<string, MissingInput> => {
  const trimmed = value?.trim() ?? ""
  return trimmed === "" ? Effect.fail(new MissingInput({ option, detail })) : Effect.succeed(trimmed)
}
