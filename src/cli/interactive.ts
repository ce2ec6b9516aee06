import { Prompt } from "@effect/cli"
import { Effect, Console } from "effect"
import type { Terminal, QuitException } from "@effect/platform/Terminal"

export interface InteractiveAnswers {
  readonly library: string
  readonly dest: string
  readonly temp: boolean
}

const MANUAL_ENTRY = "__manual__"

const promptLibrary = (
  discoveredLibraries: ReadonlyArray<string>
): Effect.Effect<string, QuitException, Terminal> =>
  Effect.gen(function* () {
    if (discoveredLibraries.length > 0) {
      const choice = yield* Prompt.select({
        message: "Steam library to relocate",
        choices: [
          ...discoveredLibraries.map((dir) => ({ title: dir, value: dir })),
          { title: "Enter a path...", value: MANUAL_ENTRY },
        ],
      })
      if (choice !== MANUAL_ENTRY) return choice
    } else {
      yield* Console.log("No Steam libraries were discovered automatically.\n")
    }

    return yield* Prompt.text({ message: "Path to a steamapps directory" }).pipe(
      Effect.map((s) => s.trim())
    )
  })

export const interactiveLinkPrompts = (
  discoveredLibraries: ReadonlyArray<string>,
  suggestedDest: string | undefined
): Effect.Effect<InteractiveAnswers, QuitException, Terminal> =>
  Effect.gen(function* () {
    yield* Console.log("\n🔗 Steam Download Symlink Helper - Interactive Setup\n")

    const library = yield* promptLibrary(discoveredLibraries)

    const dest = yield* Prompt.text({
      message: "Destination base folder on the faster volume",
      default: suggestedDest ?? "",
    }).pipe(Effect.map((s) => s.trim()))

    const temp = yield* Prompt.confirm({
      message: "Also relocate steamapps/temp?",
      initial: true,
    })

    return { library, dest, temp }
  })
