import { Prompt } from "@effect/cli"
import { Terminal } from "@effect/platform"
import { Effect, Layer, pipe } from "effect"
import { ConfirmServiceTag, type ConfirmRequest } from "@core"

/**
 * Answers confirmations with a yes/no terminal prompt. Quitting the prompt
 * (Ctrl+C) counts as "no".
 */
export const ConfirmServicePrompt = Layer.effect(
  ConfirmServiceTag,
  Effect.map(Terminal.Terminal, (terminal) => ({
    confirm: ({ title, message }: ConfirmRequest) =>
      pipe(
        Prompt.run(Prompt.confirm({ message: `${title}\n${message}`, initial: false })),
        Effect.provideService(Terminal.Terminal, terminal),
        Effect.catchTag("QuitException", () => Effect.succeed(false))
      ),
  }))
)
