/**
 * ConfirmService - the yes/no question the relocation asks before it touches
 * anything it cannot undo.
 *
 * The CLI answers through a terminal prompt. Non-interactive runs and tests use
 * one of the fixed policies below.
 */

import { Context, Effect, Layer } from "effect"

export interface ConfirmRequest {
  readonly title: string
  readonly message: string
}

export interface ConfirmService {
  readonly confirm: (request: ConfirmRequest) => Effect.Effect<boolean>
}

export class ConfirmServiceTag extends Context.Tag("ConfirmService")<
  ConfirmServiceTag,
  ConfirmService
>() {}

export const ConfirmServiceAlwaysApprove = Layer.succeed(ConfirmServiceTag, {
  confirm: () => Effect.succeed(true),
})

export const ConfirmServiceAlwaysDecline = Layer.succeed(ConfirmServiceTag, {
  confirm: () => Effect.succeed(false),
})

export interface ScriptedConfirm {
  readonly layer: Layer.Layer<ConfirmServiceTag>
  /** Every request asked so far, in order */
  readonly asked: ReadonlyArray<ConfirmRequest>
}

/**
 * Answers requests from a queue of canned replies. Once the queue runs out
 * every further request is declined.
 */
export const makeScriptedConfirmService = (answers: ReadonlyArray<boolean>): ScriptedConfirm => {
  const asked: ConfirmRequest[] = []

  const layer = Layer.succeed(ConfirmServiceTag, {
    confirm: (request: ConfirmRequest) =>
      Effect.sync(() => {
        asked.push(request)
        return answers[asked.length - 1] ?? false
      }),
  })

  return { layer, asked }
}
