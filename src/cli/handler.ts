import { Effect, pipe } from "effect"
import { Console } from "effect"

import type { LinkOptions, StatusOptions } from "./options"
import { requireInput, suggestDestination } from "./optionParsing"
import { fromDomainError, fromRelocationError } from "./errors"
import { interactiveLinkPrompts } from "./interactive"

import {
  discoverLibraries,
  inspectRelocation,
  relocate,
  RelocationRun,
  type RelocationRequest,
} from "@core"
import type { RelocationResult } from "@services/RelocationExecutor"
import { HostServiceTag } from "@services/HostService"
import { LoggerServiceTag } from "@services/LoggerService"

/**
 * Error handling wrapper for CLI commands
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return Console.error(`\n${appError.format()}`)
    }),
    Effect.asVoid
  )

const LIBRARY_DETAIL = "No steamapps directory was given."
const DEST_DETAIL = "No destination base folder was given."

const toRequest = (options: StatusOptions) =>
  Effect.gen(function* () {
    const steamappsDir = yield* requireInput(options.library, "library", LIBRARY_DETAIL)
    const destinationBase = yield* requireInput(options.dest, "dest", DEST_DETAIL)
    const request: RelocationRequest = { steamappsDir, destinationBase, includeTemp: options.temp }
    return request
  })

/**
 * Run the list command
 */
export const runList = () =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const libraries = yield* discoverLibraries

    yield* logger.discovery.header

    if (libraries.length === 0) {
      yield* logger.discovery.noLibraries
      return
    }

    yield* Effect.forEach(libraries, logger.discovery.library, { discard: true })
  })

/**
 * Run the status command
 */
export const runStatus = (options: StatusOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const request = yield* toRequest(options)

    const { plan, operations } = yield* inspectRelocation(request)

    yield* logger.status.header(plan)
    yield* Effect.forEach(operations, ({ operation, state }) => logger.status.entry(operation, state), {
      discard: true,
    })
  })

/**
 * Run the link command
 */
export const runLink = (options: LinkOptions, isInteractive: boolean = false) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag
    const host = yield* HostServiceTag

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }

    yield* logger.relocate.header

    if (host.platform === "win32") {
      yield* logger.relocate.windowsNotice
    }

    // Interactive mode: discover libraries first, then prompt for the rest
    let statusOptions: StatusOptions = options
    if (isInteractive) {
      const libraries = yield* discoverLibraries
      const suggested = yield* suggestDestination

      const answers = yield* pipe(
        interactiveLinkPrompts(libraries, suggested),
        Effect.map((a): StatusOptions | undefined => ({ library: a.library, dest: a.dest, temp: a.temp })),
        Effect.catchTag("QuitException", () => Effect.succeed(undefined))
      )

      if (answers === undefined) {
        yield* logger.relocate.cancelled("Setup aborted")
        return
      }
      statusOptions = answers
    }

    const request = yield* toRequest(statusOptions)

    const onResult = (result: RelocationResult) =>
      Effect.gen(function* () {
        yield* logger.relocate.result(result)
        if (result._tag === "Failed") {
          yield* logger.relocate.alert(fromRelocationError(result.error).format())
        }
      })

    const run = yield* relocate(request, { onResult })

    yield* RelocationRun.$match(run, {
      Cancelled: ({ reason }) => logger.relocate.cancelled(reason),
      Completed: () => logger.relocate.done,
    })
  })
