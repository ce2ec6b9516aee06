/**
 * LoggerService - formatted console output for the list, status and link commands
 */

import { Context, Effect, Layer, Console } from "effect"
import type { RelocationOperation, RelocationPlan } from "@domain/RelocationPlan"
import { describePathState, type PathState } from "@domain/PathState"
import type { RelocationResult } from "../RelocationExecutor"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly discovery: {
    readonly header: Effect.Effect<void>
    readonly noLibraries: Effect.Effect<void>
    readonly library: (steamappsDir: string) => Effect.Effect<void>
  }
  readonly status: {
    readonly header: (plan: RelocationPlan) => Effect.Effect<void>
    readonly entry: (operation: RelocationOperation, state: PathState) => Effect.Effect<void>
  }
  readonly relocate: {
    readonly header: Effect.Effect<void>
    readonly windowsNotice: Effect.Effect<void>
    readonly cancelled: (reason: string) => Effect.Effect<void>
    /** One line of the relocation log, `ERROR:`-prefixed for failures */
    readonly result: (result: RelocationResult) => Effect.Effect<void>
    readonly alert: (text: string) => Effect.Effect<void>
    readonly done: Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

export const formatResultLine = (result: RelocationResult): string =>
  result._tag === "Failed" ? `ERROR: ${result.message}` : result.message

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(LoggerServiceTag, {
  discovery: {
    header: Console.log("\n🎮 Steam libraries\n"),
    noLibraries: Console.error("❌ No steamapps directories found. Pass one with --library."),
    library: (steamappsDir: string) => Console.log(`   ${steamappsDir}`),
  },
  status: {
    header: (plan: RelocationPlan) =>
      Effect.gen(function* () {
        yield* Console.log(`\n📋 Library steamapps: ${plan.steamappsDir}`)
        yield* Console.log(`   Destination root: ${plan.destinationRoot}\n`)
      }),
    entry: (operation: RelocationOperation, state: PathState) =>
      Console.log(`   ${operation.target}: ${operation.linkPath} (${describePathState(state)})`),
  },
  relocate: {
    header: Console.log("\n🔗 Steam Download Symlink Helper\n"),
    windowsNotice: Console.log(
      [
        "ℹ️  Windows symlink requirements:",
        "   Creating symbolic links needs either Administrator rights or Developer Mode.",
        "   Settings > Update & Security > For developers > Developer Mode",
        "",
      ].join("\n")
    ),
    cancelled: (reason: string) => Console.log(`\n${reason}. No links were changed.\n`),
    result: (result: RelocationResult) =>
      result._tag === "Failed"
        ? Console.error(formatResultLine(result))
        : Console.log(formatResultLine(result)),
    alert: (text: string) => Console.error(`\n${text}\n`),
    done: Console.log("\n✓ Requested symlinks processed. Check the log above for details.\n"),
  },
})
