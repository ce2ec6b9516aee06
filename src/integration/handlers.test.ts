/**
 * Integration tests for CLI handlers using TestContext.
 *
 * Console output is captured to check what the user would see.
 */

import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"
import { Effect, Layer, pipe } from "effect"
import { lstatSync, symlinkSync } from "node:fs"

import { runLink, runList, runStatus, withErrorHandling } from "../cli/handler"
import { LoggerServiceLive, type LoggerServiceTag } from "../core/services/LoggerService"
import { useTestContext, type TestContext } from "../test/TestContext"

const setup = useTestContext()

type HandlerServices = Layer.Layer.Success<TestContext["layer"]> | LoggerServiceTag

const runHandler = (ctx: TestContext, effect: Effect.Effect<void, never, HandlerServices>) =>
  pipe(effect, Effect.provide(Layer.merge(ctx.layer, LoggerServiceLive)), Effect.runPromise)

let logged: string[] = []
let errors: string[] = []

beforeEach(() => {
  logged = []
  errors = []
  vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
    logged.push(args.join(" "))
  })
  vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
    errors.push(args.join(" "))
  })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe("runList", () => {
  test("prints every discovered steamapps directory", async () => {
    const ctx = setup()
    const library = ctx.mkdir("home", ".local", "share", "Steam", "steamapps")

    await runHandler(ctx, withErrorHandling(runList()))

    expect(logged).toContain(`   ${library}`)
  })

  test("says so when nothing is found", async () => {
    const ctx = setup()

    await runHandler(ctx, withErrorHandling(runList()))

    expect(errors).toEqual(["❌ No steamapps directories found. Pass one with --library."])
  })
})

describe("runStatus", () => {
  test("prints the state of every link path", async () => {
    const ctx = setup()
    const steamapps = ctx.mkdir("Library", "steamapps")
    const target = ctx.mkdir("fast", "Library_symlink", "downloading")
    symlinkSync(target, ctx.path("Library", "steamapps", "downloading"))

    await runHandler(
      ctx,
      withErrorHandling(runStatus({ library: steamapps, dest: ctx.path("fast"), temp: true }))
    )

    expect(logged).toContain(`   downloading: ${steamapps}/downloading (already linked)`)
    expect(logged).toContain(`   temp: ${steamapps}/temp (missing, will be linked)`)
  })

  test("reports a missing destination as a formatted error", async () => {
    const ctx = setup()

    await runHandler(ctx, withErrorHandling(runStatus({ library: ctx.path("Library"), dest: "  ", temp: false })))

    expect(errors).toEqual([
      [
        "",
        "ERROR: Missing input",
        "",
        "   No destination base folder was given.",
        "",
        "   Hint: Pass --dest, or run 'link' in a terminal to be prompted.",
      ].join("\n"),
    ])
  })
})

describe("runLink", () => {
  test("relocates and prints one line per operation", async () => {
    const ctx = setup({ confirmAnswers: [true] })
    const steamapps = ctx.mkdir("Library", "steamapps")
    const targetPath = ctx.path("fast", "Library_symlink", "downloading")

    await runHandler(
      ctx,
      withErrorHandling(
        runLink({ library: steamapps, dest: ctx.path("fast"), temp: false, yes: false })
      )
    )

    expect(logged).toContain(`Linked: ${steamapps}/downloading -> ${targetPath}`)
    expect(logged).toContain("\n✓ Requested symlinks processed. Check the log above for details.\n")
    expect(lstatSync(`${steamapps}/downloading`).isSymbolicLink()).toBe(true)
  })

  test("prints the failure and an alert for a refused link", async () => {
    const ctx = setup({ confirmAnswers: [true] })
    const steamapps = ctx.mkdir("Library", "steamapps")
    ctx.denyLink(`${steamapps}/downloading`)

    await runHandler(
      ctx,
      withErrorHandling(runLink({ library: steamapps, dest: ctx.path("fast"), temp: false, yes: false }))
    )

    expect(errors[0]?.startsWith("ERROR: Failed to create symlink due to insufficient privileges.")).toBe(true)
    expect(errors[1]?.startsWith("\nERROR: Symlink Error\n")).toBe(true)
  })

  test("reports a declined plan as cancelled", async () => {
    const ctx = setup({ confirmAnswers: [false] })
    const steamapps = ctx.mkdir("Library", "steamapps")

    await runHandler(
      ctx,
      withErrorHandling(runLink({ library: steamapps, dest: ctx.path("fast"), temp: false, yes: false }))
    )

    expect(logged).toContain("\nRelocation not confirmed. No links were changed.\n")
  })

  test("prints the Windows notice on Windows hosts", async () => {
    const ctx = setup({ confirmAnswers: [false], host: { platform: "win32" } })
    const steamapps = ctx.mkdir("Library", "steamapps")

    await runHandler(
      ctx,
      withErrorHandling(runLink({ library: steamapps, dest: ctx.path("fast"), temp: false, yes: false }))
    )

    expect(logged.some((line) => line.startsWith("ℹ️  Windows symlink requirements:"))).toBe(true)
  })
})
