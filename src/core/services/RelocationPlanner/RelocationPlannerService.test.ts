import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { existsSync } from "node:fs"

import { RelocationPlannerServiceTag } from "./RelocationPlannerService"
import { useTestContext } from "@test/TestContext"

const setup = useTestContext()

const inspect = (steamappsDir: string, destinationBase: string, includeTemp = false) =>
  Effect.flatMap(RelocationPlannerServiceTag, (planner) =>
    planner.inspect(steamappsDir, destinationBase, { includeTemp })
  )

const plan = (steamappsDir: string, destinationBase: string, includeTemp = false) =>
  Effect.flatMap(RelocationPlannerServiceTag, (planner) =>
    planner.plan(steamappsDir, destinationBase, { includeTemp })
  )

describe("RelocationPlannerService", () => {
  test("plan creates the destination root but no links", async () => {
    const ctx = setup()
    const steamapps = ctx.mkdir("SteamLibrary", "steamapps")

    const result = await ctx.run(plan(steamapps, ctx.path("fast"), true))

    expect(result.destinationRoot).toBe(ctx.path("fast", "SteamLibrary_symlink"))
    expect(result.operations.map((op) => op.linkPath)).toEqual([
      ctx.path("SteamLibrary", "steamapps", "downloading"),
      ctx.path("SteamLibrary", "steamapps", "temp"),
    ])
    expect(existsSync(ctx.path("fast", "SteamLibrary_symlink"))).toBe(true)
    expect(existsSync(ctx.path("fast", "SteamLibrary_symlink", "downloading"))).toBe(false)
    expect(existsSync(ctx.path("SteamLibrary", "steamapps", "downloading"))).toBe(false)
  })

  test("inspect does not touch the destination", async () => {
    const ctx = setup()
    const steamapps = ctx.mkdir("SteamLibrary", "steamapps")

    const result = await ctx.run(inspect(steamapps, ctx.path("fast")))

    expect(result.operations).toHaveLength(1)
    expect(existsSync(ctx.path("fast"))).toBe(false)
  })

  test("a missing source is InvalidSource", async () => {
    const ctx = setup()

    const error = await ctx.run(Effect.flip(plan(ctx.path("nowhere", "steamapps"), ctx.path("fast"))))

    expect(error).toMatchObject({
      _tag: "InvalidSource",
      path: ctx.path("nowhere", "steamapps"),
      reason: "does not exist",
    })
    expect(existsSync(ctx.path("fast"))).toBe(false)
  })

  test("a file as source is InvalidSource", async () => {
    const ctx = setup()
    const file = ctx.writeFile("steamapps", "")

    const error = await ctx.run(Effect.flip(inspect(file, ctx.path("fast"))))

    expect(error).toMatchObject({ _tag: "InvalidSource", reason: "is not a directory" })
  })

  test("a destination below a file is DestinationUnavailable", async () => {
    const ctx = setup()
    const steamapps = ctx.mkdir("SteamLibrary", "steamapps")
    const blocker = ctx.writeFile("blocker", "")

    const error = await ctx.run(Effect.flip(plan(steamapps, `${blocker}/fast`)))

    expect(error).toMatchObject({ _tag: "DestinationUnavailable", path: `${blocker}/fast` })
  })
})
