import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { symlinkSync } from "node:fs"

import { PathClassifierServiceTag } from "./PathClassifierService"
import { PathState } from "@domain/PathState"
import { useTestContext } from "@test/TestContext"

const setup = useTestContext()

const classify = (linkPath: string, targetPath: string) =>
  Effect.flatMap(PathClassifierServiceTag, (classifier) => classifier.classify(linkPath, targetPath))

describe("PathClassifierService", () => {
  test("nothing at the link path is Missing", async () => {
    const ctx = setup()

    const state = await ctx.run(classify(ctx.path("steamapps", "downloading"), ctx.path("fast", "downloading")))

    expect(state).toEqual(PathState.Missing())
  })

  test("a link resolving to the target is SymlinkCorrect", async () => {
    const ctx = setup()
    const target = ctx.mkdir("fast", "downloading")
    ctx.mkdir("steamapps")
    symlinkSync(target, ctx.path("steamapps", "downloading"))

    const state = await ctx.run(classify(ctx.path("steamapps", "downloading"), target))

    expect(state._tag).toBe("SymlinkCorrect")
  })

  test("a link elsewhere is SymlinkWrong with its current target", async () => {
    const ctx = setup()
    const elsewhere = ctx.mkdir("old", "downloading")
    ctx.mkdir("steamapps")
    symlinkSync(elsewhere, ctx.path("steamapps", "downloading"))

    const state = await ctx.run(classify(ctx.path("steamapps", "downloading"), ctx.mkdir("fast", "downloading")))

    expect(state).toEqual(PathState.SymlinkWrong({ currentTarget: elsewhere }))
  })

  test("a broken link is SymlinkWrong", async () => {
    const ctx = setup()
    ctx.mkdir("steamapps")
    symlinkSync(ctx.path("unmounted"), ctx.path("steamapps", "downloading"))

    const state = await ctx.run(classify(ctx.path("steamapps", "downloading"), ctx.path("fast", "downloading")))

    expect(state).toEqual(PathState.SymlinkWrong({ currentTarget: ctx.path("unmounted") }))
  })

  test("directories are Empty or NonEmpty by their contents", async () => {
    const ctx = setup()
    const empty = ctx.mkdir("steamapps", "temp")
    ctx.writeFile("steamapps/downloading/123/chunk.bin", "x")

    expect((await ctx.run(classify(empty, ctx.path("fast", "temp"))))._tag).toBe("EmptyDirectory")
    expect((await ctx.run(classify(ctx.path("steamapps", "downloading"), ctx.path("fast", "downloading"))))._tag).toBe(
      "NonEmptyDirectory"
    )
  })

  test("a regular file is NonDirectoryFile", async () => {
    const ctx = setup()
    const file = ctx.writeFile("steamapps/downloading", "not a directory")

    const state = await ctx.run(classify(file, ctx.path("fast", "downloading")))

    expect(state._tag).toBe("NonDirectoryFile")
  })
})
