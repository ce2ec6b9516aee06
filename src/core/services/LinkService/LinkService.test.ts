import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { existsSync, lstatSync, readlinkSync } from "node:fs"

import { LinkServiceTag, toLinkError } from "./LinkService"
import { useTestContext } from "@test/TestContext"

const setup = useTestContext()

const nodeError = (code: string, message: string) => Object.assign(new Error(message), { code })

describe("toLinkError", () => {
  test("permission errors become InsufficientPrivilege", () => {
    const error = toLinkError("/lib/downloading", "/fast/downloading", "win32", nodeError("EPERM", "operation not permitted"))

    expect(error).toMatchObject({
      _tag: "InsufficientPrivilege",
      linkPath: "/lib/downloading",
      targetPath: "/fast/downloading",
      platform: "win32",
      reason: "operation not permitted",
    })
  })

  test("anything else is LinkCreationFailed", () => {
    const error = toLinkError("/lib/downloading", "/fast/downloading", "linux", nodeError("EEXIST", "file already exists"))

    expect(error).toMatchObject({ _tag: "LinkCreationFailed", reason: "file already exists" })
  })
})

describe("LinkService", () => {
  test("creates a directory link and removes only the link", async () => {
    const ctx = setup()
    const target = ctx.mkdir("fast", "downloading")
    const link = ctx.path("downloading")

    await ctx.run(Effect.flatMap(LinkServiceTag, (links) => links.createDirectoryLink(link, target)))

    expect(lstatSync(link).isSymbolicLink()).toBe(true)
    expect(readlinkSync(link)).toBe(target)

    await ctx.run(Effect.flatMap(LinkServiceTag, (links) => links.removeLink(link)))

    expect(existsSync(link)).toBe(false)
    expect(existsSync(target)).toBe(true)
  })

  test("an existing entry makes link creation fail", async () => {
    const ctx = setup()
    const link = ctx.mkdir("downloading")

    const error = await ctx.run(
      Effect.flip(Effect.flatMap(LinkServiceTag, (links) => links.createDirectoryLink(link, ctx.path("fast"))))
    )

    expect(error._tag).toBe("LinkCreationFailed")
  })

  test("removeEmptyDirectory refuses a directory with contents", async () => {
    const ctx = setup()
    ctx.writeFile("temp/keep.txt", "x")

    const error = await ctx.run(
      Effect.flip(Effect.flatMap(LinkServiceTag, (links) => links.removeEmptyDirectory(ctx.path("temp"))))
    )

    expect(error).toMatchObject({ _tag: "PathRemovalFailed", path: ctx.path("temp") })
    expect(existsSync(ctx.path("temp", "keep.txt"))).toBe(true)
  })
})
