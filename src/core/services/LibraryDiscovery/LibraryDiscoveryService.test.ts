import { describe, expect, test } from "vitest"
import { Effect } from "effect"
import { symlinkSync } from "node:fs"

import { LibraryDiscoveryServiceTag, defaultSteamRoots, libraryConfigFiles } from "./LibraryDiscoveryService"
import type { Host } from "../HostService"
import { useTestContext } from "@test/TestContext"

const setup = useTestContext()

const discover = Effect.flatMap(LibraryDiscoveryServiceTag, (discovery) => discovery.discover())

const host = (platform: NodeJS.Platform, env: Host["env"] = {}): Host => ({
  platform,
  homeDir: "/home/player",
  env,
})

describe("defaultSteamRoots", () => {
  test("checks native, legacy and Flatpak installs on Linux", () => {
    expect(defaultSteamRoots(host("linux"))).toEqual([
      "/home/player/.local/share/Steam",
      "/home/player/.steam/steam",
      "/home/player/.var/app/com.valvesoftware.Steam/.local/share/Steam",
    ])
  })

  test("uses Program Files on Windows", () => {
    expect(defaultSteamRoots(host("win32"))).toEqual([
      "C:\\Program Files (x86)\\Steam",
      "C:\\Program Files\\Steam",
    ])
    expect(defaultSteamRoots(host("win32", { "ProgramFiles(x86)": "D:\\Apps" }))[0]).toBe("D:\\Apps\\Steam")
  })

  test("uses Application Support on macOS", () => {
    expect(defaultSteamRoots(host("darwin"))).toEqual(["/home/player/Library/Application Support/Steam"])
  })
})

describe("libraryConfigFiles", () => {
  test("looks under steamapps and config of every root", () => {
    const files = libraryConfigFiles(host("linux"))

    expect(files).toHaveLength(6)
    expect(files.slice(0, 2)).toEqual([
      "/home/player/.local/share/Steam/steamapps/libraryfolders.vdf",
      "/home/player/.local/share/Steam/config/libraryfolders.vdf",
    ])
  })
})

describe("LibraryDiscoveryService", () => {
  test("merges default installs with configured libraries, deduplicated and sorted", async () => {
    const ctx = setup()
    const steamRoot = ctx.mkdir("home", ".local", "share", "Steam")
    const mainLibrary = ctx.mkdir("home", ".local", "share", "Steam", "steamapps")
    const extraLibrary = ctx.mkdir("games", "Extra", "steamapps")
    ctx.mkdir("games", "NoSteamapps")
    ctx.mkdir("home", ".steam")
    // ~/.steam/steam is usually a link to the real install
    symlinkSync(steamRoot, ctx.path("home", ".steam", "steam"))
    ctx.writeFile(
      "home/.local/share/Steam/config/libraryfolders.vdf",
      [
        `"libraryfolders"`,
        `{`,
        `\t"0" { "path" "${steamRoot}" }`,
        `\t"1" { "path" "${ctx.path("games", "Extra")}" }`,
        `\t"2" { "path" "${ctx.path("games", "NoSteamapps")}" }`,
        `}`,
      ].join("\n")
    )

    const libraries = await ctx.run(discover)

    expect(libraries).toEqual([extraLibrary, mainLibrary])
  })

  test("finds nothing on a host without Steam", async () => {
    const ctx = setup()
    ctx.mkdir("home")

    expect(await ctx.run(discover)).toEqual([])
  })

  test("uses the macOS install location on darwin", async () => {
    const ctx = setup({ host: { platform: "darwin" } })
    const library = ctx.mkdir("home", "Library", "Application Support", "Steam", "steamapps")

    expect(await ctx.run(discover)).toEqual([library])
  })
})
