/**
 * HostService - facts about the machine the relocation runs on.
 *
 * Discovery and remediation text depend on the platform, the home directory
 * and the environment. Keeping them behind a tag lets tests pretend to be any
 * host.
 */

import { Context, Layer } from "effect"
import { homedir } from "node:os"

export interface Host {
  readonly platform: NodeJS.Platform
  readonly homeDir: string
  readonly env: Readonly<Record<string, string | undefined>>
}

export class HostServiceTag extends Context.Tag("HostService")<HostServiceTag, Host>() {}

export const HostServiceLive = Layer.sync(HostServiceTag, () => ({
  platform: process.platform,
  homeDir: homedir(),
  env: process.env,
}))

export const makeHostService = (host: Host) => Layer.succeed(HostServiceTag, host)
