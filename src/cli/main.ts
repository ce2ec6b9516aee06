import { Command } from "@effect/cli";
import type { Terminal } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Layer, Option, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runList, runStatus, runLink, withErrorHandling } from "@cli/handler";
import { ConfirmServicePrompt } from "@cli/confirm";
import {
  createAppLayer,
  ConfirmServiceAlwaysApprove,
  ConfirmServiceAlwaysDecline,
  type ConfirmServiceTag
} from "@core";
import { LoggerServiceLive } from "@services/LoggerService";

type ConfirmLayer = Layer.Layer<ConfirmServiceTag, never, Terminal.Terminal>;

const appLayer = (confirm: ConfirmLayer) =>
  Layer.merge(createAppLayer(confirm), LoggerServiceLive);

const withLogLevel =
  (debug: boolean) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    debug ? Effect.provide(self, Logger.minimumLogLevel(LogLevel.Debug)) : self;

const listCommand = Command.make(
  "list",
  {
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(runList()).pipe(
      withLogLevel(opts.debug),
      Effect.provide(appLayer(ConfirmServiceAlwaysDecline))
    )
).pipe(Command.withDescription("List the Steam libraries found on this machine"));

const statusCommand = Command.make(
  "status",
  {
    library: Opts.library,
    dest: Opts.dest,
    temp: Opts.temp,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(
      runStatus({
        library: Option.getOrUndefined(opts.library),
        dest: Option.getOrUndefined(opts.dest),
        temp: opts.temp
      })
    ).pipe(
      withLogLevel(opts.debug),
      Effect.provide(appLayer(ConfirmServiceAlwaysDecline))
    )
).pipe(Command.withDescription("Show what link would do for each relocated directory, without changing anything"));

const linkCommand = Command.make(
  "link",
  {
    library: Opts.library,
    dest: Opts.dest,
    temp: Opts.temp,
    yes: Opts.yes,
    debug: Opts.debug
  },
  (opts) => {
    const allOptionsEmpty =
      Option.isNone(opts.library) && Option.isNone(opts.dest) && !opts.temp && !opts.yes;

    const isInteractive = allOptionsEmpty && process.stdin.isTTY === true;

    const confirm: ConfirmLayer = opts.yes ? ConfirmServiceAlwaysApprove : ConfirmServicePrompt;

    return withErrorHandling(
      runLink(
        {
          library: Option.getOrUndefined(opts.library),
          dest: Option.getOrUndefined(opts.dest),
          temp: opts.temp,
          yes: opts.yes,
          debug: opts.debug
        },
        isInteractive
      )
    ).pipe(withLogLevel(opts.debug), Effect.provide(appLayer(confirm)));
  }
).pipe(
  Command.withDescription("Move the download and temp directories of a Steam library to another volume and link them back")
);

const rootCommand = Command.make("steamapps-relocate", {}).pipe(
  Command.withSubcommands([listCommand, statusCommand, linkCommand]),
  Command.withDescription("Relocate Steam's download staging directories to a faster volume")
);

const cli = Command.run(rootCommand, {
  name: "steamapps-relocate",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
