import { Options } from "@effect/cli";

export const library = Options.text("library").pipe(
  Options.withDescription("steamapps directory to modify. Prompts with discovered libraries if not set."),
  Options.optional
);

export const dest = Options.text("dest").pipe(
  Options.withDescription("Destination base folder on the faster volume (e.g., /mnt/ssd)"),
  Options.optional
);

export const temp = Options.boolean("temp").pipe(
  Options.withDescription("Also relocate steamapps/temp"),
  Options.withDefault(false)
);

export const yes = Options.boolean("yes").pipe(
  Options.withAlias("y"),
  Options.withDescription("Approve every confirmation without asking"),
  Options.withDefault(false)
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface LinkOptions {
  readonly library: string | undefined;
  readonly dest: string | undefined;
  readonly temp: boolean;
  readonly yes: boolean;
  readonly debug?: boolean;
}

export interface StatusOptions {
  readonly library: string | undefined;
  readonly dest: string | undefined;
  readonly temp: boolean;
}
