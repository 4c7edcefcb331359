import { Options } from "@effect/cli";
import { Config } from "effect";

export const source = Options.text("source").pipe(
  Options.withAlias("s"),
  Options.withDescription("Directory whose entries are renamed (env: PREFIX_RENAMER_SOURCE)"),
  Options.withFallbackConfig(
    Config.string("PREFIX_RENAMER_SOURCE").pipe(Config.withDefault("sounds"))
  )
);

export const dest = Options.text("dest").pipe(
  Options.withAlias("d"),
  Options.withDescription(
    "Directory the renamed entries are moved into, created if missing (env: PREFIX_RENAMER_DEST)"
  ),
  Options.withFallbackConfig(
    Config.string("PREFIX_RENAMER_DEST").pipe(Config.withDefault("harmonium-sounds"))
  )
);

export const debug = Options.boolean("debug").pipe(
  Options.withDescription("Enable verbose debug logging"),
  Options.withDefault(false)
);

export interface RenameCommandOptions {
  readonly source: string;
  readonly dest: string;
  readonly debug: boolean;
}
