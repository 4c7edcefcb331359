import { Command } from "@effect/cli";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect, Logger, LogLevel } from "effect";

import * as Opts from "@cli/options";
import { runRename, withErrorHandling } from "@cli/handler";
import { AppLive } from "@core";

const renameCommand = Command.make(
  "prefix-renamer",
  {
    source: Opts.source,
    dest: Opts.dest,
    debug: Opts.debug
  },
  (opts) =>
    withErrorHandling(runRename(opts)).pipe(
      Effect.provide(Logger.minimumLogLevel(opts.debug ? LogLevel.Debug : LogLevel.Info)),
      Effect.provide(AppLive)
    )
).pipe(
  Command.withDescription(
    "Rename every file in the source directory to the part after its first '-' and move it into the destination directory"
  )
);

const cli = Command.run(renameCommand, {
  name: "prefix-renamer",
  version: "0.1.0"
});

cli(process.argv).pipe(Effect.provide(NodeContext.layer), NodeRuntime.runMain);
