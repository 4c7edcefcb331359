import { Effect, Layer, pipe } from "effect";
import { NodeContext } from "@effect/platform-node";

import { BatchRenamerServiceTag, BatchRenamerServiceLive } from "../services/BatchRenamerService";
import { LoggerServiceTag, LoggerServiceLive } from "../services/LoggerService";

export type { DirectoryEntry } from "../domain/DirectoryEntry";
export { deriveName, MalformedEntryName } from "../domain/DirectoryEntry";
export type { RenameReport } from "../domain/RenameOutcome";
export { RenameOutcome } from "../domain/RenameOutcome";

export {
  SourceDirectoryNotFound,
  SourceNotADirectory,
  SourceUnreadable,
  DestinationCreateFailed
} from "../services/BatchRenamerService";
export type { RenameSetupError } from "../services/BatchRenamerService";

/**
 * Rename every entry of `sourceDir` into `destDir`, printing one line per
 * entry as it is processed.
 */
export const renameDirectory = (sourceDir: string, destDir: string) =>
  Effect.gen(function* () {
    const renamer = yield* BatchRenamerServiceTag;
    const logger = yield* LoggerServiceTag;

    return yield* renamer.run(sourceDir, destDir, {
      onOutcome: logger.rename.outcome
    });
  });

export const createAppLayer = () => {
  return Layer.mergeAll(
    LoggerServiceLive,
    pipe(BatchRenamerServiceLive, Layer.provide(NodeContext.layer))
  );
};

export const AppLive = createAppLayer();
