/**
 * BatchRenamerService - strips the prefix from every entry of a source
 * directory and moves the renamed entries into a destination directory.
 *
 * Setup problems (missing source, unwritable destination) fail the whole
 * run. Everything that goes wrong for a single entry is recorded as a
 * RenameOutcome and the pass carries on with the next entry.
 */

import { join } from "node:path"
import { Context, Data, Effect, Either, Layer, pipe } from "effect"
import { FileSystem } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { deriveName, describeMalformedName, toEntries, type DirectoryEntry } from "@domain/DirectoryEntry"
import { RenameOutcome, createRenameReport, type RenameReport } from "@domain/RenameOutcome"

// =============================================================================
// Service errors - fatal, raised before any entry is touched
// =============================================================================

export class SourceDirectoryNotFound extends Data.TaggedError("SourceDirectoryNotFound")<{
  readonly path: string
}> {}

export class SourceNotADirectory extends Data.TaggedError("SourceNotADirectory")<{
  readonly path: string
}> {}

export class SourceUnreadable extends Data.TaggedError("SourceUnreadable")<{
  readonly path: string
  readonly reason: string
}> {}

export class DestinationCreateFailed extends Data.TaggedError("DestinationCreateFailed")<{
  readonly path: string
  readonly reason: string
}> {}

export type RenameSetupError =
  | SourceDirectoryNotFound
  | SourceNotADirectory
  | SourceUnreadable
  | DestinationCreateFailed

// =============================================================================
// Types
// =============================================================================

export interface RenameOptions {
  /** Runs after each entry, before the next one is attempted */
  readonly onOutcome?: (outcome: RenameOutcome) => Effect.Effect<void>
}

// =============================================================================
// Service interface
// =============================================================================

export interface BatchRenamerService {
  readonly run: (
    sourceDir: string,
    destDir: string,
    options?: RenameOptions
  ) => Effect.Effect<RenameReport, RenameSetupError>

  /** Create the destination (and missing parents); a no-op when it already exists */
  readonly ensureDestination: (destDir: string) => Effect.Effect<void, DestinationCreateFailed>
}

export class BatchRenamerServiceTag extends Context.Tag("BatchRenamerService")<
  BatchRenamerServiceTag,
  BatchRenamerService
>() {}

// =============================================================================
// Error classification
// =============================================================================

const toSourceError = (path: string, error: PlatformError): RenameSetupError =>
  error._tag === "SystemError" && error.reason === "NotFound"
    ? new SourceDirectoryNotFound({ path })
    : new SourceUnreadable({ path, reason: error.message })

const toMoveOutcome = (entry: DirectoryEntry, newName: string, error: PlatformError): RenameOutcome => {
  if (error._tag === "SystemError") {
    switch (error.reason) {
      case "NotFound":
        return RenameOutcome.NotFound({ oldName: entry.oldName, newName })
      case "AlreadyExists":
        return RenameOutcome.AlreadyExists({ oldName: entry.oldName, newName })
    }
  }
  return RenameOutcome.UnexpectedError({ oldName: entry.oldName, reason: error.message })
}

// =============================================================================
// Implementation
// =============================================================================

export const BatchRenamerServiceLive = Layer.effect(
  BatchRenamerServiceTag,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem

    const validateSource = (sourceDir: string): Effect.Effect<void, RenameSetupError> =>
      Effect.gen(function* () {
        const exists = yield* pipe(
          fs.exists(sourceDir),
          Effect.mapError((e) => toSourceError(sourceDir, e))
        )
        if (!exists) {
          return yield* Effect.fail(new SourceDirectoryNotFound({ path: sourceDir }))
        }

        const stat = yield* pipe(
          fs.stat(sourceDir),
          Effect.mapError((e) => toSourceError(sourceDir, e))
        )
        if (stat.type !== "Directory") {
          return yield* Effect.fail(new SourceNotADirectory({ path: sourceDir }))
        }
      })

    const ensureDestination = (destDir: string): Effect.Effect<void, DestinationCreateFailed> =>
      pipe(
        fs.makeDirectory(destDir, { recursive: true }),
        Effect.mapError((e) => new DestinationCreateFailed({ path: destDir, reason: e.message }))
      )

    const listEntries = (sourceDir: string): Effect.Effect<ReadonlyArray<DirectoryEntry>, RenameSetupError> =>
      pipe(
        fs.readDirectory(sourceDir),
        Effect.map(toEntries),
        Effect.mapError((e) => toSourceError(sourceDir, e))
      )

    const moveEntry = (
      sourceDir: string,
      destDir: string,
      entry: DirectoryEntry,
      newName: string
    ): Effect.Effect<RenameOutcome> => {
      const from = join(sourceDir, entry.oldName)
      const to = join(destDir, newName)

      return pipe(
        fs.exists(to),
        Effect.flatMap((occupied): Effect.Effect<RenameOutcome, PlatformError> =>
          occupied
            ? Effect.succeed(RenameOutcome.AlreadyExists({ oldName: entry.oldName, newName }))
            : pipe(
                Effect.logDebug(`Moving ${from} -> ${to}`),
                Effect.zipRight(fs.rename(from, to)),
                Effect.as(RenameOutcome.Success({ oldName: entry.oldName, newName }))
              )
        ),
        Effect.catchAll((e) => Effect.succeed(toMoveOutcome(entry, newName, e)))
      )
    }

    const renameEntry = (
      sourceDir: string,
      destDir: string,
      entry: DirectoryEntry
    ): Effect.Effect<RenameOutcome> =>
      Either.match(deriveName(entry.oldName), {
        onLeft: (malformed) =>
          Effect.succeed(
            RenameOutcome.UnexpectedError({
              oldName: entry.oldName,
              reason: describeMalformedName(malformed),
            })
          ),
        onRight: (newName) => moveEntry(sourceDir, destDir, entry, newName),
      })

    const run: BatchRenamerService["run"] = (sourceDir, destDir, options = {}) =>
      Effect.gen(function* () {
        yield* validateSource(sourceDir)
        yield* ensureDestination(destDir)

        const entries = yield* listEntries(sourceDir)
        yield* Effect.logDebug(`Found ${entries.length} entries in ${sourceDir}`)

        const results = yield* Effect.forEach(entries, (entry) =>
          pipe(
            renameEntry(sourceDir, destDir, entry),
            Effect.tap((outcome) => options.onOutcome?.(outcome) ?? Effect.void)
          )
        )

        return createRenameReport(results)
      })

    return { run, ensureDestination }
  })
)
