import { Effect, pipe } from "effect"
import { Console } from "effect"

import type { RenameCommandOptions } from "./options"
import { fromDomainError } from "./errors"

import { renameDirectory } from "@core"
import { LoggerServiceTag } from "@services/LoggerService"

/**
 * Error handling wrapper for CLI commands. Fatal errors are printed and
 * turn the exit code non-zero; per-entry failures never get here.
 */
export const withErrorHandling = <A, R>(
  effect: Effect.Effect<A, unknown, R>
): Effect.Effect<void, never, R> =>
  pipe(
    effect,
    Effect.catchAll((error) => {
      const appError = fromDomainError(error)
      return pipe(
        Console.error(`\n${appError.format()}\n`),
        Effect.zipRight(
          Effect.sync(() => {
            process.exitCode = 1
          })
        )
      )
    }),
    Effect.asVoid
  )

/**
 * Run the rename command
 */
export const runRename = (options: RenameCommandOptions) =>
  Effect.gen(function* () {
    const logger = yield* LoggerServiceTag

    if (options.debug) {
      yield* Effect.logInfo("Debug logging enabled")
    }
    yield* Effect.logDebug(`Config: source=${options.source}, dest=${options.dest}`)

    yield* logger.rename.header(options.source, options.dest)

    const report = yield* renameDirectory(options.source, options.dest)

    if (report.results.length === 0) {
      yield* logger.rename.emptySource(options.source)
    }

    yield* logger.rename.summary(report)

    return report
  })
