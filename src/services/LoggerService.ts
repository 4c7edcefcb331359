/**
 * LoggerService - formatted console output for the rename command
 */

import { Context, Effect, Layer, Console } from "effect"
import { RenameOutcome, isFailure, type RenameReport } from "@domain/RenameOutcome"

// =============================================================================
// Service interface
// =============================================================================

export interface LoggerService {
  readonly rename: {
    readonly header: (sourceDir: string, destDir: string) => Effect.Effect<void>
    readonly outcome: (outcome: RenameOutcome) => Effect.Effect<void>
    readonly emptySource: (sourceDir: string) => Effect.Effect<void>
    readonly summary: (report: RenameReport) => Effect.Effect<void>
  }
}

export class LoggerServiceTag extends Context.Tag("LoggerService")<
  LoggerServiceTag,
  LoggerService
>() {}

// =============================================================================
// Formatting
// =============================================================================

export const formatOutcome = RenameOutcome.$match({
  Success: ({ oldName, newName }) => `✓ File '${oldName}' renamed to '${newName}' successfully.`,
  NotFound: ({ oldName }) => `❌ Error: The file '${oldName}' was not found.`,
  AlreadyExists: ({ newName }) => `❌ Error: A file named '${newName}' already exists.`,
  UnexpectedError: ({ oldName, reason }) =>
    `❌ An unexpected error occurred while renaming '${oldName}': ${reason}`,
})

export const formatSummary = (report: RenameReport): string =>
  `   ✓ ${report.renamed} renamed, ❌ ${report.failed} failed`

// =============================================================================
// Implementation
// =============================================================================

export const LoggerServiceLive = Layer.succeed(
  LoggerServiceTag,
  {
    rename: {
      header: (sourceDir, destDir) =>
        Console.log(`\n✂️  Prefix Renamer\n   ${sourceDir} → ${destDir}\n`),
      outcome: (outcome) =>
        isFailure(outcome) ? Console.error(formatOutcome(outcome)) : Console.log(formatOutcome(outcome)),
      emptySource: (sourceDir) => Console.log(`✓ Nothing to rename - ${sourceDir} is empty`),
      summary: (report) =>
        Effect.gen(function* () {
          yield* Console.log(`\n${formatSummary(report)}`)
          if (report.failed > 0) {
            const unexpected = report.failed - report.notFound - report.alreadyExists
            yield* Console.log(
              `   (${report.notFound} not found, ${report.alreadyExists} already existed, ${unexpected} unexpected)`
            )
          }
          yield* Console.log("")
        }),
    },
  }
)
