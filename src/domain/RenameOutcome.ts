/**
 * Per-entry result of a rename pass.
 *
 * Exactly one outcome is recorded for every listed entry; failures are
 * values here, not errors, so one bad entry never stops its siblings.
 */

import { Data } from "effect"

export type RenameOutcome = Data.TaggedEnum<{
  Success: { readonly oldName: string; readonly newName: string }
  NotFound: { readonly oldName: string; readonly newName: string }
  AlreadyExists: { readonly oldName: string; readonly newName: string }
  UnexpectedError: { readonly oldName: string; readonly reason: string }
}>

export const RenameOutcome = Data.taggedEnum<RenameOutcome>()

export const isFailure = (outcome: RenameOutcome): boolean => outcome._tag !== "Success"

export interface RenameReport {
  readonly results: ReadonlyArray<RenameOutcome>
  readonly renamed: number
  readonly notFound: number
  readonly alreadyExists: number
  readonly failed: number
}

export const createRenameReport = (results: ReadonlyArray<RenameOutcome>): RenameReport => {
  const count = (tag: RenameOutcome["_tag"]) => results.filter((r) => r._tag === tag).length

  return {
    results,
    renamed: count("Success"),
    notFound: count("NotFound"),
    alreadyExists: count("AlreadyExists"),
    failed: results.filter(isFailure).length,
  }
}
