/**
 * Domain type for an entry found directly inside the source directory,
 * and the pure mapping from its name to the name it is moved under.
 */

import { Data, Either } from "effect"

export interface DirectoryEntry {
  /** Name as observed when the source directory was listed */
  readonly oldName: string
}

export const NAME_DELIMITER = "-"

export class MalformedEntryName extends Data.TaggedError("MalformedEntryName")<{
  readonly entryName: string
  readonly reason: "MissingDelimiter" | "EmptyToken" | "DotSegment"
}> {}

export const describeMalformedName = (error: MalformedEntryName): string => {
  switch (error.reason) {
    case "MissingDelimiter":
      return `"${error.entryName}" has no "${NAME_DELIMITER}" to split on`
    case "EmptyToken":
      return `"${error.entryName}" has an empty segment after the first "${NAME_DELIMITER}"`
    case "DotSegment":
      return `"${error.entryName}" would be renamed to a directory reference`
  }
}

/**
 * Derive the new name by splitting on "-" and keeping the second segment.
 *
 * @example
 *   deriveName("01-C4.wav")         // Right("C4.wav")
 *   deriveName("01-C4-old.wav")     // Right("C4")
 *   deriveName("readme.txt")        // Left(MalformedEntryName)
 */
export const deriveName = (oldName: string): Either.Either<string, MalformedEntryName> => {
  const token = oldName.split(NAME_DELIMITER)[1]

  if (token === undefined) {
    return Either.left(new MalformedEntryName({ entryName: oldName, reason: "MissingDelimiter" }))
  }
  if (token.length === 0) {
    return Either.left(new MalformedEntryName({ entryName: oldName, reason: "EmptyToken" }))
  }
  // "." and ".." resolve to the destination itself or its parent
  if (token === "." || token === "..") {
    return Either.left(new MalformedEntryName({ entryName: oldName, reason: "DotSegment" }))
  }

  return Either.right(token)
}

export const toEntries = (names: ReadonlyArray<string>): ReadonlyArray<DirectoryEntry> =>
  names.map((oldName) => ({ oldName }))
