import { Match } from "effect";

import type {
  SourceDirectoryNotFound,
  SourceNotADirectory,
  SourceUnreadable,
  DestinationCreateFailed
} from "@services/BatchRenamerService";

type DomainError =
  | SourceDirectoryNotFound
  | SourceNotADirectory
  | SourceUnreadable
  | DestinationCreateFailed;

const DOMAIN_ERROR_TAGS: ReadonlySet<string> = new Set<DomainError["_tag"]>([
  "SourceDirectoryNotFound",
  "SourceNotADirectory",
  "SourceUnreadable",
  "DestinationCreateFailed"
]);

export class AppError extends Error {
  readonly _tag = "AppError";

  constructor(
    readonly title: string,
    readonly detail: string,
    readonly suggestion: string
  ) {
    super(`${title}: ${detail}`);
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      ``,
      `   ${this.detail}`,
      ``,
      `   Hint: ${this.suggestion}`
    ].join("\n");
  }
}

const errors = {
  sourceNotFound: (path: string) =>
    new AppError(
      "Source directory not found",
      `The path "${path}" does not exist.`,
      `Check the --source path, or run from the directory that contains it.`
    ),

  sourceNotADirectory: (path: string) =>
    new AppError(
      "Not a directory",
      `The source path "${path}" exists but is not a directory.`,
      `Pass the directory that holds the files to rename, not a single file.`
    ),

  sourceUnreadable: (path: string, reason: string) =>
    new AppError(
      "Cannot read source directory",
      `Failed to list "${path}": ${reason}`,
      `Check that you have read permission on the source directory.`
    ),

  destinationCreateFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot create destination",
      `Failed to create "${path}": ${reason}`,
      `Check that you have write permission on the parent directory and that no file occupies the path.`
    ),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`)
};

const matchDomainError = Match.typeTags<DomainError>()({
  SourceDirectoryNotFound: (e) => errors.sourceNotFound(e.path),
  SourceNotADirectory: (e) => errors.sourceNotADirectory(e.path),
  SourceUnreadable: (e) => errors.sourceUnreadable(e.path, e.reason),
  DestinationCreateFailed: (e) => errors.destinationCreateFailed(e.path, e.reason)
});

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_ERROR_TAGS.has(e._tag);

export const fromDomainError = (error: unknown): AppError => {
  if (error instanceof AppError) {
    return error;
  }

  if (isDomainError(error)) {
    return matchDomainError(error);
  }

  if (error instanceof Error) {
    return errors.unexpected(error.message);
  }

  return errors.unexpected(String(error));
};

export const { sourceNotFound, sourceNotADirectory, destinationCreateFailed } = errors;
