import { Match } from "effect";

import type {
  RelocationError,
  InvalidSource,
  DestinationUnavailable,
  InsufficientPrivilege,
  LinkCreationFailed,
  MoveFailure,
  PathNotADirectory,
  PathRemovalFailed
} from "@core";
import { privilegeRemediation } from "@services/RelocationExecutor";
import type { MissingInput } from "./optionParsing";

type DomainError =
  | InvalidSource
  | DestinationUnavailable
  | InsufficientPrivilege
  | LinkCreationFailed
  | MoveFailure
  | PathNotADirectory
  | PathRemovalFailed
  | MissingInput;

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
  invalidSource: (path: string, reason: string) =>
    new AppError(
      "Invalid path",
      `Not a directory: ${path} (${reason}).`,
      `Pick the steamapps directory of a library, e.g. ~/.local/share/Steam/steamapps. Run 'list' to see discovered libraries.`
    ),

  destinationUnavailable: (path: string, reason: string) =>
    new AppError(
      "Destination unavailable",
      `Could not create "${path}": ${reason}`,
      `Make sure the destination volume is mounted and writable.`
    ),

  insufficientPrivilege: (linkPath: string, targetPath: string, platform: NodeJS.Platform) =>
    new AppError(
      "Symlink Error",
      `Not allowed to create a symbolic link at "${linkPath}" pointing to "${targetPath}".`,
      privilegeRemediation(platform)
    ),

  linkCreationFailed: (linkPath: string, targetPath: string, reason: string) =>
    new AppError(
      "Symlink Error",
      `Failed to create symlink "${linkPath}" -> "${targetPath}": ${reason}`,
      `Check that nothing else was created at the link path and run 'link' again.`
    ),

  moveFailed: (source: string, destination: string, moved: number, reason: string) =>
    new AppError(
      "Move failed",
      `Could not move the contents of "${source}" to "${destination}" after ${moved} entries: ${reason}`,
      `Entries already moved are in the destination; the rest are still in the source. Fix the cause and run 'link' again.`
    ),

  notADirectory: (path: string) =>
    new AppError(
      "Path exists and is not a directory",
      `"${path}" is a file, so it was left alone.`,
      `Move or delete the file yourself, then run 'link' again.`
    ),

  removalFailed: (path: string, reason: string) =>
    new AppError(
      "Cannot remove existing entry",
      `Failed to remove "${path}": ${reason}`,
      `Close Steam so it stops writing into the library, then run 'link' again.`
    ),

  missingInput: (option: string, detail: string) =>
    new AppError("Missing input", detail, `Pass --${option}, or run 'link' in a terminal to be prompted.`),

  unexpected: (message: string) =>
    new AppError("Unexpected error", message, `If this persists, please report this issue.`)
};

const matchDomainError = Match.typeTags<DomainError>()({
  InvalidSource: (e) => errors.invalidSource(e.path, e.reason),
  DestinationUnavailable: (e) => errors.destinationUnavailable(e.path, e.reason),
  InsufficientPrivilege: (e) => errors.insufficientPrivilege(e.linkPath, e.targetPath, e.platform),
  LinkCreationFailed: (e) => errors.linkCreationFailed(e.linkPath, e.targetPath, e.reason),
  MoveFailure: (e) => errors.moveFailed(e.source, e.destination, e.moved, e.reason),
  PathNotADirectory: (e) => errors.notADirectory(e.path),
  PathRemovalFailed: (e) => errors.removalFailed(e.path, e.reason),
  MissingInput: (e) => errors.missingInput(e.option, e.detail)
});

const DOMAIN_TAGS: ReadonlySet<string> = new Set([
  "InvalidSource",
  "DestinationUnavailable",
  "InsufficientPrivilege",
  "LinkCreationFailed",
  "MoveFailure",
  "PathNotADirectory",
  "PathRemovalFailed",
  "MissingInput"
]);

const isDomainError = (e: unknown): e is DomainError =>
  typeof e === "object" &&
  e !== null &&
  "_tag" in e &&
  typeof e._tag === "string" &&
  DOMAIN_TAGS.has(e._tag);

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

/** Alert for a failed relocation operation; the log line carries the full message */
export const fromRelocationError = (error: RelocationError): AppError => matchDomainError(error);

export const {
  invalidSource,
  destinationUnavailable,
  insufficientPrivilege,
  linkCreationFailed,
  moveFailed,
  notADirectory,
  removalFailed,
  missingInput,
  unexpected
} = errors;
