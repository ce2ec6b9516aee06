import { Data } from "effect";

/**
 * What currently sits at a link path. Exactly one case holds for any
 * filesystem entry, including a broken symbolic link (SymlinkWrong).
 */
export type PathState = Data.TaggedEnum<{
  Missing: {};
  SymlinkCorrect: {};
  SymlinkWrong: { readonly currentTarget: string };
  EmptyDirectory: {};
  NonEmptyDirectory: {};
  NonDirectoryFile: {};
}>;

export const PathState = Data.taggedEnum<PathState>();

export const describePathState = PathState.$match({
  Missing: () => "missing, will be linked",
  SymlinkCorrect: () => "already linked",
  SymlinkWrong: ({ currentTarget }) => `symlink to a different target (${currentTarget})`,
  EmptyDirectory: () => "empty directory, will be replaced by a link",
  NonEmptyDirectory: () => "non-empty directory, contents can be moved",
  NonDirectoryFile: () => "exists and is not a directory",
});
