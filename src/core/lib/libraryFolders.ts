// Matches `"path"  "<value>"` anywhere in a libraryfolders.vdf, old or new layout.
const PATH_ENTRY = /"path"\s+"((?:[^"\\]|\\.)*)"/g;

const unescapeValue = (value: string): string => value.replace(/\\([\\"])/g, "$1");

/**
 * Pull every library root out of libraryfolders.vdf text, in order of appearance.
 * Only `"path"` string leaves matter, so the nesting is never parsed.
 */
export const extractLibraryPaths = (text: string): string[] =>
  Array.from(text.matchAll(PATH_ENTRY), (match) => unescapeValue(match[1] ?? "")).filter(
    (value) => value.length > 0
  );
