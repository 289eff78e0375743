import picomatch from "picomatch";

export const DEFAULT_INCLUDE_GLOBS: readonly string[] = ["*"];
export const DEFAULT_EXCLUDE_GLOBS: readonly string[] = [];

// Shell-style wildcards only: `*`, `?`, `[seq]`, `[!seq]`.
// Braces, extglobs, globstars and leading `!` negation are disabled.
const FILE_NAME_GLOB_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  nobrace: true,
  noextglob: true,
  noglobstar: true,
  nonegate: true,
  nocase: false,
};

export type FileNameFilter = (fileName: string) => boolean;

export type FileFilterOptions = {
  include?: readonly string[];
  exclude?: readonly string[];
};

export function compileFileFilter(options: FileFilterOptions = {}): FileNameFilter {
  const include = resolveGlobs(options.include, DEFAULT_INCLUDE_GLOBS).map(compileGlob);
  const exclude = resolveGlobs(options.exclude, DEFAULT_EXCLUDE_GLOBS).map(compileGlob);

  return (fileName) =>
    include.some((matches) => matches(fileName)) && !exclude.some((matches) => matches(fileName));
}

export function isFileIncluded(
  fileName: string,
  include?: readonly string[],
  exclude?: readonly string[],
): boolean {
  return compileFileFilter({ include, exclude })(fileName);
}

function resolveGlobs(
  globs: readonly string[] | undefined,
  fallback: readonly string[],
): readonly string[] {
  if (!globs || globs.length === 0) {
    return fallback;
  }
  return globs;
}

function compileGlob(glob: string): FileNameFilter {
  if (glob.length === 0) {
    return (fileName) => fileName.length === 0;
  }
  return picomatch(glob, FILE_NAME_GLOB_OPTIONS);
}
