import { createReadStream, type Dir } from "node:fs";
import { opendir, stat } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";
import { compileFileFilter, type FileNameFilter } from "./filter.ts";

/**
 * Where the files to process come from. Exactly one source per run.
 *
 * - `root`: recursive walk, filtered by include/exclude globs on the file name.
 * - `paths`: explicit list, yielded as given.
 * - `paths-file`: one path per line, blank lines skipped.
 */
export type TargetSource =
  | { kind: "root"; root: string }
  | { kind: "paths"; paths: readonly string[] }
  | { kind: "paths-file"; pathsFile: string };

export type EnumerateTargetsOptions = {
  /** Base directory for resolving the root and the paths file. */
  cwd?: string;
  include?: readonly string[];
  exclude?: readonly string[];
};

/**
 * Lazily yields candidate paths for `source`. Every call starts a fresh pass.
 *
 * Only the `root` source applies the glob filter; explicit lists are an
 * intentional override. Walk order is the directory read order of the
 * underlying filesystem and is not sorted. A root or subdirectory that cannot
 * be listed (missing, not a directory, no permission) contributes no files.
 */
export async function* enumerateTargets(
  source: TargetSource,
  options: EnumerateTargetsOptions = {},
): AsyncGenerator<string> {
  const cwd = path.resolve(options.cwd ?? process.cwd());

  switch (source.kind) {
    case "paths":
      yield* source.paths;
      return;
    case "paths-file":
      yield* readPathsFile(path.resolve(cwd, source.pathsFile));
      return;
    case "root": {
      const rootPath = path.resolve(cwd, source.root);
      const filter = compileFileFilter({ include: options.include, exclude: options.exclude });
      yield* walkDirectory(source.root, rootPath, filter);
      return;
    }
  }
}

export function describeTargetSource(source: TargetSource): string {
  switch (source.kind) {
    case "root":
      return `root ${source.root}`;
    case "paths":
      return `${source.paths.length} explicit ${source.paths.length === 1 ? "path" : "paths"}`;
    case "paths-file":
      return `paths file ${source.pathsFile}`;
  }
}

async function* readPathsFile(filePath: string): AsyncGenerator<string> {
  const lines = createInterface({
    input: createReadStream(filePath, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  try {
    for await (const line of lines) {
      const trimmed = line.trim();
      if (trimmed.length > 0) {
        yield trimmed;
      }
    }
  } finally {
    lines.close();
  }
}

const UNLISTABLE_DIRECTORY_CODES: ReadonlySet<unknown> = new Set([
  "ENOENT",
  "ENOTDIR",
  "EACCES",
  "EPERM",
]);

// Files of a directory come before the contents of its subdirectories.
// Symlinked directories are not followed; any other symlink, dangling ones
// included, is yielded as a file.
async function* walkDirectory(
  displayDirectory: string,
  directory: string,
  filter: FileNameFilter,
): AsyncGenerator<string> {
  const directoryHandle = await openListableDirectory(directory);
  if (!directoryHandle) {
    return;
  }
  const subdirectories: string[] = [];
  const fileNames: string[] = [];

  for await (const entry of directoryHandle) {
    if (entry.isDirectory()) {
      subdirectories.push(entry.name);
      continue;
    }
    if (entry.isFile()) {
      fileNames.push(entry.name);
      continue;
    }
    if (entry.isSymbolicLink() && !(await isDirectoryLink(path.join(directory, entry.name)))) {
      fileNames.push(entry.name);
    }
  }

  for (const fileName of fileNames) {
    if (filter(fileName)) {
      yield path.join(displayDirectory, fileName);
    }
  }

  for (const name of subdirectories) {
    yield* walkDirectory(path.join(displayDirectory, name), path.join(directory, name), filter);
  }
}

async function openListableDirectory(directory: string): Promise<Dir | null> {
  try {
    return await opendir(directory);
  } catch (error) {
    if (isUnlistableDirectoryError(error)) {
      return null;
    }
    throw error;
  }
}

function isUnlistableDirectoryError(error: unknown): boolean {
  return error instanceof Error && "code" in error && UNLISTABLE_DIRECTORY_CODES.has(error.code);
}

async function isDirectoryLink(linkPath: string): Promise<boolean> {
  // A dangling link has no target to stat.
  const target = await stat(linkPath).catch(() => null);
  return target?.isDirectory() ?? false;
}
