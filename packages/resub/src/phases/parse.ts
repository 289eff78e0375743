import path from "node:path";
import {
  compileSubstitution,
  DEFAULT_EXCLUDE_GLOBS,
  DEFAULT_INCLUDE_GLOBS,
  type TargetSource,
} from "resub-core";
import { DEFAULT_LOG_PATH, type ResubConfig, type ResubInput, type ResubOptions } from "../types.ts";

export function parseResubConfig(input: ResubInput, options: ResubOptions = {}): ResubConfig {
  validateTargetSource(input.source);

  const concurrency = options.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be a positive integer");
  }

  return Object.freeze({
    cwd: path.resolve(options.cwd ?? process.cwd()),
    source: input.source,
    pattern: input.pattern,
    replacement: input.replacement,
    substitution: compileSubstitution(input.pattern, input.replacement),
    dryRun: options.dryRun ?? false,
    logPath: options.logPath ?? DEFAULT_LOG_PATH,
    include: nonEmptyOr(options.include, DEFAULT_INCLUDE_GLOBS),
    exclude: nonEmptyOr(options.exclude, DEFAULT_EXCLUDE_GLOBS),
    concurrency,
  });
}

function validateTargetSource(source: TargetSource): void {
  switch (source.kind) {
    case "root":
      if (source.root.length === 0) {
        throw new Error("Root directory must not be empty.");
      }
      return;
    case "paths":
      if (source.paths.length === 0) {
        throw new Error("Explicit path list must name at least one file.");
      }
      return;
    case "paths-file":
      if (source.pathsFile.length === 0) {
        throw new Error("Paths file must not be empty.");
      }
      return;
  }
}

function nonEmptyOr(values: readonly string[] | undefined, fallback: readonly string[]) {
  return values && values.length > 0 ? [...values] : fallback;
}
