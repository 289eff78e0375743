import type { TargetSource } from "resub-core";

export type ReplaceCommandFlags = {
  root?: string;
  paths?: readonly string[];
  "paths-file"?: string;
  pattern: string;
  replace: string;
  "dry-run"?: boolean;
  log?: string;
  files?: readonly string[];
  "files-exclude"?: readonly string[];
  "summary-only"?: boolean;
  cwd?: string;
  concurrency?: number;
  json?: boolean;
  "no-color"?: boolean;
  verbose?: number;
};

export const replaceCommandFlagParameters = {
  root: {
    kind: "parsed" as const,
    optional: true,
    brief: "Root directory to scan recursively",
    placeholder: "dir",
    parse: (input: string) => input,
  },
  paths: {
    kind: "parsed" as const,
    optional: true,
    variadic: true,
    brief: "Explicit file to process (space-separated or repeated, bypasses --files filters)",
    placeholder: "file",
    parse: (input: string) => input,
  },
  "paths-file": {
    kind: "parsed" as const,
    optional: true,
    brief: "Text file listing one path per line",
    placeholder: "file",
    parse: (input: string) => input,
  },
  pattern: {
    kind: "parsed" as const,
    brief: "Regular expression to search for",
    placeholder: "regex",
    parse: (input: string) => input,
  },
  replace: {
    kind: "parsed" as const,
    brief: "Replacement template (supports \\1, \\2, \\g<name>)",
    placeholder: "template",
    parse: (input: string) => input,
  },
  "dry-run": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Report intended changes without writing files",
  },
  log: {
    kind: "parsed" as const,
    optional: true,
    brief: "Log file path (default: replacement_log.txt)",
    placeholder: "path",
    parse: (input: string) => input,
  },
  files: {
    kind: "parsed" as const,
    optional: true,
    variadic: true,
    brief: "Only scan file names matching this glob (space-separated or repeated, default: *)",
    placeholder: "glob",
    parse: (input: string) => input,
  },
  "files-exclude": {
    kind: "parsed" as const,
    optional: true,
    variadic: true,
    brief: "Skip file names matching this glob (space-separated or repeated)",
    placeholder: "glob",
    parse: (input: string) => input,
  },
  "summary-only": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Print only the final summary",
  },
  cwd: {
    kind: "parsed" as const,
    optional: true,
    brief: "Working directory for resolving targets and the log path",
    placeholder: "path",
    parse: (input: string) => input,
  },
  concurrency: {
    kind: "parsed" as const,
    optional: true,
    brief: "Max files processed concurrently (default: 1)",
    placeholder: "n",
    parse: (input: string) => {
      const value = Number(input);
      if (!Number.isFinite(value) || value < 1) {
        throw new Error("--concurrency must be a positive number");
      }
      return Math.floor(value);
    },
  },
  json: {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Output the run result as JSON",
  },
  "no-color": {
    kind: "boolean" as const,
    optional: true,
    withNegated: false,
    brief: "Disable colored output",
  },
  verbose: {
    kind: "parsed" as const,
    optional: true,
    brief: "Print timing trace to stderr (1=phases, 2=includes slow files)",
    placeholder: "level",
    parse: (input: string) => {
      const value = Number(input);
      if (!Number.isFinite(value) || value < 0) {
        throw new Error("--verbose must be a non-negative number");
      }
      return Math.floor(value);
    },
  },
} as const;

/** Resolves the single target source; zero or several is a usage error. */
export function resolveTargetSource(flags: ReplaceCommandFlags): TargetSource {
  const sources: TargetSource[] = [];
  if (flags.root !== undefined) {
    sources.push({ kind: "root", root: flags.root });
  }
  if (flags.paths !== undefined) {
    sources.push({ kind: "paths", paths: flags.paths });
  }
  if (flags["paths-file"] !== undefined) {
    sources.push({ kind: "paths-file", pathsFile: flags["paths-file"] });
  }

  const [source, ...rest] = sources;
  if (!source) {
    throw new Error("One of --root, --paths or --paths-file is required.");
  }
  if (rest.length > 0) {
    throw new Error("Only one of --root, --paths or --paths-file may be given.");
  }
  return source;
}
