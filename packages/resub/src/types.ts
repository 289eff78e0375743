import type {
  Substitution,
  TargetSource,
  TextEncodingName,
  TextFileDecoder,
  TextFileFs,
} from "resub-core";

export { DEFAULT_EXCLUDE_GLOBS, DEFAULT_INCLUDE_GLOBS } from "resub-core";
export type { TargetSource } from "resub-core";

export const DEFAULT_LOG_PATH = "replacement_log.txt";

export type ResubInput = {
  source: TargetSource;
  pattern: string;
  replacement: string;
};

export type ResubOptions = {
  cwd?: string;
  dryRun?: boolean;
  /** Log destination, resolved against `cwd`. Defaults to `replacement_log.txt`. */
  logPath?: string;
  include?: readonly string[];
  exclude?: readonly string[];
  /** Files processed at once. Defaults to 1. */
  concurrency?: number;
  verbose?: number;
  logger?: (line: string) => void;
  /** Called per file, in enumeration order, before the next file's result is reported. */
  onFile?: (file: ResubFileResult) => void;
  clock?: () => Date;
  decoders?: readonly TextFileDecoder[];
  fs?: TextFileFs;
  logFs?: RunLogFs;
};

/** Immutable run configuration, validated and compiled before any I/O. */
export type ResubConfig = Readonly<{
  cwd: string;
  source: TargetSource;
  pattern: string;
  replacement: string;
  substitution: Substitution;
  dryRun: boolean;
  logPath: string;
  include: readonly string[];
  exclude: readonly string[];
  concurrency: number;
}>;

export type ResubMatch = {
  line: number;
  column: number;
  matched: string;
  replacement: string;
};

export type ResubFileStatus = "skipped" | "modified" | "would-modify";

export type ResubFileResult = {
  file: string;
  status: ResubFileStatus;
  encoding: TextEncodingName;
  matchCount: number;
  matches: ResubMatch[];
};

export type ResubStats = {
  filesScanned: number;
  filesModified: number;
  totalReplacements: number;
};

export type ResubResult = ResubStats & {
  dryRun: boolean;
  source: TargetSource;
  pattern: string;
  replacement: string;
  logPath: string;
  summary: string;
  /** Set when the log could not be written; the run itself still completed. */
  logError?: string;
  elapsedMs: number;
  files: ResubFileResult[];
};

export type RunLogFs = {
  writeFile: (path: string, data: string, encoding: "utf8") => Promise<void>;
};
