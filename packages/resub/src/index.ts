export { replaceInFiles } from "./resub.ts";
export { formatSummary, RunLog } from "./run-log.ts";
export type { RunLogOptions } from "./run-log.ts";
export type {
  ResubConfig,
  ResubFileResult,
  ResubFileStatus,
  ResubInput,
  ResubMatch,
  ResubOptions,
  ResubResult,
  ResubStats,
  RunLogFs,
  TargetSource,
} from "./types.ts";
export { DEFAULT_EXCLUDE_GLOBS, DEFAULT_INCLUDE_GLOBS, DEFAULT_LOG_PATH } from "./types.ts";

export { app } from "./app.ts";
export { replaceCommand, runReplaceCommand } from "./command.ts";
export { expandListFlagValues } from "./command/argv.ts";
export type { ReplaceCommandFlags } from "./command/flags.ts";
export { buildChalk, formatFileReport, formatLogWarning } from "./command/output.ts";
