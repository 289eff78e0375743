import type { ResubConfig, ResubResult } from "../types.ts";
import type { RewritePhaseResult } from "./rewrite.ts";

type OutputPhaseInput = {
  config: ResubConfig;
  rewrite: RewritePhaseResult;
  summary: string;
  logError?: string;
  elapsedMs: number;
};

export function buildResubResult(input: OutputPhaseInput): ResubResult {
  return {
    dryRun: input.config.dryRun,
    source: input.config.source,
    pattern: input.config.pattern,
    replacement: input.config.replacement,
    logPath: input.config.logPath,
    filesScanned: input.rewrite.filesScanned,
    filesModified: input.rewrite.filesModified,
    totalReplacements: input.rewrite.totalReplacements,
    summary: input.summary,
    ...(input.logError === undefined ? {} : { logError: input.logError }),
    elapsedMs: input.elapsedMs,
    files: input.rewrite.files,
  };
}
