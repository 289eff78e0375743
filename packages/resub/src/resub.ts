import path from "node:path";
import { createTracer, describeTargetSource } from "resub-core";
import { buildResubResult } from "./phases/output.ts";
import { parseResubConfig } from "./phases/parse.ts";
import { rewriteTargets } from "./phases/rewrite.ts";
import { RunLog } from "./run-log.ts";
import type { ResubInput, ResubOptions, ResubResult } from "./types.ts";

/**
 * Replaces every match of `input.pattern` in the targeted files and writes
 * the replacement log.
 *
 * Configuration errors (bad pattern, template or target) throw before any
 * file is read or the log is created. A read or write failure aborts the
 * remaining files and no log is written; files already rewritten keep their
 * changes. A failure to write the log itself is reported in `logError`.
 */
export async function replaceInFiles(
  input: ResubInput,
  options: ResubOptions = {},
): Promise<ResubResult> {
  const startedAt = Date.now();
  const tracer = createTracer("resub", options.verbose ?? 0, options.logger);

  const config = await tracer.time("compile", async () => parseResubConfig(input, options));
  tracer.log(`config source=${describeTargetSource(config.source)} dryRun=${config.dryRun}`);

  const runLog = new RunLog({ clock: options.clock, fs: options.logFs });
  const rewrite = await tracer.time(
    "process",
    () => rewriteTargets({ config, runLog, tracer, options }),
    (result) => `files=${result.filesScanned} concurrency=${config.concurrency}`,
  );

  const summary = runLog.finalize(rewrite, config.logPath);
  const logError = await tracer.time("flush", async () => {
    try {
      await runLog.flush(path.resolve(config.cwd, config.logPath));
      return undefined;
    } catch (error) {
      return error instanceof Error ? error.message : String(error);
    }
  });

  const mode = config.dryRun ? "preview" : "apply";
  tracer.log(
    `summary mode=${mode} flow=${rewrite.filesScanned}->${rewrite.filesModified} replacements=${rewrite.totalReplacements} logEntries=${runLog.size}`,
  );

  return buildResubResult({
    config,
    rewrite,
    summary,
    logError,
    elapsedMs: Date.now() - startedAt,
  });
}
