import path from "node:path";
import {
  enumerateTargets,
  formatMs,
  mapLimit,
  nowNs,
  nsToMs,
  readTextFile,
  substitute,
  writeTextFile,
  type Tracer,
} from "resub-core";
import type { RunLog } from "../run-log.ts";
import type { ResubConfig, ResubFileResult, ResubOptions, ResubStats } from "../types.ts";

export type RewritePhaseResult = ResubStats & {
  files: ResubFileResult[];
};

type RewritePhaseInput = {
  config: ResubConfig;
  runLog: RunLog;
  tracer: Tracer;
  options: Pick<ResubOptions, "onFile" | "decoders" | "fs">;
};

export async function rewriteTargets(input: RewritePhaseInput): Promise<RewritePhaseResult> {
  const { config, runLog, tracer, options } = input;
  const slowFiles: Array<{ file: string; ms: number; matches: number }> = [];

  const targets = enumerateTargets(config.source, {
    cwd: config.cwd,
    include: config.include,
    exclude: config.exclude,
  });

  const files = await mapLimit(
    targets,
    async (file) => {
      const started = tracer.enabled(2) ? nowNs() : 0n;
      const result = await rewriteFile(file, config, options);
      if (tracer.enabled(2)) {
        slowFiles.push({ file, ms: nsToMs(nowNs() - started), matches: result.matchCount });
      }
      return result;
    },
    {
      concurrency: config.concurrency,
      onResult: (result) => {
        for (const match of result.matches) {
          runLog.record(result.file, match.matched, match.replacement);
        }
        options.onFile?.(result);
      },
    },
  );

  if (slowFiles.length > 0) {
    slowFiles.sort((a, b) => b.ms - a.ms);
    for (const entry of slowFiles.slice(0, 10)) {
      tracer.log(`slowFile ${formatMs(entry.ms)} file=${entry.file} matches=${entry.matches}`, 2);
    }
  }

  let filesModified = 0;
  let totalReplacements = 0;
  for (const file of files) {
    if (file.status === "skipped") {
      continue;
    }
    filesModified += 1;
    totalReplacements += file.matchCount;
  }

  return { filesScanned: files.length, filesModified, totalReplacements, files };
}

async function rewriteFile(
  file: string,
  config: ResubConfig,
  options: RewritePhaseInput["options"],
): Promise<ResubFileResult> {
  const filePath = path.resolve(config.cwd, file);
  const { text, encoding } = await readTextFile(filePath, {
    decoders: options.decoders,
    fs: options.fs,
  });

  const { matches, content } = substitute(text, config.substitution);
  if (matches.length === 0) {
    return { file, status: "skipped", encoding, matchCount: 0, matches: [] };
  }

  if (!config.dryRun) {
    await writeTextFile(filePath, content, { fs: options.fs });
  }

  return {
    file,
    status: config.dryRun ? "would-modify" : "modified",
    encoding,
    matchCount: matches.length,
    matches: matches.map((match) => ({
      line: match.line,
      column: match.column,
      matched: match.matched,
      replacement: match.replacement,
    })),
  };
}
