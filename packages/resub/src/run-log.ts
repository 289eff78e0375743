import { writeFile } from "node:fs/promises";
import type { ResubStats, RunLogFs } from "./types.ts";

export type RunLogOptions = {
  clock?: () => Date;
  fs?: RunLogFs;
};

const defaultFs: RunLogFs = { writeFile };

/**
 * In-memory replacement log. Entries accumulate during the run and are
 * written in a single call by `flush`.
 */
export class RunLog {
  private readonly entries: string[] = [];
  private readonly clock: () => Date;
  private readonly fs: RunLogFs;

  constructor(options: RunLogOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.fs = options.fs ?? defaultFs;
  }

  get size(): number {
    return this.entries.length;
  }

  record(filePath: string, oldValue: string, newValue: string): void {
    this.entries.push(
      `[${this.clock().toISOString()}] File: ${filePath}\n    Replaced: ${oldValue} -> ${newValue}\n`,
    );
  }

  finalize(stats: Omit<ResubStats, "filesScanned">, logPath: string): string {
    const summary = formatSummary(stats, logPath);
    this.entries.push(summary);
    return summary;
  }

  toString(): string {
    return this.entries.join("");
  }

  async flush(destination: string): Promise<void> {
    await this.fs.writeFile(destination, this.toString(), "utf8");
  }
}

export function formatSummary(stats: Omit<ResubStats, "filesScanned">, logPath: string): string {
  return [
    "",
    "=== SUMMARY ===",
    `Files modified:    ${stats.filesModified}`,
    `Replacements made: ${stats.totalReplacements}`,
    `Log saved to:      ${logPath}`,
    "",
  ].join("\n");
}
