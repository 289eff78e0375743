import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { ResubFileResult, ResubResult } from "../types.ts";

export type FormatResubOutputOptions = {
  color?: boolean;
  chalkInstance?: ChalkInstance;
};

/** Console lines for one processed file, without a trailing newline. */
export function formatFileReport(
  file: ResubFileResult,
  options: FormatResubOutputOptions = {},
): string {
  const chalkInstance = buildChalk(options);

  switch (file.status) {
    case "skipped":
      return chalkInstance.gray(`[Skipped] ${file.file}`);
    case "modified":
      return chalkInstance.green(`[Modified] ${file.file}`);
    case "would-modify":
      return [
        chalkInstance.green(`[Dry Run] Would modify: ${file.file}`),
        ...file.matches.map((match) => `  Replace: ${match.matched} → ${match.replacement}`),
      ].join("\n");
  }
}

export function formatLogWarning(result: ResubResult): string | null {
  if (result.logError === undefined) {
    return null;
  }
  return `Warning: could not write log file ${result.logPath}: ${result.logError}`;
}

export function buildChalk(options: FormatResubOutputOptions): ChalkInstance {
  if (options.chalkInstance) {
    return options.chalkInstance;
  }

  if (!(options.color ?? false)) {
    return new Chalk({ level: 0 });
  }

  const level = chalk.level > 0 ? chalk.level : 1;
  return new Chalk({ level });
}
