import { stderr as processStderr } from "node:process";
import { buildCommand } from "@stricli/core";
import {
  replaceCommandFlagParameters,
  resolveTargetSource,
  type ReplaceCommandFlags,
} from "./command/flags.ts";
import { formatFileReport, formatLogWarning } from "./command/output.ts";
import { replaceInFiles } from "./resub.ts";
import type { ResubOptions, ResubResult } from "./types.ts";

type RunReplaceCommandOptions = Pick<
  ResubOptions,
  "onFile" | "clock" | "decoders" | "fs" | "logFs"
> & {
  /**
   * Optional logger override. Defaults to stderr when --verbose is enabled.
   */
  logger?: (line: string) => void;
};

type CommandOutput = {
  write(s: string): void;
  isTTY?: boolean;
};

export async function runReplaceCommand(
  flags: ReplaceCommandFlags,
  options: RunReplaceCommandOptions = {},
): Promise<ResubResult> {
  const source = resolveTargetSource(flags);
  const logger =
    options.logger ??
    (flags.verbose ? (line: string) => processStderr.write(`${line}\n`) : undefined);

  return replaceInFiles(
    { source, pattern: flags.pattern, replacement: flags.replace },
    {
      cwd: flags.cwd,
      dryRun: flags["dry-run"] ?? false,
      logPath: flags.log,
      include: flags.files,
      exclude: flags["files-exclude"],
      concurrency: flags.concurrency,
      verbose: flags.verbose,
      logger,
      onFile: options.onFile,
      clock: options.clock,
      decoders: options.decoders,
      fs: options.fs,
      logFs: options.logFs,
    },
  );
}

export const replaceCommand = buildCommand({
  async func(
    this: { process: { stdout: CommandOutput; stderr: CommandOutput } },
    flags: ReplaceCommandFlags,
  ) {
    const stdout = this.process.stdout;
    const json = flags.json ?? false;
    const color = Boolean(stdout.isTTY) && !(flags["no-color"] ?? false);
    const perFile = !json && !(flags["summary-only"] ?? false);

    const result = await runReplaceCommand(flags, {
      onFile: perFile
        ? (file) => stdout.write(`${formatFileReport(file, { color })}\n`)
        : undefined,
    });

    if (json) {
      stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    } else {
      stdout.write(`${result.summary}\n`);
    }

    const warning = formatLogWarning(result);
    if (warning) {
      this.process.stderr.write(`${warning}\n`);
    }
  },
  parameters: {
    flags: replaceCommandFlagParameters,
    positional: {
      kind: "tuple" as const,
      parameters: [],
    },
  },
  docs: {
    brief: "Replace regex matches across files and log every replacement",
  },
});
