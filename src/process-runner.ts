import * as child_process from "child_process";

import type { Logger } from "./debug";

export type ProcessOptions = {
  /** working directory (default: inherited) */
  cwd?: string;
};

export type ProcessResult = {
  /** exit status; 1 when the process could not be spawned or died by signal */
  exitCode: number;
  /** signal that terminated the process */
  signal?: NodeJS.Signals;
  /** set when the executable could not be started */
  spawnError?: NodeJS.ErrnoException;
};

export type CapturedProcessResult = ProcessResult & {
  /** captured stdout (utf-8) */
  stdout: string;
};

/**
 * Runs external commands for the pipeline.
 *
 * `run` inherits all standard streams. `capture` collects stdout and leaves
 * stderr on the terminal so the tool's own diagnostics stay visible.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options?: ProcessOptions): Promise<ProcessResult>;
  capture(
    command: string,
    args: string[],
    options?: ProcessOptions
  ): Promise<CapturedProcessResult>;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

function toResult(code: number | null, signal: NodeJS.Signals | null): ProcessResult {
  if (signal !== null) {
    return { exitCode: 1, signal };
  }
  return { exitCode: code ?? 1 };
}

function spawnAndWait(
  command: string,
  args: string[],
  options: ProcessOptions,
  capture: boolean,
  logger?: Logger
): Promise<CapturedProcessResult> {
  return new Promise((resolve) => {
    logger?.debug("exec", `spawn ${formatCommand(command, args)}${options.cwd ? ` (cwd ${options.cwd})` : ""}`);

    const chunks: Buffer[] = [];
    let settled = false;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      logger?.debug("exec", `${command} exited with ${result.exitCode}`);
      resolve({ ...result, stdout: Buffer.concat(chunks).toString("utf8") });
    };

    const stdio: child_process.StdioOptions = capture ? ["inherit", "pipe", "inherit"] : "inherit";
    const child = child_process.spawn(command, args, { cwd: options.cwd, stdio });

    child.stdout?.on("data", (data: Buffer) => {
      chunks.push(data);
    });

    child.on("error", (err: NodeJS.ErrnoException) => {
      finish({ exitCode: 1, spawnError: err });
    });

    child.on("close", (code, signal) => {
      finish(toResult(code, signal));
    });
  });
}

export function createProcessRunner(logger?: Logger): ProcessRunner {
  return {
    run(command, args, options = {}) {
      return spawnAndWait(command, args, options, false, logger);
    },
    capture(command, args, options = {}) {
      return spawnAndWait(command, args, options, true, logger);
    },
  };
}
