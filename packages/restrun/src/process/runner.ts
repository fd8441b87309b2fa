/**
 * Process execution behind an interface, so the engine can be driven by a
 * recording runner in tests.
 *
 * @module process/runner
 */

import { spawn as nodeSpawn } from "node:child_process";
import { constants } from "node:os";
import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";

export interface ProcessRunOptions {
  /** Complete environment of the child process */
  env: Record<string, string>;
  /** Pipe and collect stdout instead of inheriting it */
  captureStdout?: boolean;
}

export interface ProcessRunResult {
  exitCode: number;
  /** Collected stdout; empty unless captureStdout was set */
  stdout: string;
}

/**
 * Runs one process to completion.
 */
export interface ProcessRunner {
  run(argv: string[], options: ProcessRunOptions): Promise<ProcessRunResult>;
}

/** Shell convention for "command not found" */
export const EXIT_NOT_FOUND = 127;
/** Shell convention for "found but not executable" */
export const EXIT_NOT_EXECUTABLE = 126;

/**
 * Exit code for a process killed by `signal`, following the shell's 128 + n.
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0);
}

/**
 * Runs processes with node:child_process, without a shell. stdin and stderr are
 * inherited; stdout is inherited or collected. Spawn failures resolve to 127
 * for a missing program and 126 for any other reason; the promise never rejects.
 */
export class NodeProcessRunner implements ProcessRunner {
  private readonly logger: Logger<ILogObj>;

  constructor(logger?: Logger<ILogObj>) {
    this.logger = logger ?? defaultLogger.getSubLogger({ name: "runner" });
  }

  run(argv: string[], options: ProcessRunOptions): Promise<ProcessRunResult> {
    const [command, ...args] = argv;
    const proc = nodeSpawn(command, args, {
      env: options.env,
      stdio: ["inherit", options.captureStdout ? "pipe" : "inherit", "inherit"],
    });

    const chunks: Buffer[] = [];
    proc.stdout?.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });

    return new Promise<ProcessRunResult>((resolve) => {
      proc.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          this.logger.error(`${command}: not found`);
          resolve({ exitCode: EXIT_NOT_FOUND, stdout: "" });
        } else if (error.code === "EACCES") {
          this.logger.error(`${command}: permission denied`);
          resolve({ exitCode: EXIT_NOT_EXECUTABLE, stdout: "" });
        } else {
          this.logger.error(`${command}: ${error.message}`);
          resolve({ exitCode: EXIT_NOT_EXECUTABLE, stdout: "" });
        }
      });
      proc.on("close", (code, signal) => {
        const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
        resolve({ exitCode, stdout: Buffer.concat(chunks).toString("utf-8") });
      });
    });
  }
}
