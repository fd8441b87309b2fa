import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import type { FlagKind } from "restrun";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";

/**
 * Parses and validates the log level option value.
 */
export function parseLogLevelOption(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (level === undefined) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

/**
 * One line per flag, names padded to a common width.
 */
export function formatFlagTable(flags: Array<{ flag: string; kind: FlagKind }>): string {
  const width = Math.max(0, ...flags.map(({ flag }) => flag.length + 2));
  return flags.map(({ flag, kind }) => `${`--${flag}`.padEnd(width)}  ${kind}\n`).join("");
}

/**
 * Runs an action and reports any error it throws on stderr, setting exit code 1.
 */
export async function executeAction(
  action: () => Promise<void>,
  env: CLIEnvironment,
): Promise<void> {
  try {
    await action();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    env.stderr.write(`${chalk.red.bold("Error:")} ${message}\n`);
    env.setExitCode(1);
  }
}
