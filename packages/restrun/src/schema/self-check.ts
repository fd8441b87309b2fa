/**
 * Compares the command schema with what the installed restic reports in its
 * help output.
 *
 * @module schema/self-check
 */

import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import type { ProcessRunner } from "../process/runner.js";
import { type CommandSchema, isPositional, isReservedFlag } from "./command-schema.js";

/** restic commands restrun does not wrap */
export const UNWRAPPED_COMMANDS: ReadonlySet<string> = new Set([
  "help",
  "cache",
  "completion",
  "generate",
  "key",
  "migrate",
  "self-update",
  "version",
]);

/** Flags of restic help that have no profile entry */
export const UNWRAPPED_FLAGS: ReadonlySet<string> = new Set(["option", "help"]);

const FLAG_IN_LINE = /(?:^|[\s,])--([a-z0-9][a-z0-9-]*)/;

/**
 * Command names listed in the `Available Commands:` section of `restic help`.
 */
export function parseCommandList(help: string): string[] {
  const commands: string[] = [];
  let inSection = false;
  for (const raw of help.split("\n")) {
    const line = raw.trim();
    if (line === "") {
      inSection = false;
      continue;
    }
    if (line.endsWith("Commands:")) {
      inSection = true;
      continue;
    }
    if (inSection) {
      commands.push(line.split(/\s+/)[0]);
    }
  }
  return commands;
}

/**
 * Long flag names listed in the `Flags:` and `Global Flags:` sections of
 * `restic help <command>`.
 */
export function parseFlagList(help: string): Set<string> {
  const flags = new Set<string>();
  let inSection = false;
  for (const raw of help.split("\n")) {
    const line = raw.trim();
    if (line === "") {
      inSection = false;
      continue;
    }
    if (line.endsWith("Flags:")) {
      inSection = true;
      continue;
    }
    if (!inSection) {
      continue;
    }
    const match = FLAG_IN_LINE.exec(line);
    if (match) {
      flags.add(match[1]);
    }
  }
  return flags;
}

export interface SelfCheckOptions {
  schema: CommandSchema;
  runner: ProcessRunner;
  /** @default "restic" */
  binary?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger<ILogObj>;
}

function processEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) result[name] = value;
  }
  return result;
}

/**
 * Reports every difference between the schema and restic's help output as a
 * warning.
 *
 * @returns the number of differences
 */
export async function runSelfCheck(options: SelfCheckOptions): Promise<number> {
  const { schema, runner } = options;
  const binary = options.binary ?? "restic";
  const logger = options.logger ?? defaultLogger.getSubLogger({ name: "self-check" });
  const env = processEnv(options.env ?? process.env);

  const help = async (...args: string[]): Promise<string> => {
    const result = await runner.run([binary, "help", ...args], { env, captureStdout: true });
    if (result.exitCode !== 0) {
      logger.warn(`${binary} help ${args.join(" ")} returned exit code ${result.exitCode}`);
    }
    return result.stdout;
  };

  let mismatches = 0;
  for (const command of parseCommandList(await help())) {
    if (UNWRAPPED_COMMANDS.has(command)) {
      continue;
    }
    if (!schema.isCommand(command)) {
      logger.warn(`${binary} ${command} is not supported`);
      mismatches++;
      continue;
    }

    const wrapped = new Set(
      schema.acceptedFlags(command).filter((flag) => {
        const kind = schema.flagKind(flag);
        return !isReservedFlag(flag) && kind !== undefined && !isPositional(kind);
      }),
    );
    const inHelp = parseFlagList(await help(command));

    for (const flag of inHelp) {
      if (!wrapped.has(flag) && !UNWRAPPED_FLAGS.has(flag)) {
        logger.warn(`${binary} ${command} --${flag} is not implemented`);
        mismatches++;
      }
    }
    for (const flag of wrapped) {
      if (!inHelp.has(flag)) {
        logger.warn(`--${flag} is not supported by ${binary} ${command}`);
        mismatches++;
      }
    }
  }
  return mismatches;
}
