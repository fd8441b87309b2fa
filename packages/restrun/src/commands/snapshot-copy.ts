/**
 * `cpal` and `rmcpal`: keep a hard-linked copy of a local repository around a
 * risky operation, and drop it again.
 *
 * @module commands/snapshot-copy
 */

import {
  existsSync,
  linkSync,
  lstatSync,
  mkdirSync,
  readdirSync,
  readlinkSync,
  rmSync,
  statSync,
  symlinkSync,
} from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";

export const COPY_SUFFIX = ".restrun_cpal";

/** Exit status for every refused or failed copy operation */
export const EXIT_COPY_FAILED = 2;

export type SnapshotCopyCommand = "cpal" | "rmcpal";

export const SNAPSHOT_COPY_COMMANDS: readonly SnapshotCopyCommand[] = ["cpal", "rmcpal"];

export function isSnapshotCopyCommand(command: string): command is SnapshotCopyCommand {
  return command === "cpal" || command === "rmcpal";
}

export interface SnapshotCopyOptions {
  dryRun?: boolean;
  /** Receives the planned action in dry-run mode */
  stdout?: NodeJS.WritableStream;
  logger?: Logger<ILogObj>;
}

const REMOTE_REPOSITORY = /^[A-Za-z][A-Za-z0-9+.-]*:/;

/**
 * Local directory of a repository location, or undefined for remote backends
 * such as `sftp:` or `s3:`.
 */
export function localRepositoryPath(repo: string): string | undefined {
  if (repo.startsWith("local:")) {
    return resolve(repo.slice("local:".length));
  }
  if (REMOTE_REPOSITORY.test(repo)) {
    return undefined;
  }
  return resolve(repo);
}

export function copyPathFor(repoPath: string): string {
  return `${repoPath}${COPY_SUFFIX}`;
}

function linkTree(source: string, target: string): void {
  mkdirSync(target, { mode: statSync(source).mode & 0o7777 });
  for (const dirent of readdirSync(source, { withFileTypes: true })) {
    const from = join(source, dirent.name);
    const to = join(target, dirent.name);
    if (dirent.isDirectory()) {
      linkTree(from, to);
    } else if (dirent.isSymbolicLink()) {
      symlinkSync(readlinkSync(from), to);
    } else {
      linkSync(from, to);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Checks the repository and runs `command` against it.
 *
 * @param repo - Last value of the repo flag
 * @returns 0 on success, EXIT_COPY_FAILED otherwise (the reason is logged)
 */
export function runSnapshotCopy(
  command: SnapshotCopyCommand,
  repo: string | undefined,
  options: SnapshotCopyOptions = {},
): number {
  const logger = options.logger ?? defaultLogger.getSubLogger({ name: command });

  if (repo === undefined) {
    logger.error(`${command} needs --repo`);
    return EXIT_COPY_FAILED;
  }
  const repoPath = localRepositoryPath(repo);
  if (repoPath === undefined) {
    logger.error(`${command}: ${repo} is not a local repository`);
    return EXIT_COPY_FAILED;
  }
  if (!existsSync(repoPath)) {
    logger.error(`${command}: ${repoPath} does not exist`);
    return EXIT_COPY_FAILED;
  }
  if (statSync(repoPath).dev !== statSync(dirname(repoPath)).dev) {
    logger.error(`${command}: ${repoPath} is a mount point, this is not supported`);
    return EXIT_COPY_FAILED;
  }

  const copyPath = copyPathFor(repoPath);
  const copyExists = existsSync(copyPath) || isDanglingLink(copyPath);

  if (command === "cpal" && copyExists) {
    logger.error(`cpal: ${copyPath} already exists`);
    return EXIT_COPY_FAILED;
  }
  if (command === "rmcpal" && !copyExists) {
    logger.error(`rmcpal: ${copyPath} does not exist`);
    return EXIT_COPY_FAILED;
  }

  const action =
    command === "cpal" ? `cpal: link ${repoPath} to ${copyPath}` : `rmcpal: remove ${copyPath}`;
  logger.info(`RUN ${action}`);
  if (options.dryRun) {
    options.stdout?.write(`${action}\n`);
    return 0;
  }

  try {
    if (command === "cpal") {
      linkTree(repoPath, copyPath);
    } else {
      rmSync(copyPath, { recursive: true });
    }
  } catch (error) {
    logger.error(`${command}: ${errorMessage(error)}`);
    if (command === "cpal") {
      removePartialCopy(copyPath, logger);
    }
    return EXIT_COPY_FAILED;
  }
  return 0;
}

function removePartialCopy(copyPath: string, logger: Logger<ILogObj>): void {
  try {
    rmSync(copyPath, { recursive: true, force: true });
  } catch (error) {
    logger.error(`cpal: could not remove partial copy ${copyPath}: ${errorMessage(error)}`);
  }
}

function isDanglingLink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
}
