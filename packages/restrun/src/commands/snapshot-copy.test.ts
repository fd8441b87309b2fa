import { existsSync, mkdirSync, mkdtempSync, readlinkSync, rmSync, statSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MockWritableStream } from "../../../testing/src/index.js";
import { createLogger } from "../logging/logger.js";
import {
  COPY_SUFFIX,
  copyPathFor,
  EXIT_COPY_FAILED,
  isSnapshotCopyCommand,
  localRepositoryPath,
  runSnapshotCopy,
} from "./snapshot-copy.js";

const logger = createLogger({ type: "hidden" });

describe("localRepositoryPath", () => {
  it("accepts plain and local: paths", () => {
    expect(localRepositoryPath("/srv/repo")).toBe("/srv/repo");
    expect(localRepositoryPath("local:/srv/repo")).toBe("/srv/repo");
  });

  it("rejects remote backends", () => {
    expect(localRepositoryPath("sftp:backup@host:/srv/repo")).toBeUndefined();
    expect(localRepositoryPath("s3:s3.amazonaws.com/bucket")).toBeUndefined();
  });
});

describe("isSnapshotCopyCommand", () => {
  it("matches cpal and rmcpal only", () => {
    expect(isSnapshotCopyCommand("cpal")).toBe(true);
    expect(isSnapshotCopyCommand("rmcpal")).toBe(true);
    expect(isSnapshotCopyCommand("copy")).toBe(false);
  });
});

describe("runSnapshotCopy", () => {
  let base: string;
  let repo: string;
  let copy: string;

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), "restrun-cpal-"));
    repo = join(base, "repo");
    copy = `${repo}${COPY_SUFFIX}`;
    mkdirSync(join(repo, "data", "ab"), { recursive: true });
    writeFileSync(join(repo, "config"), "repository config");
    writeFileSync(join(repo, "data", "ab", "ab01"), "pack");
    symlinkSync("config", join(repo, "config-link"));
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it("names the copy after the repository", () => {
    expect(copyPathFor(repo)).toBe(copy);
  });

  it("hard-links every file into the copy", () => {
    expect(runSnapshotCopy("cpal", repo, { logger })).toBe(0);

    expect(statSync(join(copy, "config")).ino).toBe(statSync(join(repo, "config")).ino);
    expect(statSync(join(copy, "data", "ab", "ab01")).ino).toBe(statSync(join(repo, "data", "ab", "ab01")).ino);
    expect(statSync(join(repo, "config")).nlink).toBe(2);
    expect(readlinkSync(join(copy, "config-link"))).toBe("config");
  });

  it("refuses to overwrite an existing copy", () => {
    mkdirSync(copy);

    expect(runSnapshotCopy("cpal", repo, { logger })).toBe(EXIT_COPY_FAILED);
  });

  it("removes the copy", () => {
    runSnapshotCopy("cpal", repo, { logger });

    expect(runSnapshotCopy("rmcpal", repo, { logger })).toBe(0);
    expect(existsSync(copy)).toBe(false);
    expect(existsSync(join(repo, "config"))).toBe(true);
  });

  it("removes a partial copy when linking fails", () => {
    const notARepo = join(base, "not-a-repo");
    writeFileSync(notARepo, "plain file");

    expect(runSnapshotCopy("cpal", notARepo, { logger })).toBe(EXIT_COPY_FAILED);
    expect(existsSync(copyPathFor(notARepo))).toBe(false);

    rmSync(notARepo);
    mkdirSync(notARepo);
    expect(runSnapshotCopy("cpal", notARepo, { logger })).toBe(0);
  });

  it("fails to remove a missing copy", () => {
    expect(runSnapshotCopy("rmcpal", repo, { logger })).toBe(EXIT_COPY_FAILED);
  });

  it("fails without a repository", () => {
    expect(runSnapshotCopy("cpal", undefined, { logger })).toBe(EXIT_COPY_FAILED);
  });

  it("fails for remote repositories", () => {
    expect(runSnapshotCopy("cpal", "sftp:backup@host:/srv/repo", { logger })).toBe(EXIT_COPY_FAILED);
  });

  it("fails for a missing repository", () => {
    expect(runSnapshotCopy("cpal", join(base, "missing"), { logger })).toBe(EXIT_COPY_FAILED);
  });

  it("only prints the action in dry-run mode", () => {
    const stdout = new MockWritableStream();

    expect(runSnapshotCopy("cpal", repo, { logger, dryRun: true, stdout })).toBe(0);
    expect(stdout.output).toBe(`cpal: link ${repo} to ${copy}\n`);
    expect(existsSync(copy)).toBe(false);
  });
});
