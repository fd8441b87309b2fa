import { InvalidArgumentError } from "commander";
import { stripAnsi } from "restrun";
import { describe, expect, test, vi } from "vitest";
import { MockWritableStream } from "../../testing/src/index.js";
import type { CLIEnvironment } from "./environment.js";
import { executeAction, formatFlagTable, parseLogLevelOption } from "./utils.js";

describe("parseLogLevelOption", () => {
  test("accepts level names in any case", () => {
    expect(parseLogLevelOption("DEBUG")).toBe("debug");
    expect(parseLogLevelOption("warn")).toBe("warn");
  });

  test("rejects unknown levels", () => {
    expect(() => parseLogLevelOption("loud")).toThrow(InvalidArgumentError);
  });
});

describe("formatFlagTable", () => {
  test("pads flag names to a common width", () => {
    expect(
      formatFlagTable([
        { flag: "repo", kind: "value" },
        { flag: "with-atime", kind: "boolean" },
      ]),
    ).toBe("--repo        value\n--with-atime  boolean\n");
  });

  test("returns nothing for no flags", () => {
    expect(formatFlagTable([])).toBe("");
  });
});

describe("executeAction", () => {
  const createEnv = (stderr: MockWritableStream, setExitCode: (code: number) => void): CLIEnvironment => ({
    argv: [],
    stdout: new MockWritableStream(),
    stderr,
    processEnv: {},
    setExitCode,
    createLogger: () => {
      throw new Error("not used");
    },
    createRunner: () => {
      throw new Error("not used");
    },
  });

  test("reports errors on stderr and sets exit code 1", async () => {
    const stderr = new MockWritableStream();
    const setExitCode = vi.fn();

    await executeAction(async () => {
      throw new Error("profile is broken");
    }, createEnv(stderr, setExitCode));

    expect(stripAnsi(stderr.output)).toBe("Error: profile is broken\n");
    expect(setExitCode).toHaveBeenCalledWith(1);
  });

  test("leaves the exit code alone on success", async () => {
    const stderr = new MockWritableStream();
    const setExitCode = vi.fn();

    await executeAction(async () => {}, createEnv(stderr, setExitCode));

    expect(stderr.output).toBe("");
    expect(setExitCode).not.toHaveBeenCalled();
  });
});
