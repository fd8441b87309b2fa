/**
 * Variables handed from one hook script to the next.
 *
 * A script exports a variable by printing `NAME=VALUE` on stdout. Each script
 * sees every variable exported before it, overlaid on the process environment.
 *
 * @module scripts/environment
 */

import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Immutable, insertion-ordered set of variables.
 */
export class ScriptEnvironment {
  private readonly variables: ReadonlyMap<string, string>;

  constructor(variables: Iterable<readonly [string, string]> = []) {
    this.variables = new Map(variables);
  }

  /**
   * Returns a new environment with `variables` added or replaced.
   */
  withVariables(variables: Iterable<readonly [string, string]>): ScriptEnvironment {
    const merged = new Map(this.variables);
    for (const [name, value] of variables) {
      merged.set(name, value);
    }
    return new ScriptEnvironment(merged);
  }

  with(name: string, value: string): ScriptEnvironment {
    return this.withVariables([[name, value]]);
  }

  get(name: string): string | undefined {
    return this.variables.get(name);
  }

  get size(): number {
    return this.variables.size;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.variables);
  }

  /**
   * The environment a child process gets: `base` (usually process.env) with
   * these variables on top. Unset entries of `base` are left out.
   */
  overlay(base: NodeJS.ProcessEnv): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [name, value] of Object.entries(base)) {
      if (value !== undefined) {
        env[name] = value;
      }
    }
    return { ...env, ...this.toRecord() };
  }
}

/**
 * Extracts `NAME=VALUE` assignments from a script's stdout, in order.
 *
 * The line is split at its first `=`. Lines that are not assignments are
 * logged and skipped; blank lines are skipped silently.
 */
export function parseScriptOutput(
  stdout: string,
  script: string,
  logger: Logger<ILogObj> = defaultLogger,
): Array<[string, string]> {
  const assignments: Array<[string, string]> = [];
  for (const raw of stdout.split("\n")) {
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
    if (line.trim() === "") {
      continue;
    }
    const eq = line.indexOf("=");
    const name = eq === -1 ? "" : line.slice(0, eq);
    if (!VARIABLE_NAME.test(name)) {
      logger.warn(`${script}: ignoring output line "${line}"`);
      continue;
    }
    assignments.push([name, line.slice(eq + 1)]);
  }
  return assignments;
}
