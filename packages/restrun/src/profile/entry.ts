/**
 * Decodes one profile entry (file name plus content) into a directive.
 *
 * File name grammar:
 *
 * ```
 * entry := [command "_"] ["no" "_"] flag ["_" value]*
 * ```
 *
 * @module profile/entry
 */

import { readFileSync, realpathSync, statSync } from "node:fs";
import { ConfigError } from "../core/errors.js";
import { type CommandSchema, isContentReference } from "../schema/command-schema.js";

/**
 * One directory entry of a profile.
 */
export interface ProfileEntry {
  /** File name inside the profile directory */
  name: string;
  /** Absolute path of the entry */
  path: string;
  isSymbolicLink: boolean;
}

interface DirectiveBase {
  /** Command the directive is limited to; undefined applies to every command */
  scope?: string;
  /** File name the directive was decoded from */
  source: string;
  /** Absolute path of that file */
  path: string;
}

export interface FlagDirective extends DirectiveBase {
  type: "flag";
  flag: string;
  /** Empty for a valueless (bare) flag */
  values: string[];
}

export interface NegationDirective extends DirectiveBase {
  type: "negation";
  flag: string;
}

export interface InheritDirective extends DirectiveBase {
  type: "inherit";
  profiles: string[];
}

export interface ScriptDirective extends DirectiveBase {
  type: "script";
  hook: "pre" | "post";
  script: string;
}

export type Directive = FlagDirective | NegationDirective | InheritDirective | ScriptDirective;

/**
 * Name of the flag a directive sets or clears. Inherit directives report "inherit".
 */
export function directiveFlag(directive: Directive): string {
  switch (directive.type) {
    case "flag":
    case "negation":
      return directive.flag;
    case "inherit":
      return "inherit";
    case "script":
      return directive.hook;
  }
}

function errnoMessage(error: unknown): string {
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return "dangling symbolic link";
  }
  return error instanceof Error ? error.message : String(error);
}

function entrySize(entry: ProfileEntry): number {
  try {
    return statSync(entry.path).size;
  } catch (error) {
    throw new ConfigError(errnoMessage(error), entry.path);
  }
}

/**
 * Returns the trimmed, non-empty, non-comment lines of an entry.
 */
export function readEntryLines(entry: ProfileEntry): string[] {
  let content: string;
  try {
    content = readFileSync(entry.path, "utf-8");
  } catch (error) {
    throw new ConfigError(errnoMessage(error), entry.path);
  }
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

/**
 * Path handed to restic for content-reference flags: the link target for a
 * symbolic link, the entry itself otherwise.
 */
function referencePath(entry: ProfileEntry): string {
  if (!entry.isSymbolicLink) {
    entrySize(entry);
    return entry.path;
  }
  try {
    return realpathSync(entry.path);
  } catch (error) {
    throw new ConfigError(errnoMessage(error), entry.path);
  }
}

function startsWithFlag(tokens: string[], schema: CommandSchema): boolean {
  if (tokens.length === 0) return false;
  if (schema.isFlag(tokens[0])) return true;
  return tokens[0] === "no" && tokens.length > 1 && schema.isFlag(tokens[1]);
}

/**
 * Splits an entry name into scope, negation, flag and inline values without
 * touching the file system.
 */
export function parseEntryName(
  name: string,
  schema: CommandSchema,
): { scope?: string; negated: boolean; flag: string; values: string[] } {
  let tokens = name.split("_");
  if (tokens.some((token) => token === "")) {
    throw new ConfigError(`file name "${name}" has an empty '_' segment`);
  }

  let scope: string | undefined;
  if (
    tokens.length > 1 &&
    schema.isCommand(tokens[0]) &&
    (startsWithFlag(tokens.slice(1), schema) || !schema.isFlag(tokens[0]))
  ) {
    scope = tokens[0];
    tokens = tokens.slice(1);
  }

  let negated = false;
  if (tokens[0] === "no" && startsWithFlag(tokens, schema)) {
    negated = true;
    tokens = tokens.slice(1);
  }

  return { scope, negated, flag: tokens[0], values: tokens.slice(1) };
}

/**
 * Decodes a profile entry into a directive.
 *
 * Names the schema does not know still decode to flag directives; whether they
 * are passed on or rejected is decided when flags are composed. A non-empty
 * file whose lines are all blank or comments decodes to nothing.
 *
 * @throws ConfigError for names or contents that break the entry grammar
 */
export function decodeEntry(entry: ProfileEntry, schema: CommandSchema): Directive | undefined {
  let parsed: ReturnType<typeof parseEntryName>;
  try {
    parsed = parseEntryName(entry.name, schema);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(error.message, entry.path);
    }
    throw error;
  }

  const { scope, negated, flag, values } = parsed;
  const base = { scope, source: entry.name, path: entry.path };

  if (negated) {
    if (values.length > 0) {
      throw new ConfigError(`negation of "${flag}" takes no values`, entry.path);
    }
    if (flag === "inherit") {
      throw new ConfigError("inherit cannot be negated", entry.path);
    }
    return { type: "negation", flag, ...base };
  }

  if (flag === "pre" || flag === "post") {
    if (values.length > 0) {
      throw new ConfigError(`"${flag}" takes no values in the file name`, entry.path);
    }
    return { type: "script", hook: flag, script: entry.path, ...base };
  }

  if (flag === "inherit") {
    if (values.length > 0 && entrySize(entry) > 0) {
      throw new ConfigError("must be empty when the file name holds values", entry.path);
    }
    const profiles = values.length > 0 ? values : readEntryLines(entry);
    if (profiles.length === 0) {
      throw new ConfigError("inherit names no profile", entry.path);
    }
    return { type: "inherit", profiles, ...base };
  }

  const kind = schema.flagKind(flag);

  if (kind !== undefined && isContentReference(kind)) {
    if (values.length > 0) {
      throw new ConfigError(`"${flag}" refers to the file itself and takes no values`, entry.path);
    }
    return { type: "flag", flag, values: [referencePath(entry)], ...base };
  }

  if (kind === "boolean") {
    if (values.length > 0) {
      throw new ConfigError(`"${flag}" is a switch and takes no values`, entry.path);
    }
    entrySize(entry);
    return { type: "flag", flag, values: [], ...base };
  }

  if (values.length > 0) {
    if (entrySize(entry) > 0) {
      throw new ConfigError("must be empty when the file name holds values", entry.path);
    }
    return { type: "flag", flag, values, ...base };
  }

  const lines = readEntryLines(entry);
  if (lines.length === 0 && entrySize(entry) > 0) {
    return undefined;
  }
  return { type: "flag", flag, values: lines, ...base };
}
