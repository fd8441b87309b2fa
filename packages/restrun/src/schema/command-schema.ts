/**
 * Command flag schema: which flags exist, how each one is encoded on the restic
 * command line, and which flags every command accepts.
 *
 * The table itself lives in `restic.json` beside this module and is validated
 * with zod when it is loaded.
 *
 * @module schema/command-schema
 */

import { readFileSync } from "node:fs";
import { z, type ZodError } from "zod";
import { ConfigError } from "../core/errors.js";

/**
 * How a flag is written on the command line.
 *
 * - `boolean`: `--name`
 * - `value`: `--name=value`, last value wins
 * - `list`: `--name value` once per value
 * - `file`: `--name=<entry path>`, last value wins
 * - `file-list`: `--name=<entry path>` once per entry
 * - `positional` / `single-positional`: bare arguments after all flags
 * - `inherit` / `script`: consumed by restrun itself, never passed on
 */
export const FLAG_KINDS = [
  "boolean",
  "value",
  "list",
  "file",
  "file-list",
  "positional",
  "single-positional",
  "inherit",
  "script",
] as const;

export type FlagKind = (typeof FLAG_KINDS)[number];

export const RESERVED_FLAGS = ["inherit", "pre", "post"] as const;

export type ReservedFlag = (typeof RESERVED_FLAGS)[number];

const flagNameSchema = z
  .string()
  .min(1)
  .regex(/^[a-z][a-z0-9-]*$/, "flag names are lower-case words joined by '-'");

export const schemaDefinitionSchema = z.object({
  flags: z.record(flagNameSchema, z.enum(FLAG_KINDS)),
  global: z.array(flagNameSchema),
  commands: z.record(z.string().min(1), z.array(flagNameSchema)),
});

export type SchemaDefinition = z.infer<typeof schemaDefinitionSchema>;

export function isReservedFlag(name: string): name is ReservedFlag {
  return RESERVED_FLAGS.some((reserved) => reserved === name);
}

/**
 * True for flags whose value is the path of the profile entry rather than its content.
 */
export function isContentReference(kind: FlagKind): boolean {
  return kind === "file" || kind === "file-list";
}

export function isPositional(kind: FlagKind): boolean {
  return kind === "positional" || kind === "single-positional";
}

/**
 * True for flags that keep one value per occurrence instead of the last one.
 */
export function isRepeatable(kind: FlagKind): boolean {
  return kind === "list" || kind === "file-list" || kind === "positional";
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join(".") || "root"}: ${issue.message}`)
    .join("\n");
}

/**
 * Read-only view over a validated schema definition.
 */
export class CommandSchema {
  private readonly kinds: Map<string, FlagKind>;
  private readonly accepted: Map<string, string[]>;

  constructor(private readonly definition: SchemaDefinition) {
    this.kinds = new Map(Object.entries(definition.flags));
    this.accepted = new Map();

    for (const name of definition.global) {
      if (!this.kinds.has(name)) {
        throw new ConfigError(`global flag "${name}" has no kind`);
      }
    }
    for (const [command, flags] of Object.entries(definition.commands)) {
      for (const name of flags) {
        if (!this.kinds.has(name)) {
          throw new ConfigError(`flag "${name}" of command "${command}" has no kind`);
        }
      }
      const merged = [...definition.global];
      for (const name of flags) {
        if (!merged.includes(name)) merged.push(name);
      }
      this.accepted.set(command, merged);
    }
  }

  /**
   * Validates a raw definition (e.g. parsed JSON) and builds a schema from it.
   */
  static fromDefinition(raw: unknown, source?: string): CommandSchema {
    const parsed = schemaDefinitionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid command schema:\n${formatIssues(parsed.error)}`, source);
    }
    return new CommandSchema(parsed.data);
  }

  isCommand(name: string): boolean {
    return this.accepted.has(name);
  }

  isFlag(name: string): boolean {
    return this.kinds.has(name);
  }

  flagKind(name: string): FlagKind | undefined {
    return this.kinds.get(name);
  }

  commands(): string[] {
    return [...this.accepted.keys()].sort();
  }

  /**
   * Flags accepted by `command`: the global flags first, then the command's own.
   */
  acceptedFlags(command: string): string[] {
    return [...(this.accepted.get(command) ?? [])];
  }

  accepts(command: string, flag: string): boolean {
    return this.accepted.get(command)?.includes(flag) ?? false;
  }

  /**
   * Positional slots of `command` in the order their values are emitted.
   */
  positionalSlots(command: string): Array<{ name: string; kind: FlagKind }> {
    const slots: Array<{ name: string; kind: FlagKind }> = [];
    for (const name of this.accepted.get(command) ?? []) {
      const kind = this.kinds.get(name);
      if (kind && isPositional(kind)) {
        slots.push({ name, kind });
      }
    }
    return slots;
  }
}

const RESTIC_SCHEMA_URL = new URL("./restic.json", import.meta.url);

let cachedSchema: CommandSchema | undefined;

/**
 * Loads a command schema from a JSON file. Without a path, the bundled restic
 * schema is returned (loaded once).
 */
export function loadCommandSchema(path?: string): CommandSchema {
  if (path === undefined && cachedSchema) {
    return cachedSchema;
  }
  const source = path ?? RESTIC_SCHEMA_URL;
  const label = typeof source === "string" ? source : source.pathname;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read command schema: ${message}`, label);
  }

  const schema = CommandSchema.fromDefinition(raw, label);
  if (path === undefined) {
    cachedSchema = schema;
  }
  return schema;
}
