/**
 * Merges the directives of an ordered profile list into the restic argument
 * vector and the pre/post script chains.
 *
 * @module profile/composer
 */

import type { ILogObj, Logger } from "tslog";
import { UnknownFlagError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import {
  type CommandSchema,
  type FlagKind,
  isPositional,
  isReservedFlag,
} from "../schema/command-schema.js";
import { COMMAND_LINE_PROFILE } from "./command-line.js";
import type { ProfileSnapshot } from "./locator.js";
import { appliesTo, orderForApplication } from "./resolver.js";

/**
 * When negations take effect.
 * - `profile-order`: a negation clears the flag from earlier profiles only
 * - `last`: negations are applied after every profile, clearing the flag entirely
 */
export type NegationPolicy = "profile-order" | "last";

/**
 * What happens with flags the schema does not know.
 * - `error`: resolution fails with UnknownFlagError
 * - `pass-through`: the flag is passed to restic as `--name=value` with a warning
 */
export type UnknownFlagPolicy = "error" | "pass-through";

export interface ComposeOptions {
  command: string;
  schema: CommandSchema;
  /** @default "restic" */
  binary?: string;
  /** @default "profile-order" */
  negation?: NegationPolicy;
  /** @default "error" */
  unknownFlags?: UnknownFlagPolicy;
  logger?: Logger<ILogObj>;
}

/**
 * One accumulated occurrence of a flag.
 */
export interface FlagEntry {
  values: string[];
  scope?: string;
  /** Index of the contributing profile in the resolved order */
  profileIndex: number;
  profile: string;
  /** Entry path, or the command-line pseudo-profile name */
  path: string;
  /** Global accumulation order */
  sequence: number;
}

/**
 * Flag name → ordered entries, in the order profiles were applied.
 */
export class FlagAccumulator {
  private readonly entries = new Map<string, FlagEntry[]>();
  private sequence = 0;

  add(flag: string, entry: Omit<FlagEntry, "sequence">): void {
    const list = this.entries.get(flag) ?? [];
    list.push({ ...entry, sequence: this.sequence++ });
    this.entries.set(flag, list);
  }

  /**
   * Removes the entries of `flag` contributed by profiles before `profileIndex`.
   */
  clearBefore(flag: string, profileIndex: number): void {
    const list = this.entries.get(flag);
    if (!list) return;
    const kept = list.filter((entry) => entry.profileIndex >= profileIndex);
    if (kept.length === 0) {
      this.entries.delete(flag);
    } else {
      this.entries.set(flag, kept);
    }
  }

  clear(flag: string): void {
    this.entries.delete(flag);
  }

  get(flag: string): FlagEntry[] {
    return [...(this.entries.get(flag) ?? [])];
  }

  /**
   * Values of every entry of `flag`, in order.
   */
  values(flag: string): string[] {
    return this.get(flag).flatMap((entry) => entry.values);
  }

  /**
   * Flag names ordered by their earliest surviving entry.
   */
  names(): string[] {
    const first = (flag: string): number =>
      Math.min(...(this.entries.get(flag) ?? []).map((entry) => entry.sequence));
    return [...this.entries.keys()].sort((a, b) => first(a) - first(b));
  }
}

/**
 * Applies the directives of every profile in order.
 *
 * Within one profile unscoped directives precede the ones scoped to `command`;
 * directives scoped to other commands are skipped, negations included.
 */
export function accumulateFlags(
  order: ProfileSnapshot[],
  command: string,
  negation: NegationPolicy = "profile-order",
  logger: Logger<ILogObj> = defaultLogger,
): FlagAccumulator {
  const accumulator = new FlagAccumulator();
  const deferred = new Set<string>();

  order.forEach((profile, profileIndex) => {
    for (const directive of orderForApplication(profile.directives)) {
      if (!appliesTo(directive, command)) {
        continue;
      }
      switch (directive.type) {
        case "inherit":
          break;
        case "negation":
          if (negation === "last") {
            deferred.add(directive.flag);
          } else {
            accumulator.clearBefore(directive.flag, profileIndex);
          }
          logger.debug(`${profile.name} removes ${directive.flag}`);
          break;
        case "script":
          accumulator.add(directive.hook, {
            values: [directive.script],
            scope: directive.scope,
            profileIndex,
            profile: profile.name,
            path: directive.path,
          });
          logger.debug(`${profile.name} adds ${directive.hook} script ${directive.script}`);
          break;
        case "flag":
          accumulator.add(directive.flag, {
            values: directive.values,
            scope: directive.scope,
            profileIndex,
            profile: profile.name,
            path: directive.path,
          });
          logger.debug(
            `${profile.name} sets ${directive.flag}${directive.values.length ? `=${directive.values.join(",")}` : ""}`,
          );
          break;
      }
    }
  });

  for (const flag of deferred) {
    accumulator.clear(flag);
  }
  return accumulator;
}

/**
 * A flag as it ends up on the command line.
 */
export interface ComposedFlag {
  flag: string;
  /** undefined for flags passed through without being in the schema */
  kind?: FlagKind;
  args: string[];
}

export interface Composition {
  command: string;
  /** Full command line: binary, command, flags, positional arguments */
  argv: string[];
  flags: ComposedFlag[];
  positionals: string[];
  /** pre scripts in execution order */
  pre: string[];
  /** post scripts in execution order */
  post: string[];
  /** Last value of the repo flag, if any */
  repo?: string;
}

function lastValue(entries: FlagEntry[], flag: string, logger: Logger<ILogObj>): string | undefined {
  const last = entries[entries.length - 1];
  if (!last || last.values.length === 0) {
    return undefined;
  }
  if (last.values.length > 1) {
    logger.warn(`${last.path}: --${flag} takes one value, using "${last.values[last.values.length - 1]}"`);
  }
  return last.values[last.values.length - 1];
}

function renderFlag(flag: string, kind: FlagKind, entries: FlagEntry[], logger: Logger<ILogObj>): string[] {
  switch (kind) {
    case "boolean":
      return [`--${flag}`];
    case "value":
    case "file": {
      const value = lastValue(entries, flag, logger);
      return value === undefined ? [`--${flag}`] : [`--${flag}=${value}`];
    }
    case "list":
      return entries.flatMap((entry) =>
        entry.values.length === 0
          ? [`--${flag}`]
          : entry.values.flatMap((value) => [`--${flag}`, value]),
      );
    case "file-list":
      return entries.flatMap((entry) => entry.values.map((value) => `--${flag}=${value}`));
    default:
      return [];
  }
}

function renderUnknown(flag: string, entries: FlagEntry[]): string[] {
  return entries.flatMap((entry) =>
    entry.values.length === 0 ? [`--${flag}`] : entry.values.map((value) => `--${flag}=${value}`),
  );
}

/**
 * Composes the restic command line for `order`.
 *
 * Flags appear in the order their first surviving entry was accumulated;
 * positional arguments follow all flags in the command's slot order. Flags the
 * schema knows but the command does not accept are dropped, unless they came
 * from the command line.
 *
 * @throws UnknownFlagError for flags the schema does not know (policy `error`)
 *   and for command-line flags the command does not accept
 */
export function composeArguments(order: ProfileSnapshot[], options: ComposeOptions): Composition {
  const { command, schema } = options;
  const binary = options.binary ?? "restic";
  const unknownFlags = options.unknownFlags ?? "error";
  const logger = options.logger ?? defaultLogger;

  const accumulator = accumulateFlags(order, command, options.negation, logger);

  const flags: ComposedFlag[] = [];
  const positionalValues = new Map<string, string[]>();

  for (const flag of accumulator.names()) {
    if (isReservedFlag(flag)) {
      continue;
    }
    const entries = accumulator.get(flag);
    const kind = schema.flagKind(flag);
    const origin = entries[0].path;

    if (kind === undefined || !schema.accepts(command, flag)) {
      const fromCommandLine = entries.some((entry) => entry.profile === COMMAND_LINE_PROFILE);
      if (kind !== undefined && !fromCommandLine) {
        logger.debug(`"${command}" does not accept --${flag}, ignoring ${origin}`);
        continue;
      }
      if (unknownFlags === "error") {
        throw new UnknownFlagError(flag, command, origin);
      }
      logger.warn(`passing unknown flag --${flag} from ${origin} to ${binary} ${command}`);
      flags.push({
        flag,
        kind,
        args: kind === undefined ? renderUnknown(flag, entries) : renderFlag(flag, kind, entries, logger),
      });
      continue;
    }

    if (isPositional(kind)) {
      const values = entries.flatMap((entry) => entry.values);
      positionalValues.set(flag, kind === "single-positional" ? values.slice(-1) : values);
      continue;
    }

    flags.push({ flag, kind, args: renderFlag(flag, kind, entries, logger) });
  }

  const positionals = schema
    .positionalSlots(command)
    .flatMap((slot) => positionalValues.get(slot.name) ?? []);

  const repo = accumulator.values("repo").at(-1);

  return {
    command,
    argv: [binary, command, ...flags.flatMap((flag) => flag.args), ...positionals],
    flags,
    positionals,
    pre: accumulator.values("pre"),
    post: accumulator.values("post"),
    repo,
  };
}
