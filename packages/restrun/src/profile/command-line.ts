import { ConfigError } from "../core/errors.js";
import { type CommandSchema, isReservedFlag } from "../schema/command-schema.js";
import type { FlagDirective } from "./entry.js";
import type { ProfileSnapshot } from "./locator.js";

/**
 * Name of the synthetic profile holding the arguments given after the command.
 */
export const COMMAND_LINE_PROFILE = "<command line>";

function flagDirective(flag: string, values: string[], source: string): FlagDirective {
  return { type: "flag", flag, values, source, path: COMMAND_LINE_PROFILE };
}

/**
 * Turns the restic arguments given after the command into a pseudo-profile that
 * is applied after every real profile.
 *
 * - `--name=value` and `--name value` set a value (the latter only for flags the
 *   schema knows to take one)
 * - `--name` alone is a switch
 * - everything after `--`, and every other bare word, fills the command's
 *   positional slots in order
 *
 * @throws ConfigError for short options, reserved flags, missing values and
 *   positional arguments the command has no slot for
 */
export function parseToolArguments(
  command: string,
  args: string[],
  schema: CommandSchema,
): ProfileSnapshot {
  const directives: FlagDirective[] = [];
  const positionals: string[] = [];
  let optionsEnded = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!optionsEnded && arg === "--") {
      optionsEnded = true;
      continue;
    }

    if (!optionsEnded && arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      const flag = eq === -1 ? body : body.slice(0, eq);
      if (flag === "") {
        throw new ConfigError(`malformed option "${arg}"`, COMMAND_LINE_PROFILE);
      }
      if (isReservedFlag(flag)) {
        throw new ConfigError(`--${flag} is only valid in profiles`, COMMAND_LINE_PROFILE);
      }

      const kind = schema.flagKind(flag);
      if (eq !== -1) {
        if (kind === "boolean") {
          throw new ConfigError(`--${flag} is a switch and takes no value`, COMMAND_LINE_PROFILE);
        }
        directives.push(flagDirective(flag, [body.slice(eq + 1)], arg));
      } else if (kind === undefined || kind === "boolean") {
        directives.push(flagDirective(flag, [], arg));
      } else {
        if (i + 1 >= args.length) {
          throw new ConfigError(`--${flag} needs a value`, COMMAND_LINE_PROFILE);
        }
        i++;
        directives.push(flagDirective(flag, [args[i]], arg));
      }
      continue;
    }

    if (!optionsEnded && arg.startsWith("-") && arg.length > 1) {
      throw new ConfigError(
        `short option "${arg}" is not supported, use the long form`,
        COMMAND_LINE_PROFILE,
      );
    }

    positionals.push(arg);
  }

  let remaining = positionals;
  const slots = schema.positionalSlots(command);
  slots.forEach((slot, index) => {
    if (remaining.length === 0) return;
    const last = index === slots.length - 1;
    const count = slot.kind === "single-positional" ? 1 : last ? remaining.length : 1;
    directives.push(flagDirective(slot.name, remaining.slice(0, count), remaining[0]));
    remaining = remaining.slice(count);
  });

  if (remaining.length > 0) {
    throw new ConfigError(
      `command "${command}" takes no further arguments: ${remaining.join(" ")}`,
      COMMAND_LINE_PROFILE,
    );
  }

  return { name: COMMAND_LINE_PROFILE, directory: "", directives };
}
