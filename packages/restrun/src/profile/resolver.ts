import { ConfigError, InheritanceCycleError } from "../core/errors.js";
import type { Directive } from "./entry.js";
import { DEFAULT_PROFILE, type ProfileLocator, type ProfileSnapshot } from "./locator.js";

/**
 * True when a directive applies to `command`: it is unscoped or scoped to it.
 */
export function appliesTo(directive: Directive, command: string): boolean {
  return directive.scope === undefined || directive.scope === command;
}

/**
 * Orders the directives of one profile for application: unscoped ones first,
 * then scoped ones, each group keeping file-name order.
 */
export function orderForApplication(directives: Directive[]): Directive[] {
  return [
    ...directives.filter((directive) => directive.scope === undefined),
    ...directives.filter((directive) => directive.scope !== undefined),
  ];
}

function validateProfileName(name: string, referencedBy?: string): void {
  if (name === "" || name === "." || name === ".." || name.includes("/")) {
    const origin = referencedBy ? ` (inherited by "${referencedBy}")` : "";
    throw new ConfigError(`invalid profile name "${name}"${origin}`);
  }
}

/**
 * Flattens the inheritance graph below `profile` into the order its profiles
 * are applied in.
 *
 * `default` comes first, then every profile after the profiles it inherits
 * from, and `commandLine` last. A profile is placed once, however often it is
 * inherited.
 *
 * @param profile - Profile named on the command line
 * @param command - Command being run; scoped `inherit` directives for other commands are ignored
 * @param locator - Locator used to load each profile
 * @param commandLine - Pseudo-profile built from the arguments after the command
 * @throws InheritanceCycleError when profiles inherit from each other in a loop
 * @throws ProfileNotFoundError when a non-default profile is missing
 */
export function resolveProfileOrder(
  profile: string,
  command: string,
  locator: ProfileLocator,
  commandLine?: ProfileSnapshot,
): ProfileSnapshot[] {
  const order: ProfileSnapshot[] = [];
  const placed = new Set<string>();
  const expanding: string[] = [];

  const expand = (name: string, referencedBy?: string): void => {
    if (placed.has(name)) {
      return;
    }
    const loopStart = expanding.indexOf(name);
    if (loopStart !== -1) {
      throw new InheritanceCycleError([...expanding.slice(loopStart), name]);
    }
    validateProfileName(name, referencedBy);

    const snapshot = locator.load(name, referencedBy);
    if (snapshot === undefined) {
      placed.add(name);
      return;
    }

    expanding.push(name);
    for (const directive of orderForApplication(snapshot.directives)) {
      if (directive.type === "inherit" && appliesTo(directive, command)) {
        for (const parent of directive.profiles) {
          expand(parent, name);
        }
      }
    }
    expanding.pop();

    placed.add(name);
    order.push(snapshot);
  };

  expand(DEFAULT_PROFILE);
  expand(profile);

  if (commandLine) {
    order.push(commandLine);
  }
  return order;
}
