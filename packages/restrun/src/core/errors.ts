/**
 * Errors raised while resolving a profile. All of them are thrown before any
 * process is spawned.
 */

/**
 * A named profile could not be found in any search root.
 *
 * `referencedBy` is set when the profile was named by an `inherit` directive.
 */
export class ProfileNotFoundError extends Error {
  public readonly profile: string;
  public readonly roots: string[];
  public readonly referencedBy?: string;

  constructor(profile: string, roots: string[], referencedBy?: string) {
    const origin = referencedBy ? ` (inherited by "${referencedBy}")` : "";
    super(`Profile "${profile}"${origin} not found in ${roots.join(", ")}`);
    this.name = "ProfileNotFoundError";
    this.profile = profile;
    this.roots = roots;
    this.referencedBy = referencedBy;
  }
}

/**
 * Profiles inherit from each other in a loop.
 *
 * @example
 * ```typescript
 * new InheritanceCycleError(["a", "b", "a"]).message
 * // 'Inheritance cycle detected: a -> b -> a'
 * ```
 */
export class InheritanceCycleError extends Error {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Inheritance cycle detected: ${cycle.join(" -> ")}`);
    this.name = "InheritanceCycleError";
    this.cycle = cycle;
  }
}

/**
 * A profile entry or the configuration file is malformed.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

/**
 * A flag is not known for the command being run.
 */
export class UnknownFlagError extends Error {
  public readonly flag: string;
  public readonly command: string;
  public readonly source: string;

  constructor(flag: string, command: string, source: string) {
    super(`Unknown flag "--${flag}" for command "${command}" (from ${source})`);
    this.name = "UnknownFlagError";
    this.flag = flag;
    this.command = command;
    this.source = source;
  }
}

export class UnknownCommandError extends Error {
  public readonly command: string;

  constructor(command: string) {
    super(`Unknown command "${command}"`);
    this.name = "UnknownCommandError";
    this.command = command;
  }
}
