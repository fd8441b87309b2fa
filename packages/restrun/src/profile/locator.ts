import { type Dirent, existsSync, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import type { ILogObj, Logger } from "tslog";
import { ProfileNotFoundError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import type { CommandSchema } from "../schema/command-schema.js";
import { type Directive, decodeEntry } from "./entry.js";

/**
 * Profile that is always applied first and may be missing.
 */
export const DEFAULT_PROFILE = "default";

/**
 * A profile directory decoded into directives, ordered by file name.
 */
export interface ProfileSnapshot {
  name: string;
  /** Directory the profile was read from; empty for the command-line pseudo-profile */
  directory: string;
  directives: Directive[];
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Finds profiles by name over an ordered list of search roots. The first root
 * holding a directory of that name wins.
 */
export class ProfileLocator {
  private readonly logger: Logger<ILogObj>;

  constructor(
    public readonly roots: string[],
    private readonly schema: CommandSchema,
    logger?: Logger<ILogObj>,
  ) {
    this.logger = logger ?? defaultLogger.getSubLogger({ name: "locator" });
  }

  /**
   * Returns the directory of profile `name`.
   *
   * @returns undefined only for a missing `default` profile
   * @throws ProfileNotFoundError when any other profile is missing
   */
  locate(name: string, referencedBy?: string): string | undefined {
    for (const root of this.roots) {
      const candidate = join(root, name);
      if (isDirectory(candidate)) {
        return candidate;
      }
    }
    if (name === DEFAULT_PROFILE) {
      this.logger.debug(`no "${DEFAULT_PROFILE}" profile in ${this.roots.join(", ")}`);
      return undefined;
    }
    throw new ProfileNotFoundError(name, this.roots, referencedBy);
  }

  /**
   * Locates profile `name` and decodes all of its entries.
   */
  load(name: string, referencedBy?: string): ProfileSnapshot | undefined {
    const directory = this.locate(name, referencedBy);
    if (directory === undefined) {
      return undefined;
    }

    const entries = readdirSync(directory, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );

    const directives: Directive[] = [];
    for (const dirent of entries) {
      if (!this.isEntry(dirent, directory)) {
        continue;
      }
      const path = join(directory, dirent.name);
      const directive = decodeEntry(
        { name: dirent.name, path, isSymbolicLink: dirent.isSymbolicLink() },
        this.schema,
      );
      if (directive === undefined) {
        this.logger.debug(`${path}: no values, skipped`);
        continue;
      }
      directives.push(directive);
    }

    this.logger.debug(`loaded profile "${name}" from ${directory} (${directives.length} entries)`);
    return { name, directory, directives };
  }

  /**
   * Names of all profiles over every root, sorted, without `default`.
   */
  list(): string[] {
    const names = new Set<string>();
    for (const root of this.roots) {
      if (!existsSync(root)) continue;
      for (const dirent of readdirSync(root, { withFileTypes: true })) {
        if (dirent.name !== DEFAULT_PROFILE && isDirectory(join(root, dirent.name))) {
          names.add(dirent.name);
        }
      }
    }
    return [...names].sort();
  }

  private isEntry(dirent: Dirent, directory: string): boolean {
    if (dirent.name.startsWith(".")) {
      return false;
    }
    if (dirent.isDirectory()) {
      this.logger.debug(`skipping sub-directory ${join(directory, dirent.name)}`);
      return false;
    }
    return dirent.isFile() || dirent.isSymbolicLink();
  }
}
