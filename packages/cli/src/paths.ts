import { homedir } from "node:os";
import { join } from "node:path";
import { CONFIG_PATH_ENV, DEFAULT_SEARCH_ROOTS } from "./constants.js";

/**
 * Expands tilde (~) to the user's home directory in a path string.
 * Only a leading `~` or `~/` is expanded; `~user` stays as it is.
 *
 * @example
 * expandTildePath("~/.config/restrun") // "/home/alice/.config/restrun"
 * expandTildePath("/etc/restrun")      // "/etc/restrun" (unchanged)
 */
export function expandTildePath(path: string, home: string = homedir()): string {
  if (path === "~") {
    return home;
  }
  if (path.startsWith("~/")) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Config file path: $RESTRUN_CONFIG, or ~/.config/restrun.toml.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV]?.trim();
  if (override) {
    return expandTildePath(override);
  }
  return join(homedir(), ".config", "restrun.toml");
}

/**
 * Profile search roots with `~` expanded.
 */
export function resolveSearchRoots(paths: string[] = DEFAULT_SEARCH_ROOTS, home?: string): string[] {
  return paths.map((path) => expandTildePath(path, home));
}
