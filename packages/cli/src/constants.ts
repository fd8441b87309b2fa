/** CLI program name */
export const CLI_NAME = "restrun";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION =
  "Runs restic with the flags, inheritance and hook scripts of a directory-based profile.";

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Profile search roots, first match wins */
export const DEFAULT_SEARCH_ROOTS = ["~/.config/restrun", "/etc/restrun"];

/** Environment variable naming an alternative config file */
export const CONFIG_PATH_ENV = "RESTRUN_CONFIG";

/** Command-line option flags */
export const OPTION_FLAGS = {
  dryRun: "-n, --dry-run",
  logLevel: "-l, --log-level <level>",
  selfCheck: "-s, --self-check",
  compat: "--compat",
  listProfiles: "--list-profiles",
  describe: "--describe <command>",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  dryRun: "Resolve the profile and run its scripts, but only print the restic command line.",
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  selfCheck: "Compare the supported commands and flags with the output of restic help.",
  compat: "Pass flags restrun does not know to restic instead of failing.",
  listProfiles: "List the available profiles.",
  describe: "List the flags a restic command accepts and how profiles encode them.",
} as const;
