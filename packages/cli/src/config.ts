import { existsSync, readFileSync } from "node:fs";
import { load as parseToml } from "js-toml";
import { ConfigError, type NegationPolicy, type UnknownFlagPolicy } from "restrun";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";
import { expandTildePath, getConfigPath } from "./paths.js";

/**
 * Global CLI options.
 */
export interface GlobalConfig {
  "log-level"?: CLILogLevel;
}

/**
 * How profiles are found and composed.
 */
export interface EngineConfig {
  /** Profile search roots, first match wins */
  paths?: string[];
  /** restic executable */
  binary?: string;
  "unknown-flags"?: UnknownFlagPolicy;
  negation?: NegationPolicy;
}

export interface CLIConfig {
  global?: GlobalConfig;
  engine?: EngineConfig;
}

const GLOBAL_CONFIG_KEYS = new Set(["log-level"]);

const ENGINE_CONFIG_KEYS = new Set(["paths", "binary", "unknown-flags", "negation"]);

const UNKNOWN_FLAG_POLICIES: readonly UnknownFlagPolicy[] = ["error", "pass-through"];

const NEGATION_POLICIES: readonly NegationPolicy[] = ["profile-order", "last"];

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a string.
 */
function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

/**
 * Validates that a value is a string representing a file path.
 * Expands tilde (~) to the user's home directory.
 */
function validatePathString(value: unknown, key: string, section: string): string {
  return expandTildePath(validateString(value, key, section));
}

/**
 * Validates that a value is an array of path strings.
 */
function validatePathArray(value: unknown, key: string, section: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`[${section}].${key} must be an array`);
  }
  return value.map((item: unknown, i) => validatePathString(item, `${key}[${i}]`, section));
}

/**
 * Validates that a value is one of `choices`.
 */
function validateChoice<T extends string>(
  value: unknown,
  key: string,
  section: string,
  choices: readonly T[],
): T {
  const choice = choices.find((candidate) => candidate === value);
  if (choice === undefined) {
    throw new ConfigError(`[${section}].${key} must be one of: ${choices.join(", ")}`);
  }
  return choice;
}

function checkKeys(raw: Table, section: string, allowed: Set<string>): void {
  for (const key of Object.keys(raw)) {
    if (!allowed.has(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid option`);
    }
  }
}

function validateGlobalConfig(raw: unknown, section: string): GlobalConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  checkKeys(raw, section, GLOBAL_CONFIG_KEYS);

  const result: GlobalConfig = {};
  if ("log-level" in raw) {
    result["log-level"] = validateChoice(raw["log-level"], "log-level", section, LOG_LEVELS);
  }
  return result;
}

function validateEngineConfig(raw: unknown, section: string): EngineConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  checkKeys(raw, section, ENGINE_CONFIG_KEYS);

  const result: EngineConfig = {};
  if ("paths" in raw) {
    result.paths = validatePathArray(raw.paths, "paths", section);
  }
  if ("binary" in raw) {
    result.binary = validatePathString(raw.binary, "binary", section);
  }
  if ("unknown-flags" in raw) {
    result["unknown-flags"] = validateChoice(
      raw["unknown-flags"],
      "unknown-flags",
      section,
      UNKNOWN_FLAG_POLICIES,
    );
  }
  if ("negation" in raw) {
    result.negation = validateChoice(raw.negation, "negation", section, NEGATION_POLICIES);
  }
  return result;
}

/**
 * Validates and normalizes a raw TOML object to CLIConfig.
 *
 * @throws ConfigError if validation fails
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result: CLIConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    try {
      if (key === "global") {
        result.global = validateGlobalConfig(value, key);
      } else if (key === "engine") {
        result.engine = validateEngineConfig(value, key);
      } else {
        throw new ConfigError(`[${key}] is not a valid section`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Loads configuration from `configPath` (default: $RESTRUN_CONFIG or
 * ~/.config/restrun.toml). Returns an empty config if the file doesn't exist.
 *
 * @throws ConfigError if the file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}
