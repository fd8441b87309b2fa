import { readFileSync } from "node:fs";
import { Command } from "commander";
import { Restrun, runSelfCheck } from "restrun";
import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";
import { resolveSearchRoots } from "./paths.js";
import { executeAction, formatFlagTable, parseLogLevelOption } from "./utils.js";

/**
 * Options of the restrun command line.
 */
export interface ProgramOptions {
  dryRun?: boolean;
  logLevel?: CLILogLevel;
  selfCheck?: boolean;
  compat?: boolean;
  listProfiles?: boolean;
  describe?: string;
}

/**
 * Global CLI options that are read before the environment is created.
 */
interface GlobalOptions {
  logLevel?: CLILogLevel;
}

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

/**
 * Builds the engine for one invocation from the config file and the options.
 */
export function createEngine(env: CLIEnvironment, config: CLIConfig, options: ProgramOptions): Restrun {
  const logger = env.createLogger(CLI_NAME);
  return new Restrun({
    roots: resolveSearchRoots(config.engine?.paths),
    binary: config.engine?.binary,
    negation: config.engine?.negation,
    unknownFlags: options.compat ? "pass-through" : config.engine?.["unknown-flags"],
    runner: env.createRunner(logger.getSubLogger({ name: "runner" })),
    stdout: env.stdout,
    env: env.processEnv,
    logLevel: env.loggerConfig?.logLevel ?? "warn",
    logger,
  });
}

async function runProgram(
  profile: string | undefined,
  command: string | undefined,
  args: string[],
  options: ProgramOptions,
  env: CLIEnvironment,
  config: CLIConfig,
): Promise<void> {
  const engine = createEngine(env, config, options);

  if (options.selfCheck) {
    const logger = env.createLogger("self-check");
    const mismatches = await runSelfCheck({
      schema: engine.schema,
      runner: env.createRunner(logger),
      binary: config.engine?.binary,
      env: env.processEnv,
      logger,
    });
    env.stdout.write(`self-check: ${mismatches} difference(s) found\n`);
    env.setExitCode(Math.min(mismatches, 255));
    return;
  }

  if (options.listProfiles) {
    for (const name of engine.listProfiles()) {
      env.stdout.write(`${name}\n`);
    }
    return;
  }

  if (options.describe !== undefined) {
    env.stdout.write(formatFlagTable(engine.describe(options.describe)));
    return;
  }

  if (profile === undefined || command === undefined) {
    throw new Error(`a profile and a command are required, see ${CLI_NAME} --help`);
  }
  const exitCode = await engine.run(profile, command, args, { dryRun: options.dryRun });
  env.setExitCode(exitCode);
}

/**
 * Creates and configures the CLI program.
 *
 * Everything after the profile name is passed on untouched, so restic flags
 * never clash with the program's own options.
 *
 * @param env - CLI environment configuration for I/O and dependencies
 * @param config - Configuration loaded from the config file
 * @returns Configured Commander program ready for parsing
 */
export function createProgram(env: CLIEnvironment, config: CLIConfig = {}): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(readVersion())
    .argument("[profile]", "profile to run")
    .argument("[command]", "restic command, or cpal / rmcpal")
    .argument("[args...]", "restic arguments appended after the profile's flags")
    .option(OPTION_FLAGS.dryRun, OPTION_DESCRIPTIONS.dryRun)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .option(OPTION_FLAGS.selfCheck, OPTION_DESCRIPTIONS.selfCheck)
    .option(OPTION_FLAGS.compat, OPTION_DESCRIPTIONS.compat)
    .option(OPTION_FLAGS.listProfiles, OPTION_DESCRIPTIONS.listProfiles)
    .option(OPTION_FLAGS.describe, OPTION_DESCRIPTIONS.describe)
    .passThroughOptions()
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    })
    .action(
      (profile: string | undefined, command: string | undefined, args: string[], options: ProgramOptions) =>
        executeAction(() => runProgram(profile, command, args, options, env, config), env),
    );

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the program.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  // Load config early (before program creation) - errors here should fail fast
  const config = opts.config !== undefined ? opts.config : loadConfig();
  const envOverrides = opts.env ?? {};
  const argv = envOverrides.argv ?? process.argv;

  // First pass: parse global options only (skip if help requested)
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .allowUnknownOption()
    .allowExcessArguments()
    .passThroughOptions()
    .helpOption(false); // Don't intercept --help

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config.global?.["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...envOverrides,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
