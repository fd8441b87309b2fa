import type { ILogObj, Logger } from "tslog";
import { createLogger, type LoggerOptions, NodeProcessRunner, type ProcessRunner, parseLogLevel } from "restrun";
import type { CLILogLevel } from "./constants.js";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: CLILogLevel;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Environment handed to scripts and restic */
  processEnv: NodeJS.ProcessEnv;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  createRunner: (logger: Logger<ILogObj>) => ProcessRunner;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > config file > RESTRUN_LOG_LEVEL > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };
    const level = parseLogLevel(config?.logLevel);
    if (level !== undefined) {
      options.minLevel = level;
    }
    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdout: process.stdout,
    stderr: process.stderr,
    processEnv: process.env,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    createRunner: (logger) => new NodeProcessRunner(logger),
  };
}
