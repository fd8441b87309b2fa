/**
 * The engine: resolves a profile and command into a restic invocation and runs
 * it between the profile's hook scripts.
 *
 * @example
 * ```typescript
 * const engine = new Restrun({ roots: ["/etc/restrun"] });
 * const { argv } = engine.compose("laptop", "backup", ["/home"]);
 * const exitCode = await engine.run("laptop", "backup", ["/home"]);
 * ```
 *
 * @module engine
 */

import type { ILogObj, Logger } from "tslog";
import { isSnapshotCopyCommand, runSnapshotCopy } from "./commands/snapshot-copy.js";
import { UnknownCommandError } from "./core/errors.js";
import { defaultLogger } from "./logging/logger.js";
import { NodeProcessRunner, type ProcessRunner } from "./process/runner.js";
import { parseToolArguments } from "./profile/command-line.js";
import {
  type Composition,
  composeArguments,
  type NegationPolicy,
  type UnknownFlagPolicy,
} from "./profile/composer.js";
import { ProfileLocator, type ProfileSnapshot } from "./profile/locator.js";
import { resolveProfileOrder } from "./profile/resolver.js";
import { type CommandSchema, type FlagKind, loadCommandSchema } from "./schema/command-schema.js";
import type { ScriptEnvironment } from "./scripts/environment.js";
import { type OrchestrationResult, ScriptOrchestrator } from "./scripts/orchestrator.js";

export interface RestrunOptions {
  /** Search roots, first match wins */
  roots: string[];
  /** @default the bundled restic schema */
  schema?: CommandSchema;
  /** @default "restic" */
  binary?: string;
  negation?: NegationPolicy;
  unknownFlags?: UnknownFlagPolicy;
  /** @default NodeProcessRunner */
  runner?: ProcessRunner;
  /** Receives the command line in dry-run mode */
  stdout?: NodeJS.WritableStream;
  /** Environment of scripts and restic; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Level name exported to scripts as RESTRUN_LOGLEVEL */
  logLevel?: string;
  pid?: number;
  logger?: Logger<ILogObj>;
}

export interface RunOptions {
  /** Run scripts, but print the command line instead of running restic */
  dryRun?: boolean;
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_/.,:=@%+-]+$/;

/**
 * Quotes `argv` so that it can be pasted into a POSIX shell.
 */
export function formatCommandLine(argv: string[]): string {
  return argv
    .map((arg) => (SAFE_SHELL_WORD.test(arg) ? arg : `'${arg.replace(/'/g, "'\\''")}'`))
    .join(" ");
}

export class Restrun {
  readonly schema: CommandSchema;
  readonly locator: ProfileLocator;
  private readonly runner: ProcessRunner;
  private readonly logger: Logger<ILogObj>;

  constructor(private readonly options: RestrunOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.schema = options.schema ?? loadCommandSchema();
    this.locator = new ProfileLocator(
      options.roots,
      this.schema,
      this.logger.getSubLogger({ name: "locator" }),
    );
    this.runner = options.runner ?? new NodeProcessRunner(this.logger.getSubLogger({ name: "runner" }));
  }

  /**
   * Profiles in the order they apply to `command`, the command-line arguments
   * last.
   *
   * @throws UnknownCommandError for commands the schema does not know
   */
  resolveOrder(profile: string, command: string, args: string[] = []): ProfileSnapshot[] {
    if (!this.schema.isCommand(command)) {
      throw new UnknownCommandError(command);
    }
    const commandLine = parseToolArguments(command, args, this.schema);
    return resolveProfileOrder(profile, command, this.locator, commandLine);
  }

  /**
   * Resolves the full restic command line and the hook scripts against the
   * current file system.
   */
  compose(profile: string, command: string, args: string[] = []): Composition {
    return composeArguments(this.resolveOrder(profile, command, args), {
      command,
      schema: this.schema,
      binary: this.options.binary,
      negation: this.options.negation,
      unknownFlags: this.options.unknownFlags,
      logger: this.logger.getSubLogger({ name: "composer" }),
    });
  }

  /**
   * Runs the pre scripts, restic (or a special command) and the post scripts.
   *
   * @returns the failing pre script's exit code, or the tool's
   */
  async run(
    profile: string,
    command: string,
    args: string[] = [],
    options: RunOptions = {},
  ): Promise<number> {
    const result = await this.orchestrate(profile, command, args, options);
    return result.exitCode;
  }

  async orchestrate(
    profile: string,
    command: string,
    args: string[] = [],
    options: RunOptions = {},
  ): Promise<OrchestrationResult> {
    const dryRun = options.dryRun ?? false;
    const orchestrator = new ScriptOrchestrator({
      runner: this.runner,
      profile,
      dryRun,
      logLevel: this.options.logLevel,
      pid: this.options.pid,
      baseEnv: this.options.env,
      logger: this.logger.getSubLogger({ name: "scripts" }),
    });

    return orchestrator.run(
      () => this.compose(profile, command, args),
      (composition, environment) => this.invoke(composition, environment, dryRun),
    );
  }

  listProfiles(): string[] {
    return this.locator.list();
  }

  /**
   * Flags `command` accepts with their kinds, global flags first.
   *
   * @throws UnknownCommandError for commands the schema does not know
   */
  describe(command: string): Array<{ flag: string; kind: FlagKind }> {
    if (!this.schema.isCommand(command)) {
      throw new UnknownCommandError(command);
    }
    const described: Array<{ flag: string; kind: FlagKind }> = [];
    for (const flag of this.schema.acceptedFlags(command)) {
      const kind = this.schema.flagKind(flag);
      if (kind !== undefined) {
        described.push({ flag, kind });
      }
    }
    return described;
  }

  private async invoke(
    composition: Composition,
    environment: ScriptEnvironment,
    dryRun: boolean,
  ): Promise<number> {
    if (isSnapshotCopyCommand(composition.command)) {
      return runSnapshotCopy(composition.command, composition.repo, {
        dryRun,
        stdout: this.options.stdout,
        logger: this.logger.getSubLogger({ name: composition.command }),
      });
    }

    const commandLine = formatCommandLine(composition.argv);
    this.logger.info(`RUN ${commandLine}`);
    if (dryRun) {
      this.options.stdout?.write(`${commandLine}\n`);
      return 0;
    }

    const result = await this.runner.run(composition.argv, {
      env: environment.overlay(this.options.env ?? process.env),
    });
    return result.exitCode;
  }
}
