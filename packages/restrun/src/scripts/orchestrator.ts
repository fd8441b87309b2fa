/**
 * Runs the pre scripts, the tool and the post scripts of one invocation.
 *
 * @module scripts/orchestrator
 */

import { existsSync } from "node:fs";
import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import type { ProcessRunner, ProcessRunResult } from "../process/runner.js";
import type { Composition } from "../profile/composer.js";
import { parseScriptOutput, ScriptEnvironment } from "./environment.js";

/** Exit code of a script or tool whose run failed before it returned a status */
export const EXIT_RUN_FAILED = 1;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Re-runs locate, decode, resolve and compose against the current file system.
 */
export type Resolve = () => Composition;

/**
 * Runs whatever stands between the pre and post scripts and returns its exit
 * status.
 */
export type ToolInvoker = (composition: Composition, environment: ScriptEnvironment) => Promise<number>;

export interface ScriptOrchestratorOptions {
  runner: ProcessRunner;
  /** Profile named on the command line, exported as RESTRUN_PROFILE */
  profile: string;
  dryRun?: boolean;
  /** Exported as RESTRUN_LOGLEVEL */
  logLevel?: string;
  /** Exported as RESTRUN_PID; defaults to process.pid */
  pid?: number;
  /** Environment scripts inherit; defaults to process.env */
  baseEnv?: NodeJS.ProcessEnv;
  logger?: Logger<ILogObj>;
}

export interface OrchestrationResult {
  exitCode: number;
  /** Composition the tool was run with, or the one current when a pre script failed */
  composition: Composition;
  /** Variables after the last pre script */
  environment: ScriptEnvironment;
  /** Pre script whose failure stopped the run */
  abortedBy?: string;
}

export class ScriptOrchestrator {
  private readonly logger: Logger<ILogObj>;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(private readonly options: ScriptOrchestratorOptions) {
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "scripts" });
    this.baseEnv = options.baseEnv ?? process.env;
  }

  initialEnvironment(): ScriptEnvironment {
    return new ScriptEnvironment([
      ["RESTRUN_PID", String(this.options.pid ?? process.pid)],
      ["RESTRUN_PROFILE", this.options.profile],
      ["RESTRUN_DRY_RUN", this.options.dryRun ? "1" : "0"],
      ["RESTRUN_LOGLEVEL", this.options.logLevel ?? "warn"],
    ]);
  }

  /**
   * Runs the invocation.
   *
   * After every successful pre script the composition is resolved again and the
   * first script of the new pre chain that has not run yet comes next. A failing
   * pre script ends the run with its exit code, skipping the tool and every post
   * script. Post scripts all run, with RESTIC_EXITCODE set; their exit codes do
   * not change the result. A runner or invoker that throws counts as exit code 1.
   */
  async run(resolve: Resolve, invoke: ToolInvoker): Promise<OrchestrationResult> {
    let composition = resolve();
    let environment = this.initialEnvironment();
    const executed = new Set<string>();

    for (;;) {
      const script = composition.pre.find((candidate) => !executed.has(candidate));
      if (script === undefined) {
        break;
      }
      executed.add(script);

      const { exitCode, environment: next } = await this.runScript(script, environment);
      environment = next;
      if (exitCode !== 0) {
        this.logger.warn(`aborting because ${script} returned exit code ${exitCode}`);
        return { exitCode, composition, environment, abortedBy: script };
      }
      composition = resolve();
    }

    const exitCode = await invoke(composition, environment).catch((error: unknown) => {
      this.logger.error(`${composition.argv[0]} ${composition.command}: ${errorMessage(error)}`);
      return EXIT_RUN_FAILED;
    });

    let postEnvironment = environment.with("RESTIC_EXITCODE", String(exitCode));
    for (const script of composition.post) {
      const result = await this.runScript(script, postEnvironment);
      postEnvironment = result.environment;
      if (result.exitCode !== 0) {
        this.logger.warn(`post script ${script} returned exit code ${result.exitCode}`);
      }
    }

    return { exitCode, composition, environment };
  }

  /**
   * Runs one script with `environment` over the base environment and merges the
   * variables it prints.
   */
  async runScript(
    script: string,
    environment: ScriptEnvironment,
  ): Promise<{ exitCode: number; environment: ScriptEnvironment }> {
    if (!existsSync(script)) {
      this.logger.warn(`${script} does not exist`);
    }
    this.logger.info(`RUN ${script}`);

    let result: ProcessRunResult;
    try {
      result = await this.options.runner.run([script], {
        env: environment.overlay(this.baseEnv),
        captureStdout: true,
      });
    } catch (error) {
      this.logger.error(`${script}: ${errorMessage(error)}`);
      return { exitCode: EXIT_RUN_FAILED, environment };
    }
    return {
      exitCode: result.exitCode,
      environment: environment.withVariables(parseScriptOutput(result.stdout, script, this.logger)),
    };
  }
}
