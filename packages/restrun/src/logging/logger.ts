import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

/** tslog level ids by name */
export const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const DEFAULT_LEVEL = LEVEL_NAME_TO_ID.warn;

/**
 * Level id for a level name, ignoring case and surrounding blanks.
 */
export function parseLogLevel(value?: string): number | undefined {
  const normalized = value?.trim().toLowerCase();
  return normalized ? LEVEL_NAME_TO_ID[normalized] : undefined;
}

export interface LoggerOptions {
  /** tslog level id; RESTRUN_LOG_LEVEL, then warn, when unset */
  minLevel?: number;
  /** `hidden` keeps tests quiet */
  type?: "pretty" | "json" | "hidden";
  name?: string;
}

// one append stream per process, shared by every logger
let logFile: { path: string; stream: WriteStream } | undefined;

const LOG_TEMPLATE = "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Ends the RESTRUN_LOG_FILE stream; the next logger opens it again.
 */
export function closeLogFile(): void {
  logFile?.stream.end();
  logFile = undefined;
}

function openLogFile(path: string): WriteStream | undefined {
  if (logFile?.path === path) {
    return logFile.stream;
  }
  closeLogFile();
  try {
    mkdirSync(dirname(path), { recursive: true });
  } catch (error) {
    console.error(`[restrun] cannot create log directory for ${path}:`, error);
    return undefined;
  }
  const stream = createWriteStream(path, { flags: "a" });
  stream.on("error", (error) => {
    console.error(`[restrun] log file ${path}: ${error.message}`);
    if (logFile?.stream === stream) {
      closeLogFile();
    }
  });
  logFile = { path, stream };
  return stream;
}

/**
 * Creates a tslog logger. With RESTRUN_LOG_FILE set, formatted lines go to
 * that file without colors instead of the console.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "resolver", minLevel: LEVEL_NAME_TO_ID.debug });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const type = options.type ?? "pretty";
  const path = process.env.RESTRUN_LOG_FILE?.trim();
  const stream = path && type !== "hidden" ? openLogFile(path) : undefined;

  return new Logger<ILogObj>({
    name: options.name ?? "restrun",
    minLevel: options.minLevel ?? parseLogLevel(process.env.RESTRUN_LOG_LEVEL) ?? DEFAULT_LEVEL,
    type: stream ? "pretty" : type,
    hideLogPositionForProduction: stream !== undefined || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: stream
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            const args = logArgs.map((arg) => (typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg)));
            stream.write(`${stripAnsi(logMetaMarkup)}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

export const defaultLogger = createLogger();
