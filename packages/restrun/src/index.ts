// Engine
export type { RestrunOptions, RunOptions } from "./engine.js";
export { formatCommandLine, Restrun } from "./engine.js";
// Errors
export {
  ConfigError,
  InheritanceCycleError,
  ProfileNotFoundError,
  UnknownCommandError,
  UnknownFlagError,
} from "./core/errors.js";
// Logging
export type { LoggerOptions } from "./logging/logger.js";
export {
  createLogger,
  defaultLogger,
  LEVEL_NAME_TO_ID,
  parseLogLevel,
  stripAnsi,
} from "./logging/logger.js";
// Command schema
export type { FlagKind, ReservedFlag, SchemaDefinition } from "./schema/command-schema.js";
export {
  CommandSchema,
  FLAG_KINDS,
  isContentReference,
  isPositional,
  isRepeatable,
  isReservedFlag,
  loadCommandSchema,
  RESERVED_FLAGS,
  schemaDefinitionSchema,
} from "./schema/command-schema.js";
export type { SelfCheckOptions } from "./schema/self-check.js";
export { parseCommandList, parseFlagList, runSelfCheck } from "./schema/self-check.js";
// Profiles
export type {
  Directive,
  FlagDirective,
  InheritDirective,
  NegationDirective,
  ProfileEntry,
  ScriptDirective,
} from "./profile/entry.js";
export { decodeEntry, parseEntryName, readEntryLines } from "./profile/entry.js";
export type { ProfileSnapshot } from "./profile/locator.js";
export { DEFAULT_PROFILE, ProfileLocator } from "./profile/locator.js";
export { appliesTo, resolveProfileOrder } from "./profile/resolver.js";
export { COMMAND_LINE_PROFILE, parseToolArguments } from "./profile/command-line.js";
export type {
  ComposedFlag,
  ComposeOptions,
  Composition,
  FlagEntry,
  NegationPolicy,
  UnknownFlagPolicy,
} from "./profile/composer.js";
export { accumulateFlags, composeArguments, FlagAccumulator } from "./profile/composer.js";
// Scripts
export { parseScriptOutput, ScriptEnvironment } from "./scripts/environment.js";
export type {
  OrchestrationResult,
  Resolve,
  ScriptOrchestratorOptions,
  ToolInvoker,
} from "./scripts/orchestrator.js";
export { EXIT_RUN_FAILED, ScriptOrchestrator } from "./scripts/orchestrator.js";
// Special commands
export type { SnapshotCopyCommand, SnapshotCopyOptions } from "./commands/snapshot-copy.js";
export {
  COPY_SUFFIX,
  copyPathFor,
  EXIT_COPY_FAILED,
  isSnapshotCopyCommand,
  localRepositoryPath,
  runSnapshotCopy,
} from "./commands/snapshot-copy.js";
// Processes
export type { ProcessRunner, ProcessRunOptions, ProcessRunResult } from "./process/runner.js";
export {
  EXIT_NOT_EXECUTABLE,
  EXIT_NOT_FOUND,
  NodeProcessRunner,
  signalExitCode,
} from "./process/runner.js";
