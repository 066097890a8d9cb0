// Config
export { RunnerConfig, defaults, resolveTaskSettings, RUNNER_SECTION, ENV_SECTION } from "./config.js";
export type { RunSettings, TaskSettings, TaskOverrides, TaskConfigSource, DependencySource } from "./config.js";

// Errors
export { TaskloopError, ConfigError, GraphError, ValidationError, SpawnError } from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  ConfigFileSchema,
  RunnerSectionSchema,
  TaskOverridesSchema,
  EnvSectionSchema,
} from "./schemas.js";

// Planner
export { createTaskGraph, validate, topologicalSort, resolveOrder } from "./planner/task-graph.js";
export type { TaskSpec, TaskGraph } from "./planner/types.js";

// Executor
export { Executor, sleepSeconds } from "./executor/executor.js";
export type { ExecutorOptions } from "./executor/executor.js";
export { runOnce, outcomeFromExit } from "./executor/supervisor.js";
export { buildTaskCommand, buildHookCommand, buildHaltCommand, wrapWithInterpreter } from "./executor/commands.js";
export type {
  TaskOutcome,
  PassResult,
  ProcessRunner,
  Sleeper,
  HookPayload,
  ExecutionOptions,
} from "./executor/types.js";

// Run driver
export { processTaskDir, runIterations, buildEnvironment } from "./runner.js";
export type { RunConfigSource, ProcessTaskDirOptions } from "./runner.js";
export { runApp, parseGetQuery } from "./app.js";
export type { AppOptions, AppDeps, GetQuery } from "./app.js";
export { listDirectory, discoverTasks } from "./discovery.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { splitShellWords } from "./utils/shell-words.js";
