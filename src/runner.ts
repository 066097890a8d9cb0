import type { DependencySource, TaskConfigSource } from "./config.js";
import { discoverTasks } from "./discovery.js";
import { Executor } from "./executor/executor.js";
import type { ExecutionOptions, ProcessRunner, Sleeper } from "./executor/types.js";
import { resolveOrder } from "./planner/task-graph.js";
import { log } from "./utils/logger.js";

export type RunConfigSource = TaskConfigSource &
  DependencySource & {
    getEnv(): Record<string, string>;
  };

export type ProcessTaskDirOptions = ExecutionOptions & {
  /** Environment the configured overlay is applied to (default: process.env). */
  baseEnv?: NodeJS.ProcessEnv;
  runProcess?: ProcessRunner;
  sleep?: Sleeper;
};

/** `base` with the configuration's `env` section layered on top. */
export function buildEnvironment(config: RunConfigSource, base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const overlay = config.getEnv();
  log.debug("Updating env", overlay);
  return { ...base, ...overlay };
}

/**
 * One iteration: discover the tasks in `taskDir`, order them and run passes
 * until the run succeeds or fails. Graph errors are thrown before anything
 * is spawned.
 */
export async function processTaskDir(
  config: RunConfigSource,
  taskDir: string,
  opts?: ProcessTaskDirOptions,
): Promise<boolean> {
  const order = resolveOrder(discoverTasks(taskDir, config));
  log.debug("tasks", { order });

  const executor = new Executor({
    taskDir,
    order,
    config,
    env: buildEnvironment(config, opts?.baseEnv),
    runProcess: opts?.runProcess,
    sleep: opts?.sleep,
    onTaskStart: opts?.onTaskStart,
    onTaskEnd: opts?.onTaskEnd,
  });
  return executor.execute();
}

/**
 * Run `iteration` up to `times` times (forever when `times` is undefined
 * or 0). Stops at the first failed iteration and resolves false.
 */
export async function runIterations(iteration: () => Promise<boolean>, times?: number): Promise<boolean> {
  for (let n = 1; !times || n <= times; n++) {
    log.info(`iteration ${n}`);
    if (!(await iteration())) return false;
  }
  return true;
}
