import { resolveTaskSettings, type TaskConfigSource } from "../config.js";
import { log } from "../utils/logger.js";
import { setLongTimeout } from "../utils/timers.js";
import { buildHaltCommand, buildHookCommand, buildTaskCommand } from "./commands.js";
import { runOnce } from "./supervisor.js";
import type { ExecutionOptions, HookPayload, PassResult, ProcessRunner, Sleeper } from "./types.js";

export const sleepSeconds: Sleeper = (seconds) =>
  new Promise((r) => {
    setLongTimeout(() => r(), seconds * 1000);
  });

export type ExecutorOptions = ExecutionOptions & {
  taskDir: string;
  /** Task names in resolved order; never includes the halt task. */
  order: string[];
  config: TaskConfigSource;
  env: NodeJS.ProcessEnv;
  /** Override process execution (for testing). */
  runProcess?: ProcessRunner;
  /** Override the inter-attempt sleep (for testing). */
  sleep?: Sleeper;
};

/**
 * Runs the resolved order pass after pass. A RETRY anywhere abandons the
 * pass and restarts it from the first task with the attempt counter bumped;
 * a HALT, or a RETRY once the counter has reached the task's `maxTries`,
 * runs the halt task and fails the run.
 *
 * The counter is shared by every task, so a task's `maxTries` is a
 * threshold on that shared counter rather than a budget of its own.
 */
export class Executor {
  private readonly taskDir: string;
  private readonly order: string[];
  private readonly config: TaskConfigSource;
  private readonly env: NodeJS.ProcessEnv;
  private readonly runProcess: ProcessRunner;
  private readonly sleep: Sleeper;
  private readonly callbacks: ExecutionOptions;

  constructor(opts: ExecutorOptions) {
    this.taskDir = opts.taskDir;
    this.order = [...opts.order];
    this.config = opts.config;
    this.env = opts.env;
    this.runProcess = opts.runProcess ?? runOnce;
    this.sleep = opts.sleep ?? sleepSeconds;
    this.callbacks = { onTaskStart: opts.onTaskStart, onTaskEnd: opts.onTaskEnd };
  }

  /** Run passes until one succeeds or the run fails. Resolves true on success. */
  async execute(): Promise<boolean> {
    const { maxTries } = this.config.settings;
    for (let attempt = 1; attempt <= maxTries; attempt++) {
      const result = await this.runPass(attempt);
      if (result === "ok") {
        log.debug("all tasks completed!");
        return true;
      }
      if (result === "failed") return false;
    }
    log.warn("attempt counter exhausted before any task reached its max_tries", { maxTries });
    return false;
  }

  /** One pass over the resolved order with the given attempt counter. */
  async runPass(attempt: number): Promise<PassResult> {
    const { settings } = this.config;

    for (const task of this.order) {
      const taskSettings = resolveTaskSettings(settings, this.config.getTaskConfig(task));
      const payload: HookPayload = { task, try_num: attempt, max_retries: settings.maxTries };

      if (settings.preTaskHook) {
        const hookCmd = buildHookCommand(settings.preTaskHook, payload);
        log.debug(`running pre-task hook: ${hookCmd.join(" ")}`);
        await this.runProcess(hookCmd, this.env, taskSettings.maxTime);
      }

      log.debug(`${task}: starting (max time ${taskSettings.maxTime}s)`, { attempt });
      if (taskSettings.interpreter) {
        log.debug(`${task}: running with interpreter (${taskSettings.interpreter})`);
      }
      this.callbacks.onTaskStart?.(task, attempt);
      const outcome = await this.runProcess(
        buildTaskCommand(this.taskDir, task, taskSettings.interpreter),
        this.env,
        taskSettings.maxTime,
      );
      log.debug(`${task}: ${outcome}`);
      this.callbacks.onTaskEnd?.(task, outcome, attempt);

      if (settings.postTaskHook) {
        const hookCmd = buildHookCommand(settings.postTaskHook, { ...payload, result: outcome });
        log.debug(`running post-task hook: ${hookCmd.join(" ")}`);
        await this.runProcess(hookCmd, this.env, settings.maxTime);
      }

      if (outcome === "OK") continue;

      if (outcome === "HALT") {
        log.info(`${task} requested a halt`);
        await this.halt(taskSettings.maxTime);
        return "failed";
      }

      if (attempt === taskSettings.maxTries) {
        log.warn("maximum attempts reached", { task, attempt });
        await this.halt(taskSettings.maxTime);
        return "failed";
      }

      log.debug(`sleeping for ${taskSettings.sleepTime}s`);
      await this.sleep(taskSettings.sleepTime);
      return "retry";
    }

    return "ok";
  }

  /** Run the halt task, wrapped by the global interpreter. Its outcome is not inspected. */
  private async halt(maxTime: number): Promise<void> {
    const { haltTask, interpreter } = this.config.settings;
    log.info("halting");
    await this.runProcess(buildHaltCommand(this.taskDir, haltTask, interpreter), this.env, maxTime);
  }
}
