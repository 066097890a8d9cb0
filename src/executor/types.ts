/** How one process run ended, from the runner's point of view. */
export type TaskOutcome = "OK" | "RETRY" | "HALT";

/** Result of one pass over the resolved order. */
export type PassResult = "ok" | "retry" | "failed";

/**
 * Run `command` to completion or until `maxTime` seconds have passed
 * (0 means no limit). Rejects only when the process cannot be started.
 */
export type ProcessRunner = (
  command: readonly string[],
  env: NodeJS.ProcessEnv,
  maxTime: number,
) => Promise<TaskOutcome>;

export type Sleeper = (seconds: number) => Promise<void>;

/** Argument handed to the pre- and post-task hooks, as JSON. */
export type HookPayload = {
  task: string;
  try_num: number;
  max_retries: number;
  result?: TaskOutcome;
};

export type ExecutionOptions = {
  onTaskStart?: (task: string, attempt: number) => void;
  onTaskEnd?: (task: string, outcome: TaskOutcome, attempt: number) => void;
};
