import { spawn } from "node:child_process";
import { SpawnError } from "../errors.js";
import { log } from "../utils/logger.js";
import { setLongTimeout } from "../utils/timers.js";
import type { ProcessRunner, TaskOutcome } from "./types.js";

/** Map an exit code to an outcome: 0 → OK, 2 → HALT, anything else (or a signal) → RETRY. */
export function outcomeFromExit(code: number | null): TaskOutcome {
  if (code === 0) return "OK";
  if (code === 2) return "HALT";
  return "RETRY";
}

/**
 * Run one external command with no stdin and the given environment.
 *
 * When `maxTime` runs out the process is sent SIGTERM and RETRY is returned
 * straight away; the process is not waited for and may outlive this call.
 */
export const runOnce: ProcessRunner = (command, env, maxTime) => {
  if (command.length === 0) {
    return Promise.reject(new SpawnError("SPAWN_FAILED", "Cannot run an empty command"));
  }
  const [file, ...args] = command;

  return new Promise<TaskOutcome>((resolve, reject) => {
    const child = spawn(file, args, { env, stdio: ["ignore", "inherit", "inherit"] });
    let settled = false;
    let cancelDeadline: (() => void) | undefined;

    if (maxTime > 0) {
      cancelDeadline = setLongTimeout(() => {
        if (settled) return;
        settled = true;
        log.warn("exceeded max_time; terminating", { command: file, maxTime });
        child.kill("SIGTERM");
        child.unref();
        resolve("RETRY");
      }, maxTime * 1000);
    }

    child.once("error", (err) => {
      cancelDeadline?.();
      if (settled) return;
      settled = true;
      reject(new SpawnError("SPAWN_FAILED", `Failed to start ${file}: ${err.message}`, { cause: err }));
    });

    child.once("exit", (code, signal) => {
      cancelDeadline?.();
      if (settled) return;
      settled = true;
      if (signal) log.debug(`${file} killed by ${signal}`);
      resolve(outcomeFromExit(code));
    });
  });
};
