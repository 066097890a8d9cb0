import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { RunnerConfig } from "./config.js";
import { ConfigError, ValidationError } from "./errors.js";
import { processTaskDir, runIterations, type ProcessTaskDirOptions } from "./runner.js";
import { log } from "./utils/logger.js";

export type GetQuery = {
  section: string;
  option: string;
};

export type AppOptions = {
  configFile?: string;
  get?: GetQuery;
  times?: number;
  taskDir?: string;
};

export type AppDeps = ProcessTaskDirOptions & {
  /** Where `--get` prints its value (default: stdout). */
  print?: (line: string) => void;
};

/** Split `section.option` at the first dot. */
export function parseGetQuery(value: string): GetQuery {
  const dot = value.indexOf(".");
  if (dot <= 0 || dot === value.length - 1) {
    throw new ValidationError("VALIDATION_FAILED", `Expected section.option, got "${value}"`);
  }
  return { section: value.slice(0, dot), option: value.slice(dot + 1) };
}

/** Everything the CLI does after argument parsing. Resolves to the process exit code. */
export async function runApp(opts: AppOptions, deps?: AppDeps): Promise<number> {
  const config = opts.configFile ? RunnerConfig.load(opts.configFile) : new RunnerConfig();

  if (opts.get) {
    const { section, option } = opts.get;
    log.debug(`getting ${section}.${option}`);
    const value = config.get(section, option);
    if (value !== undefined) (deps?.print ?? console.log)(value);
    return 0;
  }

  if (!opts.taskDir) {
    throw new ValidationError("VALIDATION_FAILED", "taskdir required");
  }
  if (!existsSync(opts.taskDir)) {
    throw new ConfigError("TASKDIR_MISSING", `${opts.taskDir} doesn't exist`);
  }

  const taskDir = resolve(opts.taskDir);
  const ok = await runIterations(() => processTaskDir(config, taskDir, deps), opts.times);
  return ok ? 0 : 1;
}
