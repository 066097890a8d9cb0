import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { ConfigError, ValidationError } from "./errors.js";
import {
  ConfigFileSchema,
  EnvSectionSchema,
  RunnerSectionSchema,
  TaskOverridesSchema,
  parseOrThrow,
  type ConfigFile,
  type Section,
  type SectionValue,
} from "./schemas.js";

export type RunSettings = {
  /** Seconds a task may run before it is terminated; 0 means unlimited. */
  maxTime: number;
  /** Upper bound of the run-wide attempt counter. */
  maxTries: number;
  /** Seconds to wait before restarting the pass after a RETRY. */
  sleepTime: number;
  /** Command template tasks are handed to, e.g. `bash -e`. */
  interpreter?: string;
  /** File in the task directory run whenever the run has to stop. */
  haltTask: string;
  preTaskHook?: string;
  postTaskHook?: string;
};

/** The subset of settings a task section may override. */
export type TaskSettings = Pick<RunSettings, "maxTime" | "maxTries" | "sleepTime" | "interpreter">;

export type TaskOverrides = Partial<TaskSettings>;

export const RUNNER_SECTION = "runner";
export const ENV_SECTION = "env";

const DEFAULTS: RunSettings = {
  maxTime: 600,
  maxTries: 5,
  sleepTime: 60,
  haltTask: "halt.sh",
};

/** The default settings (frozen). */
export const defaults: Readonly<RunSettings> = Object.freeze({ ...DEFAULTS });

/** What the execution engine needs to know about configuration. */
export interface TaskConfigSource {
  readonly settings: Readonly<RunSettings>;
  getTaskConfig(task: string): TaskOverrides;
}

/** What task discovery needs to know about configuration. */
export interface DependencySource {
  readonly settings: Readonly<RunSettings>;
  dependsOn(task: string): string[];
}

/** Overlay a task's overrides on the global settings. An empty interpreter disables the global one. */
export function resolveTaskSettings(base: Readonly<RunSettings>, overrides: TaskOverrides): TaskSettings {
  return {
    maxTime: overrides.maxTime ?? base.maxTime,
    maxTries: overrides.maxTries ?? base.maxTries,
    sleepTime: overrides.sleepTime ?? base.sleepTime,
    interpreter: (overrides.interpreter ?? base.interpreter) || undefined,
  };
}

function stringify(value: SectionValue | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (Array.isArray(value)) return value.map(String).join(", ");
  return String(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parsed configuration file. Sections are `runner` (global settings),
 * `env` (variables added to every process environment) and one section
 * per task name.
 */
export class RunnerConfig implements TaskConfigSource, DependencySource {
  readonly settings: Readonly<RunSettings>;
  private readonly sections: ConfigFile;
  private readonly overrides = new Map<string, TaskOverrides>();

  constructor(data: unknown = {}) {
    this.sections = parseOrThrow(ConfigFileSchema, data ?? {}, "configuration");

    const runner = parseOrThrow(RunnerSectionSchema, this.section(RUNNER_SECTION) ?? {}, `[${RUNNER_SECTION}]`);
    this.settings = Object.freeze({
      maxTime: runner.max_time ?? DEFAULTS.maxTime,
      maxTries: runner.max_tries ?? DEFAULTS.maxTries,
      sleepTime: runner.sleep_time ?? DEFAULTS.sleepTime,
      interpreter: runner.interpreter || undefined,
      haltTask: runner.halt_task ?? DEFAULTS.haltTask,
      preTaskHook: runner.pre_task_hook || undefined,
      postTaskHook: runner.post_task_hook || undefined,
    });

    parseOrThrow(EnvSectionSchema, this.section(ENV_SECTION) ?? {}, `[${ENV_SECTION}]`);

    for (const name of Object.keys(this.sections)) {
      if (name === RUNNER_SECTION || name === ENV_SECTION) continue;
      const parsed = parseOrThrow(TaskOverridesSchema, this.section(name) ?? {}, `[${name}]`);
      this.overrides.set(name, {
        maxTime: parsed.max_time,
        maxTries: parsed.max_tries,
        sleepTime: parsed.sleep_time,
        interpreter: parsed.interpreter,
      });
    }
  }

  /** Read and validate a YAML configuration file. */
  static load(path: string): RunnerConfig {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch (err) {
      throw new ConfigError("CONFIG_UNREADABLE", `Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
    }

    let data: unknown;
    try {
      data = parseYaml(text);
    } catch (err) {
      throw new ConfigError("CONFIG_INVALID", `${path}: ${errorMessage(err)}`, { cause: err });
    }

    try {
      return new RunnerConfig(data);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ConfigError("CONFIG_INVALID", `${path}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }

  /** Raw option lookup, as used by `--get section.option`. */
  get(section: string, option: string): string | undefined {
    const values = this.section(section);
    if (!values || !Object.hasOwn(values, option)) return undefined;
    return stringify(values[option]);
  }

  /** Dependency names of a task, trimmed. `depends_on` may be a comma-separated string or a list. */
  dependsOn(task: string): string[] {
    const values = this.section(task);
    if (!values || !Object.hasOwn(values, "depends_on")) return [];
    const value = values["depends_on"];
    if (value === null) return [];
    const names = Array.isArray(value) ? value.map(String) : String(value).split(",");
    return names.map((n) => n.trim()).filter((n) => n.length > 0);
  }

  /** Variables from the `env` section, stringified. */
  getEnv(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.section(ENV_SECTION) ?? {})) {
      const str = stringify(value);
      if (str !== undefined) env[key] = str;
    }
    return env;
  }

  /** The recognized overrides of a task's own section. */
  getTaskConfig(task: string): TaskOverrides {
    return { ...this.overrides.get(task) };
  }

  private section(name: string): Section | null | undefined {
    return Object.hasOwn(this.sections, name) ? this.sections[name] : undefined;
  }
}
