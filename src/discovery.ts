import { readdirSync } from "node:fs";
import { ENV_SECTION, RUNNER_SECTION, type DependencySource } from "./config.js";
import { ConfigError } from "./errors.js";
import type { TaskSpec } from "./planner/types.js";

/** Non-hidden files (or links to them) in `dir`, sorted by name. */
export function listDirectory(dir: string): string[] {
  return readdirSync(dir, { withFileTypes: true })
    .filter((e) => (e.isFile() || e.isSymbolicLink()) && !e.name.startsWith("."))
    .map((e) => e.name)
    .sort();
}

/**
 * Every task in `dir` except the halt task, with its configured dependencies.
 * A task named after a reserved section could not be configured, so it is rejected.
 */
export function discoverTasks(dir: string, config: DependencySource): TaskSpec[] {
  return listDirectory(dir)
    .filter((name) => name !== config.settings.haltTask)
    .map((name) => {
      if (name === RUNNER_SECTION || name === ENV_SECTION) {
        throw new ConfigError("CONFIG_INVALID", `Task "${name}" clashes with the reserved [${name}] configuration section`);
      }
      return { name, dependsOn: config.dependsOn(name) };
    });
}
