export type ErrorCode =
  | "CONFIG_UNREADABLE"
  | "CONFIG_INVALID"
  | "TASKDIR_MISSING"
  | "UNKNOWN_DEPENDENCY"
  | "SELF_DEPENDENCY"
  | "DEPENDENCY_CYCLE"
  | "VALIDATION_FAILED"
  | "SPAWN_FAILED";

/** Base class for every error the runner raises on purpose. */
export class TaskloopError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad or unreadable configuration, or a missing task directory. */
export class ConfigError extends TaskloopError {}

/** Task dependencies that cannot be ordered. */
export class GraphError extends TaskloopError {}

export class ValidationError extends TaskloopError {}

/**
 * The operating system refused to start a process. Distinct from the
 * OK / RETRY / HALT outcomes: it means the environment itself is broken.
 */
export class SpawnError extends TaskloopError {}
