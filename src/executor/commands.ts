import { join } from "node:path";
import { splitShellWords } from "../utils/shell-words.js";
import type { HookPayload } from "./types.js";

/** `[path]`, or the interpreter's words followed by `path`, so flags like `bash -e` work. */
export function wrapWithInterpreter(path: string, interpreter?: string): string[] {
  return interpreter ? [...splitShellWords(interpreter), path] : [path];
}

export function buildTaskCommand(taskDir: string, task: string, interpreter?: string): string[] {
  return wrapWithInterpreter(join(taskDir, task), interpreter);
}

/** The hook template's words plus the payload as one JSON argument. */
export function buildHookCommand(hook: string, payload: HookPayload): string[] {
  return [...splitShellWords(hook), JSON.stringify(payload)];
}

export function buildHaltCommand(taskDir: string, haltTask: string, interpreter?: string): string[] {
  return wrapWithInterpreter(join(taskDir, haltTask), interpreter);
}
