import { z } from "zod";
import { ValidationError } from "./errors.js";

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/** One section of the configuration file: option name → value. */
export const SectionSchema = z.record(
  z.string(),
  z.union([ScalarSchema, z.array(ScalarSchema)]).nullable(),
);

/** The whole file: section name → section. Empty sections parse as null. */
export const ConfigFileSchema = z.record(z.string(), SectionSchema.nullable());

// An option left empty (`max_time:` or `max_time: ""`) means "not set".
const blankToUndefined = (v: unknown): unknown =>
  v === null || (typeof v === "string" && v.trim() === "") ? undefined : v;

const Seconds = z.preprocess(blankToUndefined, z.coerce.number().finite().nonnegative().optional());
const Tries = z.preprocess(blankToUndefined, z.coerce.number().int().min(1).optional());
// An empty interpreter is meaningful (it switches the global one off); only null is unset.
const CommandTemplate = z.preprocess((v) => (v === null ? undefined : v), z.string().trim().optional());

/** Keys a task section may override. Anything else in it is ignored. */
export const TaskOverridesSchema = z.object({
  max_time: Seconds,
  max_tries: Tries,
  sleep_time: Seconds,
  interpreter: CommandTemplate,
});

export const RunnerSectionSchema = TaskOverridesSchema.extend({
  halt_task: z.preprocess(blankToUndefined, z.string().trim().min(1).optional()),
  pre_task_hook: CommandTemplate,
  post_task_hook: CommandTemplate,
});

export const EnvSectionSchema = z.record(z.string(), ScalarSchema.nullable());

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type Section = z.infer<typeof SectionSchema>;
export type SectionValue = Section[string];

/** Parse `data` or throw a ValidationError listing every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, context: string): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `${context}: ${msg}`);
  }
  return result.data;
}
