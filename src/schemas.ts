import { z } from "zod";
import { ValidationError } from "./errors.js";

export const TaskPayloadSchema = z.record(z.string(), z.unknown());

export const TaskDescriptorSchema = z.object({
  id: z.string().min(1, "task id must be a non-empty string").optional(),
  capability: z.string({ required_error: "capability is required" }).min(1, "capability must be a non-empty string"),
  dependsOn: z.array(z.string().min(1)).optional(),
  input: TaskPayloadSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const RunConfigSchema = z.object({
  maxConcurrency: z.number().int().min(1, "maxConcurrency must be >= 1").optional(),
  perTaskTimeoutMs: z.number().int().positive().nullable().optional(),
});

export const SubmissionSchema = z.object({
  tasks: z.array(TaskDescriptorSchema).min(1, "tasks must contain at least one task"),
  config: RunConfigSchema.optional(),
});

export const WorkerSpecSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("http"),
    capability: z.string().min(1),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    type: z.literal("echo"),
    capability: z.string().min(1),
  }),
]);

export const PlanFileSchema = SubmissionSchema.extend({
  workers: z.array(WorkerSpecSchema).optional(),
});

export type Submission = z.infer<typeof SubmissionSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type WorkerSpec = z.infer<typeof WorkerSpecSchema>;
export type PlanFile = z.infer<typeof PlanFileSchema>;

/** Parse with a zod schema, throwing a ValidationError that lists every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, label = "input"): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const msg = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new ValidationError("VALIDATION_FAILED", `Invalid ${label}: ${msg}`);
  }
  return result.data;
}
