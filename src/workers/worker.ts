import type { TaskPayload } from "../graph/types.js";
import type { HandoffSnapshot } from "../handoff/context.js";

/** What a worker sees besides the task input. */
export type WorkerContext = {
  taskId: string;
  capability: string;
  dependsOn: readonly string[];
  /** Outputs of tasks completed before this task's round started. */
  handoff: HandoffSnapshot;
  /** Aborted when the task times out. Long-running workers should watch it. */
  signal: AbortSignal;
};

/**
 * A specialist registered under one or more capabilities.
 *
 * `execute` resolves with the task output or rejects; the scheduler treats a
 * rejection as final for that task and never retries.
 */
export interface Worker {
  readonly kind: "function" | "http" | (string & {});
  readonly description?: string;

  execute(input: TaskPayload, context: WorkerContext): Promise<TaskPayload>;
  healthCheck?(): Promise<boolean>;
}
