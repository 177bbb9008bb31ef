import type { TaskPayload } from "../graph/types.js";
import { log } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import type { Worker, WorkerContext } from "./worker.js";

export type WorkerFunction = (input: TaskPayload, context: WorkerContext) => Promise<TaskPayload>;

export type FunctionWorkerOptions = {
  fn: WorkerFunction;
  description?: string;
  /** Extra attempts after the first failure (default: 0). */
  retries?: number;
  /** First backoff delay between attempts (default: config `retry.baseDelayMs`). */
  retryDelayMs?: number;
};

/** Runs an in-process async function as a specialist. */
export class FunctionWorker implements Worker {
  readonly kind = "function" as const;
  readonly description?: string;

  private fn: WorkerFunction;
  private retries: number;
  private retryDelayMs?: number;

  constructor(opts: FunctionWorkerOptions) {
    this.fn = opts.fn;
    this.description = opts.description;
    this.retries = opts.retries ?? 0;
    this.retryDelayMs = opts.retryDelayMs;
  }

  async execute(input: TaskPayload, context: WorkerContext): Promise<TaskPayload> {
    log.debug(`Running function for task "${context.taskId}"`, { capability: context.capability });
    if (this.retries === 0) {
      return this.fn(input, context);
    }
    return withRetry(() => this.fn(input, context), {
      maxAttempts: this.retries + 1,
      baseDelayMs: this.retryDelayMs,
      signal: context.signal,
      onRetry: (attempt, err) =>
        log.warn(`Task "${context.taskId}" attempt ${attempt} failed, retrying`, { error: String(err) }),
    });
  }
}
