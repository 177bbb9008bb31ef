import { getConfig } from "../config.js";
import type { TaskPayload } from "../graph/types.js";
import { TaskPayloadSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { Worker, WorkerContext } from "./worker.js";

export type HttpWorkerOptions = {
  url: string;
  headers?: Record<string, string>;
  description?: string;
  /** Timeout in ms (default: config `timeouts.httpWorker`) */
  timeout?: number;
};

/**
 * Delegates a task to a remote specialist service.
 *
 * POSTs `{ taskId, capability, dependsOn, input, handoff }` and expects a JSON
 * object back, which becomes the task output.
 */
export class HttpWorker implements Worker {
  readonly kind = "http" as const;
  readonly description?: string;
  readonly url: string;

  private headers: Record<string, string>;
  private timeout: number;

  constructor(opts: HttpWorkerOptions) {
    this.url = opts.url;
    this.headers = opts.headers ?? {};
    this.description = opts.description;
    this.timeout = opts.timeout ?? getConfig().timeouts.httpWorker;
  }

  async execute(input: TaskPayload, context: WorkerContext): Promise<TaskPayload> {
    log.info(`Calling ${this.url} for task "${context.taskId}"`);

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({
        taskId: context.taskId,
        capability: context.capability,
        dependsOn: context.dependsOn,
        input,
        handoff: Object.fromEntries(context.handoff),
      }),
      signal: AbortSignal.any([context.signal, AbortSignal.timeout(this.timeout)]),
    });

    const body = await res.text();
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${body.slice(0, 500)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new Error(`Worker at ${this.url} returned invalid JSON`);
    }
    const result = TaskPayloadSchema.safeParse(parsed);
    if (!result.success) {
      throw new Error(`Worker at ${this.url} must return a JSON object`);
    }
    return result.data;
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(this.url, {
        method: "HEAD",
        signal: AbortSignal.timeout(getConfig().timeouts.healthCheck),
      });
      return res.ok;
    } catch (err) {
      log.debug(`Health probe to ${this.url} failed`, { error: String(err) });
      return false;
    }
  }
}
