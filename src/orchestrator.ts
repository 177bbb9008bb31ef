import { getConfig } from "./config.js";
import { createTaskGraph, planRounds } from "./graph/task-graph.js";
import type { RunStore } from "./persistence/store.js";
import { Scheduler } from "./scheduler/scheduler.js";
import type { RunResult, SchedulerOptions } from "./scheduler/types.js";
import { parseOrThrow, SubmissionSchema, type Submission } from "./schemas.js";
import { log } from "./utils/logger.js";
import { WorkerRegistry } from "./workers/registry.js";
import type { Worker } from "./workers/worker.js";

export type OrchestratorOptions = {
  /** Finished runs are written here for audit. */
  store?: RunStore;
  registry?: WorkerRegistry;
};

export type SubmitOptions = Pick<
  SchedulerOptions,
  "signal" | "onRoundStart" | "onTaskStart" | "onTaskEnd" | "onRoundEnd"
>;

export type PlanPreview = {
  /** Task ids per round, assuming every task succeeds. */
  rounds: string[][];
  maxConcurrency: number;
};

/**
 * Entry point for callers: validates a submission, builds its task graph and
 * runs it on the registered workers.
 */
export class Orchestrator {
  readonly workers: WorkerRegistry;
  private store?: RunStore;

  constructor(opts?: OrchestratorOptions) {
    this.workers = opts?.registry ?? new WorkerRegistry();
    this.store = opts?.store;
  }

  register(capability: string, worker: Worker): this {
    this.workers.register(capability, worker);
    return this;
  }

  /** Run a submission to completion. Graph errors throw before any worker is called. */
  async submit(submission: Submission, opts?: SubmitOptions): Promise<RunResult> {
    const request = parseOrThrow(SubmissionSchema, submission, "submission");
    const graph = createTaskGraph(request.tasks);
    log.info(`Submitting ${graph.tasks.length} task(s)`, { graphId: graph.id });

    const result = await new Scheduler(this.workers).execute(graph, {
      ...opts,
      maxConcurrency: request.config?.maxConcurrency,
      perTaskTimeoutMs: request.config?.perTaskTimeoutMs,
    });

    this.persist(result);
    return result;
  }

  /** Dry run: validate and preview the rounds without calling any worker. */
  plan(submission: Submission): PlanPreview {
    const request = parseOrThrow(SubmissionSchema, submission, "submission");
    const graph = createTaskGraph(request.tasks);
    const maxConcurrency = request.config?.maxConcurrency ?? getConfig().limits.maxConcurrency;
    return { rounds: planRounds(graph, maxConcurrency), maxConcurrency };
  }

  private persist(result: RunResult): void {
    if (!this.store) return;
    try {
      this.store.insert(result);
    } catch (err) {
      log.error("Failed to persist run", { runId: result.runId, error: String(err) });
    }
  }

  close(): void {
    this.store?.close();
  }
}
