import { randomUUID } from "node:crypto";
import { getConfig } from "../config.js";
import { ConfigError, HandlerExecutionError, StalledError, TimeoutError, UnknownCapabilityError } from "../errors.js";
import { markCompleted, markFailed, markRunning, markSkipped } from "../graph/task.js";
import { getTask, isTerminal, readySet, skipDownstream } from "../graph/task-graph.js";
import type { Task, TaskGraph } from "../graph/types.js";
import { HandoffContext, type HandoffSnapshot } from "../handoff/context.js";
import { TaskPayloadSchema } from "../schemas.js";
import { log as rootLog } from "../utils/logger.js";
import type { WorkerRegistry } from "../workers/registry.js";
import type { Worker } from "../workers/worker.js";
import type { RunResult, SchedulerOptions, TaskRecord } from "./types.js";

const log = rootLog.child("scheduler");

type Round = {
  graph: TaskGraph;
  handoff: HandoffContext;
  snapshot: HandoffSnapshot;
  perTaskTimeoutMs: number | null;
  opts?: SchedulerOptions;
};

export function toRecord(task: Task): TaskRecord {
  const record: TaskRecord = { id: task.id, capability: task.capability, state: task.state };
  if (task.output !== undefined) record.output = task.output;
  if (task.error !== undefined) record.error = task.error;
  if (task.skipReason !== undefined) record.skipReason = task.skipReason;
  if (task.startedAt !== undefined) record.startedAt = task.startedAt;
  if (task.finishedAt !== undefined) record.finishedAt = task.finishedAt;
  return record;
}

/**
 * Drives a task graph to a terminal state in bulk-synchronous rounds.
 *
 * Each round dispatches up to `maxConcurrency` ready tasks (ascending id order)
 * and waits for all of them before readiness is recomputed, so every task sees
 * the outputs of all tasks completed in earlier rounds.
 */
export class Scheduler {
  private registry: WorkerRegistry;

  constructor(registry: WorkerRegistry) {
    this.registry = registry;
  }

  async execute(graph: TaskGraph, opts?: SchedulerOptions): Promise<RunResult> {
    const maxConcurrency = opts?.maxConcurrency ?? getConfig().limits.maxConcurrency;
    if (!(maxConcurrency === Infinity || (Number.isInteger(maxConcurrency) && maxConcurrency >= 1))) {
      throw new ConfigError(`maxConcurrency must be an integer >= 1, got ${maxConcurrency}`);
    }
    const perTaskTimeoutMs =
      opts?.perTaskTimeoutMs !== undefined ? opts.perTaskTimeoutMs : getConfig().timeouts.perTaskMs;

    const runId = randomUUID();
    const startedAt = Date.now();
    const handoff = new HandoffContext();
    let rounds = 0;
    let cancelled = false;

    const release = this.registry.lock();
    try {
      while (!isTerminal(graph)) {
        if (opts?.signal?.aborted) {
          cancelled = this.cancelRemaining(graph) > 0;
          break;
        }

        const ready = readySet(graph);
        if (ready.length === 0) {
          // readySet may have just skipped the last blocked tasks
          if (isTerminal(graph)) break;
          const blocked = graph.tasks.filter((t) => t.state === "pending").map((t) => t.id);
          log.error("Scheduler stalled: no ready tasks but graph not terminal", { blocked });
          throw new StalledError(blocked);
        }

        rounds++;
        const batch = ready.slice(0, maxConcurrency).map((id) => getTask(graph, id));
        const ids = batch.map((t) => t.id);
        log.debug(`Round ${rounds}: dispatching ${batch.length} of ${ready.length} ready`, { tasks: ids });
        notify("onRoundStart", () => opts?.onRoundStart?.(rounds, ids));

        const round: Round = { graph, handoff, snapshot: handoff.snapshot(), perTaskTimeoutMs, opts };
        const settled = await Promise.allSettled(batch.map((task) => this.runTask(task, round)));
        const crashed = settled.find((s): s is PromiseRejectedResult => s.status === "rejected");
        if (crashed) throw crashed.reason;

        notify("onRoundEnd", () => opts?.onRoundEnd?.(rounds));
      }
    } finally {
      release();
    }

    const finishedAt = Date.now();
    const status = graph.tasks.every((t) => t.state === "completed") ? "success" : "partial-failure";
    log.info(`Run ${runId} finished: ${status}`, { rounds, tasks: graph.tasks.length, cancelled });

    return {
      runId,
      status,
      cancelled,
      rounds,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      tasks: graph.tasks.map(toRecord),
      handoff: handoff.toJSON(),
    };
  }

  /** Resolves once the task is terminal. Rejects only on an internal invariant violation. */
  private async runTask(task: Task, round: Round): Promise<void> {
    let worker: Worker;
    try {
      worker = this.registry.resolve(task.capability);
    } catch (err) {
      if (!(err instanceof UnknownCapabilityError)) throw err;
      log.warn(`No worker for task "${task.id}"`, { capability: task.capability });
      this.fail(task, err, round);
      return;
    }

    markRunning(task);
    notify("onTaskStart", () => round.opts?.onTaskStart?.(task.id));
    log.info(`Dispatching "${task.id}" to "${task.capability}"`, { kind: worker.kind });

    const timeoutMs = task.timeoutMs ?? round.perTaskTimeoutMs;
    const controller = new AbortController();

    try {
      const pending = worker.execute(task.input, {
        taskId: task.id,
        capability: task.capability,
        dependsOn: task.dependsOn,
        handoff: round.snapshot,
        signal: controller.signal,
      });
      const raw = await withTimeout(pending, timeoutMs, controller, (ms) => new TimeoutError(task.id, ms));
      const parsed = TaskPayloadSchema.safeParse(raw);
      if (!parsed.success) {
        throw new HandlerExecutionError(task.id, new Error("worker output must be a plain object"));
      }
      const stored = round.handoff.record(task.id, parsed.data);
      markCompleted(task, stored);
      log.debug(`Task "${task.id}" completed`);
    } catch (err) {
      const failure =
        err instanceof TimeoutError || err instanceof HandlerExecutionError
          ? err
          : new HandlerExecutionError(task.id, err);
      this.fail(task, failure, round);
      return;
    }

    notify("onTaskEnd", () => round.opts?.onTaskEnd?.(toRecord(task)));
  }

  private fail(task: Task, err: Error, round: Round): void {
    markFailed(task, err);
    const skipped = skipDownstream(round.graph, task.id);
    log.warn(`Task "${task.id}" failed`, { error: err.message, skipped });
    notify("onTaskEnd", () => round.opts?.onTaskEnd?.(toRecord(task)));
  }

  private cancelRemaining(graph: TaskGraph): number {
    let count = 0;
    for (const task of graph.tasks) {
      if (task.state === "pending" || task.state === "ready") {
        markSkipped(task, { kind: "cancelled" });
        count++;
      }
    }
    log.info(`Run cancelled, skipped ${count} remaining task(s)`);
    return count;
  }
}

/** Caller callbacks are observers: a throwing one is logged and the run goes on. */
function notify(name: string, callback: () => void): void {
  try {
    callback();
  } catch (err) {
    log.warn(`${name} callback threw`, { error: String(err) });
  }
}

/** The timeout error is settled before the worker is aborted, so it wins the race. */
function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | null | undefined,
  controller: AbortController,
  onTimeout: (ms: number) => Error,
): Promise<T> {
  if (timeoutMs === null || timeoutMs === undefined) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = onTimeout(timeoutMs);
      reject(err);
      controller.abort(err);
    }, timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
