import { randomUUID } from "node:crypto";
import { InvalidTransitionError, OrchestratorError } from "../errors.js";
import type { SkipReason, Task, TaskDescriptor, TaskError, TaskPayload, TaskState, TerminalState } from "./types.js";

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ["ready", "skipped"],
  // ready → failed: the capability could not be resolved, so the task never ran
  ready: ["running", "failed", "skipped"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
  skipped: [],
};

export function createTask(descriptor: TaskDescriptor): Task {
  return {
    id: descriptor.id ?? randomUUID(),
    capability: descriptor.capability,
    dependsOn: [...new Set(descriptor.dependsOn ?? [])],
    input: descriptor.input ?? {},
    timeoutMs: descriptor.timeoutMs,
    state: "pending",
  };
}

export function isTerminalState(state: TaskState): state is TerminalState {
  return state === "completed" || state === "failed" || state === "skipped";
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Move a task forward; states are never revisited. */
export function transition(task: Task, to: TaskState): void {
  if (!canTransition(task.state, to)) {
    throw new InvalidTransitionError(task.id, task.state, to);
  }
  task.state = to;
}

export function markRunning(task: Task, now = Date.now()): void {
  transition(task, "running");
  task.startedAt = now;
}

export function markCompleted(task: Task, output: Readonly<TaskPayload>, now = Date.now()): void {
  transition(task, "completed");
  task.output = output;
  task.finishedAt = now;
}

export function markFailed(task: Task, err: unknown, now = Date.now()): void {
  transition(task, "failed");
  task.error = toTaskError(err);
  task.finishedAt = now;
}

export function markSkipped(task: Task, reason: SkipReason, now = Date.now()): void {
  transition(task, "skipped");
  task.skipReason = reason;
  task.finishedAt = now;
}

export function toTaskError(err: unknown): TaskError {
  if (err instanceof OrchestratorError) {
    return { name: err.name, code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { name: err.name, code: "HANDLER_FAILED", message: err.message };
  }
  return { name: "Error", code: "HANDLER_FAILED", message: String(err) };
}
