import { randomUUID } from "node:crypto";
import { CycleError, DuplicateIdError, NotFoundError, UnknownDependencyError } from "../errors.js";
import { createTask, isTerminalState, markSkipped, transition } from "./task.js";
import type { Task, TaskDescriptor, TaskGraph } from "./types.js";

/** Build and validate a task graph from caller descriptors. */
export function createTaskGraph(descriptors: TaskDescriptor[]): TaskGraph {
  const graph: TaskGraph = { id: randomUUID(), tasks: [], index: new Map() };
  for (const d of descriptors) addTask(graph, d);
  validate(graph);
  return graph;
}

/** Append a task without validating edges; call `validate` once the graph is complete. */
export function addTask(graph: TaskGraph, descriptor: TaskDescriptor): Task {
  const task = createTask(descriptor);
  if (graph.index.has(task.id)) {
    throw new DuplicateIdError(task.id);
  }
  graph.tasks.push(task);
  graph.index.set(task.id, task);
  return task;
}

export function getTask(graph: TaskGraph, id: string): Task {
  const task = graph.index.get(id);
  if (!task) throw new NotFoundError("Task", id);
  return task;
}

/** Validate a task graph: check for missing deps and cycles. */
export function validate(graph: TaskGraph): void {
  for (const task of graph.tasks) {
    for (const dep of task.dependsOn) {
      if (!graph.index.has(dep)) {
        throw new UnknownDependencyError(task.id, dep);
      }
    }
  }

  const cycle = findCycle(graph);
  if (cycle) throw new CycleError(cycle);
}

/** DFS with coloring along dependency edges. Returns the cycle path, or null. */
function findCycle(graph: TaskGraph): string[] | null {
  const WHITE = 0, GRAY = 1, BLACK = 2;
  const color = new Map<string, number>();
  const stack: string[] = [];

  function dfs(id: string): string[] | null {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of getTask(graph, id).dependsOn) {
      const c = color.get(dep) ?? WHITE;
      if (c === GRAY) return [...stack.slice(stack.indexOf(dep)), dep]; // back edge
      if (c === WHITE) {
        const found = dfs(dep);
        if (found) return found;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return null;
  }

  for (const task of graph.tasks) {
    if ((color.get(task.id) ?? WHITE) === WHITE) {
      const found = dfs(task.id);
      if (found) return found;
    }
  }
  return null;
}

/** Return tasks in topological order (dependencies first, otherwise submission order). */
export function topologicalSort(graph: TaskGraph): Task[] {
  const visited = new Set<string>();
  const sorted: Task[] = [];

  function visit(task: Task): void {
    if (visited.has(task.id)) return;
    visited.add(task.id);
    for (const dep of task.dependsOn) {
      visit(getTask(graph, dep));
    }
    sorted.push(task);
  }

  for (const task of graph.tasks) visit(task);
  return sorted;
}

/** Ascending code-unit order, independent of locale. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ids of tasks that may be dispatched now, sorted ascending.
 *
 * Pending tasks with a failed or skipped dependency are moved to `skipped`
 * (transitively, since tasks are visited dependencies first). Pending tasks whose
 * dependencies are all completed are promoted to `ready`. Tasks already `ready`
 * but not yet dispatched stay in the set.
 */
export function readySet(graph: TaskGraph): string[] {
  for (const task of topologicalSort(graph)) {
    if (task.state !== "pending") continue;

    const deps = task.dependsOn.map((id) => getTask(graph, id));
    const blocker = deps.find((d) => d.state === "failed" || d.state === "skipped");
    if (blocker) {
      markSkipped(task, { kind: "upstream-failed", blockedBy: rootCause(blocker) });
    } else if (deps.every((d) => d.state === "completed")) {
      transition(task, "ready");
    }
  }

  return graph.tasks
    .filter((t) => t.state === "ready")
    .map((t) => t.id)
    .sort(compareIds);
}

function rootCause(task: Task): string {
  return task.skipReason?.kind === "upstream-failed" ? task.skipReason.blockedBy : task.id;
}

/** Check if all tasks are terminal (completed, failed, or skipped). */
export function isTerminal(graph: TaskGraph): boolean {
  return graph.tasks.every((t) => isTerminalState(t.state));
}

export function dependentsMap(graph: TaskGraph): Map<string, string[]> {
  const dependents = new Map<string, string[]>();
  for (const task of graph.tasks) {
    for (const dep of task.dependsOn) {
      const list = dependents.get(dep) ?? [];
      list.push(task.id);
      dependents.set(dep, list);
    }
  }
  return dependents;
}

/** Mark every transitive dependent of a failed task as skipped. Returns the ids skipped. */
export function skipDownstream(graph: TaskGraph, failedTaskId: string): string[] {
  const dependents = dependentsMap(graph);
  const queue = [...(dependents.get(failedTaskId) ?? [])];
  const visited = new Set<string>();
  const skipped: string[] = [];

  for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
    if (visited.has(id)) continue;
    visited.add(id);
    const task = getTask(graph, id);
    if (task.state === "pending" || task.state === "ready") {
      markSkipped(task, { kind: "upstream-failed", blockedBy: failedTaskId });
      skipped.push(id);
    }
    queue.push(...(dependents.get(id) ?? []));
  }
  return skipped;
}

/**
 * Preview the rounds the scheduler would run if every remaining task succeeded.
 * Completed tasks count as satisfied; failed and skipped ones block their dependents.
 */
export function planRounds(graph: TaskGraph, maxConcurrency: number): string[][] {
  const done = new Set(graph.tasks.filter((t) => t.state === "completed").map((t) => t.id));
  const remaining = new Set(
    graph.tasks.filter((t) => t.state === "pending" || t.state === "ready").map((t) => t.id),
  );
  const rounds: string[][] = [];

  while (remaining.size > 0) {
    const ready = [...remaining]
      .filter((id) => getTask(graph, id).dependsOn.every((d) => done.has(d)))
      .sort(compareIds)
      .slice(0, maxConcurrency);
    if (ready.length === 0) break;
    for (const id of ready) {
      remaining.delete(id);
      done.add(id);
    }
    rounds.push(ready);
  }
  return rounds;
}
