import { HandoffConflictError, NotFoundError } from "../errors.js";
import type { TaskPayload } from "../graph/types.js";

export type HandoffSnapshot = ReadonlyMap<string, Readonly<TaskPayload>>;

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Reflect.ownKeys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Outputs of completed tasks, keyed by task id, in completion order.
 *
 * Each id is written once. Stored outputs are cloned and frozen, so neither the
 * producing worker nor any reader can change them afterwards.
 */
export class HandoffContext {
  private entries = new Map<string, Readonly<TaskPayload>>();

  /** Store a task's output. Returns the frozen copy that was stored. */
  record(taskId: string, output: TaskPayload): Readonly<TaskPayload> {
    if (this.entries.has(taskId)) {
      throw new HandoffConflictError(taskId);
    }
    const stored = deepFreeze(structuredClone(output));
    this.entries.set(taskId, stored);
    return stored;
  }

  get(taskId: string): Readonly<TaskPayload> {
    const output = this.entries.get(taskId);
    if (!output) throw new NotFoundError("Handoff entry", taskId);
    return output;
  }

  has(taskId: string): boolean {
    return this.entries.has(taskId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Task ids in completion order. */
  ids(): string[] {
    return [...this.entries.keys()];
  }

  /** Point-in-time view; entries recorded later do not appear in it. */
  snapshot(): HandoffSnapshot {
    return new Map(this.entries);
  }

  toJSON(): Array<[string, Readonly<TaskPayload>]> {
    return [...this.entries.entries()];
  }
}
