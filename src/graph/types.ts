/** Structured key/value data passed into and out of workers. */
export type TaskPayload = Record<string, unknown>;

export type TaskState = "pending" | "ready" | "running" | "completed" | "failed" | "skipped";

export type TerminalState = Extract<TaskState, "completed" | "failed" | "skipped">;

export type SkipReason =
  | { kind: "upstream-failed"; blockedBy: string }
  | { kind: "cancelled" };

/** Serializable form of the error that failed a task. */
export type TaskError = {
  name: string;
  code: string;
  message: string;
};

/** What a caller submits for one task. */
export type TaskDescriptor = {
  id?: string;
  capability: string;
  dependsOn?: string[];
  input?: TaskPayload;
  /** Overrides the run's per-task timeout. */
  timeoutMs?: number;
};

export type Task = {
  id: string;
  capability: string;
  dependsOn: string[];
  input: TaskPayload;
  timeoutMs?: number;
  state: TaskState;
  output?: Readonly<TaskPayload>;
  error?: TaskError;
  skipReason?: SkipReason;
  startedAt?: number;
  finishedAt?: number;
};

export type TaskGraph = {
  id: string;
  /** Tasks in submission order. */
  tasks: Task[];
  index: Map<string, Task>;
};
