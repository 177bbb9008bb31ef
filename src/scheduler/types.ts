import type { SkipReason, TaskError, TaskPayload, TaskState } from "../graph/types.js";

export type SchedulerOptions = {
  /** Tasks dispatched per round; `Infinity` dispatches the whole ready set. */
  maxConcurrency?: number;
  /** Applies to tasks without their own `timeoutMs`; null disables it. */
  perTaskTimeoutMs?: number | null;
  /** Checked between rounds; remaining tasks are skipped once aborted. */
  signal?: AbortSignal;
  onRoundStart?: (round: number, taskIds: string[]) => void;
  onTaskStart?: (taskId: string) => void;
  onTaskEnd?: (record: TaskRecord) => void;
  onRoundEnd?: (round: number) => void;
};

export type TaskRecord = {
  id: string;
  capability: string;
  state: TaskState;
  output?: Readonly<TaskPayload>;
  error?: TaskError;
  skipReason?: SkipReason;
  startedAt?: number;
  finishedAt?: number;
};

export type RunStatus = "success" | "partial-failure";

export type RunResult = {
  runId: string;
  status: RunStatus;
  /** True when cancellation skipped at least one task. */
  cancelled: boolean;
  rounds: number;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  /** One record per task, in submission order. */
  tasks: TaskRecord[];
  /** Completed outputs in completion order. */
  handoff: Array<[string, Readonly<TaskPayload>]>;
};
