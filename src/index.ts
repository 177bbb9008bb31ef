// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { OrchestratorConfig, DeepPartial } from "./config.js";

// Errors
export {
  OrchestratorError,
  DuplicateIdError,
  UnknownDependencyError,
  CycleError,
  UnknownCapabilityError,
  TimeoutError,
  HandlerExecutionError,
  StalledError,
  InvalidTransitionError,
  NotFoundError,
  HandoffConflictError,
  RegistryLockedError,
  ValidationError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  TaskPayloadSchema,
  TaskDescriptorSchema,
  RunConfigSchema,
  SubmissionSchema,
  WorkerSpecSchema,
  PlanFileSchema,
} from "./schemas.js";
export type { Submission, RunConfig, WorkerSpec, PlanFile } from "./schemas.js";

// Graph
export {
  createTaskGraph,
  addTask,
  getTask,
  validate,
  readySet,
  isTerminal,
  skipDownstream,
  topologicalSort,
  planRounds,
} from "./graph/task-graph.js";
export { canTransition, isTerminalState } from "./graph/task.js";
export type {
  Task,
  TaskDescriptor,
  TaskGraph,
  TaskPayload,
  TaskState,
  TaskError,
  SkipReason,
} from "./graph/types.js";

// Handoff
export { HandoffContext } from "./handoff/context.js";
export type { HandoffSnapshot } from "./handoff/context.js";

// Workers
export type { Worker, WorkerContext } from "./workers/worker.js";
export { WorkerRegistry } from "./workers/registry.js";
export type { WorkerHealth } from "./workers/registry.js";
export { FunctionWorker } from "./workers/function-worker.js";
export type { FunctionWorkerOptions, WorkerFunction } from "./workers/function-worker.js";
export { HttpWorker } from "./workers/http-worker.js";
export type { HttpWorkerOptions } from "./workers/http-worker.js";

// Core
export { Scheduler } from "./scheduler/scheduler.js";
export type { SchedulerOptions, RunResult, RunStatus, TaskRecord } from "./scheduler/types.js";
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, SubmitOptions, PlanPreview } from "./orchestrator.js";
export { loadPlanFile, createWorker, createEchoWorker, registerWorkers } from "./plan-file.js";

// Persistence
export { RunStore } from "./persistence/store.js";

// Utils
export { log, createLogger, setLogLevel, getLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
