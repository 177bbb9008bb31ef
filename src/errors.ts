export type ErrorCode =
  | "DUPLICATE_ID"
  | "UNKNOWN_DEPENDENCY"
  | "CYCLE"
  | "UNKNOWN_CAPABILITY"
  | "TIMEOUT"
  | "HANDLER_FAILED"
  | "STALLED"
  | "NOT_FOUND"
  | "HANDOFF_CONFLICT"
  | "REGISTRY_LOCKED"
  | "INVALID_TRANSITION"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "INVALID_CONFIG";

/** Base class for every error the orchestrator raises. */
export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// --- Graph construction (fatal, run never starts) ---

export class DuplicateIdError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("DUPLICATE_ID", `Duplicate task id "${taskId}"`);
    this.taskId = taskId;
  }
}

export class UnknownDependencyError extends OrchestratorError {
  readonly taskId: string;
  readonly dependency: string;

  constructor(taskId: string, dependency: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${dependency}"`);
    this.taskId = taskId;
    this.dependency = dependency;
  }
}

export class CycleError extends OrchestratorError {
  /** Task ids along the cycle; the first id is repeated at the end. */
  readonly path: string[];

  constructor(path: string[]) {
    super("CYCLE", `Task graph contains a cycle: ${path.join(" -> ")}`);
    this.path = path;
  }
}

// --- Task-local (the task fails, dependents are skipped) ---

export class UnknownCapabilityError extends OrchestratorError {
  readonly capability: string;

  constructor(capability: string) {
    super("UNKNOWN_CAPABILITY", `No worker registered for capability "${capability}"`);
    this.capability = capability;
  }
}

export class TimeoutError extends OrchestratorError {
  readonly taskId: string;
  readonly timeoutMs: number;

  constructor(taskId: string, timeoutMs: number) {
    super("TIMEOUT", `Task "${taskId}" timed out after ${timeoutMs}ms`);
    this.taskId = taskId;
    this.timeoutMs = timeoutMs;
  }
}

export class HandlerExecutionError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("HANDLER_FAILED", `Task "${taskId}" failed: ${reason}`, { cause });
    this.taskId = taskId;
  }
}

// --- Run-level ---

export class StalledError extends OrchestratorError {
  readonly blocked: string[];

  constructor(blocked: string[]) {
    super("STALLED", `Scheduler stalled with blocked tasks: ${blocked.join(", ")}`);
    this.blocked = blocked;
  }
}

export class InvalidTransitionError extends OrchestratorError {
  constructor(taskId: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Task "${taskId}" cannot move from ${from} to ${to}`);
  }
}

// --- Lookups and shared state ---

export class NotFoundError extends OrchestratorError {
  constructor(what: string, id: string) {
    super("NOT_FOUND", `${what} "${id}" not found`);
  }
}

export class HandoffConflictError extends OrchestratorError {
  readonly taskId: string;

  constructor(taskId: string) {
    super("HANDOFF_CONFLICT", `Output for task "${taskId}" is already recorded`);
    this.taskId = taskId;
  }
}

export class RegistryLockedError extends OrchestratorError {
  constructor(capability: string) {
    super("REGISTRY_LOCKED", `Cannot change worker "${capability}" while a run is in progress`);
  }
}

// --- Input ---

export class ValidationError extends OrchestratorError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION" | "INVALID_CONFIG", message: string) {
    super(code, message);
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}
