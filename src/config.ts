import { homedir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "./errors.js";

export type OrchestratorConfig = {
  limits: {
    maxConcurrency: number;
    listRuns: number;
  };
  timeouts: {
    /** Default per-task timeout; null means tasks may run indefinitely. */
    perTaskMs: number | null;
    httpWorker: number;
    healthCheck: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  store: {
    path: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: OrchestratorConfig = {
  limits: {
    maxConcurrency: 8,
    listRuns: 50,
  },
  timeouts: {
    perTaskMs: null,
    httpWorker: 60_000,
    healthCheck: 5_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  store: {
    path: join(homedir(), ".specialist-orchestrator", "runs.db"),
  },
};

let current: OrchestratorConfig = structuredClone(DEFAULTS);

function mergeSection<T extends object>(base: T, override?: Partial<T>): T {
  const result = { ...base };
  if (!override) return result;
  for (const key of Object.keys(override) as (keyof T)[]) {
    const val = override[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

function check(config: OrchestratorConfig): OrchestratorConfig {
  const { maxConcurrency } = config.limits;
  if (!(maxConcurrency === Infinity || (Number.isInteger(maxConcurrency) && maxConcurrency >= 1))) {
    throw new ConfigError(`limits.maxConcurrency must be an integer >= 1, got ${maxConcurrency}`);
  }
  const { perTaskMs } = config.timeouts;
  if (perTaskMs !== null && !(Number.isFinite(perTaskMs) && perTaskMs > 0)) {
    throw new ConfigError(`timeouts.perTaskMs must be a positive number or null, got ${perTaskMs}`);
  }
  return config;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<OrchestratorConfig>): void {
  current = check({
    limits: mergeSection(DEFAULTS.limits, overrides.limits),
    timeouts: mergeSection(DEFAULTS.timeouts, overrides.timeouts),
    retry: mergeSection(DEFAULTS.retry, overrides.retry),
    store: mergeSection(DEFAULTS.store, overrides.store),
  });
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<OrchestratorConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<OrchestratorConfig> = Object.freeze(structuredClone(DEFAULTS));
