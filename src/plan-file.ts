import { readFile } from "node:fs/promises";
import { ValidationError } from "./errors.js";
import type { Orchestrator } from "./orchestrator.js";
import { parseOrThrow, PlanFileSchema, type PlanFile, type WorkerSpec } from "./schemas.js";
import { FunctionWorker } from "./workers/function-worker.js";
import { HttpWorker } from "./workers/http-worker.js";
import type { Worker } from "./workers/worker.js";

/** Read and validate a JSON plan: tasks, optional workers and run config. */
export async function loadPlanFile(path: string): Promise<PlanFile> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError("VALIDATION_FAILED", `Plan file ${path} is not valid JSON: ${String(err)}`);
  }
  return parseOrThrow(PlanFileSchema, raw, `plan file ${path}`);
}

/** Echo workers report what they were given; useful to dry-run a plan end to end. */
export function createEchoWorker(capability: string): FunctionWorker {
  return new FunctionWorker({
    description: `echo (${capability})`,
    fn: async (input, ctx) => ({ capability, input, upstream: [...ctx.handoff.keys()] }),
  });
}

export function createWorker(spec: WorkerSpec): Worker {
  switch (spec.type) {
    case "http":
      return new HttpWorker({ url: spec.url, headers: spec.headers, timeout: spec.timeoutMs });
    case "echo":
      return createEchoWorker(spec.capability);
  }
}

export function registerWorkers(orch: Orchestrator, specs: WorkerSpec[]): void {
  for (const spec of specs) {
    orch.register(spec.capability, createWorker(spec));
  }
}
