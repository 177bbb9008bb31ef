import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../src/errors.js";
import { Orchestrator } from "../src/orchestrator.js";
import { createWorker, loadPlanFile, registerWorkers } from "../src/plan-file.js";
import { HttpWorker } from "../src/workers/http-worker.js";

const examplePlan = fileURLToPath(new URL("../examples/feature-delivery.json", import.meta.url));

describe("plan files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "plan-file-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writePlan(content: string): string {
    const path = join(dir, "plan.json");
    writeFileSync(path, content);
    return path;
  }

  it("loads a valid plan", async () => {
    const path = writePlan(
      JSON.stringify({ tasks: [{ id: "a", capability: "dev" }], workers: [{ type: "echo", capability: "dev" }] }),
    );
    const plan = await loadPlanFile(path);
    expect(plan.tasks).toEqual([{ id: "a", capability: "dev" }]);
    expect(plan.workers).toEqual([{ type: "echo", capability: "dev" }]);
  });

  it("rejects invalid JSON", async () => {
    const path = writePlan("{ tasks: ");
    await expect(loadPlanFile(path)).rejects.toThrow(ValidationError);
    await expect(loadPlanFile(path)).rejects.toThrow("is not valid JSON");
  });

  it("rejects a task without a capability", async () => {
    const path = writePlan(JSON.stringify({ tasks: [{ id: "a" }] }));
    await expect(loadPlanFile(path)).rejects.toThrow(`Invalid plan file ${path}: tasks.0.capability: capability is required`);
  });

  it("builds http workers from their spec", () => {
    const worker = createWorker({ type: "http", capability: "qa", url: "http://localhost:9000/qa" });
    expect(worker).toBeInstanceOf(HttpWorker);
  });

  it("runs the bundled example with echo workers", async () => {
    const plan = await loadPlanFile(examplePlan);
    const orch = new Orchestrator();
    registerWorkers(orch, plan.workers ?? []);

    expect(orch.plan(plan).rounds).toEqual([
      ["requirements"],
      ["architecture"],
      ["infra", "schema", "ui"],
      ["api"],
      ["qa", "security-review"],
    ]);

    const result = await orch.submit(plan);
    expect(result.status).toBe("success");
    expect(result.rounds).toBe(5);
    const api = result.tasks.find((t) => t.id === "api");
    expect(api?.output).toEqual({
      capability: "python-developer",
      input: {},
      upstream: ["requirements", "architecture", "infra", "schema", "ui"],
    });
  });
});
