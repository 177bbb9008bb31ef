import { afterEach, describe, expect, it, vi } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { CycleError, UnknownDependencyError, ValidationError } from "../src/errors.js";
import { Orchestrator } from "../src/orchestrator.js";
import { RunStore } from "../src/persistence/store.js";
import type { Submission } from "../src/schemas.js";
import { FunctionWorker } from "../src/workers/function-worker.js";

const echo = () => new FunctionWorker({ fn: async (input) => ({ ...input }) });

describe("Orchestrator", () => {
  afterEach(() => resetConfig());

  it("runs a submission end to end", async () => {
    const orch = new Orchestrator().register("planner", echo()).register("developer", echo());

    const result = await orch.submit({
      tasks: [
        { id: "plan", capability: "planner", input: { goal: "login page" } },
        { id: "build", capability: "developer", dependsOn: ["plan"] },
      ],
    });

    expect(result.status).toBe("success");
    expect(result.rounds).toBe(2);
    expect(result.handoff).toEqual([
      ["plan", { goal: "login page" }],
      ["build", {}],
    ]);
  });

  it("rejects a malformed submission before building a graph", async () => {
    const orch = new Orchestrator().register("planner", echo());
    const bad: Submission = { tasks: [] };

    await expect(orch.submit(bad)).rejects.toThrow(ValidationError);
    await expect(orch.submit(bad)).rejects.toThrow("Invalid submission: tasks: tasks must contain at least one task");
  });

  it("throws graph errors before any worker runs", async () => {
    const fn = vi.fn(async () => ({}));
    const orch = new Orchestrator().register("dev", new FunctionWorker({ fn }));

    await expect(
      orch.submit({
        tasks: [
          { id: "ok", capability: "dev" },
          { id: "a", capability: "dev", dependsOn: ["b"] },
          { id: "b", capability: "dev", dependsOn: ["a"] },
        ],
      }),
    ).rejects.toThrow(CycleError);
    await expect(orch.submit({ tasks: [{ id: "a", capability: "dev", dependsOn: ["Z"] }] })).rejects.toThrow(
      UnknownDependencyError,
    );
    expect(fn).not.toHaveBeenCalled();
  });

  it("uses the submission's maxConcurrency over the configured default", async () => {
    configure({ limits: { maxConcurrency: 1 } });
    const rounds: string[][] = [];
    const orch = new Orchestrator().register("dev", echo());
    const tasks = [
      { id: "a", capability: "dev" },
      { id: "b", capability: "dev" },
    ];

    await orch.submit({ tasks }, { onRoundStart: (_n, ids) => rounds.push(ids) });
    expect(rounds).toEqual([["a"], ["b"]]);

    rounds.length = 0;
    await orch.submit({ tasks, config: { maxConcurrency: 2 } }, { onRoundStart: (_n, ids) => rounds.push(ids) });
    expect(rounds).toEqual([["a", "b"]]);
  });

  it("persists finished runs when given a store", async () => {
    const store = new RunStore(":memory:");
    const orch = new Orchestrator({ store }).register("dev", echo());

    const result = await orch.submit({ tasks: [{ id: "a", capability: "dev", input: { n: 1 } }] });

    expect(store.get(result.runId)).toMatchObject({
      runId: result.runId,
      status: "success",
      rounds: 1,
      handoff: [["a", { n: 1 }]],
    });
    orch.close();
  });

  it("previews rounds without calling workers", () => {
    const fn = vi.fn(async () => ({}));
    const orch = new Orchestrator().register("dev", new FunctionWorker({ fn }));

    const preview = orch.plan({
      tasks: [
        { id: "c", capability: "dev", dependsOn: ["a"] },
        { id: "b", capability: "dev", dependsOn: ["a"] },
        { id: "a", capability: "dev" },
      ],
      config: { maxConcurrency: 4 },
    });

    expect(preview).toEqual({ rounds: [["a"], ["b", "c"]], maxConcurrency: 4 });
    expect(fn).not.toHaveBeenCalled();
  });

  it("passes ids and capabilities through unchanged, whitespace included", async () => {
    const orch = new Orchestrator().register("dev ", echo());

    const result = await orch.submit({
      tasks: [
        { id: "a ", capability: "dev " },
        { id: "b", capability: "dev ", dependsOn: ["a "] },
      ],
    });

    expect(result.status).toBe("success");
    expect(result.tasks.map((r) => [r.id, r.capability])).toEqual([
      ["a ", "dev "],
      ["b", "dev "],
    ]);
  });

  it("rejects registering the same capability twice", () => {
    const orch = new Orchestrator().register("dev", echo());
    expect(() => orch.register("dev", echo())).toThrow('Capability "dev" already registered');
  });
});
