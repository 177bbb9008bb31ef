import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RunStore } from "../src/persistence/store.js";
import type { RunResult } from "../src/scheduler/types.js";

function run(runId: string, startedAt: number, overrides?: Partial<RunResult>): RunResult {
  return {
    runId,
    status: "success",
    cancelled: false,
    rounds: 1,
    startedAt,
    finishedAt: startedAt + 40,
    durationMs: 40,
    tasks: [{ id: "a", capability: "dev", state: "completed", output: { ok: true }, startedAt, finishedAt: startedAt + 40 }],
    handoff: [["a", { ok: true }]],
    ...overrides,
  };
}

describe("RunStore", () => {
  let store: RunStore;

  beforeEach(() => {
    store = new RunStore(":memory:");
  });

  afterEach(() => {
    store.close();
  });

  it("round-trips a run", () => {
    store.insert(run("r1", 1_000));
    expect(store.get("r1")).toEqual(run("r1", 1_000));
  });

  it("keeps failure details and the cancelled flag", () => {
    store.insert(
      run("r2", 1_000, {
        status: "partial-failure",
        cancelled: true,
        tasks: [
          { id: "a", capability: "dev", state: "failed", error: { name: "TimeoutError", code: "TIMEOUT", message: "slow" } },
          { id: "b", capability: "dev", state: "skipped", skipReason: { kind: "cancelled" } },
        ],
        handoff: [],
      }),
    );

    const stored = store.get("r2");
    expect(stored?.status).toBe("partial-failure");
    expect(stored?.cancelled).toBe(true);
    expect(stored?.tasks[1].skipReason).toEqual({ kind: "cancelled" });
  });

  it("returns undefined for an unknown run", () => {
    expect(store.get("missing")).toBeUndefined();
  });

  it("lists newest first up to the limit", () => {
    store.insert(run("old", 1_000));
    store.insert(run("new", 3_000));
    store.insert(run("mid", 2_000));

    expect(store.list(2).map((r) => r.runId)).toEqual(["new", "mid"]);
  });

  it("deletes runs", () => {
    store.insert(run("r1", 1_000));
    store.insert(run("r2", 2_000));
    store.insert(run("r3", 3_000));

    expect(store.delete("r1")).toBe(true);
    expect(store.delete("r1")).toBe(false);
    expect(store.deleteOlderThan(2_500)).toBe(1);
    expect(store.list().map((r) => r.runId)).toEqual(["r3"]);
    expect(store.deleteAll()).toBe(1);
  });
});
