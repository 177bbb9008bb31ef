#!/usr/bin/env node

import { Command } from "commander";
import { getConfig } from "./config.js";
import { Orchestrator } from "./orchestrator.js";
import { RunStore } from "./persistence/store.js";
import { loadPlanFile, registerWorkers } from "./plan-file.js";
import type { RunResult, TaskRecord } from "./scheduler/types.js";
import type { PlanFile } from "./schemas.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("specialist-orchestrator")
  .description("Run dependency-ordered specialist tasks on pluggable workers")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
});

function formatTask(t: TaskRecord): string {
  let detail = "";
  if (t.error) detail = t.error.message;
  else if (t.skipReason?.kind === "upstream-failed") detail = `blocked by ${t.skipReason.blockedBy}`;
  else if (t.skipReason?.kind === "cancelled") detail = "cancelled";
  else if (t.output) detail = JSON.stringify(t.output).slice(0, 200);
  return `  [${t.state}] ${t.id} (${t.capability})${detail ? `: ${detail}` : ""}`;
}

function printResult(result: RunResult): void {
  console.log("\n--- Result ---");
  for (const task of result.tasks) {
    console.log(formatTask(task));
  }
  console.log(
    `\n${result.status} in ${result.durationMs}ms (${result.rounds} rounds${result.cancelled ? ", cancelled" : ""})`,
  );
}

type RunFlags = { concurrency?: string; timeout?: string; db?: string; json?: boolean };

/** Command-line flags win over the plan file's own config. */
function withRunConfig(plan: PlanFile, opts: RunFlags): PlanFile {
  const config = { ...plan.config };
  if (opts.concurrency !== undefined) config.maxConcurrency = Number(opts.concurrency);
  if (opts.timeout !== undefined) config.perTaskTimeoutMs = Number(opts.timeout);
  return { ...plan, config };
}

// --- run ---
program
  .command("run")
  .description("Execute a plan file")
  .argument("<plan>", "Path to a JSON plan file")
  .option("-c, --concurrency <n>", "Max tasks per round")
  .option("-t, --timeout <ms>", "Per-task timeout in ms")
  .option("--db <path>", "Record the run in this SQLite database")
  .option("--json", "Print the full result as JSON")
  .action(async (planPath: string, opts: RunFlags) => {
    const plan = withRunConfig(await loadPlanFile(planPath), opts);
    const store = opts.db ? new RunStore(opts.db) : undefined;
    const orch = new Orchestrator({ store });
    registerWorkers(orch, plan.workers ?? []);

    const controller = new AbortController();
    const onSigint = () => {
      console.error("Cancelling after the current round...");
      controller.abort();
    };
    process.once("SIGINT", onSigint);

    try {
      const result = await orch.submit(plan, {
        signal: controller.signal,
        onRoundStart: (round, ids) => console.error(`Round ${round}: ${ids.join(", ")}`),
      });
      if (opts.json) console.log(JSON.stringify(result, null, 2));
      else printResult(result);
      if (result.status !== "success") process.exitCode = 1;
    } finally {
      process.off("SIGINT", onSigint);
      orch.close();
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Preview the rounds a plan would run in (dry-run)")
  .argument("<plan>", "Path to a JSON plan file")
  .option("-c, --concurrency <n>", "Max tasks per round")
  .action(async (planPath: string, opts: RunFlags) => {
    const plan = withRunConfig(await loadPlanFile(planPath), opts);
    const preview = new Orchestrator().plan(plan);
    console.log(`Max concurrency: ${preview.maxConcurrency}`);
    preview.rounds.forEach((ids, i) => console.log(`  Round ${i + 1}: ${ids.join(", ")}`));
  });

// --- validate ---
program
  .command("validate")
  .description("Check a plan file and its dependency graph")
  .argument("<plan>", "Path to a JSON plan file")
  .action(async (planPath: string) => {
    const plan = await loadPlanFile(planPath);
    const orch = new Orchestrator();
    registerWorkers(orch, plan.workers ?? []);
    orch.plan(plan);
    const missing = [...new Set(plan.tasks.map((t) => t.capability))].filter((c) => !orch.workers.has(c));
    if (missing.length > 0) {
      console.log(`Valid graph, but no worker for: ${missing.join(", ")}`);
      process.exitCode = 1;
      return;
    }
    console.log(`Plan OK: ${plan.tasks.length} task(s)`);
  });

// --- workers ---
program
  .command("workers")
  .description("Probe the health of the workers a plan declares")
  .argument("<plan>", "Path to a JSON plan file")
  .action(async (planPath: string) => {
    const plan = await loadPlanFile(planPath);
    const orch = new Orchestrator();
    registerWorkers(orch, plan.workers ?? []);
    for (const h of await orch.workers.checkAllHealth()) {
      const icon = h.healthy ? "+" : "x";
      console.log(`[${icon}] ${h.capability}${h.responseTimeMs != null ? ` ${h.responseTimeMs}ms` : ""}${h.error ? ` (${h.error})` : ""}`);
    }
  });

// --- runs ---
const runs = program.command("runs").description("Inspect recorded runs");

runs
  .command("list")
  .option("--db <path>", "SQLite database path")
  .option("-n, --limit <n>", "Number of runs", String(getConfig().limits.listRuns))
  .action((opts: { db?: string; limit: string }) => {
    const store = new RunStore(opts.db);
    try {
      for (const run of store.list(Number(opts.limit))) {
        const failed = run.tasks.filter((t) => t.state !== "completed").length;
        console.log(`${run.runId}  ${new Date(run.startedAt).toISOString()}  ${run.status}  ${run.tasks.length} tasks, ${failed} not completed`);
      }
    } finally {
      store.close();
    }
  });

runs
  .command("show")
  .argument("<runId>")
  .option("--db <path>", "SQLite database path")
  .action((runId: string, opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      const run = store.get(runId);
      if (!run) {
        console.error(`Run "${runId}" not found`);
        process.exitCode = 1;
        return;
      }
      printResult(run);
    } finally {
      store.close();
    }
  });

runs
  .command("delete")
  .argument("<runId>")
  .option("--db <path>", "SQLite database path")
  .action((runId: string, opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      if (!store.delete(runId)) {
        console.error(`Run "${runId}" not found`);
        process.exitCode = 1;
      }
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
