#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { configure, type FailurePolicy } from "./config.js";
import { CrewError } from "./errors.js";
import { Orchestrator } from "./orchestrator.js";
import { RunStore } from "./persistence/store.js";
import { loadPipelineFile } from "./pipeline/loader.js";
import type { PipelineRun } from "./pipeline/types.js";
import { connectMcpServers, type McpConnections } from "./tools/mcp-tool.js";
import { ResponseCache, SqliteCacheStore } from "./utils/cache.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

type RunCommandOptions = {
  out: string;
  db?: string;
  cacheDb?: string;
  policy?: FailurePolicy;
  concurrency?: number;
  input: Record<string, unknown>;
};

const program = new Command();

program
  .name("taskcrew")
  .description("Run pipelines of tool-using agents as a task graph")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  if (actionCmd.optsWithGlobals().debug) setLogLevel("debug");
});

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Not a positive integer.");
  return n;
}

function parsePolicy(value: string): FailurePolicy {
  if (value === "abort" || value === "skip-downstream") return value;
  throw new InvalidArgumentError('Expected "abort" or "skip-downstream".');
}

/** Collect `key=value` pairs; values that parse as JSON keep their type. */
function collectInput(pair: string, previous: Record<string, unknown>): Record<string, unknown> {
  const eq = pair.indexOf("=");
  if (eq < 1) throw new InvalidArgumentError(`Expected key=value, got "${pair}".`);
  const key = pair.slice(0, eq);
  const raw = pair.slice(eq + 1);
  return { ...previous, [key]: parseInputValue(raw) };
}

function parseInputValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function printRun(run: PipelineRun): void {
  console.log("\n--- Result ---");
  for (const task of run.tasks) {
    const result = run.results[task.id];
    const detail = result?.error?.message ?? result?.warnings[0] ?? "";
    console.log(`  [${result?.status ?? "pending"}] ${task.id}${detail ? `: ${detail}` : ""}`);
  }
  const durationMs = (run.finishedAt ?? Date.now()) - run.startedAt;
  console.log(`\n${run.status} in ${durationMs}ms (${run.metrics?.toolCalls ?? 0} tool calls, ${run.metrics?.cacheHits ?? 0} cache hits)`);
  if (run.artifacts) {
    console.log("Results saved to:");
    console.log(`  - JSON: ${run.artifacts.json}`);
    console.log(`  - Text: ${run.artifacts.text}`);
  }
}

function reportError(prefix: string, err: unknown): void {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`${prefix}${err instanceof CrewError ? ` [${err.code}]` : ""}: ${msg}`);
  process.exitCode = 1;
}

// --- run ---
program
  .command("run")
  .description("Run a pipeline file")
  .argument("<file>", "Pipeline definition (JSON)")
  .option("-o, --out <dir>", "Directory for JSON and text reports", "results")
  .option("--db <path>", "Run store database (default: ~/.taskcrew/runs.db)")
  .option("--cache-db <path>", "Persist tool responses in this SQLite file")
  .option("--policy <policy>", "Failure policy: abort | skip-downstream", parsePolicy)
  .option("-c, --concurrency <n>", "Max parallel tasks", parsePositiveInt)
  .option("-i, --input <key=value>", "Run input, repeatable", collectInput, {})
  .action(async (file: string, opts: RunCommandOptions) => {
    let store: RunStore | undefined;
    let cacheStore: SqliteCacheStore | undefined;
    let mcp: McpConnections | undefined;
    const controller = new AbortController();
    const onSigint = () => {
      console.error("\nCancelling run...");
      controller.abort();
    };

    try {
      const pipeline = await loadPipelineFile(file);
      if (pipeline.config) configure(pipeline.config);
      mcp = await connectMcpServers(pipeline.mcpServers);

      store = new RunStore(opts.db);
      cacheStore = opts.cacheDb ? new SqliteCacheStore(opts.cacheDb) : undefined;

      const orch = new Orchestrator({
        models: pipeline.models,
        tools: [...pipeline.tools, ...mcp.tools],
        cache: cacheStore ? new ResponseCache({ store: cacheStore }) : undefined,
        store,
        reportDir: opts.out,
      });

      console.log(`Starting ${pipeline.name} (${pipeline.tasks.length} tasks)...`);
      console.log("-".repeat(80));
      process.on("SIGINT", onSigint);

      const run = await orch.run(pipeline.tasks, pipeline.agents, {
        name: pipeline.name,
        inputs: { ...pipeline.inputs, ...opts.input },
        failurePolicy: opts.policy,
        maxConcurrency: opts.concurrency,
        signal: controller.signal,
      });

      printRun(run);
      if (run.status !== "completed") process.exitCode = 1;
    } catch (err) {
      reportError("Run failed", err);
    } finally {
      process.off("SIGINT", onSigint);
      store?.close();
      cacheStore?.close();
      await mcp?.close();
    }
  });

// --- validate ---
program
  .command("validate")
  .description("Check a pipeline file without running it")
  .argument("<file>", "Pipeline definition (JSON)")
  .action(async (file: string) => {
    let mcp: McpConnections | undefined;
    try {
      const pipeline = await loadPipelineFile(file);
      mcp = await connectMcpServers(pipeline.mcpServers);
      const orch = new Orchestrator({
        models: pipeline.models,
        tools: [...pipeline.tools, ...mcp.tools],
        rateLimiter: false,
        cache: false,
      });
      const order = orch.validate(pipeline.tasks, pipeline.agents);
      console.log(`${pipeline.name}: ${order.length} tasks, ${pipeline.agents.length} agents`);
      console.log("Execution order:");
      order.forEach((task, i) => {
        const deps = task.dependsOn.length > 0 ? ` (after ${task.dependsOn.join(", ")})` : "";
        console.log(`  ${i + 1}. ${task.id} -> ${task.agent}${deps}`);
      });
    } catch (err) {
      reportError("Invalid pipeline", err);
    } finally {
      await mcp?.close();
    }
  });

// --- runs ---
const runs = program.command("runs").description("Inspect stored runs");

runs
  .command("list")
  .description("List recent runs")
  .option("--db <path>", "Run store database")
  .option("-n, --limit <n>", "How many runs", parsePositiveInt, 20)
  .action((opts: { db?: string; limit: number }) => {
    const store = new RunStore(opts.db);
    try {
      const list = store.list(opts.limit);
      if (list.length === 0) {
        console.log("No runs stored.");
        return;
      }
      for (const r of list) {
        const duration = r.finishedAt !== undefined ? `${r.finishedAt - r.startedAt}ms` : "-";
        console.log(`${r.runId}  ${new Date(r.startedAt).toISOString()}  ${r.status.padEnd(16)} ${duration.padStart(8)}  ${r.name}`);
      }
    } finally {
      store.close();
    }
  });

runs
  .command("show")
  .description("Print the stored record of a run")
  .argument("<runId>", "Run id")
  .option("--db <path>", "Run store database")
  .action((runId: string, opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      const record = store.get(runId);
      if (!record) {
        console.error(`Run "${runId}" not found`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(record, null, 2));
    } finally {
      store.close();
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
