import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { RunRecord, TaskRecord } from "../schemas.js";
import { stableStringify } from "../utils/stable-json.js";
import { pendingResult, type PipelineRun, type RunMetrics } from "./types.js";

export const RECORD_VERSION = 1;

function collectMetrics(run: PipelineRun): RunMetrics {
  if (run.metrics) return run.metrics;
  const results = Object.values(run.results);
  return {
    durationMs: (run.finishedAt ?? Date.now()) - run.startedAt,
    toolCalls: results.reduce((n, r) => n + r.toolCalls, 0),
    cacheHits: results.reduce((n, r) => n + r.cacheHits, 0),
    cacheMisses: results.reduce((n, r) => n + r.cacheMisses, 0),
    modelCalls: results.reduce((n, r) => n + r.modelCalls, 0),
  };
}

/** Machine-readable record of a run: every task in declaration order, with metrics. */
export function toRunRecord(run: PipelineRun): RunRecord {
  const tasks: TaskRecord[] = run.tasks.map((task) => {
    const r = run.results[task.id] ?? pendingResult(task);
    return {
      id: task.id,
      agent: task.agent,
      description: task.description,
      dependsOn: [...task.dependsOn],
      status: r.status,
      rawOutput: r.rawOutput,
      structuredOutput: r.structuredOutput,
      error: r.error,
      warnings: [...r.warnings],
      startedAt: r.startedAt,
      finishedAt: r.finishedAt,
      durationMs: r.startedAt !== undefined && r.finishedAt !== undefined ? r.finishedAt - r.startedAt : undefined,
      toolCalls: r.toolCalls,
      cacheHits: r.cacheHits,
      cacheMisses: r.cacheMisses,
      modelCalls: r.modelCalls,
      iterations: r.iterations,
      attempts: r.attempts,
    };
  });

  return {
    version: RECORD_VERSION,
    runId: run.runId,
    name: run.name,
    status: run.status,
    failurePolicy: run.failurePolicy,
    inputs: run.inputs,
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    error: run.error,
    metrics: collectMetrics(run),
    tasks,
  };
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/** Human-readable report of a run. */
export function renderSummary(run: PipelineRun): string {
  const record = toRunRecord(run);
  const count = (status: TaskRecord["status"]) => record.tasks.filter((t) => t.status === status).length;

  const title = `${record.name} report`;
  const lines = [
    title,
    "=".repeat(80),
    `Run: ${record.runId}`,
    `Generated: ${new Date(record.finishedAt ?? record.startedAt).toISOString()}`,
    `Status: ${record.status}`,
    `Duration: ${formatDuration(record.metrics.durationMs)}`,
    `Tasks: ${record.tasks.length} total, ${count("succeeded")} succeeded, ${count("failed")} failed, ${count("skipped")} skipped`,
    `Tool calls: ${record.metrics.toolCalls} (cache hits: ${record.metrics.cacheHits})`,
    `Model calls: ${record.metrics.modelCalls}`,
  ];
  if (record.error) lines.push(`Error: ${record.error.message}`);

  for (const task of record.tasks) {
    lines.push("", `## ${task.id} [${task.status}]`, `Agent: ${task.agent}`);
    if (task.description) lines.push(`Task: ${task.description}`);

    if (task.status === "succeeded") {
      lines.push("", task.structuredOutput ? stableStringify(task.structuredOutput, 2) : task.rawOutput);
    } else if (task.status === "skipped") {
      lines.push(task.warnings[0] ?? "Skipped");
    } else if (task.error) {
      lines.push(`Error (${task.error.code}): ${task.error.message}`);
    }

    const notes = task.status === "skipped" ? task.warnings.slice(1) : task.warnings;
    for (const note of notes) lines.push(`Warning: ${note}`);
  }

  return lines.join("\n") + "\n";
}

function fileStamp(ms: number): string {
  // 20240131_154500
  return new Date(ms).toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

function safeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]+/g, "_") || "pipeline";
}

export type RunArtifacts = {
  json: string;
  text: string;
};

/** Write `<name>_<timestamp>.json` and a matching `.txt` summary into `dir`. */
export async function writeRunArtifacts(run: PipelineRun, dir: string): Promise<RunArtifacts> {
  await mkdir(dir, { recursive: true });
  const base = join(dir, `${safeName(run.name)}_${fileStamp(run.startedAt)}`);
  const paths: RunArtifacts = { json: `${base}.json`, text: `${base}.txt` };
  await writeFile(paths.json, JSON.stringify(toRunRecord(run), null, 2), { encoding: "utf-8" });
  await writeFile(paths.text, renderSummary(run), { encoding: "utf-8" });
  return paths;
}
