import type { FailurePolicy } from "../config.js";
import type { ErrorDetail } from "../errors.js";
import type { CacheStats } from "../utils/cache.js";
import type { RateLimiterStats } from "../utils/rate-limiter.js";

export type FieldType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export type FieldSpec = {
  readonly name: string;
  readonly type: FieldType;
  /** Defaults to true */
  readonly required?: boolean;
  readonly description?: string;
};

export type OutputSchema = {
  readonly fields: readonly FieldSpec[];
};

export type TaskSpec = {
  readonly id: string;
  /** Id of the agent that performs this task */
  readonly agent: string;
  readonly description: string;
  /** Instruction with {{taskId}}, {{taskId.field}} and {{inputs.name}} placeholders */
  readonly instruction: string;
  readonly expectedOutput?: string;
  readonly dependsOn: readonly string[];
  readonly outputSchema?: OutputSchema;
  /** Run even when a dependency ended up skipped */
  readonly tolerateSkipped?: boolean;
};

export type TaskStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type TaskResult = {
  taskId: string;
  agentId: string;
  status: TaskStatus;
  rawOutput: string;
  /** Non-null only when the schema validator accepted rawOutput */
  structuredOutput: Record<string, unknown> | null;
  error?: ErrorDetail;
  warnings: string[];
  startedAt?: number;
  finishedAt?: number;
  /** Requests that reached the tool invoker (cache hits excluded) */
  toolCalls: number;
  cacheHits: number;
  cacheMisses: number;
  modelCalls: number;
  iterations: number;
  /** Agent executions, including corrective re-prompts */
  attempts: number;
};

export type RunStatus = "running" | "completed" | "partially_failed" | "failed" | "cancelled";

export type RunMetrics = {
  durationMs: number;
  toolCalls: number;
  cacheHits: number;
  cacheMisses: number;
  modelCalls: number;
  /** Limiter activity during this run; queueSize and remaining are taken at the end */
  rateLimiter?: RateLimiterStats;
  /** Cache activity during this run; size is taken at the end */
  cache?: CacheStats;
};

export type PipelineRun = {
  runId: string;
  name: string;
  status: RunStatus;
  failurePolicy: FailurePolicy;
  tasks: readonly TaskSpec[];
  results: Record<string, TaskResult>;
  inputs: Record<string, unknown>;
  startedAt: number;
  finishedAt?: number;
  error?: ErrorDetail;
  metrics?: RunMetrics;
  /** Report files, when the orchestrator wrote them */
  artifacts?: { json: string; text: string };
};

function freezeSchema(schema: OutputSchema): OutputSchema {
  return Object.freeze({ fields: Object.freeze(schema.fields.map((f) => Object.freeze({ ...f }))) });
}

/** Copy and freeze a task definition. */
export function defineTask(spec: TaskSpec): TaskSpec {
  return Object.freeze({
    ...spec,
    dependsOn: Object.freeze([...spec.dependsOn]),
    outputSchema: spec.outputSchema ? freezeSchema(spec.outputSchema) : undefined,
  });
}

export function pendingResult(task: TaskSpec): TaskResult {
  return {
    taskId: task.id,
    agentId: task.agent,
    status: "pending",
    rawOutput: "",
    structuredOutput: null,
    warnings: [],
    toolCalls: 0,
    cacheHits: 0,
    cacheMisses: 0,
    modelCalls: 0,
    iterations: 0,
    attempts: 0,
  };
}

export function isTerminal(status: TaskStatus): boolean {
  return status === "succeeded" || status === "failed" || status === "skipped";
}
