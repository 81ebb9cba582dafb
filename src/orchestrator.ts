import { randomUUID } from "node:crypto";
import { AgentExecutor } from "./agents/agent-loop.js";
import type { AgentSpec } from "./agents/types.js";
import { getConfig, type FailurePolicy, type SchemaPolicy } from "./config.js";
import { CancelledError, ConfigurationError, RunAborted, TaskFailure, toErrorDetail } from "./errors.js";
import type { ModelClient } from "./models/client.js";
import type { RunStore } from "./persistence/store.js";
import { writeRunArtifacts } from "./pipeline/report.js";
import { readyTasks, skipDownstream, topologicalOrder, validateGraph } from "./pipeline/task-graph.js";
import { buildInstruction, INPUTS_ROOT, placeholderRoots, type TaskContext } from "./pipeline/template.js";
import { pendingResult, type PipelineRun, type RunMetrics, type TaskResult, type TaskSpec } from "./pipeline/types.js";
import { correctionFeedback, extractPayload, safeValidateOutput } from "./pipeline/validator.js";
import { ToolGateway } from "./tools/gateway.js";
import { ToolInvoker } from "./tools/invoker.js";
import type { Tool } from "./tools/tool.js";
import { ResponseCache, type CacheStats } from "./utils/cache.js";
import { log } from "./utils/logger.js";
import { RateLimiter, type RateLimiterStats } from "./utils/rate-limiter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunConfig = {
  /** Used in artifact file names and reports */
  name?: string;
  runId?: string;
  failurePolicy?: FailurePolicy;
  schemaPolicy?: SchemaPolicy;
  maxConcurrency?: number;
  /** Rounds per task for agents that set none */
  maxIterations?: number;
  /** Corrective re-prompts after a schema violation */
  maxSchemaRetries?: number;
  /** Run variables, available as {{inputs.name}} */
  inputs?: Record<string, unknown>;
  signal?: AbortSignal;
};

export type OrchestratorOptions = {
  /** Model clients keyed by provider */
  models: Readonly<Record<string, ModelClient>>;
  tools?: readonly Tool[];
  /** Shared by every tool and model call; `false` disables throttling */
  rateLimiter?: RateLimiter | false;
  /** Tool response cache; `false` disables caching */
  cache?: ResponseCache | false;
  invoker?: ToolInvoker;
  /** Completed runs are saved here */
  store?: RunStore;
  /** JSON and text reports are written here */
  reportDir?: string;
};

type RunState = {
  run: PipelineRun;
  order: TaskSpec[];
  agents: ReadonlyMap<string, AgentSpec>;
  executor: AgentExecutor;
  schemaPolicy: SchemaPolicy;
  maxSchemaRetries: number;
  signal?: AbortSignal;
  /** Shared limiter and cache counters when the run started */
  baseline: { rateLimiter?: RateLimiterStats; cache?: CacheStats };
};

function limiterDelta(now: RateLimiterStats, start: RateLimiterStats): RateLimiterStats {
  return {
    allowed: now.allowed - start.allowed,
    throttled: now.throttled - start.throttled,
    rejected: now.rejected - start.rejected,
    timedOut: now.timedOut - start.timedOut,
    queueSize: now.queueSize,
    remaining: now.remaining,
  };
}

function cacheDelta(now: CacheStats, start: CacheStats): CacheStats {
  const hits = now.hits - start.hits;
  const misses = now.misses - start.misses;
  return {
    size: now.size,
    hits,
    misses,
    writes: now.writes - start.writes,
    errors: now.errors - start.errors,
    hitRate: hits + misses > 0 ? hits / (hits + misses) : 0,
  };
}

/** Value a dependent sees for a finished task: validated fields, else the text. */
function contextValue(task: TaskSpec, result: TaskResult): unknown {
  if (task.outputSchema && task.outputSchema.fields.length > 0) {
    return result.structuredOutput ?? result.rawOutput;
  }
  return extractPayload(result.rawOutput) ?? result.rawOutput.trim();
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Runs a pipeline of tasks as a DAG. Independent branches run concurrently
 * on a bounded worker pool; each task is one agent execution whose output is
 * validated before dependents can see it.
 */
export class Orchestrator {
  private models: Readonly<Record<string, ModelClient>>;
  private tools: ReadonlyMap<string, Tool>;
  private rateLimiter?: RateLimiter;
  private cache?: ResponseCache;
  private invoker: ToolInvoker;
  private store?: RunStore;
  private reportDir?: string;

  constructor(opts: OrchestratorOptions) {
    const config = getConfig();
    this.models = opts.models;
    this.tools = new Map((opts.tools ?? []).map((t) => [t.id, t]));
    if (opts.rateLimiter !== false) {
      this.rateLimiter = opts.rateLimiter ?? (config.rateLimit.enabled ? new RateLimiter() : undefined);
    }
    if (opts.cache !== false) {
      this.cache = opts.cache ?? (config.cache.enabled ? new ResponseCache() : undefined);
    }
    this.invoker = opts.invoker ?? new ToolInvoker();
    this.store = opts.store;
    this.reportDir = opts.reportDir;
  }

  /**
   * Check a pipeline without running it. Returns the tasks in execution
   * order; any problem raises ConfigurationError.
   */
  validate(tasks: readonly TaskSpec[], agents: readonly AgentSpec[]): TaskSpec[] {
    const agentMap = new Map<string, AgentSpec>();
    for (const agent of agents) {
      if (agentMap.has(agent.id)) {
        throw new ConfigurationError("DUPLICATE_ID", `Duplicate agent id "${agent.id}"`);
      }
      agentMap.set(agent.id, agent);
    }

    validateGraph(tasks);

    for (const task of tasks) {
      const agent = agentMap.get(task.agent);
      if (!agent) {
        throw new ConfigurationError("UNKNOWN_AGENT", `Task "${task.id}" is assigned to unknown agent "${task.agent}"`);
      }
      for (const root of placeholderRoots(task.instruction)) {
        if (root !== INPUTS_ROOT && !task.dependsOn.includes(root)) {
          throw new ConfigurationError(
            "UNKNOWN_PLACEHOLDER",
            `Task "${task.id}" references "{{${root}}}", which is not one of its dependencies`,
          );
        }
      }
    }

    for (const agent of agents) {
      for (const toolId of agent.tools) {
        if (!this.tools.has(toolId)) {
          throw new ConfigurationError("UNKNOWN_TOOL", `Agent "${agent.id}" uses unknown tool "${toolId}"`);
        }
      }
      if (!this.models[agent.model.provider]) {
        throw new ConfigurationError(
          "UNKNOWN_PROVIDER",
          `Agent "${agent.id}" uses model provider "${agent.model.provider}", which has no client`,
        );
      }
    }

    return topologicalOrder(tasks);
  }

  async run(tasks: readonly TaskSpec[], agents: readonly AgentSpec[], config: RunConfig = {}): Promise<PipelineRun> {
    const defaults = getConfig();
    const order = this.validate(tasks, agents);

    const run: PipelineRun = {
      runId: config.runId ?? randomUUID(),
      name: config.name ?? "pipeline",
      status: "running",
      failurePolicy: config.failurePolicy ?? defaults.policy.failure,
      tasks,
      results: Object.fromEntries(tasks.map((t) => [t.id, pendingResult(t)])),
      inputs: { ...config.inputs },
      startedAt: Date.now(),
    };

    const state: RunState = {
      run,
      order,
      agents: new Map(agents.map((a) => [a.id, a])),
      executor: new AgentExecutor({
        models: this.models,
        rateLimiter: this.rateLimiter,
        maxIterations: config.maxIterations,
      }),
      schemaPolicy: config.schemaPolicy ?? defaults.policy.schema,
      maxSchemaRetries: config.maxSchemaRetries ?? defaults.limits.maxSchemaRetries,
      signal: config.signal,
      baseline: { rateLimiter: this.rateLimiter?.getStats(), cache: this.cache?.getStats() },
    };

    const maxConcurrency = Math.max(1, config.maxConcurrency ?? defaults.limits.maxConcurrency);
    const runLog = log.child({ run: run.runId });
    runLog.info(`Starting run "${run.name}"`, { tasks: tasks.length, maxConcurrency, policy: run.failurePolicy });

    await this.schedule(state, maxConcurrency);

    run.finishedAt = Date.now();
    run.metrics = this.collectMetrics(run, state.baseline);
    runLog.info(`Run finished: ${run.status}`, { durationMs: run.metrics.durationMs, toolCalls: run.metrics.toolCalls });

    await this.persist(run);
    return run;
  }

  private async schedule(state: RunState, maxConcurrency: number): Promise<void> {
    const { run, order, signal } = state;
    const statusOf = (id: string) => run.results[id]?.status ?? "pending";
    const inFlight = new Map<string, Promise<TaskResult>>();
    let abortedBy: string | undefined;

    for (;;) {
      const stopping = signal?.aborted === true || abortedBy !== undefined;
      if (!stopping) {
        for (const task of readyTasks(order, statusOf)) {
          if (inFlight.size >= maxConcurrency) break;
          run.results[task.id] = { ...pendingResult(task), status: "running", startedAt: Date.now() };
          inFlight.set(task.id, this.runTask(task, state));
        }
      }

      if (inFlight.size === 0) break;

      const finished = await Promise.race(inFlight.values());
      inFlight.delete(finished.taskId);
      run.results[finished.taskId] = finished;

      if (finished.status !== "failed" || signal?.aborted) continue;

      if (run.failurePolicy === "abort") {
        abortedBy ??= finished.taskId;
        log.warn(`Task "${finished.taskId}" failed, aborting run`, { run: run.runId });
        continue;
      }

      for (const id of skipDownstream(order, statusOf, finished.taskId)) {
        run.results[id] = {
          ...run.results[id],
          status: "skipped",
          warnings: [`Skipped: dependency "${finished.taskId}" did not succeed`],
        };
        log.info(`Skipping "${id}"`, { run: run.runId, failed: finished.taskId });
      }
    }

    const reason = signal?.aborted ? "run cancelled" : abortedBy ? `run aborted after "${abortedBy}" failed` : "";
    for (const task of order) {
      const result = run.results[task.id];
      if (result && result.status === "pending") {
        run.results[task.id] = {
          ...result,
          status: "skipped",
          warnings: [reason ? `Skipped: ${reason}` : "Skipped: dependencies can never be satisfied"],
        };
      }
    }

    if (signal?.aborted) {
      run.status = "cancelled";
      run.error = toErrorDetail(new CancelledError());
    } else if (abortedBy) {
      run.status = "failed";
      run.error = toErrorDetail(new RunAborted(abortedBy));
    } else {
      const allSucceeded = order.every((t) => statusOf(t.id) === "succeeded");
      run.status = allSucceeded ? "completed" : "partially_failed";
    }
  }

  /** Executes one task to a terminal result. Never rejects. */
  private async runTask(task: TaskSpec, state: RunState): Promise<TaskResult> {
    const { run, schemaPolicy, maxSchemaRetries, signal } = state;
    const result: TaskResult = { ...pendingResult(task), status: "running", startedAt: Date.now() };
    const logger = log.child({ run: run.runId, task: task.id, agent: task.agent });
    const gateway = new ToolGateway({
      tools: this.tools,
      invoker: this.invoker,
      rateLimiter: this.rateLimiter,
      cache: this.cache,
      signal,
    });

    try {
      const agent = state.agents.get(task.agent);
      if (!agent) throw new ConfigurationError("UNKNOWN_AGENT", `Unknown agent "${task.agent}"`);

      const base = buildInstruction(task, this.contextFor(task, run));
      let instruction = base;
      logger.info("Task started");

      for (let retry = 0; ; retry++) {
        const outcome = await state.executor.execute(agent, instruction, { tools: gateway, signal, logger });
        result.attempts++;
        result.modelCalls += outcome.modelCalls;
        result.iterations += outcome.iterations;
        result.warnings.push(...outcome.warnings);
        result.rawOutput = outcome.rawOutput;

        const validation = safeValidateOutput(outcome.rawOutput, task.outputSchema);
        if (validation.success) {
          result.structuredOutput = validation.data;
          result.status = "succeeded";
          break;
        }

        if (retry < maxSchemaRetries) {
          logger.warn("Output did not match schema, asking again", {
            violations: validation.error.violations.map((v) => v.field),
          });
          instruction = `${base}\n\n${correctionFeedback(validation.error)}`;
          continue;
        }

        if (schemaPolicy === "degrade") {
          logger.warn("Keeping unstructured output", { error: validation.error.message });
          result.status = "succeeded";
          result.structuredOutput = null;
          result.warnings.push(validation.error.message);
          break;
        }
        throw validation.error;
      }
    } catch (err) {
      const failure = new TaskFailure(task.id, err);
      result.status = "failed";
      result.error = toErrorDetail(failure);
      logger.error("Task failed", { code: failure.code, error: failure.message });
    }

    result.toolCalls = gateway.toolCalls;
    result.cacheHits = gateway.cacheHits;
    result.cacheMisses = gateway.cacheMisses;
    result.finishedAt = Date.now();
    if (result.status === "succeeded") {
      logger.info("Task succeeded", { durationMs: result.finishedAt - (result.startedAt ?? result.finishedAt) });
    }
    return result;
  }

  /** Outputs of the task's succeeded dependencies, plus run inputs. Nothing else. */
  private contextFor(task: TaskSpec, run: PipelineRun): TaskContext {
    const dependencies: Record<string, unknown> = {};
    for (const depId of task.dependsOn) {
      const dep = run.tasks.find((t) => t.id === depId);
      const result = run.results[depId];
      if (dep && result?.status === "succeeded") {
        dependencies[depId] = contextValue(dep, result);
      }
    }
    return { dependencies, inputs: run.inputs };
  }

  /**
   * Task counters summed over the run. Limiter and cache counters are the
   * change since the run started; concurrent runs on the same orchestrator
   * share them.
   */
  private collectMetrics(run: PipelineRun, baseline: RunState["baseline"]): RunMetrics {
    const limiter = this.rateLimiter?.getStats();
    const cache = this.cache?.getStats();
    const results = Object.values(run.results);
    return {
      durationMs: (run.finishedAt ?? Date.now()) - run.startedAt,
      toolCalls: results.reduce((n, r) => n + r.toolCalls, 0),
      cacheHits: results.reduce((n, r) => n + r.cacheHits, 0),
      cacheMisses: results.reduce((n, r) => n + r.cacheMisses, 0),
      modelCalls: results.reduce((n, r) => n + r.modelCalls, 0),
      rateLimiter: limiter && baseline.rateLimiter ? limiterDelta(limiter, baseline.rateLimiter) : limiter,
      cache: cache && baseline.cache ? cacheDelta(cache, baseline.cache) : cache,
    };
  }

  /** Save the run and write its reports. Failures are logged; the run result stands. */
  private async persist(run: PipelineRun): Promise<void> {
    if (this.store) {
      try {
        this.store.save(run);
      } catch (err) {
        log.error("Failed to save run", { run: run.runId, error: String(err) });
      }
    }
    if (this.reportDir) {
      try {
        run.artifacts = await writeRunArtifacts(run, this.reportDir);
        log.info("Reports written", { json: run.artifacts.json, text: run.artifacts.text });
      } catch (err) {
        log.error("Failed to write reports", { run: run.runId, error: String(err) });
      }
    }
  }
}
