import { getConfig } from "../config.js";
import {
  CancelledError,
  ConfigurationError,
  IterationBudgetExceeded,
  ModelInvocationError,
  ToolNotPermittedError,
} from "../errors.js";
import type { ChatMessage, ModelClient, ToolDescriptor } from "../models/client.js";
import type { ToolGateway } from "../tools/gateway.js";
import { describeTool } from "../tools/tool.js";
import { log, type Logger } from "../utils/logger.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { RetryExhaustedError, retryUnlessCancelled, withRetry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import { parseReply } from "./reply.js";
import type { AgentSpec } from "./types.js";

function buildSystemPrompt(agent: AgentSpec, tools: readonly ToolDescriptor[]): string {
  const intro = [`You are ${agent.role}.`, `Objective: ${agent.objective}`];
  if (agent.backstory.trim()) intro.push(agent.backstory.trim());

  if (tools.length === 0) {
    return `${intro.join("\n\n")}

You have no tools. Respond with ONLY valid JSON:
{ "action": "final", "answer": <your answer> }`;
  }

  return `${intro.join("\n\n")}

Tools you may use:
${tools.map((t) => describeTool(t)).join("\n")}

Respond with ONLY valid JSON in one of these formats:

To use a tool (one per reply):
{ "action": "tool", "tool": "tool-id", "params": { "name": "value" } }

When you have the final answer:
{ "action": "final", "answer": <your answer> }

Rules:
- Call one tool at a time and wait for its result before the next request
- Only use the tools listed above
- Give the final answer in the format the task asks for`;
}

function truncate(text: string, maxLen: number): string {
  return text.length > maxLen ? text.slice(0, maxLen) + "...(truncated)" : text;
}

export type AgentOutcome = {
  rawOutput: string;
  /** Tool requests that reached the invoker during this execution */
  toolCalls: number;
  cacheHits: number;
  cacheMisses: number;
  modelCalls: number;
  iterations: number;
  warnings: string[];
  budgetExceeded: boolean;
};

export type AgentExecutorOptions = {
  /** Model clients keyed by provider */
  models: Readonly<Record<string, ModelClient>>;
  rateLimiter?: RateLimiter;
  /** Per model call, in ms */
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Used when the agent sets no maxIterations */
  maxIterations?: number;
  /** Characters of each tool result kept in the transcript */
  outputTruncation?: number;
};

export type ExecuteOptions = {
  tools: ToolGateway;
  signal?: AbortSignal;
  logger?: Logger;
};

/**
 * Runs one agent on one instruction: a bounded loop where each round is a
 * model call that either ends with a final answer or requests a single tool
 * call whose result is appended to the transcript.
 */
export class AgentExecutor {
  private models: Readonly<Record<string, ModelClient>>;
  private rateLimiter?: RateLimiter;
  private timeoutMs: number;
  private retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  private maxIterations: number;
  private outputTruncation: number;

  constructor(opts: AgentExecutorOptions) {
    const config = getConfig();
    this.models = opts.models;
    this.rateLimiter = opts.rateLimiter;
    this.timeoutMs = opts.timeoutMs ?? config.timeouts.modelCall;
    this.retry = {
      maxAttempts: opts.maxAttempts ?? config.retry.maxAttempts,
      baseDelayMs: opts.baseDelayMs ?? config.retry.baseDelayMs,
      maxDelayMs: opts.maxDelayMs ?? config.retry.maxDelayMs,
    };
    this.maxIterations = opts.maxIterations ?? config.limits.maxIterations;
    this.outputTruncation = opts.outputTruncation ?? config.limits.outputTruncation;
  }

  async execute(agent: AgentSpec, instruction: string, opts: ExecuteOptions): Promise<AgentOutcome> {
    const logger = opts.logger ?? log.child({ agent: agent.id });
    const client = this.models[agent.model.provider];
    if (!client) {
      throw new ConfigurationError("UNKNOWN_PROVIDER", `No model client for provider "${agent.model.provider}"`);
    }

    const gateway = opts.tools;
    const before = { toolCalls: gateway.toolCalls, cacheHits: gateway.cacheHits, cacheMisses: gateway.cacheMisses };
    const allowed = new Set(agent.tools);
    const descriptors: ToolDescriptor[] = [];
    for (const id of agent.tools) {
      const tool = gateway.get(id);
      if (tool) descriptors.push({ id: tool.id, description: tool.description, parameters: tool.parameters });
    }

    const system = buildSystemPrompt(agent, descriptors);
    const messages: ChatMessage[] = [{ role: "user", content: instruction }];
    const observations: string[] = [];
    const maxIterations = agent.maxIterations ?? this.maxIterations;
    let modelCalls = 0;

    const finish = (rawOutput: string, iterations: number, warnings: string[]): AgentOutcome => ({
      rawOutput,
      toolCalls: gateway.toolCalls - before.toolCalls,
      cacheHits: gateway.cacheHits - before.cacheHits,
      cacheMisses: gateway.cacheMisses - before.cacheMisses,
      modelCalls,
      iterations,
      warnings,
      budgetExceeded: warnings.length > 0,
    });

    for (let round = 1; round <= maxIterations; round++) {
      if (opts.signal?.aborted) throw new CancelledError(`Agent "${agent.id}" stopped: run cancelled`);

      const completion = await this.callModel(client, agent, system, messages, descriptors, opts.signal);
      modelCalls++;
      messages.push({ role: "assistant", content: completion });

      const reply = parseReply(completion);
      if (reply.kind === "final") {
        logger.debug("Final answer", { round, length: reply.answer.length });
        return finish(reply.answer, round, []);
      }

      if (!allowed.has(reply.tool)) {
        const denied = new ToolNotPermittedError(agent.id, reply.tool, agent.tools);
        logger.warn(denied.message, { round });
        messages.push({ role: "tool", toolId: reply.tool, content: `Error: ${denied.message}` });
        continue;
      }

      logger.info(`Round ${round}: calling tool "${reply.tool}"`);
      const result = await gateway.call(reply.tool, reply.params);
      const content = truncate(result.output, this.outputTruncation);
      observations.push(`[${reply.tool}] ${content}`);
      messages.push({ role: "tool", toolId: reply.tool, content });
    }

    // Budget exhausted: keep what the tools returned rather than nothing
    const exceeded = new IterationBudgetExceeded(agent.id, maxIterations);
    logger.warn(exceeded.message);
    return finish(observations.join("\n\n"), maxIterations, [exceeded.message]);
  }

  private async callModel(
    client: ModelClient,
    agent: AgentSpec,
    system: string,
    messages: readonly ChatMessage[],
    tools: readonly ToolDescriptor[],
    signal?: AbortSignal,
  ): Promise<string> {
    const snapshot = [...messages];
    try {
      return await withRetry(
        async () => {
          // a slot per attempt; a RateLimitTimeout fails the attempt like any other error
          await this.rateLimiter?.acquire({ signal });
          return withTimeout(
            (timeoutSignal) => client.complete({ model: agent.model, system, messages: snapshot, tools, signal: timeoutSignal }),
            this.timeoutMs,
            `Model "${agent.model.name}"`,
          );
        },
        {
          ...this.retry,
          retryIf: retryUnlessCancelled,
          beforeRetry: (attempt, err) => {
            log.warn(`Retrying model call for agent "${agent.id}"`, { attempt, error: String(err) });
          },
        },
      );
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new ModelInvocationError(
          `Model "${agent.model.name}" failed after ${err.attempts} attempt(s): ${err.message}`,
          { attempts: err.attempts, cause: err.cause },
        );
      }
      throw err;
    }
  }
}
