import { RateLimitTimeout, ToolInvocationError } from "../errors.js";
import { ResponseCache } from "../utils/cache.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { RetryExhaustedError, withRetry } from "../utils/retry.js";
import { log } from "../utils/logger.js";
import type { ToolInvoker } from "./invoker.js";
import type { Tool, ToolParams } from "./tool.js";

export type ToolGatewayOptions = {
  tools: ReadonlyMap<string, Tool>;
  invoker: ToolInvoker;
  rateLimiter?: RateLimiter;
  cache?: ResponseCache;
  /** Cancels waits for a rate-limit slot; calls already sent are left to finish */
  signal?: AbortSignal;
};

export type ToolCallOutcome = {
  output: string;
  cached: boolean;
};

/**
 * Routes one task's tool requests through the shared rate limiter, then the
 * shared response cache, then the invoker. Counters are per gateway, so the
 * orchestrator creates one per task execution.
 */
export class ToolGateway {
  private tools: ReadonlyMap<string, Tool>;
  private invoker: ToolInvoker;
  private rateLimiter?: RateLimiter;
  private cache?: ResponseCache;
  private signal?: AbortSignal;

  toolCalls = 0;
  cacheHits = 0;
  cacheMisses = 0;

  constructor(opts: ToolGatewayOptions) {
    this.tools = opts.tools;
    this.invoker = opts.invoker;
    this.rateLimiter = opts.rateLimiter;
    this.cache = opts.cache;
    this.signal = opts.signal;
  }

  get(toolId: string): Tool | undefined {
    return this.tools.get(toolId);
  }

  private async acquire(): Promise<void> {
    await this.rateLimiter?.acquire({ signal: this.signal });
  }

  /**
   * First slot of a call, taken before the cache lookup. A RateLimitTimeout
   * is retried with the invoker's backoff; cancellation is not.
   */
  private async acquireFirst(toolId: string): Promise<void> {
    if (!this.rateLimiter) return;
    try {
      await withRetry(() => this.acquire(), {
        ...this.invoker.retryPolicy,
        retryIf: (err) => err instanceof RateLimitTimeout,
        beforeRetry: (attempt, err) => {
          log.warn(`Waiting again for a rate-limit slot for "${toolId}"`, { attempt, error: String(err) });
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new ToolInvocationError(
          toolId,
          `Tool "${toolId}" got no rate-limit slot after ${err.attempts} attempt(s): ${err.message}`,
          { attempts: err.attempts, cause: err.cause, code: "RATE_LIMIT_TIMEOUT" },
        );
      }
      throw err;
    }
  }

  async call(toolId: string, params: ToolParams): Promise<ToolCallOutcome> {
    const tool = this.tools.get(toolId);
    if (!tool) {
      throw new ToolInvocationError(toolId, `Unknown tool "${toolId}"`, { code: "UNKNOWN_TOOL" });
    }

    await this.acquireFirst(tool.id);

    const key = ResponseCache.key(tool.id, params, {
      foldCase: tool.caseInsensitive,
      collapseWhitespace: tool.normalizeWhitespace,
    });
    if (this.cache) {
      const hit = this.cache.get(key);
      if (hit.found) {
        this.cacheHits++;
        return { output: hit.value, cached: true };
      }
      this.cacheMisses++;
    }

    this.toolCalls++;
    const output = await this.invoker.invoke(tool, params, {
      // the first attempt runs on the slot taken above
      beforeAttempt: (attempt) => (attempt > 1 ? this.acquire() : Promise.resolve()),
    });
    this.cache?.put(key, output);
    return { output, cached: false };
  }
}
