import { getConfig } from "../config.js";
import { CrewError, ToolInvocationError } from "../errors.js";
import { log } from "../utils/logger.js";
import { RetryExhaustedError, retryUnlessCancelled, withRetry } from "../utils/retry.js";
import { stableStringify } from "../utils/stable-json.js";
import { withTimeout } from "../utils/timeout.js";
import type { Tool, ToolOutput, ToolParams } from "./tool.js";

export type ToolInvokerOptions = {
  /** Per-attempt timeout in ms */
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
};

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export type InvokeOptions = {
  /**
   * Runs at the start of every attempt, e.g. to take a rate-limit slot. A
   * failure here fails the attempt and is retried like any other.
   */
  beforeAttempt?: (attempt: number) => Promise<void>;
};

export function serializeOutput(output: ToolOutput): string {
  return typeof output === "string" ? output : stableStringify(output);
}

/**
 * Performs one external tool call with a per-attempt timeout and bounded
 * retry with exponential backoff. Exhaustion surfaces as ToolInvocationError.
 */
export class ToolInvoker {
  private timeoutMs: number;
  private retry: RetryPolicy;

  constructor(opts: ToolInvokerOptions = {}) {
    const config = getConfig();
    this.timeoutMs = opts.timeoutMs ?? config.timeouts.toolCall;
    this.retry = {
      maxAttempts: opts.maxAttempts ?? config.retry.maxAttempts,
      baseDelayMs: opts.baseDelayMs ?? config.retry.baseDelayMs,
      maxDelayMs: opts.maxDelayMs ?? config.retry.maxDelayMs,
    };
  }

  /** Attempt limit and backoff this invoker retries with. */
  get retryPolicy(): Readonly<RetryPolicy> {
    return this.retry;
  }

  async invoke(tool: Tool, params: ToolParams, opts: InvokeOptions = {}): Promise<string> {
    const start = Date.now();
    try {
      const output = await withRetry(
        async (attempt) => {
          await opts.beforeAttempt?.(attempt);
          return withTimeout(
            (signal) => tool.invoke(params, { toolId: tool.id, signal }),
            this.timeoutMs,
            `Tool "${tool.id}"`,
          );
        },
        {
          ...this.retry,
          retryIf: retryUnlessCancelled,
          beforeRetry: (attempt, err) => {
            log.warn(`Retrying tool "${tool.id}"`, { attempt, error: String(err) });
          },
        },
      );
      log.debug(`Tool "${tool.id}" finished`, { durationMs: Date.now() - start });
      return serializeOutput(output);
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        log.error(`Tool "${tool.id}" failed`, { attempts: err.attempts, error: err.message });
        throw new ToolInvocationError(
          tool.id,
          `Tool "${tool.id}" failed after ${err.attempts} attempt(s): ${err.message}`,
          { attempts: err.attempts, cause: err.cause },
        );
      }
      if (err instanceof CrewError) throw err;
      throw new ToolInvocationError(tool.id, `Tool "${tool.id}" failed: ${String(err)}`, { cause: err });
    }
  }
}
