import { getConfig } from "../config.js";
import { CancelledError } from "../errors.js";

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Return false to stop retrying and rethrow immediately. */
  retryIf?: (err: unknown, attempt: number) => boolean;
  /** Runs after the backoff delay, before the next attempt starts. */
  beforeRetry?: (attempt: number, err: unknown) => Promise<void> | void;
};

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

/** `retryIf` for outbound calls: cancellation ends the call at once. */
export function retryUnlessCancelled(err: unknown): boolean {
  return !(err instanceof CancelledError);
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Run `fn` up to `maxAttempts` times with exponential backoff. The last error
 * is rethrown wrapped in a RetryExhaustedError that records the attempt count;
 * an error rejected by `retryIf` is rethrown as-is.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const defaults = getConfig().retry;
  const maxAttempts = Math.max(1, opts?.maxAttempts ?? defaults.maxAttempts);
  const baseDelayMs = opts?.baseDelayMs ?? defaults.baseDelayMs;
  const maxDelayMs = opts?.maxDelayMs ?? defaults.maxDelayMs;

  let lastError: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (opts?.retryIf && !opts.retryIf(err, attempt)) throw err;
      lastError = err;
      if (attempt === maxAttempts) break;
      const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
      await new Promise((r) => setTimeout(r, delay));
      await opts?.beforeRetry?.(attempt + 1, err);
    }
  }
  throw new RetryExhaustedError(maxAttempts, lastError);
}
