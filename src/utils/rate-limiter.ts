import { getConfig } from "../config.js";
import { CancelledError, RateLimitTimeout } from "../errors.js";
import { log } from "./logger.js";

export type RateLimiterOptions = {
  /** Maximum grants per rolling window */
  maxRequests?: number;
  /** Window size in milliseconds */
  windowMs?: number;
  /** How long a caller may wait for a slot before RateLimitTimeout */
  maxWaitMs?: number;
  /** Maximum number of waiting callers */
  maxQueueSize?: number;
};

export type AcquireOptions = {
  signal?: AbortSignal;
  /** Overrides the limiter's maxWaitMs for this call */
  maxWaitMs?: number;
};

export type RateLimiterStats = {
  allowed: number;
  throttled: number;
  rejected: number;
  timedOut: number;
  queueSize: number;
  remaining: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
  detach?: () => void;
};

/**
 * Sliding-window rate limiter shared by every agent in a run.
 * No more than `maxRequests` grants leave the gate in any rolling `windowMs`,
 * and waiting callers are served strictly in arrival order.
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private queue: Waiter[] = [];
  private drainTimer?: ReturnType<typeof setTimeout>;
  private maxRequests: number;
  private windowMs: number;
  private maxWaitMs: number;
  private maxQueueSize: number;
  private stats = { allowed: 0, throttled: 0, rejected: 0, timedOut: 0 };

  constructor(opts: RateLimiterOptions = {}) {
    const defaults = getConfig().rateLimit;
    this.maxRequests = Math.max(1, opts.maxRequests ?? defaults.maxRequests);
    this.windowMs = opts.windowMs ?? defaults.windowMs;
    this.maxWaitMs = opts.maxWaitMs ?? defaults.maxWaitMs;
    this.maxQueueSize = opts.maxQueueSize ?? defaults.maxQueueSize;
  }

  /**
   * Drop timestamps that have left the current window.
   */
  private cleanup(): void {
    const cutoff = Date.now() - this.windowMs;
    this.timestamps = this.timestamps.filter((t) => t > cutoff);
  }

  private grant(): void {
    this.timestamps.push(Date.now());
    this.stats.allowed++;
  }

  /**
   * Get remaining grants in the current window.
   */
  remaining(): number {
    this.cleanup();
    return Math.max(0, this.maxRequests - this.timestamps.length);
  }

  /**
   * Get time until the next slot frees up (in ms).
   */
  nextAvailableIn(): number {
    this.cleanup();
    if (this.timestamps.length < this.maxRequests) {
      return 0;
    }
    const oldest = this.timestamps[0];
    return Math.max(0, oldest + this.windowMs - Date.now());
  }

  /**
   * Wait until a slot is free. Resolves immediately when nobody is queued and
   * the window has room; otherwise joins the back of the queue.
   */
  acquire(opts: AcquireOptions = {}): Promise<void> {
    if (opts.signal?.aborted) {
      return Promise.reject(new CancelledError("Rate-limit wait cancelled"));
    }

    this.cleanup();
    if (this.queue.length === 0 && this.timestamps.length < this.maxRequests) {
      this.grant();
      return Promise.resolve();
    }

    this.stats.throttled++;
    if (this.queue.length >= this.maxQueueSize) {
      this.stats.rejected++;
      return Promise.reject(new RateLimitTimeout("Rate limit queue full"));
    }

    const maxWaitMs = opts.maxWaitMs ?? this.maxWaitMs;
    log.debug("Call queued by rate limiter", {
      queueSize: this.queue.length + 1,
      waitTime: this.nextAvailableIn(),
    });

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject };

      if (Number.isFinite(maxWaitMs)) {
        waiter.timer = setTimeout(() => {
          if (!this.remove(waiter)) return;
          this.stats.timedOut++;
          reject(new RateLimitTimeout(`Waited more than ${maxWaitMs}ms for a rate-limit slot`));
        }, maxWaitMs);
      }

      const signal = opts.signal;
      if (signal) {
        const onAbort = (): void => {
          if (!this.remove(waiter)) return;
          reject(new CancelledError("Rate-limit wait cancelled"));
        };
        signal.addEventListener("abort", onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener("abort", onAbort);
      }

      this.queue.push(waiter);
      this.scheduleDrain();
    });
  }

  /**
   * Take a slot without waiting. Never overtakes queued callers.
   */
  tryAcquire(): boolean {
    this.cleanup();
    if (this.queue.length === 0 && this.timestamps.length < this.maxRequests) {
      this.grant();
      return true;
    }
    this.stats.throttled++;
    return false;
  }

  private remove(waiter: Waiter): boolean {
    const idx = this.queue.indexOf(waiter);
    if (idx === -1) return false;
    this.queue.splice(idx, 1);
    this.release(waiter);
    return true;
  }

  private release(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    waiter.detach?.();
  }

  private scheduleDrain(): void {
    if (this.drainTimer) return;
    this.drainTimer = setTimeout(() => this.drain(), this.nextAvailableIn());
  }

  /**
   * Hand free slots to waiters in arrival order, then re-arm for the rest.
   */
  private drain(): void {
    this.drainTimer = undefined;
    this.cleanup();

    while (this.queue.length > 0 && this.timestamps.length < this.maxRequests) {
      const waiter = this.queue.shift();
      if (!waiter) break;
      this.release(waiter);
      this.grant();
      waiter.resolve();
    }

    if (this.queue.length > 0) {
      this.scheduleDrain();
    }
  }

  /**
   * Get current rate limiter statistics.
   */
  getStats(): RateLimiterStats {
    return {
      ...this.stats,
      queueSize: this.queue.length,
      remaining: this.remaining(),
    };
  }

  /**
   * Reset the limiter. Queued callers are rejected.
   */
  reset(): void {
    clearTimeout(this.drainTimer);
    this.drainTimer = undefined;
    const pending = this.queue;
    this.queue = [];
    for (const waiter of pending) {
      this.release(waiter);
      waiter.reject(new CancelledError("Rate limiter reset"));
    }
    this.timestamps = [];
    this.stats = { allowed: 0, throttled: 0, rejected: 0, timedOut: 0 };
  }
}
