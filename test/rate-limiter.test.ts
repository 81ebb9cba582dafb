import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CancelledError, RateLimitTimeout } from "../src/errors.js";
import { RateLimiter } from "../src/utils/rate-limiter.js";

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("allows requests under the limit", async () => {
    const limiter = new RateLimiter({ maxRequests: 3, windowMs: 100 });
    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.remaining()).toBe(0);
  });

  it("tryAcquire returns false when over limit", () => {
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 100 });
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
  });

  it("frees slots as the window slides", () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.nextAvailableIn()).toBe(1000);
    vi.advanceTimersByTime(400);
    expect(limiter.nextAvailableIn()).toBe(600);
    vi.advanceTimersByTime(600);
    expect(limiter.remaining()).toBe(1);
  });

  it("grants at most N per rolling window, in arrival order, and completes every request", async () => {
    const N = 2;
    const windowMs = 1000;
    const limiter = new RateLimiter({ maxRequests: N, windowMs });
    const start = Date.now();
    const grants: Array<{ i: number; at: number }> = [];

    const pending = Array.from({ length: 3 * N }, (_, i) =>
      limiter.acquire().then(() => {
        grants.push({ i, at: Date.now() - start });
      }),
    );

    await vi.advanceTimersByTimeAsync(2 * windowMs);
    await Promise.all(pending);

    expect(grants.map((g) => g.i)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(grants.map((g) => g.at)).toEqual([0, 0, 1000, 1000, 2000, 2000]);
    for (let i = 0; i + N < grants.length; i++) {
      expect(grants[i + N].at - grants[i].at).toBeGreaterThanOrEqual(windowMs);
    }
  });

  it("does not grant a queued caller before its slot frees", async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });
    await limiter.acquire();
    let granted = false;
    const queued = limiter.acquire().then(() => {
      granted = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(granted).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await queued;
    expect(granted).toBe(true);
  });

  it("rejects a waiter that exceeds maxWaitMs with RateLimitTimeout", async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, maxWaitMs: 300 });
    await limiter.acquire();

    const waiting = expect(limiter.acquire()).rejects.toBeInstanceOf(RateLimitTimeout);
    await vi.advanceTimersByTimeAsync(300);
    await waiting;

    expect(limiter.getStats().timedOut).toBe(1);
    expect(limiter.getStats().queueSize).toBe(0);
  });

  it("rejects when the queue is full", async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, maxQueueSize: 1 });
    await limiter.acquire();
    const queued = limiter.acquire();

    await expect(limiter.acquire()).rejects.toThrow("Rate limit queue full");
    expect(limiter.getStats().rejected).toBe(1);

    limiter.reset();
    await expect(queued).rejects.toThrow("Rate limiter reset");
  });

  it("rejects a queued waiter with CancelledError when its signal aborts", async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });
    await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire({ signal: controller.signal });
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.getStats().queueSize).toBe(0);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    const limiter = new RateLimiter({ maxRequests: 5, windowMs: 1000 });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire({ signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(limiter.getStats().allowed).toBe(0);
  });

  it("tracks statistics", async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000 });
    await limiter.acquire();
    const queued = limiter.acquire();
    await vi.advanceTimersByTimeAsync(1000);
    await queued;

    expect(limiter.getStats()).toEqual({
      allowed: 2,
      throttled: 1,
      rejected: 0,
      timedOut: 0,
      queueSize: 0,
      remaining: 0,
    });
  });
});
