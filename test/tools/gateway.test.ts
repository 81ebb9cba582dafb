import { afterEach, describe, expect, it, vi } from "vitest";
import { ToolInvocationError } from "../../src/errors.js";
import { FunctionTool } from "../../src/tools/function-tool.js";
import { ToolGateway } from "../../src/tools/gateway.js";
import { ToolInvoker } from "../../src/tools/invoker.js";
import type { Tool } from "../../src/tools/tool.js";
import { ResponseCache } from "../../src/utils/cache.js";
import { RateLimiter } from "../../src/utils/rate-limiter.js";

function setup(tool: Tool, opts: { cache?: ResponseCache; rateLimiter?: RateLimiter } = {}) {
  return new ToolGateway({
    tools: new Map([[tool.id, tool]]),
    invoker: new ToolInvoker({ timeoutMs: 1000, maxAttempts: 2, baseDelayMs: 0 }),
    ...opts,
  });
}

describe("ToolGateway", () => {
  it("invokes the tool and caches the result", async () => {
    const fn = vi.fn(async () => "fresh");
    const cache = new ResponseCache({ ttlMs: 60_000 });
    const gateway = setup(new FunctionTool({ id: "search", description: "Search", fn, normalizeWhitespace: true }), { cache });

    await expect(gateway.call("search", { query: "hotels" })).resolves.toEqual({ output: "fresh", cached: false });
    await expect(gateway.call("search", { query: " hotels " })).resolves.toEqual({ output: "fresh", cached: true });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(gateway.toolCalls).toBe(1);
    expect(gateway.cacheHits).toBe(1);
    expect(gateway.cacheMisses).toBe(1);
  });

  it("never invokes the tool for a pre-seeded key", async () => {
    const fn = vi.fn(async () => "live");
    const cache = new ResponseCache({ ttlMs: 60_000 });
    cache.put(ResponseCache.key("search", { query: "hotels" }), "seeded");
    const gateway = setup(new FunctionTool({ id: "search", description: "Search", fn }), { cache });

    await expect(gateway.call("search", { query: "hotels" })).resolves.toEqual({ output: "seeded", cached: true });
    expect(fn).not.toHaveBeenCalled();
    expect(gateway.toolCalls).toBe(0);
  });

  it("keeps whitespace significant unless the tool normalizes it", async () => {
    const fn = vi.fn(async () => "result");
    const cache = new ResponseCache({ ttlMs: 60_000 });
    const gateway = setup(new FunctionTool({ id: "format", description: "Format", fn }), { cache });

    await gateway.call("format", { text: "a  b" });
    await gateway.call("format", { text: "a b" });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("folds case in cache keys for case-insensitive tools", async () => {
    const fn = vi.fn(async () => "result");
    const cache = new ResponseCache({ ttlMs: 60_000 });
    const gateway = setup(new FunctionTool({ id: "search", description: "Search", fn, caseInsensitive: true }), { cache });

    await gateway.call("search", { query: "Hotels" });
    await gateway.call("search", { query: "hotels" });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not cache failures", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const fn = vi.fn(async (): Promise<string> => Promise.reject(new Error("down")));
    const cache = new ResponseCache({ ttlMs: 60_000 });
    const gateway = setup(new FunctionTool({ id: "search", description: "Search", fn }), { cache });

    await expect(gateway.call("search", {})).rejects.toBeInstanceOf(ToolInvocationError);
    expect(cache.getStats().writes).toBe(0);
    vi.restoreAllMocks();
  });

  it("rejects unknown tools", async () => {
    const gateway = setup(new FunctionTool({ id: "search", description: "Search", fn: async () => "x" }));
    await expect(gateway.call("scrape", {})).rejects.toThrow('Unknown tool "scrape"');
  });

  it("takes a rate-limit slot per call, including cache hits and retries", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const fn = vi.fn().mockRejectedValueOnce(new Error("503")).mockResolvedValueOnce("ok");
    const rateLimiter = new RateLimiter({ maxRequests: 100, windowMs: 60_000 });
    const cache = new ResponseCache({ ttlMs: 60_000 });
    const gateway = setup(new FunctionTool({ id: "search", description: "Search", fn }), { cache, rateLimiter });

    await gateway.call("search", { query: "a" });
    await gateway.call("search", { query: "a" });

    expect(rateLimiter.getStats().allowed).toBe(3);
    vi.restoreAllMocks();
  });
});

describe("ToolGateway rate-limit waits", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function limitedGateway(fn: () => Promise<string>, rateLimiter: RateLimiter, maxAttempts: number) {
    return new ToolGateway({
      tools: new Map([["search", new FunctionTool({ id: "search", description: "Search", fn })]]),
      invoker: new ToolInvoker({ timeoutMs: 1000, maxAttempts, baseDelayMs: 20 }),
      rateLimiter,
    });
  }

  it("backs off and waits again when the first slot times out", async () => {
    vi.useFakeTimers();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rateLimiter = new RateLimiter({ maxRequests: 1, windowMs: 60, maxWaitMs: 15 });
    await rateLimiter.acquire();
    const fn = vi.fn(async () => "ok");
    const gateway = limitedGateway(fn, rateLimiter, 4);

    const pending = gateway.call("search", { query: "a" });
    await vi.advanceTimersByTimeAsync(200);

    await expect(pending).resolves.toEqual({ output: "ok", cached: false });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(rateLimiter.getStats()).toMatchObject({ allowed: 2, timedOut: 2 });
  });

  it("gives up after the invoker's attempt limit", async () => {
    vi.useFakeTimers();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const rateLimiter = new RateLimiter({ maxRequests: 1, windowMs: 60_000, maxWaitMs: 15 });
    await rateLimiter.acquire();
    const fn = vi.fn(async () => "ok");
    const gateway = limitedGateway(fn, rateLimiter, 2);

    const pending = gateway.call("search", { query: "a" }).catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(200);
    const err = await pending;

    expect(err).toBeInstanceOf(ToolInvocationError);
    expect(err instanceof ToolInvocationError && err.code).toBe("RATE_LIMIT_TIMEOUT");
    expect(err instanceof ToolInvocationError && err.message).toBe(
      'Tool "search" got no rate-limit slot after 2 attempt(s): Waited more than 15ms for a rate-limit slot',
    );
    expect(fn).not.toHaveBeenCalled();
    rateLimiter.reset();
  });
});
