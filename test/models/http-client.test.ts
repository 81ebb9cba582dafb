import { afterEach, describe, expect, it, vi } from "vitest";
import type { ModelRequest } from "../../src/models/client.js";
import { HttpModelClient } from "../../src/models/http-client.js";

function request(): ModelRequest {
  return {
    model: { provider: "local", name: "test-model", temperature: 0.2 },
    system: "You are a tester.",
    messages: [{ role: "user", content: "Say hi" }],
    tools: [],
    signal: new AbortController().signal,
  };
}

describe("HttpModelClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns a plain-text body as the completion", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("hi", { headers: { "content-type": "text/plain" } })));
    const client = new HttpModelClient({ name: "local", url: "http://localhost:9/complete" });
    await expect(client.complete(request())).resolves.toBe("hi");
  });

  it("reads completion or content from a JSON body", async () => {
    const json = (body: unknown) =>
      new Response(JSON.stringify(body), { headers: { "content-type": "application/json" } });
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(json({ completion: "first" }))
      .mockResolvedValueOnce(json({ content: "second" }));
    vi.stubGlobal("fetch", fetchMock);
    const client = new HttpModelClient({ name: "local", url: "http://localhost:9/complete" });

    await expect(client.complete(request())).resolves.toBe("first");
    await expect(client.complete(request())).resolves.toBe("second");
  });

  it("sends the model settings, prompt and transcript", async () => {
    const fetchMock = vi.fn(async () => new Response("ok"));
    vi.stubGlobal("fetch", fetchMock);
    const client = new HttpModelClient({
      name: "local",
      url: "http://localhost:9/complete",
      headers: { Authorization: "Bearer test-secret" },
    });

    await client.complete(request());

    expect(fetchMock).toHaveBeenCalledWith(
      "http://localhost:9/complete",
      expect.objectContaining({
        method: "POST",
        headers: { "Content-Type": "application/json", Authorization: "Bearer test-secret" },
        body: JSON.stringify({
          model: "test-model",
          temperature: 0.2,
          system: "You are a tester.",
          messages: [{ role: "user", content: "Say hi" }],
          tools: [],
        }),
      }),
    );
  });

  it("throws on a non-2xx status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("quota", { status: 429 })));
    const client = new HttpModelClient({ name: "local", url: "http://localhost:9/complete" });
    await expect(client.complete(request())).rejects.toThrow("HTTP 429: quota");
  });

  it("rejects JSON without a completion field", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("{}", { headers: { "content-type": "application/json" } })),
    );
    const client = new HttpModelClient({ name: "local", url: "http://localhost:9/complete" });
    await expect(client.complete(request())).rejects.toThrow("without a completion or content field");
  });
});
