import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, ParseError } from "../../src/errors.js";
import { buildPipeline, loadPipelineFile } from "../../src/pipeline/loader.js";

function pipelineData() {
  return {
    name: "market",
    inputs: { city: "Cabo" },
    models: {
      local: { url: "http://localhost:9/complete", apiKeyEnv: "TASKCREW_TEST_KEY" },
    },
    tools: [{ id: "search", url: "http://localhost:9/search", description: "Web search", parameters: { query: "terms" } }],
    mcpServers: [{ id: "tourism", command: "tourism-server", args: ["--stdio"], tools: ["hotel_rates"] }],
    agents: [
      {
        id: "researcher",
        role: "Market Researcher",
        objective: "Find gaps",
        tools: ["search"],
        model: { provider: "local", name: "test-model" },
      },
    ],
    tasks: [
      { id: "research", agent: "researcher", instruction: "Research {{inputs.city}}" },
      { id: "analysis", agent: "researcher", instruction: "Analyse", dependsOn: ["research"] },
    ],
    config: { limits: { maxConcurrency: 2 } },
  };
}

describe("buildPipeline", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds agents, tasks, tools and model clients with defaults filled in", () => {
    const pipeline = buildPipeline(pipelineData(), { env: { TASKCREW_TEST_KEY: "test-secret" } });

    expect(pipeline.name).toBe("market");
    expect(pipeline.inputs).toEqual({ city: "Cabo" });
    expect(pipeline.agents[0].backstory).toBe("");
    expect(pipeline.tasks.map((t) => [t.id, t.dependsOn])).toEqual([
      ["research", []],
      ["analysis", ["research"]],
    ]);
    expect(pipeline.tasks[0].description).toBe("");
    expect(pipeline.tools.map((t) => [t.id, t.type])).toEqual([["search", "http"]]);
    expect(pipeline.mcpServers).toEqual([
      { id: "tourism", command: "tourism-server", args: ["--stdio"], tools: ["hotel_rates"] },
    ]);
    expect(Object.keys(pipeline.models)).toEqual(["local"]);
    expect(pipeline.config).toEqual({ limits: { maxConcurrency: 2 } });
    expect(Object.isFrozen(pipeline.tasks[0])).toBe(true);
  });

  it("sends the key from apiKeyEnv as a bearer token", async () => {
    const fetchMock = vi.fn(async () => new Response("ok"));
    vi.stubGlobal("fetch", fetchMock);
    const pipeline = buildPipeline(pipelineData(), { env: { TASKCREW_TEST_KEY: "test-secret" } });

    await pipeline.models.local.complete({
      model: { provider: "local", name: "test-model" },
      system: "",
      messages: [],
      tools: [],
      signal: new AbortController().signal,
    });

    expect(fetchMock).toHaveBeenCalledWith(
      "http://localhost:9/complete",
      expect.objectContaining({
        headers: { "Content-Type": "application/json", Authorization: "Bearer test-secret" },
      }),
    );
  });

  it("fails when the key variable is not set", () => {
    expect(() => buildPipeline(pipelineData(), { env: {} })).toThrow(
      "Model provider \"local\" needs environment variable TASKCREW_TEST_KEY, which is not set",
    );
  });

  it("lists every schema problem", () => {
    const data = { ...pipelineData(), agents: [], tasks: [{ id: "1bad", agent: "x", instruction: "" }] };

    try {
      buildPipeline(data, { env: { TASKCREW_TEST_KEY: "test-secret" } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      const issues = err instanceof ConfigurationError ? err.issues : [];
      expect(issues).toHaveLength(3);
      expect(issues[0]).toBe("agents: Array must contain at least 1 element(s)");
      expect(issues[1].startsWith("tasks.0.id: must start with a letter")).toBe(true);
      expect(issues[2]).toBe("tasks.0.instruction: String must contain at least 1 character(s)");
    }
  });
});

describe("loadPipelineFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("reads and builds a pipeline file", async () => {
    dir = mkdtempSync(join(tmpdir(), "taskcrew-loader-"));
    const path = join(dir, "pipeline.json");
    writeFileSync(path, JSON.stringify(pipelineData()));

    const pipeline = await loadPipelineFile(path, { env: { TASKCREW_TEST_KEY: "test-secret" } });
    expect(pipeline.tasks).toHaveLength(2);
  });

  it("raises ParseError for invalid JSON", async () => {
    dir = mkdtempSync(join(tmpdir(), "taskcrew-loader-"));
    const path = join(dir, "pipeline.json");
    writeFileSync(path, "{ not json");

    await expect(loadPipelineFile(path)).rejects.toBeInstanceOf(ParseError);
  });
});
