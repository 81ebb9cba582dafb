import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, ToolInvocationError } from "../../src/errors.js";
import { ToolInvoker } from "../../src/tools/invoker.js";
import { connectMcpServers, McpToolSource, type McpServerOptions } from "../../src/tools/mcp-tool.js";

/** In-process tourism data server with a rates tool and a tool that always errors. */
async function tourismServer(id = "tourism"): Promise<McpToolSource> {
  const server = new Server({ name: "tourism", version: "1.0.0" }, { capabilities: { tools: {} } });
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "hotel_rates",
        description: "Average nightly hotel rates",
        inputSchema: { type: "object" as const, properties: { city: { type: "string", description: "City name" } } },
      },
      { name: "flights", description: "Weekly flight counts", inputSchema: { type: "object" as const } },
    ],
  }));
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    if (request.params.name === "hotel_rates") {
      return { content: [{ type: "text" as const, text: `rates for ${String(request.params.arguments?.city)}` }] };
    }
    return { content: [{ type: "text" as const, text: "no flight data" }], isError: true };
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  return McpToolSource.connect(id, clientTransport);
}

describe("McpToolSource", () => {
  let source: McpToolSource;

  beforeEach(async () => {
    source = await tourismServer();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await source.close();
  });

  it("lists the server's tools with their parameters", async () => {
    const tools = await source.tools();

    expect(tools.map((t) => [t.id, t.type, t.description])).toEqual([
      ["hotel_rates", "mcp", "Average nightly hotel rates"],
      ["flights", "mcp", "Weekly flight counts"],
    ]);
    expect(tools[0].parameters).toEqual({ city: "City name" });
    expect(tools[1].parameters).toBeUndefined();
  });

  it("keeps only allow-listed tools", async () => {
    const tools = await source.tools(["hotel_rates"]);
    expect(tools.map((t) => t.id)).toEqual(["hotel_rates"]);
  });

  it("rejects an allow-listed name the server does not provide", async () => {
    const err = await source.tools(["hotel_rates", "weather"]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof ConfigurationError && err.message).toBe('MCP server "tourism" does not provide "weather"');
  });

  it("returns the text content of a call", async () => {
    const [rates] = await source.tools(["hotel_rates"]);

    const output = await rates.invoke({ city: "Cabo" }, { toolId: rates.id, signal: new AbortController().signal });
    expect(output).toBe("rates for Cabo");
  });

  it("turns an error result into a failed tool call", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const [flights] = await source.tools(["flights"]);
    const invoker = new ToolInvoker({ timeoutMs: 1000, maxAttempts: 2, baseDelayMs: 0 });

    const err = await invoker.invoke(flights, {}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolInvocationError);
    expect(err instanceof ToolInvocationError && err.message).toBe('Tool "flights" failed after 2 attempt(s): no flight data');
  });
});

describe("connectMcpServers", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("collects the allowed tools of every server", async () => {
    const servers: McpServerOptions[] = [{ id: "tourism", command: "unused", tools: ["hotel_rates"] }];

    const connections = await connectMcpServers(servers, (opts) => tourismServer(opts.id));
    expect(connections.tools.map((t) => t.id)).toEqual(["hotel_rates"]);
    await connections.close();
  });

  it("closes servers already started when a tool id repeats", async () => {
    const started: McpToolSource[] = [];
    const connect = async (opts: McpServerOptions) => {
      const source = await tourismServer(opts.id);
      vi.spyOn(source, "close");
      started.push(source);
      return source;
    };

    const err = await connectMcpServers(
      [
        { id: "first", command: "unused" },
        { id: "second", command: "unused", tools: ["flights"] },
      ],
      connect,
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err instanceof ConfigurationError && err.message).toBe('MCP tool "flights" is provided by more than one server');
    expect(started).toHaveLength(2);
    expect(started[0].close).toHaveBeenCalledTimes(1);
    expect(started[1].close).toHaveBeenCalledTimes(1);
  });
});
