import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { getDefaultEnvironment, StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { log } from "../utils/logger.js";
import type { Tool, ToolContext, ToolOutput, ToolParams } from "./tool.js";

export type McpServerOptions = {
  /** Names the server in logs and errors */
  id: string;
  command: string;
  args?: string[];
  /** Added to the default environment the SDK passes to the server process */
  env?: Record<string, string>;
  /** Only these tools are exposed; all of them when omitted */
  tools?: string[];
};

const InputSchemaShape = z
  .object({
    properties: z.record(z.object({ description: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

const CallResultShape = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
});

function describeParameters(inputSchema: unknown): Record<string, string> | undefined {
  const parsed = InputSchemaShape.safeParse(inputSchema);
  if (!parsed.success || !parsed.data.properties) return undefined;
  return Object.fromEntries(
    Object.entries(parsed.data.properties).map(([name, prop]) => [name, prop.description ?? ""]),
  );
}

export type McpToolOptions = {
  client: Client;
  /** Name of the tool on the server; also its id here */
  name: string;
  description: string;
  parameters?: Record<string, string>;
};

/**
 * Tool served by an MCP server. Text content parts are joined into the
 * output; a result flagged `isError` is thrown so the invoker can retry it.
 */
export class McpTool implements Tool {
  readonly id: string;
  readonly type = "mcp" as const;
  readonly description: string;
  readonly parameters?: Record<string, string>;

  private client: Client;

  constructor(opts: McpToolOptions) {
    this.id = opts.name;
    this.client = opts.client;
    this.description = opts.description;
    this.parameters = opts.parameters;
  }

  async invoke(params: ToolParams, ctx: ToolContext): Promise<ToolOutput> {
    log.debug(`[${this.id}] Calling MCP tool`);

    const result = await this.client.callTool({ name: this.id, arguments: params }, undefined, { signal: ctx.signal });
    const parsed = CallResultShape.safeParse(result);
    if (!parsed.success) {
      throw new Error(`MCP tool "${this.id}" returned an unreadable result`);
    }

    const text = parsed.data.content.map((part) => (part.type === "text" ? part.text ?? "" : `[${part.type}]`)).join("\n");
    if (parsed.data.isError) {
      throw new Error(text || `MCP tool "${this.id}" reported an error`);
    }
    return text;
  }
}

/** One connected MCP server and the tools it lists. */
export class McpToolSource {
  readonly id: string;
  private client: Client;

  private constructor(id: string, client: Client) {
    this.id = id;
    this.client = client;
  }

  static async connect(id: string, transport: Transport): Promise<McpToolSource> {
    const client = new Client({ name: "taskcrew", version: "0.1.0" });
    await client.connect(transport);
    log.debug(`Connected to MCP server "${id}"`);
    return new McpToolSource(id, client);
  }

  /** Start the server as a child process and talk to it over stdio. */
  static stdio(opts: McpServerOptions): Promise<McpToolSource> {
    const transport = new StdioClientTransport({
      command: opts.command,
      args: opts.args,
      env: opts.env ? { ...getDefaultEnvironment(), ...opts.env } : undefined,
    });
    return McpToolSource.connect(opts.id, transport);
  }

  /**
   * Tools the server lists, in its order. With `allow`, only those names;
   * a name the server does not list is a configuration error.
   */
  async tools(allow?: readonly string[]): Promise<McpTool[]> {
    const listed: { name: string; description?: string; inputSchema: unknown }[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.client.listTools(cursor ? { cursor } : undefined);
      listed.push(...page.tools);
      cursor = page.nextCursor;
    } while (cursor);

    if (allow) {
      const names = new Set(listed.map((t) => t.name));
      const missing = allow.filter((name) => !names.has(name));
      if (missing.length > 0) {
        throw new ConfigurationError(
          "UNKNOWN_TOOL",
          `MCP server "${this.id}" does not provide ${missing.map((n) => `"${n}"`).join(", ")}`,
        );
      }
    }

    return listed
      .filter((t) => !allow || allow.includes(t.name))
      .map(
        (t) =>
          new McpTool({
            client: this.client,
            name: t.name,
            description: t.description ?? "",
            parameters: describeParameters(t.inputSchema),
          }),
      );
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

export type McpConnections = {
  tools: McpTool[];
  close: () => Promise<void>;
};

/**
 * Connect every server and collect its tools. Tool ids must be unique across
 * servers. If anything fails, servers already started are closed again.
 */
export async function connectMcpServers(
  servers: readonly McpServerOptions[],
  connect: (opts: McpServerOptions) => Promise<McpToolSource> = McpToolSource.stdio,
): Promise<McpConnections> {
  const sources: McpToolSource[] = [];
  const close = async (): Promise<void> => {
    const results = await Promise.allSettled(sources.map((s) => s.close()));
    results.forEach((r, i) => {
      if (r.status === "rejected") {
        log.warn(`Failed to close MCP server "${sources[i].id}"`, { error: String(r.reason) });
      }
    });
  };

  const tools: McpTool[] = [];
  try {
    for (const server of servers) {
      const source = await connect(server);
      sources.push(source);
      const provided = await source.tools(server.tools);
      for (const tool of provided) {
        if (tools.some((t) => t.id === tool.id)) {
          throw new ConfigurationError("DUPLICATE_ID", `MCP tool "${tool.id}" is provided by more than one server`);
        }
        tools.push(tool);
      }
      log.info(`MCP server "${server.id}" ready`, { tools: provided.length });
    }
  } catch (err) {
    await close();
    throw err;
  }

  return { tools, close };
}
