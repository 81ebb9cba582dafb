import { readFile } from "node:fs/promises";
import { defineAgent, type AgentSpec } from "../agents/types.js";
import type { CrewConfig, DeepPartial } from "../config.js";
import { ConfigurationError, ParseError } from "../errors.js";
import type { ModelClient } from "../models/client.js";
import { HttpModelClient } from "../models/http-client.js";
import { parseOrThrow, PipelineFileSchema } from "../schemas.js";
import { HttpTool } from "../tools/http-tool.js";
import type { McpServerOptions } from "../tools/mcp-tool.js";
import type { Tool } from "../tools/tool.js";
import { defineTask, type TaskSpec } from "./types.js";

export type LoadedPipeline = {
  name: string;
  inputs: Record<string, unknown>;
  agents: AgentSpec[];
  tasks: TaskSpec[];
  tools: Tool[];
  /** Connected by the caller, whose tools join `tools` */
  mcpServers: McpServerOptions[];
  models: Record<string, ModelClient>;
  config?: DeepPartial<CrewConfig>;
};

export type BuildOptions = {
  /** Where apiKeyEnv names are looked up; defaults to process.env */
  env?: Readonly<Record<string, string | undefined>>;
};

/** Turn parsed pipeline JSON into agents, tasks, tools and model clients. */
export function buildPipeline(data: unknown, opts: BuildOptions = {}): LoadedPipeline {
  const file = parseOrThrow(PipelineFileSchema, data, "pipeline file");
  const env = opts.env ?? process.env;

  const models: Record<string, ModelClient> = {};
  for (const [provider, def] of Object.entries(file.models)) {
    const headers: Record<string, string> = { ...def.headers };
    if (def.apiKeyEnv) {
      const key = env[def.apiKeyEnv];
      if (!key) {
        throw new ConfigurationError(
          "INVALID_CONFIG",
          `Model provider "${provider}" needs environment variable ${def.apiKeyEnv}, which is not set`,
        );
      }
      headers.Authorization = `Bearer ${key}`;
    }
    models[provider] = new HttpModelClient({ name: provider, url: def.url, headers });
  }

  return {
    name: file.name,
    inputs: file.inputs,
    agents: file.agents.map((a) => defineAgent(a)),
    tasks: file.tasks.map((t) => defineTask(t)),
    tools: file.tools.map((t) => new HttpTool(t)),
    mcpServers: file.mcpServers,
    models,
    config: file.config,
  };
}

export async function loadPipelineFile(path: string, opts: BuildOptions = {}): Promise<LoadedPipeline> {
  const text = await readFile(path, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Pipeline file ${path} is not valid JSON`, { cause: err });
  }
  return buildPipeline(data, opts);
}
