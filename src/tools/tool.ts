export type ToolParams = Record<string, unknown>;

/** Raw tool output: text, or records that are serialized before reaching the model. */
export type ToolOutput = string | Record<string, unknown> | unknown[];

export type ToolContext = {
  toolId: string;
  /** Aborts when the per-call timeout elapses */
  signal: AbortSignal;
};

export interface Tool {
  id: string;
  type: "function" | "http" | string;
  description: string;
  /** Parameter names mapped to a short description, shown to the model */
  parameters?: Record<string, string>;
  /** Parameter case does not change the result, so the cache key folds case */
  caseInsensitive?: boolean;
  /** Surrounding and repeated whitespace in parameters does not change the result */
  normalizeWhitespace?: boolean;

  invoke(params: ToolParams, ctx: ToolContext): Promise<ToolOutput>;
}

/** Line describing a tool in an agent's system prompt. */
export function describeTool(tool: Pick<Tool, "id" | "description" | "parameters">): string {
  let line = `- "${tool.id}": ${tool.description}`;
  const params = Object.entries(tool.parameters ?? {});
  if (params.length > 0) {
    line += ` (params: ${params.map(([name, desc]) => `${name}: ${desc}`).join(", ")})`;
  }
  return line;
}
