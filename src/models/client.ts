export type ModelConfig = {
  /** Key of the ModelClient that serves this model */
  readonly provider: string;
  readonly name: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
};

export type ChatMessage = {
  role: "user" | "assistant" | "tool";
  content: string;
  /** Set on tool messages */
  toolId?: string;
};

export type ToolDescriptor = {
  id: string;
  description: string;
  parameters?: Record<string, string>;
};

export type ModelRequest = {
  model: ModelConfig;
  system: string;
  messages: readonly ChatMessage[];
  tools: readonly ToolDescriptor[];
  /** Aborts when the per-call timeout elapses */
  signal: AbortSignal;
};

/**
 * A language-model invocation service: prompt in, completion text out. Tool
 * requests are encoded in the completion (see agents/reply.ts).
 */
export interface ModelClient {
  name: string;
  type: "function" | "http" | string;
  complete(request: ModelRequest): Promise<string>;
}
