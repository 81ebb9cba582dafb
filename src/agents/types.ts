import type { ModelConfig } from "../models/client.js";

export type AgentSpec = {
  readonly id: string;
  readonly role: string;
  readonly objective: string;
  readonly backstory: string;
  /** Ids of the tools this agent may call */
  readonly tools: readonly string[];
  readonly model: ModelConfig;
  /** Tool-call rounds per task; falls back to limits.maxIterations */
  readonly maxIterations?: number;
};

/** Copy and freeze an agent definition. */
export function defineAgent(spec: AgentSpec): AgentSpec {
  return Object.freeze({
    ...spec,
    tools: Object.freeze([...spec.tools]),
    model: Object.freeze({ ...spec.model }),
  });
}
