import type { Tool, ToolContext, ToolOutput, ToolParams } from "./tool.js";

export type ToolFunction = (params: ToolParams, ctx: ToolContext) => Promise<ToolOutput>;

export type FunctionToolOptions = {
  id: string;
  fn: ToolFunction;
  description: string;
  parameters?: Record<string, string>;
  caseInsensitive?: boolean;
  normalizeWhitespace?: boolean;
};

/**
 * Tool backed by an in-process async function (local lookups, tests, SDK
 * clients that already wrap a remote service).
 */
export class FunctionTool implements Tool {
  readonly id: string;
  readonly type = "function" as const;
  readonly description: string;
  readonly parameters?: Record<string, string>;
  readonly caseInsensitive?: boolean;
  readonly normalizeWhitespace?: boolean;

  private fn: ToolFunction;

  constructor(opts: FunctionToolOptions) {
    this.id = opts.id;
    this.fn = opts.fn;
    this.description = opts.description;
    this.parameters = opts.parameters;
    this.caseInsensitive = opts.caseInsensitive;
    this.normalizeWhitespace = opts.normalizeWhitespace;
  }

  invoke(params: ToolParams, ctx: ToolContext): Promise<ToolOutput> {
    return this.fn(params, ctx);
  }
}
