import { log } from "../utils/logger.js";
import type { Tool, ToolContext, ToolOutput, ToolParams } from "./tool.js";

export type HttpToolOptions = {
  id: string;
  url: string;
  description: string;
  headers?: Record<string, string>;
  parameters?: Record<string, string>;
  caseInsensitive?: boolean;
  normalizeWhitespace?: boolean;
};

/**
 * Tool that POSTs its parameters as JSON and returns the response body.
 * Any non-2xx status is an error so the invoker can retry it.
 */
export class HttpTool implements Tool {
  readonly id: string;
  readonly type = "http" as const;
  readonly description: string;
  readonly parameters?: Record<string, string>;
  readonly caseInsensitive?: boolean;
  readonly normalizeWhitespace?: boolean;

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpToolOptions) {
    this.id = opts.id;
    this.url = opts.url;
    this.description = opts.description;
    this.headers = opts.headers ?? {};
    this.parameters = opts.parameters;
    this.caseInsensitive = opts.caseInsensitive;
    this.normalizeWhitespace = opts.normalizeWhitespace;
  }

  async invoke(params: ToolParams, ctx: ToolContext): Promise<ToolOutput> {
    log.debug(`[${this.id}] Calling ${this.url}`);

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify(params),
      signal: ctx.signal,
    });

    const body = await res.text();
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${body.slice(0, 500)}`);
    }
    return body;
  }
}
