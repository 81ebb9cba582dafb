import { CompletionResponseSchema } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { ModelClient, ModelRequest } from "./client.js";

export type HttpModelClientOptions = {
  name: string;
  url: string;
  /** Sent with every request, e.g. an Authorization header */
  headers?: Record<string, string>;
};

/**
 * Posts the request as JSON to a completion endpoint. The endpoint answers
 * with plain text, or JSON carrying `completion` or `content`.
 */
export class HttpModelClient implements ModelClient {
  readonly name: string;
  readonly type = "http" as const;

  private url: string;
  private headers: Record<string, string>;

  constructor(opts: HttpModelClientOptions) {
    this.name = opts.name;
    this.url = opts.url;
    this.headers = opts.headers ?? {};
  }

  async complete(request: ModelRequest): Promise<string> {
    log.debug(`[${this.name}] Calling ${this.url}`, { model: request.model.name, messages: request.messages.length });

    const res = await fetch(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify({
        model: request.model.name,
        temperature: request.model.temperature,
        maxOutputTokens: request.model.maxOutputTokens,
        system: request.system,
        messages: request.messages,
        tools: request.tools,
      }),
      signal: request.signal,
    });

    const body = await res.text();
    if (!res.ok) {
      throw new Error(`HTTP ${res.status}: ${body.slice(0, 500)}`);
    }

    if (!(res.headers.get("content-type") ?? "").includes("application/json")) {
      return body;
    }

    const parsed = CompletionResponseSchema.safeParse(JSON.parse(body));
    if (!parsed.success) {
      throw new Error("Completion endpoint returned JSON without a completion or content field");
    }
    return parsed.data.completion ?? parsed.data.content ?? "";
  }
}
