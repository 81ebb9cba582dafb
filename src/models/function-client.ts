import type { ModelClient, ModelRequest } from "./client.js";

export type CompletionFunction = (request: ModelRequest) => Promise<string>;

export type FunctionModelClientOptions = {
  name: string;
  fn: CompletionFunction;
};

/** Model client backed by an in-process function (local models, scripted replies). */
export class FunctionModelClient implements ModelClient {
  readonly name: string;
  readonly type = "function" as const;

  private fn: CompletionFunction;

  constructor(opts: FunctionModelClientOptions) {
    this.name = opts.name;
    this.fn = opts.fn;
  }

  complete(request: ModelRequest): Promise<string> {
    return this.fn(request);
  }
}
