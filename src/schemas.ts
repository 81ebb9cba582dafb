import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// ---------------------------------------------------------------------------
// Model replies
// ---------------------------------------------------------------------------

export const ModelReplySchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("tool"),
    tool: z.string().min(1),
    params: z.record(z.unknown()).default({}),
  }),
  z.object({
    action: z.literal("final"),
    answer: z.unknown(),
  }),
]);

export type ModelReply = z.infer<typeof ModelReplySchema>;

export const CompletionResponseSchema = z
  .object({
    completion: z.string().optional(),
    content: z.string().optional(),
  })
  .refine((d) => d.completion !== undefined || d.content !== undefined, {
    message: "completion or content is required",
  });

// ---------------------------------------------------------------------------
// Pipeline definitions
// ---------------------------------------------------------------------------

const idSchema = z
  .string()
  .regex(/^[a-zA-Z][a-zA-Z0-9_-]*$/, "must start with a letter and contain only letters, digits, _ or -");

export const FieldSpecSchema = z.object({
  name: z.string().min(1),
  type: z.enum(["string", "number", "integer", "boolean", "array", "object"]),
  required: z.boolean().optional(),
  description: z.string().optional(),
});

export const OutputSchemaSchema = z.object({
  fields: z.array(FieldSpecSchema),
});

export const ModelConfigSchema = z.object({
  provider: z.string().min(1),
  name: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
});

export const AgentSpecSchema = z.object({
  id: idSchema,
  role: z.string().min(1),
  objective: z.string().min(1),
  backstory: z.string().default(""),
  tools: z.array(z.string()).default([]),
  model: ModelConfigSchema,
  maxIterations: z.number().int().positive().optional(),
});

export const TaskSpecSchema = z.object({
  id: idSchema,
  agent: z.string().min(1),
  description: z.string().default(""),
  instruction: z.string().min(1),
  expectedOutput: z.string().optional(),
  dependsOn: z.array(z.string()).default([]),
  outputSchema: OutputSchemaSchema.optional(),
  tolerateSkipped: z.boolean().optional(),
});

export const ModelProviderSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string()).optional(),
  /** Environment variable holding a bearer token */
  apiKeyEnv: z.string().optional(),
});

export const HttpToolSchema = z.object({
  id: idSchema,
  url: z.string().url(),
  description: z.string().min(1),
  headers: z.record(z.string()).optional(),
  parameters: z.record(z.string()).optional(),
  caseInsensitive: z.boolean().optional(),
  normalizeWhitespace: z.boolean().optional(),
});

/** MCP server started over stdio; `tools` limits which of its tools are used */
export const McpServerSchema = z.object({
  id: idSchema,
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  tools: z.array(z.string().min(1)).optional(),
});

export const ConfigOverridesSchema = z
  .object({
    timeouts: z.object({ toolCall: z.number().positive(), modelCall: z.number().positive() }).partial(),
    retry: z
      .object({
        maxAttempts: z.number().int().positive(),
        baseDelayMs: z.number().nonnegative(),
        maxDelayMs: z.number().nonnegative(),
      })
      .partial(),
    limits: z
      .object({
        maxConcurrency: z.number().int().positive(),
        maxIterations: z.number().int().positive(),
        maxSchemaRetries: z.number().int().nonnegative(),
        outputTruncation: z.number().int().positive(),
      })
      .partial(),
    cache: z
      .object({ enabled: z.boolean(), ttlMs: z.number().positive(), maxEntries: z.number().int().positive() })
      .partial(),
    rateLimit: z
      .object({
        enabled: z.boolean(),
        maxRequests: z.number().int().positive(),
        windowMs: z.number().positive(),
        maxWaitMs: z.number().positive(),
        maxQueueSize: z.number().int().positive(),
      })
      .partial(),
    policy: z
      .object({ failure: z.enum(["abort", "skip-downstream"]), schema: z.enum(["degrade", "fail"]) })
      .partial(),
  })
  .partial();

export const PipelineFileSchema = z.object({
  name: z.string().min(1).default("pipeline"),
  inputs: z.record(z.unknown()).default({}),
  models: z.record(ModelProviderSchema).default({}),
  tools: z.array(HttpToolSchema).default([]),
  mcpServers: z.array(McpServerSchema).default([]),
  agents: z.array(AgentSpecSchema).min(1),
  tasks: z.array(TaskSpecSchema).min(1),
  config: ConfigOverridesSchema.optional(),
});

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

// ---------------------------------------------------------------------------
// Stored run records
// ---------------------------------------------------------------------------

const ErrorDetailSchema = z.object({
  code: z.string(),
  message: z.string(),
  violations: z.array(z.object({ field: z.string(), reason: z.string() })).optional(),
});

export const TaskRecordSchema = z.object({
  id: z.string(),
  agent: z.string(),
  description: z.string(),
  dependsOn: z.array(z.string()),
  status: z.enum(["pending", "running", "succeeded", "failed", "skipped"]),
  rawOutput: z.string(),
  structuredOutput: z.record(z.unknown()).nullable(),
  error: ErrorDetailSchema.optional(),
  warnings: z.array(z.string()),
  startedAt: z.number().optional(),
  finishedAt: z.number().optional(),
  durationMs: z.number().optional(),
  toolCalls: z.number(),
  cacheHits: z.number(),
  cacheMisses: z.number(),
  modelCalls: z.number(),
  iterations: z.number(),
  attempts: z.number(),
});

export const RunRecordSchema = z.object({
  version: z.literal(1),
  runId: z.string(),
  name: z.string(),
  status: z.enum(["running", "completed", "partially_failed", "failed", "cancelled"]),
  failurePolicy: z.enum(["abort", "skip-downstream"]),
  inputs: z.record(z.unknown()),
  startedAt: z.number(),
  finishedAt: z.number().optional(),
  error: ErrorDetailSchema.optional(),
  metrics: z.object({
    durationMs: z.number(),
    toolCalls: z.number(),
    cacheHits: z.number(),
    cacheMisses: z.number(),
    modelCalls: z.number(),
    rateLimiter: z.record(z.number()).optional(),
    cache: z.record(z.number()).optional(),
  }),
  tasks: z.array(TaskRecordSchema),
});

export type RunRecord = z.infer<typeof RunRecordSchema>;
export type TaskRecord = z.infer<typeof TaskRecordSchema>;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}

/** Parse with a schema, raising ConfigurationError that lists every issue. */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, data: unknown, label: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError("INVALID_CONFIG", `Invalid ${label}`, formatIssues(result.error));
  }
  return result.data;
}
