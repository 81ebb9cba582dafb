// Config
export { getConfig, configure, resetConfig, resolveConfig, defaults } from "./config.js";
export type { CrewConfig, DeepPartial, FailurePolicy, SchemaPolicy } from "./config.js";

// Errors
export {
  CrewError,
  ConfigurationError,
  CycleError,
  UnknownDependencyError,
  ParseError,
  TimeoutError,
  ToolInvocationError,
  RateLimitTimeout,
  ModelInvocationError,
  ToolNotPermittedError,
  IterationBudgetExceeded,
  SchemaViolationError,
  TaskFailure,
  RunAborted,
  CancelledError,
  toErrorDetail,
} from "./errors.js";
export type { ErrorCode, ErrorDetail, FieldViolation } from "./errors.js";

// Schemas
export { parseOrThrow, PipelineFileSchema, RunRecordSchema, ModelReplySchema } from "./schemas.js";
export type { PipelineFile, RunRecord, TaskRecord, ModelReply } from "./schemas.js";

// Core
export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, RunConfig } from "./orchestrator.js";

// Pipeline
export { defineTask, isTerminal } from "./pipeline/types.js";
export type {
  FieldSpec,
  FieldType,
  OutputSchema,
  TaskSpec,
  TaskStatus,
  TaskResult,
  RunStatus,
  RunMetrics,
  PipelineRun,
} from "./pipeline/types.js";
export { validateGraph, topologicalOrder, findCycle, readyTasks, skipDownstream } from "./pipeline/task-graph.js";
export { renderTemplate, buildInstruction, placeholderRoots } from "./pipeline/template.js";
export type { TaskContext } from "./pipeline/template.js";
export { validateOutput, safeValidateOutput, extractPayload, describeSchema } from "./pipeline/validator.js";
export { toRunRecord, renderSummary, writeRunArtifacts } from "./pipeline/report.js";
export type { RunArtifacts } from "./pipeline/report.js";
export { buildPipeline, loadPipelineFile } from "./pipeline/loader.js";
export type { LoadedPipeline } from "./pipeline/loader.js";

// Agents
export { defineAgent } from "./agents/types.js";
export type { AgentSpec } from "./agents/types.js";
export { AgentExecutor } from "./agents/agent-loop.js";
export type { AgentOutcome, AgentExecutorOptions } from "./agents/agent-loop.js";
export { parseReply } from "./agents/reply.js";

// Models
export type { ModelClient, ModelConfig, ModelRequest, ChatMessage, ToolDescriptor } from "./models/client.js";
export { FunctionModelClient } from "./models/function-client.js";
export { HttpModelClient } from "./models/http-client.js";

// Tools
export type { Tool, ToolParams, ToolOutput, ToolContext } from "./tools/tool.js";
export { FunctionTool } from "./tools/function-tool.js";
export { HttpTool } from "./tools/http-tool.js";
export { McpTool, McpToolSource, connectMcpServers } from "./tools/mcp-tool.js";
export type { McpServerOptions, McpConnections } from "./tools/mcp-tool.js";
export { ToolInvoker } from "./tools/invoker.js";
export { ToolGateway } from "./tools/gateway.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunSummary } from "./persistence/store.js";

// Utilities
export { RateLimiter } from "./utils/rate-limiter.js";
export type { RateLimiterOptions, RateLimiterStats } from "./utils/rate-limiter.js";
export { ResponseCache, MemoryCacheStore, SqliteCacheStore } from "./utils/cache.js";
export type { CacheStats } from "./utils/cache.js";
export type { CacheStore, CacheEntry } from "./utils/cache.js";
export { withRetry } from "./utils/retry.js";
export { withTimeout } from "./utils/timeout.js";
export { log, setLogLevel } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
