export type ErrorCode =
  | "CONFIGURATION"
  | "CYCLE"
  | "UNKNOWN_DEPENDENCY"
  | "DUPLICATE_ID"
  | "RESERVED_ID"
  | "UNKNOWN_AGENT"
  | "UNKNOWN_TOOL"
  | "UNKNOWN_PROVIDER"
  | "UNKNOWN_PLACEHOLDER"
  | "INVALID_CONFIG"
  | "PARSE_FAILED"
  | "TOOL_INVOCATION"
  | "RATE_LIMIT_TIMEOUT"
  | "TIMEOUT"
  | "TOOL_NOT_PERMITTED"
  | "MODEL_INVOCATION"
  | "SCHEMA_VIOLATION"
  | "ITERATION_BUDGET_EXCEEDED"
  | "TASK_FAILURE"
  | "RUN_ABORTED"
  | "CANCELLED";

export class CrewError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// --- configuration (fatal, raised before any task runs) ---

export class ConfigurationError extends CrewError {
  readonly issues: string[];

  constructor(code: ErrorCode, message: string, issues: string[] = []) {
    super(code, issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export class CycleError extends ConfigurationError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super("CYCLE", `Task graph contains a cycle: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}

export class UnknownDependencyError extends ConfigurationError {
  readonly taskId: string;
  readonly dependency: string;

  constructor(taskId: string, dependency: string) {
    super("UNKNOWN_DEPENDENCY", `Task "${taskId}" depends on unknown task "${dependency}"`);
    this.taskId = taskId;
    this.dependency = dependency;
  }
}

export class ParseError extends CrewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
  }
}

// --- outbound calls ---

export class TimeoutError extends CrewError {
  constructor(label: string, timeoutMs: number) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`);
  }
}

export class ToolInvocationError extends CrewError {
  readonly toolId: string;
  readonly attempts: number;

  constructor(
    toolId: string,
    message: string,
    opts: { attempts?: number; cause?: unknown; code?: ErrorCode } = {},
  ) {
    super(opts.code ?? "TOOL_INVOCATION", message, { cause: opts.cause });
    this.toolId = toolId;
    this.attempts = opts.attempts ?? 1;
  }
}

/** A call waited longer than the configured maximum for a rate-limit slot. */
export class RateLimitTimeout extends ToolInvocationError {
  constructor(message: string) {
    super("rate-limiter", message, { code: "RATE_LIMIT_TIMEOUT" });
  }
}

export class ModelInvocationError extends CrewError {
  readonly attempts: number;

  constructor(message: string, opts: { attempts?: number; cause?: unknown } = {}) {
    super("MODEL_INVOCATION", message, { cause: opts.cause });
    this.attempts = opts.attempts ?? 1;
  }
}

// --- agent loop ---

export class ToolNotPermittedError extends CrewError {
  constructor(agentId: string, toolId: string, allowed: readonly string[]) {
    super(
      "TOOL_NOT_PERMITTED",
      `Tool "${toolId}" is not permitted for agent "${agentId}". Allowed tools: ${
        allowed.length > 0 ? allowed.join(", ") : "(none)"
      }`,
    );
  }
}

export class IterationBudgetExceeded extends CrewError {
  constructor(agentId: string, maxIterations: number) {
    super(
      "ITERATION_BUDGET_EXCEEDED",
      `Agent "${agentId}" used all ${maxIterations} rounds without a final answer; keeping partial output`,
    );
  }
}

export type FieldViolation = {
  field: string;
  reason: string;
};

export class SchemaViolationError extends CrewError {
  readonly violations: FieldViolation[];

  constructor(violations: FieldViolation[]) {
    super(
      "SCHEMA_VIOLATION",
      `Output violates schema: ${violations.map((v) => `${v.field} (${v.reason})`).join(", ")}`,
    );
    this.violations = violations;
  }
}

// --- task and run ---

/**
 * Terminal failure of one task. Takes the code and message of its cause, so
 * the record says what went wrong; causes outside the taxonomy get TASK_FAILURE.
 */
export class TaskFailure extends CrewError {
  readonly taskId: string;

  constructor(taskId: string, cause: unknown) {
    super(
      cause instanceof CrewError ? cause.code : "TASK_FAILURE",
      cause instanceof Error ? cause.message : String(cause),
      { cause },
    );
    this.taskId = taskId;
  }
}

export class RunAborted extends CrewError {
  readonly failedTaskId: string;

  constructor(failedTaskId: string) {
    super("RUN_ABORTED", `Run aborted after task "${failedTaskId}" failed`);
    this.failedTaskId = failedTaskId;
  }
}

export class CancelledError extends CrewError {
  constructor(message = "Run cancelled") {
    super("CANCELLED", message);
  }
}

// --- serialization ---

export type ErrorDetail = {
  code: ErrorCode | "UNKNOWN";
  message: string;
  violations?: FieldViolation[];
};

export function toErrorDetail(err: unknown): ErrorDetail {
  if (err instanceof TaskFailure) {
    return { ...toErrorDetail(err.cause), code: err.code };
  }
  if (err instanceof SchemaViolationError) {
    return { code: err.code, message: err.message, violations: err.violations };
  }
  if (err instanceof CrewError) {
    return { code: err.code, message: err.message };
  }
  return { code: "UNKNOWN", message: err instanceof Error ? err.message : String(err) };
}
