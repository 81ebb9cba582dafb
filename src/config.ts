export type FailurePolicy = "abort" | "skip-downstream";
export type SchemaPolicy = "degrade" | "fail";

export type CrewConfig = {
  timeouts: {
    toolCall: number;
    modelCall: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxConcurrency: number;
    maxIterations: number;
    maxSchemaRetries: number;
    outputTruncation: number;
  };
  cache: {
    enabled: boolean;
    ttlMs: number;
    maxEntries: number;
  };
  rateLimit: {
    enabled: boolean;
    maxRequests: number;
    windowMs: number;
    maxWaitMs: number;
    maxQueueSize: number;
  };
  policy: {
    failure: FailurePolicy;
    schema: SchemaPolicy;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: CrewConfig = {
  timeouts: {
    toolCall: 30_000,
    modelCall: 120_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxConcurrency: 4,
    maxIterations: 5,
    maxSchemaRetries: 1,
    outputTruncation: 3_000,
  },
  cache: {
    enabled: true,
    ttlMs: 60 * 60 * 1000, // 1 hour
    maxEntries: 1_000,
  },
  rateLimit: {
    enabled: true,
    maxRequests: 10,
    windowMs: 60_000,
    maxWaitMs: 120_000,
    maxQueueSize: 1_000,
  },
  policy: {
    failure: "skip-downstream",
    schema: "degrade",
  },
};

let current: CrewConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge<T>(base: T, overrides: DeepPartial<T>): T {
  const result: Record<string, unknown> = isPlainObject(base) ? structuredClone(base) : {};
  for (const [key, val] of Object.entries(overrides)) {
    if (val === undefined) continue;
    const existing = result[key];
    result[key] = isPlainObject(val) && isPlainObject(existing) ? deepMerge(existing, val) : val;
  }
  return result as T;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<CrewConfig>): void {
  current = deepMerge(DEFAULTS, overrides);
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<CrewConfig> {
  return current;
}

/** Merge overrides onto the current config without changing it. */
export function resolveConfig(overrides?: DeepPartial<CrewConfig>): CrewConfig {
  return overrides ? deepMerge(current, overrides) : structuredClone(current);
}

/** The default config values (frozen). */
export const defaults: Readonly<CrewConfig> = Object.freeze(structuredClone(DEFAULTS));
