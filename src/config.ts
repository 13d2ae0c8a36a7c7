import { ConfigError } from "./errors.js";
import { SessionConfigSchema } from "./schemas.js";

export type LoopConfig = {
  maxIterations: number;
  enableReplanning: boolean;
  enableReflection: boolean;
  parallelExecution: boolean;
  /** Upper bound on nodes dispatched in one wave when parallel execution is on. */
  maxParallelism: number;
};

export type NodeConfig = {
  /** Attempts a node gets before it is failed for good. */
  retryLimit: number;
  timeoutMs: number;
};

export type ContextConfig = {
  maxTokens: number;
  compressionThresholdFraction: number;
  /** Target summary size relative to the round it replaces. */
  summaryRatio: number;
  /** Compressed rounds this many indices behind the newest get archived. */
  archiveAfterRounds: number;
  /** Share of `maxTokens` the folded session digest may use. */
  digestFraction: number;
  summarizeAttempts: number;
};

export type SessionConfig = {
  loop: LoopConfig;
  nodes: NodeConfig;
  session: {
    timeoutMs: number;
  };
  context: ContextConfig;
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: SessionConfig = {
  loop: {
    maxIterations: 10,
    enableReplanning: true,
    enableReflection: false,
    parallelExecution: true,
    maxParallelism: 4,
  },
  nodes: {
    retryLimit: 3,
    timeoutMs: 60_000,
  },
  session: {
    timeoutMs: 10 * 60 * 1000, // 10 minutes
  },
  context: {
    maxTokens: 8_000,
    compressionThresholdFraction: 0.8,
    summaryRatio: 0.3,
    archiveAfterRounds: 4,
    digestFraction: 0.25,
    summarizeAttempts: 2,
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/**
 * Merge overrides onto the defaults and validate the result. Each session
 * gets its own copy; nothing here is shared between sessions.
 */
export function resolveSessionConfig(overrides: DeepPartial<SessionConfig> = {}): SessionConfig {
  const merged = deepMerge(DEFAULTS, overrides);
  const parsed = SessionConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid session config: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/** The default config values (frozen). */
export const defaults: Readonly<SessionConfig> = Object.freeze(structuredClone(DEFAULTS));
