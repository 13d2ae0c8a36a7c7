export type TaskStatus = "pending" | "ready" | "running" | "succeeded" | "failed" | "skipped";

/** Opaque payload a capability returned for a node. */
export type TaskResult = {
  output: string;
  data?: unknown;
  durationMs?: number;
};

export type TaskNode = {
  id: string;
  description: string;
  capabilityRef: string;
  arguments: Record<string, unknown>;
  dependencies: string[];
  status: TaskStatus;
  result?: TaskResult;
  error?: string;
  /** Failed attempts so far. */
  retryCount: number;
};

/** What a planner hands over: a node before it has any execution state. */
export type TaskNodeSpec = {
  id: string;
  description: string;
  capabilityRef: string;
  arguments?: Record<string, unknown>;
  dependencies?: string[];
};

export type TaskGraphSnapshot = {
  goal: string;
  version: number;
  nodes: TaskNode[];
};
