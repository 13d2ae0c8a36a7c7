import type { TaskNode, TaskResult } from "../graph/types.js";

export type ExecutionOptions = {
  /** Nodes per wave; 1 runs ready nodes one at a time in insertion order. */
  maxParallelism: number;
  retryLimit: number;
  nodeTimeoutMs: number;
  /** Session-level cancellation. */
  signal?: AbortSignal;
  onNodeStart?: (node: TaskNode) => void;
  onNodeEnd?: (node: TaskNode) => void;
};

export type NodeAttempt = {
  nodeId: string;
  attempt: number;
  ok: boolean;
  error?: string;
};

export type ExecutionReport = {
  /** Results of nodes that succeeded during this run, by node id. */
  results: Record<string, TaskResult>;
  attempts: NodeAttempt[];
  /** Ids of nodes this run touched, in the order they settled. */
  touched: string[];
  waves: number;
  aborted: boolean;
  deadlocked: boolean;
  durationMs: number;
};
