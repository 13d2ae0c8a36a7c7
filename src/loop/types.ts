import type { ContextSnapshot, ViewEntry } from "../context/types.js";
import type { TaskGraphSnapshot, TaskNode, TaskResult } from "../graph/types.js";
import type { ValidationResult } from "../validation/types.js";

export type LoopPhase =
  | "PLANNING"
  | "EXECUTION"
  | "OBSERVATION"
  | "REFLECTION"
  | "VALIDATION"
  | "REPLANNING"
  | "DONE"
  | "FAILED";

export type Termination = "none" | "completed" | "failed" | "max_iterations_exceeded";

export type ReasonCode =
  | "completed"
  | "planning_error"
  | "graph_integrity"
  | "validation_failed"
  | "max_iterations"
  | "session_timeout"
  | "budget_exceeded"
  | "input_rejected";

export type TerminationReason = {
  code: ReasonCode;
  message: string;
};

/** Serializable controller state; the unit a checkpoint sink persists. */
export type LoopSnapshot = {
  sessionId: string;
  goal: string;
  phase: LoopPhase;
  iteration: number;
  graph?: TaskGraphSnapshot;
  context: ContextSnapshot;
  lastValidation?: ValidationResult;
  termination: Termination;
  reason?: TerminationReason;
  /** Every succeeded node's result across all plans, by node id. */
  results: Record<string, TaskResult>;
  /** Node ids that finished during the current iteration. */
  iterationNodes: string[];
  replanFeedback?: string;
  sessionTimedOut: boolean;
  savedAt: number;
};

export type LoopOutcome = {
  sessionId: string;
  phase: "DONE" | "FAILED";
  termination: Exclude<Termination, "none">;
  reason: TerminationReason;
  iterations: number;
  results: Record<string, TaskResult>;
  lastValidation?: ValidationResult;
  view: ViewEntry[];
  graph?: TaskGraphSnapshot;
};

export interface CheckpointSink {
  save(snapshot: LoopSnapshot): Promise<void>;
  load(sessionId: string): Promise<LoopSnapshot | undefined>;
}

export type ReflectionRequest = {
  goal: string;
  iteration: number;
  view: ViewEntry[];
  nodes: TaskNode[];
};

/** Produces advisory notes. Never touches the graph. */
export interface ReflectionPort {
  reflect(request: ReflectionRequest): Promise<string[]>;
}

export type LoopHooks = {
  onPhase?: (from: LoopPhase, to: LoopPhase, snapshot: LoopSnapshot) => void;
  onNodeStart?: (node: TaskNode) => void;
  onNodeEnd?: (node: TaskNode) => void;
};
