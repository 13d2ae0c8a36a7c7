import type { ViewEntry } from "../context/types.js";
import type { TaskNode, TaskNodeSpec } from "../graph/types.js";

export type PlanRequest = {
  goal: string;
  iteration: number;
  /** Effective view of the context store at planning time. */
  view: ViewEntry[];
  /** Nodes that already succeeded; their ids may be used as dependencies. */
  carried: TaskNode[];
  /** Present on replanning passes. */
  feedback?: string;
  /** Aborted when the session times out. */
  signal?: AbortSignal;
};

/** Decomposes a goal into task nodes. Any thrown error fails the session. */
export interface PlanningPort {
  plan(request: PlanRequest): Promise<TaskNodeSpec[]>;
}

/** Language-model completion service: prompt in, text out. */
export interface ModelPort {
  complete(prompt: string, signal?: AbortSignal): Promise<string>;
}
