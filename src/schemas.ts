import { z } from "zod";
import { CheckpointError } from "./errors.js";
import type { LoopSnapshot } from "./loop/types.js";

// ---------------------------------------------------------------------------
// Session config
// ---------------------------------------------------------------------------

const fraction = z.number().gt(0).lte(1);

export const SessionConfigSchema = z.object({
  loop: z.object({
    maxIterations: z.number().int().min(1),
    enableReplanning: z.boolean(),
    enableReflection: z.boolean(),
    parallelExecution: z.boolean(),
    maxParallelism: z.number().int().min(1),
  }),
  nodes: z.object({
    retryLimit: z.number().int().min(1),
    timeoutMs: z.number().int().positive(),
  }),
  session: z.object({
    timeoutMs: z.number().int().positive(),
  }),
  context: z.object({
    maxTokens: z.number().int().min(1),
    compressionThresholdFraction: fraction,
    summaryRatio: fraction,
    archiveAfterRounds: z.number().int().min(1),
    digestFraction: fraction,
    summarizeAttempts: z.number().int().min(1),
  }),
});

// ---------------------------------------------------------------------------
// Planner output
// ---------------------------------------------------------------------------

export const PlannedNodeSchema = z.object({
  id: z.string().min(1, "Node id must be a non-empty string"),
  description: z.string().min(1, "Node description must be a non-empty string"),
  capability: z.string().min(1, "Node capability must be a non-empty string"),
  arguments: z.record(z.unknown()).optional(),
  dependsOn: z.array(z.string()).default([]),
});

export const PlannerResponseSchema = z.object({
  nodes: z.array(PlannedNodeSchema).min(1, "Planner returned no nodes"),
});

// ---------------------------------------------------------------------------
// Checkpoint snapshots
// ---------------------------------------------------------------------------

const TaskResultSchema = z.object({
  output: z.string(),
  data: z.unknown().optional(),
  durationMs: z.number().optional(),
});

const TaskNodeSchema = z.object({
  id: z.string(),
  description: z.string(),
  capabilityRef: z.string(),
  arguments: z.record(z.unknown()),
  dependencies: z.array(z.string()),
  status: z.enum(["pending", "ready", "running", "succeeded", "failed", "skipped"]),
  result: TaskResultSchema.optional(),
  error: z.string().optional(),
  retryCount: z.number().int().min(0),
});

const RoundSchema = z.object({
  index: z.number().int().min(0),
  kind: z.enum(["plan", "observation", "reflection", "validation", "note"]),
  rawContent: z.string().optional(),
  compressedSummary: z.string().optional(),
  lodLevel: z.enum(["raw", "compressed", "archived"]),
  rawTokens: z.number().int().min(0),
  summaryTokens: z.number().int().min(0).optional(),
  folded: z.boolean(),
});

const ValidationResultSchema = z.object({
  passed: z.boolean(),
  violations: z.array(
    z.object({
      ruleName: z.string(),
      severity: z.enum(["error", "warning", "info"]),
      message: z.string(),
    }),
  ),
  score: z.number().optional(),
});

export const LoopSnapshotSchema = z.object({
  sessionId: z.string().min(1),
  goal: z.string(),
  phase: z.enum(["PLANNING", "EXECUTION", "OBSERVATION", "REFLECTION", "VALIDATION", "REPLANNING", "DONE", "FAILED"]),
  iteration: z.number().int().min(0),
  graph: z
    .object({
      goal: z.string(),
      version: z.number().int().min(1),
      nodes: z.array(TaskNodeSchema),
    })
    .optional(),
  context: z.object({
    sessionId: z.string(),
    maxTokens: z.number().int().min(1),
    nextIndex: z.number().int().min(0),
    rounds: z.array(RoundSchema),
    digest: z
      .object({
        content: z.string(),
        tokens: z.number().int().min(0),
        throughIndex: z.number().int(),
      })
      .optional(),
    compressionCount: z.number().int().min(0),
  }),
  lastValidation: ValidationResultSchema.optional(),
  termination: z.enum(["none", "completed", "failed", "max_iterations_exceeded"]),
  reason: z
    .object({
      code: z.enum([
        "completed",
        "planning_error",
        "graph_integrity",
        "validation_failed",
        "max_iterations",
        "session_timeout",
        "budget_exceeded",
        "input_rejected",
      ]),
      message: z.string(),
    })
    .optional(),
  results: z.record(TaskResultSchema),
  iterationNodes: z.array(z.string()),
  replanFeedback: z.string().optional(),
  sessionTimedOut: z.boolean(),
  savedAt: z.number(),
});

/** Parse a stored snapshot, throwing {@link CheckpointError} when it does not fit. */
export function parseSnapshot(value: unknown): LoopSnapshot {
  const result = LoopSnapshotSchema.safeParse(value);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new CheckpointError(`Invalid checkpoint snapshot: ${msg}`);
  }
  return result.data;
}
