import type { TaskGraph } from "../graph/task-graph.js";
import type { TaskNode } from "../graph/types.js";
import type { ValidationResult } from "../validation/types.js";

// Plain-text bodies for the rounds the controller appends to the context store.

export function renderPlan(graph: TaskGraph, iteration: number): string {
  const lines = [`Plan v${graph.version} (iteration ${iteration}) for goal: ${graph.goal}`];
  for (const node of graph.topologicalOrder()) {
    lines.push(`- ${node.id} [${node.capabilityRef}] ${node.description}${describeDeps(node)}${carriedTag(node)}`);
  }
  return lines.join("\n");
}

export function renderObservation(graph: TaskGraph, iterationNodes: string[], iteration: number): string {
  const lines = [`Observations (iteration ${iteration}):`];
  for (const id of iterationNodes) {
    const node = graph.get(id);
    if (!node) continue;
    lines.push(describeOutcome(node));
  }
  if (lines.length === 1) lines.push("- no nodes ran");
  return lines.join("\n");
}

export function renderReflection(notes: string[], iteration: number): string {
  return [`Reflection (iteration ${iteration}):`, ...notes.map((note) => `- ${note}`)].join("\n");
}

export function renderValidation(result: ValidationResult, iteration: number): string {
  const score = result.score === undefined ? "" : ` (score ${result.score})`;
  const lines = [`Validation (iteration ${iteration}): ${result.passed ? "passed" : "failed"}${score}`];
  for (const v of result.violations) {
    lines.push(`- [${v.severity}] ${v.ruleName}: ${v.message}`);
  }
  return lines.join("\n");
}

function describeDeps(node: TaskNode): string {
  return node.dependencies.length > 0 ? ` (after: ${node.dependencies.join(", ")})` : "";
}

function carriedTag(node: TaskNode): string {
  return node.status === "succeeded" ? " (done)" : "";
}

function describeOutcome(node: TaskNode): string {
  switch (node.status) {
    case "succeeded":
      return `- ${node.id} succeeded: ${node.result?.output ?? ""}`;
    case "failed":
      return `- ${node.id} failed after ${node.retryCount} attempt(s): ${node.error ?? "unknown error"}`;
    case "skipped":
      return `- ${node.id} skipped`;
    default:
      return `- ${node.id} ${node.status}`;
  }
}
