import type { TaskGraph } from "../graph/task-graph.js";
import type { ValidationResult, Violation } from "./types.js";

/**
 * Fold the graph's own state into a validator's verdict. Permanently failed
 * nodes or a graph that never reached a terminal state fail the gate whatever
 * the validator reported.
 */
export function gateValidation(reported: ValidationResult, graph: TaskGraph | undefined): ValidationResult {
  const extra: Violation[] = [];

  if (!graph) {
    extra.push({ ruleName: "graph.missing", severity: "error", message: "No task graph to validate" });
  } else {
    const failed = graph.failedNodes();
    if (failed.length > 0) {
      extra.push({
        ruleName: "graph.failed-nodes",
        severity: "error",
        message: `Failed nodes: ${failed.map((n) => `${n.id} (${n.error ?? "unknown error"})`).join(", ")}`,
      });
    }
    if (!graph.isTerminal()) {
      const open = graph.nodes().filter((n) => n.status === "pending" || n.status === "ready" || n.status === "running");
      extra.push({
        ruleName: "graph.incomplete",
        severity: "error",
        message: `Unfinished nodes: ${open.map((n) => n.id).join(", ")}`,
      });
    }
  }

  if (extra.length === 0) return reported;

  return {
    passed: false,
    violations: [...reported.violations, ...extra],
    score: reported.score,
  };
}
