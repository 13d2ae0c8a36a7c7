import type { TaskGraph } from "../graph/task-graph.js";
import type { ValidationResult } from "../validation/types.js";

/** Summarize why the previous plan fell short, for the next planning pass. */
export function buildReplanFeedback(graph: TaskGraph | undefined, validation: ValidationResult | undefined): string {
  const parts: string[] = [];

  for (const node of graph?.failedNodes() ?? []) {
    parts.push(
      [
        `**Failed step**: ${node.id}`,
        `**Description**: ${node.description}`,
        `**Capability**: ${node.capabilityRef}`,
        `**Attempts**: ${node.retryCount}`,
        `**Error**: ${node.error ?? "unknown error"}`,
      ].join("\n"),
    );
  }

  const skipped = graph?.nodes().filter((n) => n.status === "skipped") ?? [];
  if (skipped.length > 0) {
    parts.push(`**Skipped steps**: ${skipped.map((n) => n.id).join(", ")}`);
  }

  const violations = validation?.violations.filter((v) => v.severity !== "info") ?? [];
  if (violations.length > 0) {
    parts.push(
      ["**Validation issues**:", ...violations.map((v) => `- [${v.severity}] ${v.ruleName}: ${v.message}`)].join("\n"),
    );
  }

  parts.push(
    "Produce a revised plan. Completed steps keep their results and must not be repeated; " +
      "try a different approach or capability for the failed steps.",
  );
  return parts.join("\n\n");
}
