import { ParseError, PlanningError, toErrorMessage } from "../errors.js";
import type { TaskNodeSpec } from "../graph/types.js";
import { PlannerResponseSchema } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import type { ModelPort, PlanRequest, PlanningPort } from "./types.js";

const log = createLogger("planner");

const PLANNER_SYSTEM_PROMPT = `You are a task planner. Given a goal, decompose it into a directed acyclic graph (DAG) of subtasks.

Output ONLY valid JSON matching this schema:
{
  "nodes": [
    {
      "id": "unique-id",
      "description": "what this step does",
      "capability": "name of the capability that performs it",
      "arguments": { "key": "value" },
      "dependsOn": ["id-of-dependency"]
    }
  ]
}

Rules:
- Each node must have a unique "id" (short, descriptive, kebab-case)
- "dependsOn" lists node IDs that must complete before this node starts
- Independent steps should have "dependsOn": [] so they can run in parallel
- Steps listed under "Completed steps" are done; depend on their ids instead of repeating them
- Output raw JSON only, no markdown fences`;

export type ModelPlannerOptions = {
  model: ModelPort;
  /** Capability names the planner may assign. */
  capabilities?: string[];
};

/** Planner that asks a language model for a JSON task graph. */
export class ModelPlanner implements PlanningPort {
  private model: ModelPort;
  private capabilities: string[];

  constructor(opts: ModelPlannerOptions) {
    this.model = opts.model;
    this.capabilities = opts.capabilities ?? [];
  }

  async plan(request: PlanRequest): Promise<TaskNodeSpec[]> {
    const prompt = this.buildPrompt(request);
    let raw: string;
    try {
      raw = await this.model.complete(prompt, request.signal);
    } catch (err) {
      throw new PlanningError(`Planner model call failed: ${toErrorMessage(err)}`, { cause: err });
    }

    try {
      return parsePlannerResponse(raw);
    } catch (err) {
      log.error("Failed to parse planner response", { raw: raw.slice(0, 500) });
      throw new PlanningError(`Planner returned an unusable plan: ${toErrorMessage(err)}`, { cause: err });
    }
  }

  buildPrompt(request: PlanRequest): string {
    let prompt = `${PLANNER_SYSTEM_PROMPT}\n\nGoal: ${request.goal}`;
    if (this.capabilities.length > 0) {
      prompt += `\n\nAvailable capabilities: ${this.capabilities.join(", ")}`;
    }
    if (request.carried.length > 0) {
      prompt += "\n\n## Completed steps\n";
      for (const node of request.carried) {
        prompt += `- ${node.id}: ${node.description} => ${node.result?.output ?? ""}\n`;
      }
    }
    if (request.view.length > 0) {
      prompt += "\n\n## Context\n";
      for (const entry of request.view) {
        const label = entry.index === -1 ? "Digest" : `Round ${entry.index} (${entry.kind})`;
        prompt += `\n### ${label}\n${entry.content}\n`;
      }
    }
    if (request.feedback) {
      prompt += `\n\n## Replanning feedback\n${request.feedback}`;
    }
    return prompt;
  }
}

/** Parse model output into node specs, tolerating markdown fences. */
export function parsePlannerResponse(raw: string): TaskNodeSpec[] {
  const cleaned = raw.replace(/^```(?:json)?\s*\n?/m, "").replace(/\n?```\s*$/m, "").trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new ParseError(`Planner returned invalid JSON: ${toErrorMessage(err)}`, { cause: err });
  }

  const result = PlannerResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new ParseError(result.error.issues.map((i) => i.message).join("; "));
  }

  return result.data.nodes.map((n) => ({
    id: n.id,
    description: n.description,
    capabilityRef: n.capability,
    arguments: n.arguments ?? {},
    dependencies: n.dependsOn,
  }));
}
