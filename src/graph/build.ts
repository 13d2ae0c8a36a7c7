import { createLogger } from "../utils/logger.js";
import { TaskGraph } from "./task-graph.js";
import type { TaskNode, TaskNodeSpec } from "./types.js";

const log = createLogger("graph");

/**
 * Assemble the graph for one planning pass. Nodes that succeeded in an
 * earlier pass are inserted first as already-succeeded, and a planned node
 * reusing one of their ids is dropped so that work never runs twice.
 */
export function buildTaskGraph(
  goal: string,
  planned: TaskNodeSpec[],
  carried: TaskNode[] = [],
  version = 1,
): TaskGraph {
  const graph = new TaskGraph(goal, version);

  for (const prior of carried) {
    if (prior.status !== "succeeded") continue;
    graph.addNode({
      id: prior.id,
      description: prior.description,
      capabilityRef: prior.capabilityRef,
      arguments: prior.arguments,
      // Edges into the old plan are irrelevant once the work is done.
      dependencies: [],
    });
    graph.mark(prior.id, "ready");
    graph.mark(prior.id, "running");
    graph.mark(prior.id, "succeeded", { result: prior.result });
  }

  for (const spec of planned) {
    if (graph.get(spec.id)?.status === "succeeded") {
      log.debug(`Planned node "${spec.id}" already succeeded, keeping prior result`);
      continue;
    }
    graph.addNode(spec);
  }

  graph.assertResolved();
  return graph;
}
