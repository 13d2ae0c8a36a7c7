import {
  CycleError,
  DuplicateIdError,
  InvalidTransitionError,
  UnknownNodeError,
} from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { TaskGraphSnapshot, TaskNode, TaskNodeSpec, TaskResult, TaskStatus } from "./types.js";

const log = createLogger("graph");

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["ready", "skipped"],
  ready: ["running", "skipped"],
  running: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
  skipped: [],
};

export type MarkPayload = { result?: TaskResult; error?: string };

/**
 * Dependency graph for one planning pass. Nodes keep insertion order, which
 * is the tie-break for every ordered query.
 */
export class TaskGraph {
  readonly goal: string;
  readonly version: number;
  private readonly byId = new Map<string, TaskNode>();

  constructor(goal: string, version = 1) {
    this.goal = goal;
    this.version = version;
  }

  get size(): number {
    return this.byId.size;
  }

  /**
   * Insert a node. Dependencies may name ids that are added later; they stay
   * unsatisfied until then. Rejects duplicates and cycles without mutating.
   */
  addNode(spec: TaskNodeSpec): TaskNode {
    if (this.byId.has(spec.id)) throw new DuplicateIdError(spec.id);

    const dependencies = [...new Set(spec.dependencies ?? [])];
    for (const dep of dependencies) {
      const path = this.pathBetween(dep, spec.id);
      if (path) throw new CycleError([spec.id, ...path]);
    }

    const node: TaskNode = {
      id: spec.id,
      description: spec.description,
      capabilityRef: spec.capabilityRef,
      arguments: { ...(spec.arguments ?? {}) },
      dependencies,
      status: "pending",
      retryCount: 0,
    };
    this.byId.set(node.id, node);
    return node;
  }

  /** Add a single edge: `id` will wait for `dependsOn`. */
  addDependency(id: string, dependsOn: string): void {
    const node = this.require(id);
    if (node.dependencies.includes(dependsOn)) return;
    const path = this.pathBetween(dependsOn, id);
    if (path) throw new CycleError([id, ...path]);
    node.dependencies.push(dependsOn);
  }

  get(id: string): TaskNode | undefined {
    return this.byId.get(id);
  }

  nodes(): TaskNode[] {
    return [...this.byId.values()];
  }

  /** Pending nodes whose dependencies all succeeded or were skipped. */
  readyNodes(): TaskNode[] {
    return this.nodes().filter(
      (n) => n.status === "pending" && n.dependencies.every((d) => this.isSatisfied(d)),
    );
  }

  mark(id: string, status: TaskStatus, payload?: MarkPayload): TaskNode {
    const node = this.require(id);
    if (!TRANSITIONS[node.status].includes(status)) {
      throw new InvalidTransitionError(id, node.status, status);
    }
    node.status = status;
    if (status === "succeeded") {
      node.result = payload?.result ?? { output: "" };
      node.error = undefined;
    } else if (status === "failed") {
      node.error = payload?.error ?? "failed";
      node.retryCount += 1;
    }
    return node;
  }

  /**
   * Put a failed node back to `pending` for another attempt. Returns false
   * when the retry budget is spent; the node then stays failed for good.
   */
  requeue(id: string, retryLimit: number): boolean {
    const node = this.require(id);
    if (node.status !== "failed") {
      throw new InvalidTransitionError(id, node.status, "pending");
    }
    if (node.retryCount >= retryLimit) return false;
    node.status = "pending";
    return true;
  }

  /** Skip every transitive dependent of `id` that has not started. */
  skipDownstream(id: string): string[] {
    const dependents = this.dependentsIndex();
    const queue = [...(dependents.get(id) ?? [])];
    const visited = new Set<string>();
    const skipped: string[] = [];

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || visited.has(next)) continue;
      visited.add(next);
      const node = this.byId.get(next);
      if (node && (node.status === "pending" || node.status === "ready")) {
        node.status = "skipped";
        skipped.push(next);
      }
      queue.push(...(dependents.get(next) ?? []));
    }

    if (skipped.length > 0) {
      log.debug(`Skipped downstream of "${id}"`, { skipped });
    }
    return skipped;
  }

  /** Throws if any dependency names a node that never got added. */
  assertResolved(): void {
    for (const node of this.byId.values()) {
      for (const dep of node.dependencies) {
        if (!this.byId.has(dep)) {
          throw new UnknownNodeError(dep, `Node "${node.id}" depends on unknown node "${dep}"`);
        }
      }
    }
  }

  /** True once no node can make further progress. */
  isTerminal(): boolean {
    return this.nodes().every(
      (n) => n.status === "succeeded" || n.status === "failed" || n.status === "skipped",
    );
  }

  succeededNodes(): TaskNode[] {
    return this.nodes().filter((n) => n.status === "succeeded");
  }

  failedNodes(): TaskNode[] {
    return this.nodes().filter((n) => n.status === "failed");
  }

  hasPermanentFailures(): boolean {
    return this.isTerminal() && this.failedNodes().length > 0;
  }

  /** Dependencies first; insertion order among independent nodes. */
  topologicalOrder(): TaskNode[] {
    const visited = new Set<string>();
    const sorted: TaskNode[] = [];

    const visit = (id: string): void => {
      if (visited.has(id)) return;
      visited.add(id);
      const node = this.byId.get(id);
      if (!node) return;
      for (const dep of node.dependencies) visit(dep);
      sorted.push(node);
    };

    for (const id of this.byId.keys()) visit(id);
    return sorted;
  }

  snapshot(): TaskGraphSnapshot {
    return {
      goal: this.goal,
      version: this.version,
      nodes: this.nodes().map((n) => ({
        ...n,
        arguments: { ...n.arguments },
        dependencies: [...n.dependencies],
        result: n.result ? { ...n.result } : undefined,
      })),
    };
  }

  static fromSnapshot(snapshot: TaskGraphSnapshot): TaskGraph {
    const graph = new TaskGraph(snapshot.goal, snapshot.version);
    for (const node of snapshot.nodes) {
      graph.addNode(node);
      const added = graph.require(node.id);
      added.status = node.status;
      added.result = node.result;
      added.error = node.error;
      added.retryCount = node.retryCount;
    }
    return graph;
  }

  private require(id: string): TaskNode {
    const node = this.byId.get(id);
    if (!node) throw new UnknownNodeError(id);
    return node;
  }

  private isSatisfied(id: string): boolean {
    const status = this.byId.get(id)?.status;
    return status === "succeeded" || status === "skipped";
  }

  /** Dependency path from `from` down to `to`, or undefined when unreachable. */
  private pathBetween(from: string, to: string): string[] | undefined {
    if (from === to) return [to];
    const visited = new Set<string>();
    const stack: Array<{ id: string; path: string[] }> = [{ id: from, path: [from] }];

    while (stack.length > 0) {
      const top = stack.pop();
      if (!top || visited.has(top.id)) continue;
      visited.add(top.id);
      for (const dep of this.byId.get(top.id)?.dependencies ?? []) {
        if (dep === to) return [...top.path, to];
        stack.push({ id: dep, path: [...top.path, dep] });
      }
    }
    return undefined;
  }

  private dependentsIndex(): Map<string, string[]> {
    const dependents = new Map<string, string[]>();
    for (const node of this.byId.values()) {
      for (const dep of node.dependencies) {
        const list = dependents.get(dep) ?? [];
        list.push(node.id);
        dependents.set(dep, list);
      }
    }
    return dependents;
  }
}
