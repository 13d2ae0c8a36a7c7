import type { CapabilityInvocationPort } from "../capability/types.js";
import { AgentLoopError, GraphIntegrityError, TimeoutError, isRetryable, toErrorMessage } from "../errors.js";
import type { TaskGraph } from "../graph/task-graph.js";
import type { TaskNode } from "../graph/types.js";
import { createLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { ExecutionOptions, ExecutionReport } from "./types.js";

const log = createLogger("executor");

/**
 * Runs the ready nodes of a graph in waves until it is terminal. Nodes in a
 * wave have no edge between them, so they run side by side; the next wave
 * starts only after every node of the current one has settled.
 */
export class Executor {
  constructor(private readonly capabilities: CapabilityInvocationPort) {}

  async execute(graph: TaskGraph, opts: ExecutionOptions): Promise<ExecutionReport> {
    const start = Date.now();
    const report: ExecutionReport = {
      results: {},
      attempts: [],
      touched: [],
      waves: 0,
      aborted: false,
      deadlocked: false,
      durationMs: 0,
    };
    const limit = Math.max(1, opts.maxParallelism);

    while (!graph.isTerminal()) {
      if (opts.signal?.aborted) {
        report.aborted = true;
        this.skipRemaining(graph, report);
        break;
      }

      const ready = graph.readyNodes();
      if (ready.length === 0) {
        // Only reachable with dependencies that never resolve.
        log.error("Execution deadlock: no ready nodes but graph not terminal");
        report.deadlocked = true;
        break;
      }

      const wave = ready.slice(0, limit);
      for (const node of wave) graph.mark(node.id, "ready");
      report.waves += 1;
      log.debug(`Wave ${report.waves}`, { nodes: wave.map((n) => n.id) });

      const settled = await Promise.allSettled(wave.map((node) => this.runNode(graph, node, opts, report)));
      for (const outcome of settled) {
        if (outcome.status === "rejected") throw outcome.reason;
      }
    }

    report.aborted ||= opts.signal?.aborted === true;
    report.durationMs = Date.now() - start;
    return report;
  }

  private async runNode(
    graph: TaskGraph,
    node: TaskNode,
    opts: ExecutionOptions,
    report: ExecutionReport,
  ): Promise<void> {
    graph.mark(node.id, "running");
    opts.onNodeStart?.(node);
    const attempt = node.retryCount + 1;
    log.info(`Dispatching "${node.id}" to "${node.capabilityRef}"`, { attempt });

    try {
      const invocation = this.capabilities.invoke(node.capabilityRef, node.arguments, {
        timeoutMs: opts.nodeTimeoutMs,
        signal: opts.signal,
      });
      const result = await withTimeout(invocation, opts.nodeTimeoutMs, opts.signal, `Node "${node.id}"`);
      graph.mark(node.id, "succeeded", { result });
      report.results[node.id] = result;
      report.attempts.push({ nodeId: node.id, attempt, ok: true });
    } catch (err) {
      if (err instanceof GraphIntegrityError) throw err;
      const message = toErrorMessage(err);
      graph.mark(node.id, "failed", { error: message });
      report.attempts.push({ nodeId: node.id, attempt, ok: false, error: message });

      const retry = isRetryable(err) || !(err instanceof AgentLoopError);
      const aborted = opts.signal?.aborted === true;
      if (!aborted && retry && graph.requeue(node.id, opts.retryLimit)) {
        log.warn(`Node "${node.id}" failed, will retry`, { attempt, error: message });
      } else {
        const kind = err instanceof TimeoutError ? "timed out" : "failed";
        log.warn(`Node "${node.id}" ${kind} permanently`, { attempts: node.retryCount, error: message });
        graph.skipDownstream(node.id);
      }
    }

    if (!report.touched.includes(node.id)) report.touched.push(node.id);
    opts.onNodeEnd?.(node);
  }

  private skipRemaining(graph: TaskGraph, report: ExecutionReport): void {
    const skipped: string[] = [];
    for (const node of graph.nodes()) {
      if (node.status === "pending" || node.status === "ready") {
        graph.mark(node.id, "skipped");
        skipped.push(node.id);
        report.touched.push(node.id);
      }
    }
    log.warn("Session cancelled, skipped remaining nodes", { skipped });
  }
}
