import { randomUUID } from "node:crypto";
import type { CapabilityInvocationPort } from "../capability/types.js";
import { resolveSessionConfig } from "../config.js";
import type { DeepPartial, SessionConfig } from "../config.js";
import { ContextStore } from "../context/context-store.js";
import type { ArchiveStore, SummarizationPort, TokenEstimator } from "../context/types.js";
import {
  BudgetExceededError,
  CheckpointError,
  GraphIntegrityError,
  PlanningError,
  ValidationFailure,
  toErrorMessage,
} from "../errors.js";
import { Executor } from "../executor/executor.js";
import { buildTaskGraph } from "../graph/build.js";
import { TaskGraph } from "../graph/task-graph.js";
import type { TaskNodeSpec, TaskResult } from "../graph/types.js";
import { NoopCheckpointSink } from "../persistence/checkpoint.js";
import { buildReplanFeedback } from "../planner/feedback.js";
import type { PlanningPort } from "../planner/types.js";
import { parseSnapshot } from "../schemas.js";
import { createLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import { gateValidation } from "../validation/gate.js";
import { InputValidator } from "../validation/input-validator.js";
import type { InputValidatorPort, LatestResults, ValidationResult, ValidatorPort } from "../validation/types.js";
import { renderObservation, renderPlan, renderReflection, renderValidation } from "./rounds.js";
import type {
  CheckpointSink,
  LoopHooks,
  LoopOutcome,
  LoopPhase,
  LoopSnapshot,
  ReflectionPort,
  Termination,
  TerminationReason,
} from "./types.js";

const log = createLogger("loop");

export type AgentLoopControllerOptions = {
  sessionId?: string;
  config?: DeepPartial<SessionConfig>;
  planner: PlanningPort;
  capabilities: CapabilityInvocationPort;
  validator: ValidatorPort;
  /** Screens the goal before the first plan. Defaults to {@link InputValidator} with its default rules. */
  inputValidator?: InputValidatorPort;
  summarizer: SummarizationPort;
  reflector?: ReflectionPort;
  checkpoint?: CheckpointSink;
  archive?: ArchiveStore;
  estimateTokens?: TokenEstimator;
  hooks?: LoopHooks;
};

type Terminal = { termination: Exclude<Termination, "none">; reason: TerminationReason };

function isTerminalPhase(phase: LoopPhase): phase is "DONE" | "FAILED" {
  return phase === "DONE" || phase === "FAILED";
}

/**
 * Drives one session through PLANNING → EXECUTION → OBSERVATION →
 * (REFLECTION) → VALIDATION → (REPLANNING) until DONE or FAILED. Owns the
 * session's task graph and context store exclusively.
 */
export class AgentLoopController {
  readonly sessionId: string;
  readonly config: SessionConfig;

  private readonly planner: PlanningPort;
  private readonly validator: ValidatorPort;
  private readonly inputValidator: InputValidatorPort;
  private readonly reflector?: ReflectionPort;
  private readonly checkpoint: CheckpointSink;
  private readonly executor: Executor;
  private readonly hooks: LoopHooks;
  private readonly summarizer: SummarizationPort;
  private readonly archive?: ArchiveStore;
  private readonly estimateTokens?: TokenEstimator;

  private goal = "";
  private phase: LoopPhase = "PLANNING";
  private iteration = 0;
  private graph?: TaskGraph;
  private context: ContextStore;
  private lastValidation?: ValidationResult;
  private termination: Termination = "none";
  private reason?: TerminationReason;
  private results: Record<string, TaskResult> = {};
  private latestResults: LatestResults = {};
  private iterationNodes: string[] = [];
  private replanFeedback?: string;
  private sessionTimedOut = false;
  private started = false;

  constructor(opts: AgentLoopControllerOptions) {
    this.sessionId = opts.sessionId ?? randomUUID();
    this.config = resolveSessionConfig(opts.config);
    this.planner = opts.planner;
    this.validator = opts.validator;
    this.inputValidator = opts.inputValidator ?? new InputValidator();
    this.reflector = opts.reflector;
    this.checkpoint = opts.checkpoint ?? new NoopCheckpointSink();
    this.executor = new Executor(opts.capabilities);
    this.hooks = opts.hooks ?? {};
    this.summarizer = opts.summarizer;
    this.archive = opts.archive;
    this.estimateTokens = opts.estimateTokens;
    this.context = this.newContext();
  }

  get currentPhase(): LoopPhase {
    return this.phase;
  }

  get contextStore(): ContextStore {
    return this.context;
  }

  get taskGraph(): TaskGraph | undefined {
    return this.graph;
  }

  /** Run a fresh session for `goal` to completion. */
  async run(goal: string): Promise<LoopOutcome> {
    this.claim();
    this.goal = goal;
    log.info("Session started", { sessionId: this.sessionId, goal });
    await this.save();
    return this.drive();
  }

  /**
   * Continue a session from the checkpoint sink. The context store's view is
   * rebuilt from the stored rounds before the state machine re-enters the
   * saved phase.
   */
  async resume(): Promise<LoopOutcome> {
    this.claim();
    const stored = await this.checkpoint.load(this.sessionId);
    if (!stored) throw new CheckpointError(`No checkpoint for session "${this.sessionId}"`);
    this.restore(parseSnapshot(stored));
    log.info("Session resumed", { sessionId: this.sessionId, phase: this.phase, iteration: this.iteration });
    return this.drive();
  }

  snapshot(): LoopSnapshot {
    return {
      sessionId: this.sessionId,
      goal: this.goal,
      phase: this.phase,
      iteration: this.iteration,
      graph: this.graph?.snapshot(),
      context: this.context.snapshot(),
      lastValidation: this.lastValidation,
      termination: this.termination,
      reason: this.reason,
      results: { ...this.results },
      iterationNodes: [...this.iterationNodes],
      replanFeedback: this.replanFeedback,
      sessionTimedOut: this.sessionTimedOut,
      savedAt: Date.now(),
    };
  }

  // -------------------------------------------------------------------------
  // State machine
  // -------------------------------------------------------------------------

  private async drive(): Promise<LoopOutcome> {
    const abort = new AbortController();
    const timer = setTimeout(() => {
      this.sessionTimedOut = true;
      log.warn("Session timed out, cancelling in-flight work", { timeoutMs: this.config.session.timeoutMs });
      abort.abort();
    }, this.config.session.timeoutMs);

    try {
      while (!isTerminalPhase(this.phase)) {
        let next: LoopPhase;
        try {
          next = await this.step(this.phase, abort.signal);
        } catch (err) {
          const terminal = this.classify(err);
          if (!terminal) throw err;
          this.finish(terminal);
          next = "FAILED";
        }
        await this.transition(next);
      }
    } finally {
      clearTimeout(timer);
    }

    return this.outcome();
  }

  private async step(phase: LoopPhase, signal: AbortSignal): Promise<LoopPhase> {
    switch (phase) {
      case "PLANNING":
        return this.plan(signal);
      case "EXECUTION":
        return this.execute(signal);
      case "OBSERVATION":
        return this.observe();
      case "REFLECTION":
        return this.reflect(signal);
      case "VALIDATION":
        return this.validate();
      case "REPLANNING":
        return this.replan();
      case "DONE":
      case "FAILED":
        return phase;
    }
  }

  private async plan(signal: AbortSignal): Promise<LoopPhase> {
    const { maxIterations } = this.config.loop;
    if (this.sessionTimedOut) {
      this.finish({
        termination: "failed",
        reason: { code: "session_timeout", message: "Session timed out before planning" },
      });
      return "FAILED";
    }
    if (this.iteration === 0) {
      const verdict = this.inputValidator.validate(this.goal);
      if (!verdict.passed) {
        this.lastValidation = verdict;
        this.finish({
          termination: "failed",
          reason: { code: "input_rejected", message: `Goal rejected: ${describeFailure(verdict)}` },
        });
        return "FAILED";
      }
    }
    if (this.iteration >= maxIterations) {
      this.finish({
        termination: "max_iterations_exceeded",
        reason: { code: "max_iterations", message: `Reached the limit of ${maxIterations} iterations` },
      });
      return "FAILED";
    }

    this.iteration += 1;
    this.iterationNodes = [];
    this.latestResults = {};
    const carried = this.graph?.succeededNodes() ?? [];

    let specs: TaskNodeSpec[];
    try {
      const planning = this.planner.plan({
        goal: this.goal,
        iteration: this.iteration,
        view: this.context.effectiveView(),
        carried,
        feedback: this.replanFeedback,
        signal,
      });
      specs = await withTimeout(planning, this.config.session.timeoutMs, signal, "Planner");
    } catch (err) {
      if (this.sessionTimedOut) {
        this.finish({
          termination: "failed",
          reason: { code: "session_timeout", message: "Session timed out during planning" },
        });
        return "FAILED";
      }
      if (err instanceof PlanningError) throw err;
      throw new PlanningError(`Planning failed: ${toErrorMessage(err)}`, { cause: err });
    }

    this.graph = buildTaskGraph(this.goal, specs, carried, (this.graph?.version ?? 0) + 1);
    this.replanFeedback = undefined;
    log.info(`Plan v${this.graph.version} ready`, { nodes: this.graph.size, carried: carried.length });
    await this.context.appendRound(renderPlan(this.graph, this.iteration), "plan");
    return "EXECUTION";
  }

  private async execute(signal: AbortSignal): Promise<LoopPhase> {
    if (!this.graph) return "PLANNING";
    const { loop, nodes } = this.config;

    const report = await this.executor.execute(this.graph, {
      maxParallelism: loop.parallelExecution ? loop.maxParallelism : 1,
      retryLimit: nodes.retryLimit,
      nodeTimeoutMs: nodes.timeoutMs,
      signal,
      onNodeStart: this.hooks.onNodeStart,
      onNodeEnd: this.hooks.onNodeEnd,
    });

    Object.assign(this.latestResults, report.results);
    Object.assign(this.results, report.results);
    for (const id of report.touched) {
      if (!this.iterationNodes.includes(id)) this.iterationNodes.push(id);
    }
    log.info("Execution finished", {
      waves: report.waves,
      succeeded: Object.keys(report.results).length,
      aborted: report.aborted,
      deadlocked: report.deadlocked,
      durationMs: report.durationMs,
    });
    if (report.deadlocked) {
      const stuck = this.graph.nodes().filter((n) => n.status === "pending").map((n) => n.id);
      log.warn("Execution stalled with unfinished nodes", { nodes: stuck });
    }
    return "OBSERVATION";
  }

  private async observe(): Promise<LoopPhase> {
    if (this.graph) {
      await this.context.appendRound(renderObservation(this.graph, this.iterationNodes, this.iteration), "observation");
    }
    const reflect = this.config.loop.enableReflection && this.reflector !== undefined && !this.sessionTimedOut;
    return reflect ? "REFLECTION" : "VALIDATION";
  }

  private async reflect(signal: AbortSignal): Promise<LoopPhase> {
    if (!this.reflector) return "VALIDATION";
    let notes: string[];
    try {
      const reflecting = this.reflector.reflect({
        goal: this.goal,
        iteration: this.iteration,
        view: this.context.effectiveView(),
        nodes: this.graph?.nodes() ?? [],
      });
      notes = await withTimeout(reflecting, this.config.session.timeoutMs, signal, "Reflector");
    } catch (err) {
      log.warn("Reflection failed, continuing without notes", { error: toErrorMessage(err) });
      return "VALIDATION";
    }
    if (notes.length > 0) {
      await this.context.appendRound(renderReflection(notes, this.iteration), "reflection");
    }
    return "VALIDATION";
  }

  private async validate(): Promise<LoopPhase> {
    let reported: ValidationResult;
    try {
      // Runs after a session timeout too, so only the node timeout bounds it.
      const validating = this.validator.validate(this.context.effectiveView(), { ...this.latestResults });
      reported = await withTimeout(validating, this.config.nodes.timeoutMs, undefined, "Validator");
    } catch (err) {
      if (err instanceof ValidationFailure) {
        reported = err.result;
      } else {
        log.error("Validator failed", { error: toErrorMessage(err) });
        reported = {
          passed: false,
          violations: [{ ruleName: "validator.error", severity: "error", message: toErrorMessage(err) }],
        };
      }
    }

    const result = gateValidation(reported, this.graph);
    this.lastValidation = result;
    await this.context.appendRound(renderValidation(result, this.iteration), "validation");

    const cancelled = this.sessionTimedOut && (this.graph?.nodes().some((n) => n.status === "skipped") ?? false);
    if (result.passed && !cancelled) {
      this.finish({
        termination: "completed",
        reason: { code: "completed", message: `Completed after ${this.iteration} iteration(s)` },
      });
      return "DONE";
    }

    if (this.sessionTimedOut) {
      this.finish({
        termination: "failed",
        reason: { code: "session_timeout", message: `Session timed out after ${this.config.session.timeoutMs}ms` },
      });
      return "FAILED";
    }

    const { enableReplanning, maxIterations } = this.config.loop;
    if (enableReplanning && this.iteration < maxIterations) return "REPLANNING";

    if (enableReplanning) {
      this.finish({
        termination: "max_iterations_exceeded",
        reason: {
          code: "max_iterations",
          message: `Validation still failing after ${this.iteration} of ${maxIterations} iterations`,
        },
      });
    } else {
      this.finish({ termination: "failed", reason: { code: "validation_failed", message: describeFailure(result) } });
    }
    return "FAILED";
  }

  private async replan(): Promise<LoopPhase> {
    this.replanFeedback = buildReplanFeedback(this.graph, this.lastValidation);
    return "PLANNING";
  }

  private async transition(next: LoopPhase): Promise<void> {
    const from = this.phase;
    this.phase = next;
    if (from !== next) {
      const level = next === "FAILED" ? "error" : "info";
      log[level](`${from} -> ${next}`, { iteration: this.iteration, ...(this.reason ? { reason: this.reason.code } : {}) });
    }
    const snapshot = await this.save();
    this.hooks.onPhase?.(from, next, snapshot);
  }

  private finish(terminal: Terminal): void {
    this.termination = terminal.termination;
    this.reason = terminal.reason;
  }

  /** Map an error thrown inside a phase to a terminal state, or undefined to rethrow. */
  private classify(err: unknown): Terminal | undefined {
    if (err instanceof PlanningError) {
      return { termination: "failed", reason: { code: "planning_error", message: err.message } };
    }
    if (err instanceof GraphIntegrityError) {
      return { termination: "failed", reason: { code: "graph_integrity", message: err.message } };
    }
    if (err instanceof BudgetExceededError) {
      return { termination: "failed", reason: { code: "budget_exceeded", message: err.message } };
    }
    log.error("Unexpected error in agent loop", { phase: this.phase, error: toErrorMessage(err) });
    return undefined;
  }

  private async save(): Promise<LoopSnapshot> {
    const snapshot = this.snapshot();
    await this.checkpoint.save(snapshot);
    return snapshot;
  }

  private outcome(): LoopOutcome {
    const phase = this.phase === "DONE" ? "DONE" : "FAILED";
    const termination = this.termination === "none" ? "failed" : this.termination;
    return {
      sessionId: this.sessionId,
      phase,
      termination,
      reason: this.reason ?? { code: "validation_failed", message: "Session ended without a reason" },
      iterations: this.iteration,
      results: { ...this.results },
      lastValidation: this.lastValidation,
      view: this.context.effectiveView(),
      graph: this.graph?.snapshot(),
    };
  }

  // -------------------------------------------------------------------------
  // Setup and recovery
  // -------------------------------------------------------------------------

  private claim(): void {
    if (this.started) throw new Error(`Session "${this.sessionId}" is already running or finished`);
    this.started = true;
  }

  private newContext(): ContextStore {
    return new ContextStore({
      sessionId: this.sessionId,
      config: this.config.context,
      summarizer: this.summarizer,
      archive: this.archive,
      estimateTokens: this.estimateTokens,
    });
  }

  private restore(snapshot: LoopSnapshot): void {
    if (snapshot.sessionId !== this.sessionId) {
      throw new CheckpointError(`Checkpoint belongs to session "${snapshot.sessionId}"`);
    }
    this.goal = snapshot.goal;
    this.phase = snapshot.phase;
    this.iteration = snapshot.iteration;
    this.lastValidation = snapshot.lastValidation;
    this.termination = snapshot.termination;
    this.reason = snapshot.reason;
    this.results = { ...snapshot.results };
    this.iterationNodes = [...snapshot.iterationNodes];
    this.replanFeedback = snapshot.replanFeedback;
    this.sessionTimedOut = false;
    this.context = ContextStore.restore(snapshot.context, {
      config: this.config.context,
      summarizer: this.summarizer,
      archive: this.archive,
      estimateTokens: this.estimateTokens,
    });

    if (snapshot.graph) {
      this.graph = TaskGraph.fromSnapshot(snapshot.graph);
      this.recoverInterrupted(this.graph);
    }
    this.latestResults = {};
    for (const id of this.iterationNodes) {
      const result = this.results[id];
      if (result) this.latestResults[id] = result;
    }
  }

  /** Nodes caught mid-flight count as one failed attempt. */
  private recoverInterrupted(graph: TaskGraph): void {
    for (const node of graph.nodes()) {
      const status = node.status;
      if (status !== "ready" && status !== "running") continue;
      if (status === "ready") graph.mark(node.id, "running");
      graph.mark(node.id, "failed", { error: "interrupted by restart" });
      if (!graph.requeue(node.id, this.config.nodes.retryLimit)) {
        graph.skipDownstream(node.id);
      }
      log.warn(`Recovered interrupted node "${node.id}"`, { status });
    }
  }
}

function describeFailure(result: ValidationResult): string {
  const errors = result.violations.filter((v) => v.severity === "error");
  if (errors.length === 0) return "Validation failed";
  return errors.map((v) => `${v.ruleName}: ${v.message}`).join("; ");
}
