import type { TaskStatus } from "./graph/types.js";
import type { ValidationResult } from "./validation/types.js";

export type ErrorCode =
  | "PLANNING_FAILED"
  | "PARSE_FAILED"
  | "CAPABILITY_FAILED"
  | "TIMEOUT"
  | "VALIDATION_FAILED"
  | "CYCLE"
  | "DUPLICATE_ID"
  | "UNKNOWN_NODE"
  | "INVALID_TRANSITION"
  | "BUDGET_EXCEEDED"
  | "INVALID_CONFIG"
  | "CHECKPOINT_INVALID";

export class AgentLoopError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Planning produced no usable graph. Ends the session. */
export class PlanningError extends AgentLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PLANNING_FAILED", message, options);
  }
}

export class ParseError extends AgentLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_FAILED", message, options);
  }
}

export class CapabilityError extends AgentLoopError {
  readonly capabilityRef: string;

  constructor(capabilityRef: string, message: string, options?: { cause?: unknown }) {
    super("CAPABILITY_FAILED", message, options);
    this.capabilityRef = capabilityRef;
  }
}

export class TimeoutError extends AgentLoopError {
  readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number) {
    super("TIMEOUT", message);
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationFailure extends AgentLoopError {
  readonly result: ValidationResult;

  constructor(result: ValidationResult) {
    const first = result.violations[0];
    super("VALIDATION_FAILED", first ? `${first.ruleName}: ${first.message}` : "Validation failed");
    this.result = result;
  }
}

/** Programming or configuration errors in a task graph. Never retried. */
export class GraphIntegrityError extends AgentLoopError {}

export class CycleError extends GraphIntegrityError {
  readonly path: string[];

  constructor(path: string[]) {
    super("CYCLE", `Dependency cycle: ${path.join(" -> ")}`);
    this.path = path;
  }
}

export class DuplicateIdError extends GraphIntegrityError {
  constructor(readonly nodeId: string) {
    super("DUPLICATE_ID", `Node "${nodeId}" already exists`);
  }
}

export class UnknownNodeError extends GraphIntegrityError {
  constructor(readonly nodeId: string, detail?: string) {
    super("UNKNOWN_NODE", detail ?? `Unknown node "${nodeId}"`);
  }
}

export class InvalidTransitionError extends GraphIntegrityError {
  constructor(
    readonly nodeId: string,
    readonly from: TaskStatus,
    readonly to: TaskStatus,
  ) {
    super("INVALID_TRANSITION", `Node "${nodeId}" cannot move from ${from} to ${to}`);
  }
}

export class BudgetExceededError extends AgentLoopError {
  constructor(
    readonly roundIndex: number,
    readonly tokens: number,
    readonly budget: number,
  ) {
    super(
      "BUDGET_EXCEEDED",
      `Round ${roundIndex} needs ${tokens} tokens after compression but the budget is ${budget}`,
    );
  }
}

export class ConfigError extends AgentLoopError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export class CheckpointError extends AgentLoopError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CHECKPOINT_INVALID", message, options);
  }
}

/** Node-level failures that a later wave may re-attempt. */
export function isRetryable(err: unknown): boolean {
  return err instanceof CapabilityError || err instanceof TimeoutError;
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
