// Config
export { resolveSessionConfig, defaults } from "./config.js";
export type { SessionConfig, LoopConfig, NodeConfig, ContextConfig, DeepPartial } from "./config.js";

// Errors
export {
  AgentLoopError,
  PlanningError,
  ParseError,
  CapabilityError,
  TimeoutError,
  ValidationFailure,
  GraphIntegrityError,
  CycleError,
  DuplicateIdError,
  UnknownNodeError,
  InvalidTransitionError,
  BudgetExceededError,
  ConfigError,
  CheckpointError,
  isRetryable,
  toErrorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { SessionConfigSchema, PlannerResponseSchema, LoopSnapshotSchema, parseSnapshot } from "./schemas.js";

// Task graph
export { TaskGraph } from "./graph/task-graph.js";
export type { MarkPayload } from "./graph/task-graph.js";
export { buildTaskGraph } from "./graph/build.js";
export type { TaskNode, TaskNodeSpec, TaskResult, TaskStatus, TaskGraphSnapshot } from "./graph/types.js";

// Context store
export { ContextStore } from "./context/context-store.js";
export type { ContextStoreOptions } from "./context/context-store.js";
export { MemoryArchiveStore } from "./context/archive.js";
export { estimateTokens, clipToBudget } from "./context/tokens.js";
export { renderContextMarkdown } from "./context/markdown.js";
export type {
  ArchiveStore,
  ContextSnapshot,
  ContextStats,
  Digest,
  LodLevel,
  Round,
  RoundKind,
  SummarizationPort,
  TokenEstimator,
  ViewEntry,
} from "./context/types.js";

// Validation
export {
  RuleValidator,
  qualityScore,
  nonEmptyResults,
  maxResultLength,
  forbiddenPatterns,
} from "./validation/rule-validator.js";
export type { ValidationRule, RuleOutcome } from "./validation/rule-validator.js";
export {
  InputValidator,
  defaultInputRules,
  maxInputLength,
  noInjection,
  noPii,
  notBlank,
} from "./validation/input-validator.js";
export type { InputRule } from "./validation/input-validator.js";
export { gateValidation } from "./validation/gate.js";
export type {
  Severity,
  Violation,
  ValidationResult,
  LatestResults,
  ValidatorPort,
  InputValidatorPort,
} from "./validation/types.js";

// Capabilities
export { CapabilityRegistry, RegistryCapabilityPort } from "./capability/registry.js";
export { FunctionCapability } from "./capability/function-capability.js";
export type { CapabilityFunction, FunctionCapabilityOptions } from "./capability/function-capability.js";
export type {
  Capability,
  CapabilityInvocationPort,
  CapabilityKind,
  InvocationContext,
  InvokeOptions,
} from "./capability/types.js";

// Executor
export { Executor } from "./executor/executor.js";
export type { ExecutionOptions, ExecutionReport, NodeAttempt } from "./executor/types.js";

// Planner
export { ModelPlanner, parsePlannerResponse } from "./planner/planner.js";
export type { ModelPlannerOptions } from "./planner/planner.js";
export { buildReplanFeedback } from "./planner/feedback.js";
export type { ModelPort, PlanningPort, PlanRequest } from "./planner/types.js";

// Loop
export { AgentLoopController } from "./loop/controller.js";
export type { AgentLoopControllerOptions } from "./loop/controller.js";
export type {
  CheckpointSink,
  LoopHooks,
  LoopOutcome,
  LoopPhase,
  LoopSnapshot,
  ReasonCode,
  ReflectionPort,
  ReflectionRequest,
  Termination,
  TerminationReason,
} from "./loop/types.js";

// Persistence
export { NoopCheckpointSink, MemoryCheckpointSink } from "./persistence/checkpoint.js";
export { SqliteCheckpointStore, SqliteArchiveStore, DEFAULT_DB_PATH } from "./persistence/store.js";
export type { SessionSummary } from "./persistence/store.js";

// Utils
export { createLogger, setLogLevel, getLogLevel, log } from "./utils/logger.js";
export type { Logger, LogLevel } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
export type { RetryOptions } from "./utils/retry.js";
export { withTimeout } from "./utils/timeout.js";
