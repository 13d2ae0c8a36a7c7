import type { TaskResult } from "../graph/types.js";

/** How a capability is reached. Dispatch on the kind belongs to the registry, never the loop. */
export type CapabilityKind = "function" | "subagent" | "protocol-tool";

export type InvokeOptions = {
  timeoutMs: number;
  /** Aborted when the session times out. */
  signal?: AbortSignal;
};

export type InvocationContext = {
  capabilityRef: string;
  signal?: AbortSignal;
};

/**
 * The only way the loop executes a task step. Failures are thrown; the loop
 * treats every capability as opaque and stateless between calls.
 */
export interface CapabilityInvocationPort {
  invoke(capabilityRef: string, args: Record<string, unknown>, opts: InvokeOptions): Promise<TaskResult>;
}

export interface Capability {
  readonly name: string;
  readonly kind: CapabilityKind;
  readonly description?: string;
  invoke(args: Record<string, unknown>, ctx: InvocationContext): Promise<TaskResult>;
}
