import type { TaskResult } from "../graph/types.js";
import type { Capability, CapabilityKind, InvocationContext } from "./types.js";

export type CapabilityFunction = (
  args: Record<string, unknown>,
  ctx: InvocationContext,
) => Promise<string | TaskResult>;

export type FunctionCapabilityOptions = {
  name: string;
  fn: CapabilityFunction;
  /** Defaults to "function"; sub-agents and protocol tools wrapped as functions set their own kind. */
  kind?: CapabilityKind;
  description?: string;
};

/** Wraps a plain async function as a capability. */
export class FunctionCapability implements Capability {
  readonly name: string;
  readonly kind: CapabilityKind;
  readonly description?: string;

  private fn: CapabilityFunction;

  constructor(opts: FunctionCapabilityOptions) {
    this.name = opts.name;
    this.kind = opts.kind ?? "function";
    this.description = opts.description;
    this.fn = opts.fn;
  }

  async invoke(args: Record<string, unknown>, ctx: InvocationContext): Promise<TaskResult> {
    const start = Date.now();
    const out = await this.fn(args, ctx);
    if (typeof out === "string") {
      return { output: out, durationMs: Date.now() - start };
    }
    return { ...out, durationMs: out.durationMs ?? Date.now() - start };
  }
}
