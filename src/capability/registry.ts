import { CapabilityError, ConfigError, TimeoutError, toErrorMessage } from "../errors.js";
import type { TaskResult } from "../graph/types.js";
import { createLogger } from "../utils/logger.js";
import { withTimeout } from "../utils/timeout.js";
import type { Capability, CapabilityInvocationPort, CapabilityKind, InvokeOptions } from "./types.js";

const log = createLogger("capability");

/** Keyed store of capabilities, one session's worth. */
export class CapabilityRegistry {
  private capabilities = new Map<string, Capability>();

  add(capability: Capability): void {
    if (this.capabilities.has(capability.name)) {
      throw new ConfigError(`Capability "${capability.name}" already registered`);
    }
    this.capabilities.set(capability.name, capability);
  }

  remove(name: string): boolean {
    return this.capabilities.delete(name);
  }

  get(name: string): Capability | undefined {
    return this.capabilities.get(name);
  }

  list(): Capability[] {
    return [...this.capabilities.values()];
  }

  names(): string[] {
    return [...this.capabilities.keys()];
  }

  ofKind(kind: CapabilityKind): Capability[] {
    return this.list().filter((c) => c.kind === kind);
  }
}

/**
 * Port that resolves a capability by name and runs it under the caller's
 * timeout. Anything a capability throws comes out as a {@link CapabilityError}
 * or a {@link TimeoutError}.
 */
export class RegistryCapabilityPort implements CapabilityInvocationPort {
  constructor(private readonly registry: CapabilityRegistry) {}

  async invoke(capabilityRef: string, args: Record<string, unknown>, opts: InvokeOptions): Promise<TaskResult> {
    const capability = this.registry.get(capabilityRef);
    if (!capability) {
      throw new CapabilityError(capabilityRef, `No capability registered under "${capabilityRef}"`);
    }

    const start = Date.now();
    log.debug(`Invoking ${capability.kind} "${capabilityRef}"`);
    try {
      const result = await withTimeout(
        capability.invoke(args, { capabilityRef, signal: opts.signal }),
        opts.timeoutMs,
        opts.signal,
        `Capability "${capabilityRef}"`,
      );
      return { ...result, durationMs: result.durationMs ?? Date.now() - start };
    } catch (err) {
      if (err instanceof TimeoutError || err instanceof CapabilityError) throw err;
      throw new CapabilityError(capabilityRef, toErrorMessage(err), { cause: err });
    }
  }
}
