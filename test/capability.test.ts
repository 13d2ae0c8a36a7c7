import { describe, expect, it } from "vitest";
import { FunctionCapability } from "../src/capability/function-capability.js";
import { CapabilityRegistry, RegistryCapabilityPort } from "../src/capability/registry.js";
import { CapabilityError, ConfigError, TimeoutError } from "../src/errors.js";

function echo(name = "echo") {
  return new FunctionCapability({ name, fn: async (args) => `echo:${String(args.text)}` });
}

describe("CapabilityRegistry", () => {
  it("stores capabilities by name", () => {
    const registry = new CapabilityRegistry();
    registry.add(echo());
    registry.add(new FunctionCapability({ name: "researcher", kind: "subagent", fn: async () => "notes" }));

    expect(registry.names()).toEqual(["echo", "researcher"]);
    expect(registry.get("echo")?.kind).toBe("function");
    expect(registry.ofKind("subagent").map((c) => c.name)).toEqual(["researcher"]);
  });

  it("rejects a duplicate name", () => {
    const registry = new CapabilityRegistry();
    registry.add(echo());
    expect(() => registry.add(echo())).toThrow(ConfigError);
    expect(() => registry.add(echo())).toThrow('Capability "echo" already registered');
  });

  it("removes capabilities", () => {
    const registry = new CapabilityRegistry();
    registry.add(echo());
    expect(registry.remove("echo")).toBe(true);
    expect(registry.remove("echo")).toBe(false);
    expect(registry.list()).toEqual([]);
  });
});

describe("RegistryCapabilityPort", () => {
  function port(...capabilities: FunctionCapability[]) {
    const registry = new CapabilityRegistry();
    for (const c of capabilities) registry.add(c);
    return new RegistryCapabilityPort(registry);
  }

  it("invokes the named capability with its arguments", async () => {
    const result = await port(echo()).invoke("echo", { text: "hi" }, { timeoutMs: 1000 });

    expect(result.output).toBe("echo:hi");
    expect(typeof result.durationMs).toBe("number");
  });

  it("keeps structured results", async () => {
    const capability = new FunctionCapability({
      name: "lookup",
      fn: async () => ({ output: "found", data: { rows: 2 }, durationMs: 7 }),
    });
    const result = await port(capability).invoke("lookup", {}, { timeoutMs: 1000 });

    expect(result).toEqual({ output: "found", data: { rows: 2 }, durationMs: 7 });
  });

  it("fails on an unknown capability", async () => {
    await expect(port().invoke("missing", {}, { timeoutMs: 1000 })).rejects.toThrow(
      'No capability registered under "missing"',
    );
  });

  it("wraps thrown errors as capability errors", async () => {
    const broken = new FunctionCapability({
      name: "broken",
      fn: async () => {
        throw new Error("disk full");
      },
    });

    const err = await port(broken).invoke("broken", {}, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CapabilityError);
    if (err instanceof CapabilityError) {
      expect(err.message).toBe("disk full");
      expect(err.capabilityRef).toBe("broken");
    }
  });

  it("times out slow capabilities", async () => {
    const slow = new FunctionCapability({ name: "slow", fn: () => new Promise<string>(() => {}) });

    await expect(port(slow).invoke("slow", {}, { timeoutMs: 20 })).rejects.toThrow(
      'Capability "slow" timed out after 20ms',
    );
  });

  it("stops when the session signal aborts", async () => {
    const slow = new FunctionCapability({ name: "slow", fn: () => new Promise<string>(() => {}) });
    const controller = new AbortController();

    const pending = port(slow).invoke("slow", {}, { timeoutMs: 5000, signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow('Capability "slow" aborted: session timed out');
  });

  it("passes the signal through to the capability", async () => {
    const controller = new AbortController();
    let seen: AbortSignal | undefined;
    const capability = new FunctionCapability({
      name: "spy",
      fn: async (_args, ctx) => {
        seen = ctx.signal;
        return ctx.capabilityRef;
      },
    });

    const result = await port(capability).invoke("spy", {}, { timeoutMs: 1000, signal: controller.signal });

    expect(result.output).toBe("spy");
    expect(seen).toBe(controller.signal);
  });
});
