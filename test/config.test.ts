import { describe, expect, it } from "vitest";
import { defaults, resolveSessionConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("resolveSessionConfig", () => {
  it("returns the defaults when nothing is overridden", () => {
    expect(resolveSessionConfig()).toEqual(defaults);
    expect(defaults.loop.maxIterations).toBe(10);
    expect(defaults.nodes.retryLimit).toBe(3);
    expect(defaults.context.compressionThresholdFraction).toBe(0.8);
  });

  it("deep-merges partial overrides", () => {
    const config = resolveSessionConfig({ loop: { maxIterations: 2 }, context: { maxTokens: 500 } });

    expect(config.loop.maxIterations).toBe(2);
    expect(config.loop.enableReplanning).toBe(true);
    expect(config.context.maxTokens).toBe(500);
    expect(config.context.summaryRatio).toBe(0.3);
  });

  it("gives every session its own copy", () => {
    const a = resolveSessionConfig();
    a.loop.maxIterations = 99;
    expect(resolveSessionConfig().loop.maxIterations).toBe(10);
    expect(defaults.loop.maxIterations).toBe(10);
  });

  it("rejects out-of-range values with the offending path", () => {
    expect(() => resolveSessionConfig({ context: { compressionThresholdFraction: 1.5 } })).toThrow(ConfigError);
    expect(() => resolveSessionConfig({ nodes: { retryLimit: 0 } })).toThrow(/^Invalid session config: nodes\.retryLimit:/);
  });
});
