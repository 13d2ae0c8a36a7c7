import { describe, expect, it, vi } from "vitest";
import { resolveSessionConfig } from "../src/config.js";
import type { ContextConfig } from "../src/config.js";
import { MemoryArchiveStore } from "../src/context/archive.js";
import { ContextStore } from "../src/context/context-store.js";
import { renderContextMarkdown } from "../src/context/markdown.js";
import { clipToBudget, estimateTokens } from "../src/context/tokens.js";
import type { SummarizationPort } from "../src/context/types.js";
import { BudgetExceededError } from "../src/errors.js";
import { setLogLevel } from "../src/utils/logger.js";

setLogLevel("error");

/** Keeps the head of the raw text, exactly at budget. */
const headSummarizer: SummarizationPort = {
  async summarize(raw, budget) {
    return raw.slice(0, budget * 4);
  },
};

function contextConfig(overrides: Partial<ContextConfig> = {}): ContextConfig {
  return resolveSessionConfig({
    context: {
      maxTokens: 100,
      compressionThresholdFraction: 0.8,
      summaryRatio: 0.3,
      archiveAfterRounds: 10,
      digestFraction: 0.25,
      summarizeAttempts: 1,
      ...overrides,
    },
  }).context;
}

function store(overrides: Partial<ContextConfig> = {}, summarizer = headSummarizer) {
  return new ContextStore({ sessionId: "s1", config: contextConfig(overrides), summarizer });
}

describe("tokens", () => {
  it("estimates one token per four characters, rounded up", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcd")).toBe(1);
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("clips the head of the text to fit the budget", () => {
    expect(clipToBudget("short", 5)).toBe("short");
    expect(clipToBudget("abcdefghijklmnop", 2)).toBe("abcde...");
    expect(estimateTokens(clipToBudget("x".repeat(400), 10))).toBeLessThanOrEqual(10);
  });
});

describe("ContextStore", () => {
  it("compresses the oldest raw round once the threshold is crossed", async () => {
    const ctx = store();
    await ctx.appendRound("a".repeat(120));
    await ctx.appendRound("b".repeat(120));
    expect(ctx.viewTokens()).toBe(60);

    await ctx.appendRound("c".repeat(120));

    expect(ctx.getRound(0)?.lodLevel).toBe("compressed");
    expect(ctx.getRound(0)?.summaryTokens).toBe(9);
    expect(ctx.getRound(0)?.compressedSummary).toBe("a".repeat(36));
    expect(ctx.getRound(1)?.lodLevel).toBe("raw");
    expect(ctx.getRound(2)?.lodLevel).toBe("raw");
    expect(ctx.viewTokens()).toBe(69);
    expect(ctx.stats().compressionCount).toBe(1);
  });

  it("forces compression of a single round larger than the budget", async () => {
    const ctx = store();
    const round = await ctx.appendRound("z".repeat(500));

    expect(round.lodLevel).toBe("compressed");
    expect(round.rawTokens).toBe(125);
    expect(round.summaryTokens).toBe(38);
    expect(ctx.viewTokens()).toBe(38);
    expect(ctx.rawContent(0)).toBe("z".repeat(500));
  });

  it("keeps the view within budget across a long session", async () => {
    const ctx = store({ archiveAfterRounds: 2 });
    for (let i = 0; i < 12; i++) {
      await ctx.appendRound(`round ${i} `.padEnd(200, "x"), "observation");
      expect(ctx.viewTokens()).toBeLessThanOrEqual(100);
    }

    const stats = ctx.stats();
    expect(stats.rounds).toBe(12);
    expect(stats.folded).toBeGreaterThan(0);
    expect(ctx.effectiveView()[0].kind).toBe("digest");
    for (let i = 0; i < 12; i++) {
      expect(ctx.rawContent(i)).toBe(`round ${i} `.padEnd(200, "x"));
    }
  });

  it("folds the oldest summaries into a session digest when summaries alone overflow", async () => {
    const ctx = store({ archiveAfterRounds: 2 });
    for (let i = 0; i < 7; i++) {
      await ctx.appendRound("r".repeat(200));
    }

    const snapshot = ctx.snapshot();
    expect(snapshot.digest?.throughIndex).toBe(1);
    expect(snapshot.digest?.tokens).toBe(25);
    expect(snapshot.rounds.filter((r) => r.folded).map((r) => r.index)).toEqual([0, 1]);
    expect(ctx.viewTokens()).toBe(100);
    expect(ctx.effectiveView().map((e) => e.index)).toEqual([-1, 2, 3, 4, 5, 6]);
  });

  it("archives compressed rounds that fall behind and keeps their raw content", async () => {
    const archive = new MemoryArchiveStore();
    const ctx = new ContextStore({
      sessionId: "s1",
      config: contextConfig({ maxTokens: 1000, archiveAfterRounds: 1 }),
      summarizer: headSummarizer,
      archive,
    });
    await ctx.appendRound("a".repeat(40));
    expect(await ctx.compressRound(0)).toBe(true);

    await ctx.appendRound("b".repeat(40));

    const round = ctx.getRound(0);
    expect(round?.lodLevel).toBe("archived");
    expect(round?.rawContent).toBeUndefined();
    expect(archive.indices()).toEqual([0]);
    expect(ctx.rawContent(0)).toBe("a".repeat(40));
    expect(ctx.effectiveView()[0].content).toBe("a".repeat(12));
  });

  it("compressRound is a no-op for rounds already compressed", async () => {
    const summarize = vi.fn(headSummarizer.summarize);
    const ctx = store({ maxTokens: 1000 }, { summarize });
    await ctx.appendRound("a".repeat(40));

    expect(await ctx.compressRound(0)).toBe(true);
    const before = ctx.snapshot();
    expect(await ctx.compressRound(0)).toBe(false);

    expect(ctx.snapshot()).toEqual(before);
    expect(summarize).toHaveBeenCalledTimes(1);
    await expect(ctx.compressRound(42)).rejects.toThrow(RangeError);
  });

  it("rolls back an append whose summary exceeds the budget", async () => {
    const ctx = store({}, {
      async summarize(raw) {
        return raw.startsWith("BIG") ? "y".repeat(1000) : raw.slice(0, 4);
      },
    });
    await ctx.appendRound("small");

    await expect(ctx.appendRound("BIG" + "z".repeat(500))).rejects.toThrow(BudgetExceededError);

    expect(ctx.listRounds().map((r) => r.rawContent)).toEqual(["small"]);
    expect(ctx.stats().compressionCount).toBe(0);
    const next = await ctx.appendRound("next");
    expect(next.index).toBe(1);
  });

  it("drops archive writes made by a rolled-back append", async () => {
    const archive = new MemoryArchiveStore();
    const ctx = new ContextStore({
      sessionId: "s1",
      config: contextConfig({ archiveAfterRounds: 1 }),
      summarizer: {
        async summarize(raw, budget) {
          return raw.startsWith("Round ") ? "y".repeat(1000) : raw.slice(0, budget * 4);
        },
      },
      archive,
    });
    for (let i = 0; i < 6; i++) await ctx.appendRound(String(i).repeat(200));
    expect(archive.indices()).toEqual([0, 1, 2, 3, 4]);

    await expect(ctx.appendRound("6".repeat(200))).rejects.toThrow(BudgetExceededError);

    expect(archive.indices()).toEqual([0, 1, 2, 3, 4]);
    expect(ctx.listRounds()).toHaveLength(6);
    expect(ctx.getRound(5)?.lodLevel).toBe("compressed");
    expect(ctx.rawContent(5)).toBe("5".repeat(200));
  });

  it("clips the raw content when the summarizer keeps failing", async () => {
    const ctx = store({}, {
      async summarize() {
        throw new Error("model offline");
      },
    });

    const round = await ctx.appendRound("abcdefghij".repeat(50));

    expect(round.compressedSummary).toBe("abcdefghij".repeat(14) + "abcdefghi...");
    expect(round.summaryTokens).toBe(38);
  });

  it("serializes concurrent appends in call order", async () => {
    const ctx = store({ maxTokens: 1000 });
    const rounds = await Promise.all([ctx.appendRound("one"), ctx.appendRound("two"), ctx.appendRound("three")]);

    expect(rounds.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(ctx.effectiveView().map((e) => e.content)).toEqual(["one", "two", "three"]);
  });

  it("restores the same view without calling the summarizer", async () => {
    const archive = new MemoryArchiveStore();
    const config = contextConfig({ archiveAfterRounds: 2 });
    const ctx = new ContextStore({ sessionId: "s1", config, summarizer: headSummarizer, archive });
    for (let i = 0; i < 8; i++) await ctx.appendRound(`entry ${i} `.padEnd(160, "."));

    const summarize = vi.fn(headSummarizer.summarize);
    const restored = ContextStore.restore(ctx.snapshot(), { config, summarizer: { summarize }, archive });

    expect(restored.effectiveView()).toEqual(ctx.effectiveView());
    expect(restored.snapshot()).toEqual(ctx.snapshot());
    expect(restored.rawContent(0)).toBe(ctx.rawContent(0));
    expect(summarize).not.toHaveBeenCalled();
  });
});

describe("renderContextMarkdown", () => {
  it("renders each level of detail under its own heading", async () => {
    const ctx = store({ maxTokens: 1000, archiveAfterRounds: 1 });
    await ctx.appendRound("first round raw", "plan");
    await ctx.compressRound(0);
    await ctx.appendRound("second round", "observation");
    await ctx.compressRound(1);

    const markdown = renderContextMarkdown(ctx.snapshot(), (i) => ctx.rawContent(i));

    expect(markdown).toBe(
      [
        "---",
        "session_id: s1",
        "max_tokens: 1000",
        "rounds: 2",
        "compression_count: 2",
        "---",
        "",
        "# Execution History",
        "",
        "### Round 0 (plan) - Archived",
        "",
        "first ro",
        "",
        "*Raw content: 15 chars in archive entry 0*",
        "",
        "## Round 1 (observation) - Compressed",
        "",
        "seco",
        "",
        "*Compression: 3 -> 1 tokens*",
        "",
        "### Round 1 - Raw Archive",
        "",
        "<details>",
        "",
        "second round",
        "",
        "</details>",
        "",
      ].join("\n"),
    );
  });

  it("renders raw rounds under a plain heading", async () => {
    const ctx = store({ maxTokens: 1000 });
    await ctx.appendRound("hello", "plan");

    const lines = renderContextMarkdown(ctx.snapshot()).split("\n");

    expect(lines.slice(9)).toEqual(["## Round 0 (plan)", "", "hello", ""]);
  });

  it("renders the session digest ahead of the rounds", async () => {
    const ctx = store({ archiveAfterRounds: 2 });
    for (let i = 0; i < 7; i++) await ctx.appendRound("r".repeat(200));

    const lines = renderContextMarkdown(ctx.snapshot()).split("\n");

    expect(lines[9]).toBe("## Session Digest (through round 1)");
    expect(lines).toContain("### Round 0 (note) - Archived (folded into digest)");
    expect(lines).toContain("### Round 2 (note) - Archived");
    expect(lines).toContain("## Round 6 (note) - Compressed");
  });
});
