import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";
import { FunctionCapability } from "../src/capability/function-capability.js";
import { CapabilityRegistry, RegistryCapabilityPort } from "../src/capability/registry.js";
import { ContextStore } from "../src/context/context-store.js";
import { resolveSessionConfig } from "../src/config.js";
import { CheckpointError } from "../src/errors.js";
import { AgentLoopController } from "../src/loop/controller.js";
import type { LoopSnapshot } from "../src/loop/types.js";
import { SqliteArchiveStore, SqliteCheckpointStore } from "../src/persistence/store.js";
import { setLogLevel } from "../src/utils/logger.js";
import { RuleValidator } from "../src/validation/rule-validator.js";

setLogLevel("error");

function snapshot(sessionId: string, savedAt: number, goal = "goal"): LoopSnapshot {
  return {
    sessionId,
    goal,
    phase: "PLANNING",
    iteration: 0,
    context: { sessionId, maxTokens: 100, nextIndex: 0, rounds: [], compressionCount: 0 },
    termination: "none",
    results: {},
    iterationNodes: [],
    sessionTimedOut: false,
    savedAt,
  };
}

describe("SqliteCheckpointStore", () => {
  let store: SqliteCheckpointStore;

  afterEach(() => {
    store.close();
  });

  it("saves and loads the latest snapshot per session", async () => {
    store = new SqliteCheckpointStore(":memory:");
    await store.save(snapshot("s1", 1));
    await store.save({ ...snapshot("s1", 2), phase: "EXECUTION", iteration: 1 });

    const loaded = await store.load("s1");

    expect(loaded?.phase).toBe("EXECUTION");
    expect(loaded?.iteration).toBe(1);
    expect(await store.load("missing")).toBeUndefined();
  });

  it("lists sessions newest first", async () => {
    store = new SqliteCheckpointStore(":memory:");
    await store.save(snapshot("old", 100, "first goal"));
    await store.save(snapshot("new", 200, "second goal"));

    expect(store.list()).toEqual([
      { sessionId: "new", goal: "second goal", phase: "PLANNING", iteration: 0, termination: "none", savedAt: 200 },
      { sessionId: "old", goal: "first goal", phase: "PLANNING", iteration: 0, termination: "none", savedAt: 100 },
    ]);
    expect(store.list(1).map((s) => s.sessionId)).toEqual(["new"]);
  });

  it("deletes a session", async () => {
    store = new SqliteCheckpointStore(":memory:");
    await store.save(snapshot("s1", 1));

    expect(store.delete("s1")).toBe(true);
    expect(store.delete("s1")).toBe(false);
    expect(await store.load("s1")).toBeUndefined();
  });

  it("rejects a stored snapshot that does not parse", async () => {
    store = new SqliteCheckpointStore(new Database(":memory:"));
    await store.save(snapshot("s1", 1));
    store.db.prepare("UPDATE checkpoints SET snapshot = ? WHERE session_id = ?").run('{"sessionId":""}', "s1");

    await expect(store.load("s1")).rejects.toThrow(CheckpointError);
  });

  it("backs a full session together with the archive store", async () => {
    store = new SqliteCheckpointStore(":memory:");
    const archive = new SqliteArchiveStore(store.db, "durable");
    const registry = new CapabilityRegistry();
    registry.add(new FunctionCapability({ name: "echo", fn: async () => "done" }));

    const outcome = await new AgentLoopController({
      sessionId: "durable",
      planner: { plan: async () => [{ id: "a", description: "do a", capabilityRef: "echo" }] },
      capabilities: new RegistryCapabilityPort(registry),
      validator: new RuleValidator(),
      summarizer: { summarize: async (raw, budget) => raw.slice(0, budget * 4) },
      checkpoint: store,
      archive,
    }).run("persist me");

    expect(outcome.phase).toBe("DONE");
    expect(store.list()).toEqual([
      expect.objectContaining({ sessionId: "durable", phase: "DONE", termination: "completed", iteration: 1 }),
    ]);
  });
});

describe("SqliteArchiveStore", () => {
  it("keeps raw content per session and round", () => {
    const db = new Database(":memory:");
    const a = new SqliteArchiveStore(db, "a");
    const b = new SqliteArchiveStore(db, "b");
    a.put(3, "three");
    a.put(1, "one");
    b.put(1, "other");

    expect(a.get(1)).toBe("one");
    expect(a.has(2)).toBe(false);
    expect(a.indices()).toEqual([1, 3]);
    expect(b.indices()).toEqual([1]);
    db.close();
  });

  it("deletes one round without touching other sessions", () => {
    const db = new Database(":memory:");
    const a = new SqliteArchiveStore(db, "a");
    const b = new SqliteArchiveStore(db, "b");
    a.put(1, "one");
    a.put(2, "two");
    b.put(1, "other");

    a.delete(1);

    expect(a.indices()).toEqual([2]);
    expect(b.get(1)).toBe("other");
    db.close();
  });

  it("serves archived rounds to a context store", async () => {
    const db = new Database(":memory:");
    const archive = new SqliteArchiveStore(db, "s1");
    const ctx = new ContextStore({
      sessionId: "s1",
      config: resolveSessionConfig({ context: { maxTokens: 1000, archiveAfterRounds: 1 } }).context,
      summarizer: { summarize: async (raw, budget) => raw.slice(0, budget * 4) },
      archive,
    });
    await ctx.appendRound("a".repeat(40));
    await ctx.compressRound(0);
    await ctx.appendRound("b".repeat(40));

    expect(archive.indices()).toEqual([0]);
    expect(ctx.rawContent(0)).toBe("a".repeat(40));
    db.close();
  });
});
