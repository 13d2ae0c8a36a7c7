#!/usr/bin/env node

import { Command } from "commander";
import { renderContextMarkdown } from "./context/markdown.js";
import type { TaskGraphSnapshot } from "./graph/types.js";
import { SqliteArchiveStore, SqliteCheckpointStore, DEFAULT_DB_PATH } from "./persistence/store.js";
import { toErrorMessage } from "./errors.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", toErrorMessage(reason));
  process.exitCode = 1;
});

const program = new Command();

program
  .name("agentloop")
  .description("Inspect checkpointed agent loop sessions")
  .version("0.1.0")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
});

// --- sessions ---
program
  .command("sessions")
  .description("List stored session checkpoints, newest first")
  .option("--db <path>", "Checkpoint database", DEFAULT_DB_PATH)
  .option("-l, --limit <n>", "Maximum sessions to list", "20")
  .action((opts: { db: string; limit: string }) => {
    const store = new SqliteCheckpointStore(opts.db);
    try {
      const sessions = store.list(Number(opts.limit));
      if (sessions.length === 0) {
        console.log("No sessions stored.");
        return;
      }
      for (const s of sessions) {
        const when = new Date(s.savedAt).toISOString();
        console.log(`${s.sessionId}  ${s.phase.padEnd(11)} iter ${s.iteration}  ${s.termination.padEnd(23)} ${when}  ${s.goal}`);
      }
    } finally {
      store.close();
    }
  });

// --- inspect ---
program
  .command("inspect")
  .description("Show a session's state, task graph and context history")
  .argument("<sessionId>", "Session to inspect")
  .option("--db <path>", "Checkpoint database", DEFAULT_DB_PATH)
  .option("--json", "Print the raw checkpoint snapshot as JSON")
  .action(async (sessionId: string, opts: { db: string; json?: boolean }) => {
    const store = new SqliteCheckpointStore(opts.db);
    try {
      const snapshot = await store.load(sessionId);
      if (!snapshot) {
        console.error(`No checkpoint for session "${sessionId}"`);
        process.exitCode = 1;
        return;
      }
      if (opts.json) {
        console.log(JSON.stringify(snapshot, null, 2));
        return;
      }

      console.log(`Session:     ${snapshot.sessionId}`);
      console.log(`Goal:        ${snapshot.goal}`);
      console.log(`Phase:       ${snapshot.phase} (iteration ${snapshot.iteration})`);
      console.log(`Termination: ${snapshot.termination}${snapshot.reason ? ` - ${snapshot.reason.code}: ${snapshot.reason.message}` : ""}`);
      if (snapshot.graph) {
        console.log("");
        console.log(renderNodeTable(snapshot.graph));
      }

      const archive = new SqliteArchiveStore(store.db, sessionId);
      console.log("");
      console.log(renderContextMarkdown(snapshot.context, (index) => archive.get(index)));
    } finally {
      store.close();
    }
  });

function renderNodeTable(graph: TaskGraphSnapshot): string {
  const lines = [`Plan v${graph.version}: ${graph.nodes.length} node(s)`];
  for (const node of graph.nodes) {
    const deps = node.dependencies.length > 0 ? ` <- ${node.dependencies.join(", ")}` : "";
    const detail = node.status === "failed" ? ` (${node.error ?? "unknown error"})` : "";
    lines.push(`  [${node.status.padEnd(9)}] ${node.id} (${node.capabilityRef}, failures ${node.retryCount})${deps}${detail}`);
  }
  return lines.join("\n");
}

program.parseAsync().catch((err: unknown) => {
  console.error(toErrorMessage(err));
  process.exit(1);
});
