import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import type { ArchiveStore } from "../context/types.js";
import { CheckpointError } from "../errors.js";
import type { CheckpointSink, LoopPhase, LoopSnapshot, Termination } from "../loop/types.js";
import { parseSnapshot } from "../schemas.js";

export const DEFAULT_DB_PATH = join(homedir(), ".agentloop", "sessions.db");

export type SessionSummary = {
  sessionId: string;
  goal: string;
  phase: LoopPhase;
  iteration: number;
  termination: Termination;
  savedAt: number;
};

function openDatabase(dbPath?: string): Database.Database {
  const path = dbPath ?? DEFAULT_DB_PATH;
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  return db;
}

/**
 * Durable checkpoint sink: one row per session holding the latest snapshot.
 */
export class SqliteCheckpointStore implements CheckpointSink {
  readonly db: Database.Database;

  constructor(dbPathOrDb?: string | Database.Database) {
    this.db = typeof dbPathOrDb === "object" ? dbPathOrDb : openDatabase(dbPathOrDb);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS checkpoints (
        session_id  TEXT PRIMARY KEY,
        goal        TEXT NOT NULL,
        phase       TEXT NOT NULL,
        iteration   INTEGER NOT NULL,
        termination TEXT NOT NULL,
        snapshot    TEXT NOT NULL,
        saved_at    INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_checkpoints_saved ON checkpoints(saved_at DESC);
    `);
  }

  async save(snapshot: LoopSnapshot): Promise<void> {
    this.db
      .prepare(`
        INSERT OR REPLACE INTO checkpoints (session_id, goal, phase, iteration, termination, snapshot, saved_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        snapshot.sessionId,
        snapshot.goal,
        snapshot.phase,
        snapshot.iteration,
        snapshot.termination,
        JSON.stringify(snapshot),
        snapshot.savedAt,
      );
  }

  async load(sessionId: string): Promise<LoopSnapshot | undefined> {
    const row = this.db.prepare("SELECT snapshot FROM checkpoints WHERE session_id = ?").get(sessionId);
    if (row === undefined) return undefined;
    return parseSnapshot(JSON.parse(readColumn(row, "snapshot", sessionId)));
  }

  list(limit = 50): SessionSummary[] {
    const rows = this.db
      .prepare("SELECT snapshot FROM checkpoints ORDER BY saved_at DESC LIMIT ?")
      .all(limit);
    return rows.map((row) => {
      const snapshot = parseSnapshot(JSON.parse(readColumn(row, "snapshot", "list")));
      return {
        sessionId: snapshot.sessionId,
        goal: snapshot.goal,
        phase: snapshot.phase,
        iteration: snapshot.iteration,
        termination: snapshot.termination,
        savedAt: snapshot.savedAt,
      };
    });
  }

  /** Delete a session's checkpoint. Returns true if one existed. */
  delete(sessionId: string): boolean {
    const result = this.db.prepare("DELETE FROM checkpoints WHERE session_id = ?").run(sessionId);
    return result.changes > 0;
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Archive of relocated raw round content, keyed by session and round index.
 * Can share a database handle with {@link SqliteCheckpointStore}.
 */
export class SqliteArchiveStore implements ArchiveStore {
  constructor(
    private readonly db: Database.Database,
    private readonly sessionId: string,
  ) {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS archived_rounds (
        session_id  TEXT NOT NULL,
        round_index INTEGER NOT NULL,
        raw_content TEXT NOT NULL,
        PRIMARY KEY (session_id, round_index)
      );
    `);
  }

  put(index: number, rawContent: string): void {
    this.db
      .prepare("INSERT OR REPLACE INTO archived_rounds (session_id, round_index, raw_content) VALUES (?, ?, ?)")
      .run(this.sessionId, index, rawContent);
  }

  get(index: number): string | undefined {
    const row = this.db
      .prepare("SELECT raw_content FROM archived_rounds WHERE session_id = ? AND round_index = ?")
      .get(this.sessionId, index);
    return row === undefined ? undefined : readColumn(row, "raw_content", `round ${index}`);
  }

  has(index: number): boolean {
    return this.get(index) !== undefined;
  }

  delete(index: number): void {
    this.db.prepare("DELETE FROM archived_rounds WHERE session_id = ? AND round_index = ?").run(this.sessionId, index);
  }

  indices(): number[] {
    const rows = this.db
      .prepare("SELECT round_index FROM archived_rounds WHERE session_id = ? ORDER BY round_index")
      .all(this.sessionId);
    return rows.map((row) => {
      const value = isRecord(row) ? row.round_index : undefined;
      if (typeof value !== "number") throw new CheckpointError("Archive row without a round index");
      return value;
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readColumn(row: unknown, column: string, what: string): string {
  const value = isRecord(row) ? row[column] : undefined;
  if (typeof value !== "string") {
    throw new CheckpointError(`Stored row for ${what} has no ${column} column`);
  }
  return value;
}
