import type { CheckpointSink, LoopSnapshot } from "../loop/types.js";
import { parseSnapshot } from "../schemas.js";

/** Keeps nothing. A session using it cannot be resumed. */
export class NoopCheckpointSink implements CheckpointSink {
  async save(_snapshot: LoopSnapshot): Promise<void> {}

  async load(_sessionId: string): Promise<LoopSnapshot | undefined> {
    return undefined;
  }
}

/** Holds the latest snapshot per session in process memory. */
export class MemoryCheckpointSink implements CheckpointSink {
  private snapshots = new Map<string, string>();
  private saves = 0;

  async save(snapshot: LoopSnapshot): Promise<void> {
    // Stored as JSON so later mutation of the live state cannot leak in.
    this.snapshots.set(snapshot.sessionId, JSON.stringify(snapshot));
    this.saves += 1;
  }

  async load(sessionId: string): Promise<LoopSnapshot | undefined> {
    const json = this.snapshots.get(sessionId);
    return json === undefined ? undefined : parseSnapshot(JSON.parse(json));
  }

  get saveCount(): number {
    return this.saves;
  }
}
