import type { ContextConfig } from "../config.js";
import { BudgetExceededError, toErrorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { MemoryArchiveStore } from "./archive.js";
import { clipToBudget, estimateTokens } from "./tokens.js";
import type {
  ArchiveStore,
  ContextSnapshot,
  ContextStats,
  Digest,
  Round,
  RoundKind,
  SummarizationPort,
  TokenEstimator,
  ViewEntry,
} from "./types.js";

const log = createLogger("context");

const SUMMARY_RETRY_DELAY_MS = 100;

export type ContextStoreOptions = {
  sessionId: string;
  config: ContextConfig;
  summarizer: SummarizationPort;
  archive?: ArchiveStore;
  estimateTokens?: TokenEstimator;
};

type StoreState = {
  rounds: Round[];
  digest?: Digest;
  nextIndex: number;
  compressionCount: number;
};

/**
 * Append-only history of rounds kept at three levels of detail. The
 * effective view never exceeds `config.maxTokens` once a public call
 * resolves; raw content is relocated to the archive store, never dropped.
 */
export class ContextStore {
  readonly sessionId: string;
  private readonly config: ContextConfig;
  private readonly summarizer: SummarizationPort;
  private readonly archive: ArchiveStore;
  private readonly estimate: TokenEstimator;

  private rounds: Round[] = [];
  private digest?: Digest;
  private nextIndex = 0;
  private compressionCount = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: ContextStoreOptions) {
    this.sessionId = opts.sessionId;
    this.config = opts.config;
    this.summarizer = opts.summarizer;
    this.archive = opts.archive ?? new MemoryArchiveStore();
    this.estimate = opts.estimateTokens ?? estimateTokens;
  }

  /** Rebuild a store from a snapshot without calling the summarizer. */
  static restore(snapshot: ContextSnapshot, opts: Omit<ContextStoreOptions, "sessionId">): ContextStore {
    const store = new ContextStore({ ...opts, sessionId: snapshot.sessionId });
    store.rounds = snapshot.rounds.map((r) => ({ ...r }));
    store.digest = snapshot.digest ? { ...snapshot.digest } : undefined;
    store.nextIndex = snapshot.nextIndex;
    store.compressionCount = snapshot.compressionCount;

    for (const round of store.rounds) {
      if (round.lodLevel === "archived" && !store.archive.has(round.index)) {
        log.warn(`Raw content of archived round ${round.index} is not in the archive store`);
      }
    }
    return store;
  }

  get maxTokens(): number {
    return this.config.maxTokens;
  }

  /**
   * Record a new raw round and run the compression policy. When compression
   * cannot bring the view within budget the append is rolled back and the
   * error propagates.
   */
  appendRound(rawContent: string, kind: RoundKind = "note"): Promise<Round> {
    return this.exclusive(async () => {
      const before = this.saveState();
      const archivedBefore = new Set(this.archive.indices());
      const round: Round = {
        index: this.nextIndex,
        kind,
        rawContent,
        lodLevel: "raw",
        rawTokens: this.estimate(rawContent),
        folded: false,
      };
      this.nextIndex += 1;
      this.rounds.push(round);
      log.debug(`Appended round ${round.index}`, { kind, tokens: round.rawTokens });

      try {
        await this.runCompression();
      } catch (err) {
        this.loadState(before);
        for (const index of this.archive.indices()) {
          if (!archivedBefore.has(index)) this.archive.delete(index);
        }
        log.error(`Rolled back round ${round.index}`, { error: toErrorMessage(err) });
        throw err;
      }
      return this.roundAt(round.index) ?? round;
    });
  }

  /** Apply the compression policy to the current rounds. */
  maybeCompress(): Promise<void> {
    return this.exclusive(() => this.runCompression());
  }

  /**
   * Compress a single raw round. Returns false, changing nothing, for rounds
   * that are already compressed or archived.
   */
  compressRound(index: number): Promise<boolean> {
    return this.exclusive(async () => {
      const round = this.roundAt(index);
      if (!round) throw new RangeError(`No round with index ${index}`);
      if (round.lodLevel !== "raw") return false;
      await this.compress(round, this.summaryBudget(round));
      return true;
    });
  }

  /** The bounded projection handed to planning, reflection and validation. */
  effectiveView(): ViewEntry[] {
    const view: ViewEntry[] = [];
    if (this.digest) {
      view.push({
        index: -1,
        kind: "digest",
        lodLevel: "archived",
        content: this.digest.content,
        tokens: this.digest.tokens,
      });
    }
    for (const round of this.rounds) {
      if (round.folded) continue;
      view.push({
        index: round.index,
        kind: round.kind,
        lodLevel: round.lodLevel,
        content: round.lodLevel === "raw" ? (round.rawContent ?? "") : (round.compressedSummary ?? ""),
        tokens: this.entryTokens(round),
      });
    }
    return view;
  }

  viewTokens(): number {
    let total = this.digest?.tokens ?? 0;
    for (const round of this.rounds) {
      if (!round.folded) total += this.entryTokens(round);
    }
    return total;
  }

  /** Full-fidelity content of any round, wherever it currently lives. */
  rawContent(index: number): string | undefined {
    const round = this.roundAt(index);
    if (!round) return undefined;
    return round.rawContent ?? this.archive.get(index);
  }

  getRound(index: number): Round | undefined {
    return this.roundAt(index);
  }

  listRounds(): Round[] {
    return [...this.rounds];
  }

  stats(): ContextStats {
    const count = (pred: (r: Round) => boolean) => this.rounds.filter(pred).length;
    return {
      rounds: this.rounds.length,
      raw: count((r) => r.lodLevel === "raw"),
      compressed: count((r) => r.lodLevel === "compressed"),
      archived: count((r) => r.lodLevel === "archived"),
      folded: count((r) => r.folded),
      viewTokens: this.viewTokens(),
      rawTokensTotal: this.rounds.reduce((sum, r) => sum + r.rawTokens, 0),
      maxTokens: this.config.maxTokens,
      compressionCount: this.compressionCount,
    };
  }

  snapshot(): ContextSnapshot {
    return {
      sessionId: this.sessionId,
      maxTokens: this.config.maxTokens,
      nextIndex: this.nextIndex,
      rounds: this.rounds.map((r) => ({ ...r })),
      digest: this.digest ? { ...this.digest } : undefined,
      compressionCount: this.compressionCount,
    };
  }

  // -------------------------------------------------------------------------
  // Compression policy
  // -------------------------------------------------------------------------

  private async runCompression(): Promise<void> {
    const { maxTokens, compressionThresholdFraction } = this.config;

    // A round that alone exceeds the whole budget cannot wait for the threshold.
    for (const round of this.rounds) {
      if (round.lodLevel === "raw" && round.rawTokens > maxTokens) {
        log.warn(`Round ${round.index} exceeds the context budget, forcing compression`, {
          tokens: round.rawTokens,
          maxTokens,
        });
        await this.compress(round, this.summaryBudget(round));
      }
    }

    const threshold = compressionThresholdFraction * maxTokens;
    while (this.viewTokens() > threshold) {
      const oldestRaw = this.rounds.find((r) => r.lodLevel === "raw");
      if (!oldestRaw) break;
      await this.compress(oldestRaw, this.summaryBudget(oldestRaw));
    }

    this.archiveAged();

    if (this.viewTokens() > maxTokens) {
      await this.fold();
    }
  }

  private async compress(round: Round, budget: number): Promise<void> {
    const summary = await this.summarize(round.rawContent ?? "", budget, `round ${round.index}`);
    const tokens = this.estimate(summary);
    if (tokens > budget) throw new BudgetExceededError(round.index, tokens, budget);

    this.replace({ ...round, compressedSummary: summary, summaryTokens: tokens, lodLevel: "compressed" });
    this.compressionCount += 1;
    log.debug(`Compressed round ${round.index}`, { from: round.rawTokens, to: tokens });
  }

  private archiveAged(): void {
    const newest = this.nextIndex - 1;
    for (const round of this.rounds) {
      if (round.lodLevel === "compressed" && newest - round.index >= this.config.archiveAfterRounds) {
        this.demote(round);
      }
    }
  }

  private demote(round: Round): Round {
    if (round.rawContent !== undefined) this.archive.put(round.index, round.rawContent);
    const archived: Round = { ...round, rawContent: undefined, lodLevel: "archived" };
    this.replace(archived);
    log.debug(`Archived round ${round.index}`);
    return archived;
  }

  /**
   * Merge the oldest summaries, together with any previous digest, into a
   * single session digest, taking just enough rounds to get back under budget.
   */
  private async fold(): Promise<void> {
    const { maxTokens, digestFraction } = this.config;
    const digestBudget = Math.max(1, Math.floor(maxTokens * digestFraction));
    const candidates = this.rounds.filter((r) => !r.folded && r.lodLevel !== "raw");
    if (candidates.length === 0) return;

    const rest = this.viewTokens() - (this.digest?.tokens ?? 0);
    let removed = 0;
    let take = 0;
    while (take < candidates.length) {
      removed += this.entryTokens(candidates[take]);
      take += 1;
      if (rest - removed + digestBudget <= maxTokens) break;
    }

    const targets = candidates.slice(0, take).map((r) => (r.lodLevel === "compressed" ? this.demote(r) : r));
    const last = targets[targets.length - 1];
    const merged = [
      ...(this.digest ? [this.digest.content] : []),
      ...targets.map((r) => `Round ${r.index}: ${r.compressedSummary ?? ""}`),
    ].join("\n\n");

    const content = await this.summarize(merged, digestBudget, "session digest");
    const tokens = this.estimate(content);
    if (tokens > digestBudget) throw new BudgetExceededError(last.index, tokens, digestBudget);

    this.digest = { content, tokens, throughIndex: last.index };
    for (const target of targets) this.replace({ ...target, folded: true });
    this.compressionCount += 1;
    log.info(`Folded ${targets.length} rounds into the session digest`, {
      throughIndex: last.index,
      tokens,
    });
  }

  private async summarize(raw: string, budget: number, label: string): Promise<string> {
    try {
      return await withRetry(() => this.summarizer.summarize(raw, budget), {
        maxAttempts: this.config.summarizeAttempts,
        baseDelayMs: SUMMARY_RETRY_DELAY_MS,
        onRetry: (err, attempt) =>
          log.warn(`Summarizing ${label} failed, retrying`, { attempt, error: toErrorMessage(err) }),
      });
    } catch (err) {
      log.warn(`Summarizer unavailable for ${label}, clipping raw content`, { error: toErrorMessage(err) });
      return clipToBudget(raw, budget, this.estimate);
    }
  }

  private summaryBudget(round: Round): number {
    const { maxTokens, summaryRatio } = this.config;
    return Math.max(1, Math.min(maxTokens, Math.ceil(round.rawTokens * summaryRatio)));
  }

  private entryTokens(round: Round): number {
    return round.lodLevel === "raw" ? round.rawTokens : (round.summaryTokens ?? 0);
  }

  // -------------------------------------------------------------------------
  // Bookkeeping
  // -------------------------------------------------------------------------

  private roundAt(index: number): Round | undefined {
    return this.rounds.find((r) => r.index === index);
  }

  private replace(round: Round): void {
    const pos = this.rounds.findIndex((r) => r.index === round.index);
    if (pos !== -1) this.rounds[pos] = round;
  }

  private saveState(): StoreState {
    return {
      rounds: [...this.rounds],
      digest: this.digest,
      nextIndex: this.nextIndex,
      compressionCount: this.compressionCount,
    };
  }

  private loadState(state: StoreState): void {
    this.rounds = state.rounds;
    this.digest = state.digest;
    this.nextIndex = state.nextIndex;
    this.compressionCount = state.compressionCount;
  }

  /** Serialize mutations so rounds never interleave. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
