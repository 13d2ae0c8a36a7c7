/** Fidelity tier of a round. Only ever moves forward. */
export type LodLevel = "raw" | "compressed" | "archived";

/** Which loop phase produced a round. */
export type RoundKind = "plan" | "observation" | "reflection" | "validation" | "note";

export type Round = {
  readonly index: number;
  readonly kind: RoundKind;
  /** Absent once archived; the archive store holds it from then on. */
  readonly rawContent?: string;
  readonly compressedSummary?: string;
  readonly lodLevel: LodLevel;
  readonly rawTokens: number;
  readonly summaryTokens?: number;
  /** Summary merged into the session digest; no longer listed on its own. */
  readonly folded: boolean;
};

export type ViewEntry = {
  /** Round index, or -1 for the session digest. */
  index: number;
  kind: RoundKind | "digest";
  lodLevel: LodLevel;
  content: string;
  tokens: number;
};

export type Digest = {
  content: string;
  tokens: number;
  /** Highest round index folded into this digest. */
  throughIndex: number;
};

export type ContextSnapshot = {
  sessionId: string;
  maxTokens: number;
  nextIndex: number;
  rounds: Round[];
  digest?: Digest;
  compressionCount: number;
};

export type ContextStats = {
  rounds: number;
  raw: number;
  compressed: number;
  archived: number;
  folded: number;
  viewTokens: number;
  rawTokensTotal: number;
  maxTokens: number;
  compressionCount: number;
};

/** Given raw content, return a summary within `sizeBudget` tokens. */
export interface SummarizationPort {
  summarize(rawContent: string, sizeBudget: number): Promise<string>;
}

/** Relocated raw content of archived rounds, keyed by round index. */
export interface ArchiveStore {
  put(index: number, rawContent: string): void;
  get(index: number): string | undefined;
  has(index: number): boolean;
  delete(index: number): void;
  indices(): number[];
}

export type TokenEstimator = (text: string) => number;
