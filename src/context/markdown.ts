import type { ContextSnapshot, Round } from "./types.js";

/**
 * Human-readable encoding of a context snapshot. The heading depth mirrors
 * the level of detail: active rounds at `##`, their relocated raw content and
 * archived rounds at `###`.
 */
export function renderContextMarkdown(
  snapshot: ContextSnapshot,
  rawLookup?: (index: number) => string | undefined,
): string {
  const lines: string[] = [
    "---",
    `session_id: ${snapshot.sessionId}`,
    `max_tokens: ${snapshot.maxTokens}`,
    `rounds: ${snapshot.rounds.length}`,
    `compression_count: ${snapshot.compressionCount}`,
    "---",
    "",
    "# Execution History",
    "",
  ];

  if (snapshot.digest) {
    lines.push(`## Session Digest (through round ${snapshot.digest.throughIndex})`, "", snapshot.digest.content, "");
  }

  for (const round of snapshot.rounds) {
    lines.push(...renderRound(round, rawLookup), "");
  }

  return lines.join("\n").trimEnd() + "\n";
}

function renderRound(round: Round, rawLookup?: (index: number) => string | undefined): string[] {
  const label = `Round ${round.index} (${round.kind})`;

  switch (round.lodLevel) {
    case "raw":
      return [`## ${label}`, "", round.rawContent ?? ""];
    case "compressed": {
      const lines = [`## ${label} - Compressed`, "", round.compressedSummary ?? "", ""];
      lines.push(`*Compression: ${round.rawTokens} -> ${round.summaryTokens ?? 0} tokens*`);
      if (round.rawContent !== undefined) {
        lines.push("", `### Round ${round.index} - Raw Archive`, "", "<details>", "", round.rawContent, "", "</details>");
      }
      return lines;
    }
    case "archived": {
      const suffix = round.folded ? " - Archived (folded into digest)" : " - Archived";
      const lines = [`### ${label}${suffix}`, "", round.compressedSummary ?? ""];
      const raw = rawLookup?.(round.index);
      lines.push("", raw === undefined ? `*Raw content: archive entry ${round.index}*` : `*Raw content: ${raw.length} chars in archive entry ${round.index}*`);
      return lines;
    }
  }
}
