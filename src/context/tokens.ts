import type { TokenEstimator } from "./types.js";

const CHARS_PER_TOKEN = 4;

/** Length-based token proxy: one token per four characters, rounded up. */
export const estimateTokens: TokenEstimator = (text) => Math.ceil(text.length / CHARS_PER_TOKEN);

/**
 * Deterministic head clip that fits `budget` tokens under the default
 * estimator. Used when the summarizer is unavailable.
 */
export function clipToBudget(text: string, budget: number, estimator: TokenEstimator = estimateTokens): string {
  if (estimator(text) <= budget) return text;
  const marker = "...";
  let end = Math.max(0, budget * CHARS_PER_TOKEN - marker.length);
  while (end > 0 && estimator(text.slice(0, end) + marker) > budget) end--;
  return end > 0 ? text.slice(0, end) + marker : text.slice(0, Math.max(0, budget * CHARS_PER_TOKEN));
}
