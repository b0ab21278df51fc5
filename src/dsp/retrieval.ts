import type { CorpusFragment, ProjectSummary, RetrievalResult } from "./types";

const STOP_WORDS = new Set([
  "the", "and", "for", "are", "but", "not", "you", "all", "any", "can", "has", "have",
  "will", "with", "this", "that", "from", "they", "their", "there", "been", "were", "which",
  "what", "when", "who", "into", "such", "than", "then", "also", "each", "our", "its", "may",
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length >= 3 && !STOP_WORDS.has(t));
}

/**
 * Scores a fragment against the project summary. Implementations must be pure so
 * identical inputs always rank identically.
 */
export interface ScoringStrategy {
  readonly name: string;
  score(fragment: CorpusFragment, summaryTokens: ReadonlySet<string>): number;
}

/** Count of distinct fragment tokens that also occur in the summary. */
export const tokenOverlapScoring: ScoringStrategy = {
  name: "token-overlap",
  score(fragment, summaryTokens) {
    let overlap = 0;
    for (const token of new Set(tokenize(fragment.text))) {
      if (summaryTokens.has(token)) overlap++;
    }
    return overlap;
  },
};

export class RetrievalSelector {
  constructor(
    private readonly k: number,
    private readonly strategy: ScoringStrategy = tokenOverlapScoring
  ) {
    if (!Number.isInteger(k) || k < 0) {
      throw new RangeError(`retrieval k must be a non-negative integer, got ${k}`);
    }
  }

  /**
   * Top-K fragments whose topic is the section, highest score first.
   * Equal scores keep corpus load order; no matching fragment gives an empty result.
   */
  select(sectionId: string, summary: ProjectSummary, corpus: readonly CorpusFragment[]): RetrievalResult {
    if (this.k === 0) return [];
    const summaryTokens = new Set(tokenize(summary.text));
    return corpus
      .map((fragment, loadOrder) => ({ fragment, loadOrder }))
      .filter(({ fragment }) => fragment.sectionTopic === sectionId)
      .map((entry) => ({ ...entry, score: this.strategy.score(entry.fragment, summaryTokens) }))
      .sort((a, b) => b.score - a.score || a.loadOrder - b.loadOrder)
      .slice(0, this.k)
      .map(({ fragment }) => fragment);
  }
}
