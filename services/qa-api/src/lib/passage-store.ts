import type { Evidence } from "../types.js";
import type { Passage } from "./data-files.js";

export type PassageStore = {
  search(query: string, keywords: string[], limit: number): Promise<Evidence[]>;
};

const SNIPPET_CHARS = 300;
const DEFAULT_CONFIDENCE = 0.8;

export function scorePassage(passage: Passage, terms: string[]): number {
  const text = `${passage.title} ${passage.content}`.toLowerCase();
  const keywords = passage.keywords.map((keyword) => keyword.toLowerCase());
  let score = 0;
  for (const term of terms) {
    if (text.includes(term)) {
      score += 2;
    }
    if (keywords.includes(term)) {
      score += 3;
    }
  }
  return score;
}

export function toEvidence(passage: Passage): Evidence {
  return {
    source: passage.source,
    source_type: passage.source_type,
    snippet:
      passage.content.length > SNIPPET_CHARS ? `${passage.content.slice(0, SNIPPET_CHARS)}...` : passage.content,
    pmid: passage.pmid ?? null,
    doi: passage.doi ?? null,
    url: passage.url ?? null,
    confidence: passage.confidence ?? DEFAULT_CONFIDENCE,
    publication_date: passage.year ?? null,
    section: passage.title,
  };
}

// Keyword-overlap ranking over a fixed corpus; the raw query counts as one more keyword.
export function createInMemoryPassageStore(passages: Passage[]): PassageStore {
  return {
    async search(query, keywords, limit) {
      const terms = [query, ...keywords].map((term) => term.toLowerCase()).filter(Boolean);
      return passages
        .map((passage) => ({ passage, score: scorePassage(passage, terms) }))
        .filter((entry) => entry.score > 0)
        .sort((left, right) => right.score - left.score)
        .slice(0, limit)
        .map((entry) => toEvidence(entry.passage));
    },
  };
}
