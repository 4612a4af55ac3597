import type { ChatMessage } from "../types.js";
import type { Lexicon } from "./data-files.js";
import type { GraphStore } from "./graph-store.js";
import { errorMessage, type Logger } from "./logger.js";

export type ResolverStrategy = (question: string, history: ChatMessage[]) => Promise<string[]>;

export type EntityResolver = {
  lexiconScan: ResolverStrategy;
  synonymScan: ResolverStrategy;
  fuzzySearch: ResolverStrategy;
  historyBackoff: ResolverStrategy;
  aggressiveBackoff: ResolverStrategy;
  resolve(question: string, history?: ChatMessage[]): Promise<string[]>;
  resolveCurrentTurnOnly(question: string): Promise<string[]>;
};

export type EntityResolverOptions = {
  graph: GraphStore;
  lexicon: Lexicon;
  logger: Logger;
};

const HISTORY_WINDOW = 6;
const QUESTION_SUFFIXES = /(是什么|是啥|啥是|是啥意思|是什么意思|是什么病|怎么回事|有哪些症状|症状|怎么办)$/u;

export function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}

// Consecutive CJK windows: each run is consumed greedily in chunks of at most `max` characters.
export function cjkWindows(text: string, min: number, max: number): string[] {
  const pattern = new RegExp(`[\\u4e00-\\u9fa5]{${min},${max}}`, "gu");
  return [...text.matchAll(pattern)].map((match) => match[0]);
}

export function stripQuestionSuffix(question: string): string {
  return question.trim().replace(QUESTION_SUFFIXES, "").trim();
}

export function firstNonEmpty(strategies: ResolverStrategy[]): ResolverStrategy {
  return async (question, history) => {
    for (const strategy of strategies) {
      const found = await strategy(question, history);
      if (found.length > 0) {
        return found;
      }
    }
    return [];
  };
}

export function createEntityResolver(options: EntityResolverOptions): EntityResolver {
  const { graph, lexicon, logger } = options;

  async function lookup(term: string, label: "Disease" | "Symptom", limit: number): Promise<string[]> {
    try {
      return await graph.search(term, label, limit);
    } catch (error) {
      logger.warn({ err: errorMessage(error), term, label }, "graph lookup failed");
      return [];
    }
  }

  async function lookupDiseaseThenSymptom(term: string): Promise<string | null> {
    const [disease] = await lookup(term, "Disease", 1);
    if (disease) {
      return disease;
    }
    const [symptom] = await lookup(term, "Symptom", 1);
    return symptom ?? null;
  }

  function scanLexicon(text: string): string[] {
    return lexicon.terms.filter((term) => text.includes(term));
  }

  // Looks up every window except those the lexicon already matched.
  async function fuzzyOver(text: string): Promise<string[]> {
    if (!graph.isConnected()) {
      return [];
    }
    const seeds = new Set(scanLexicon(text));
    const found: string[] = [];
    for (const term of cjkWindows(text, 2, 6)) {
      if (seeds.has(term)) {
        continue;
      }
      const hit = await lookupDiseaseThenSymptom(term);
      if (hit) {
        found.push(hit);
      }
    }
    return dedupe(found);
  }

  const lexiconScan: ResolverStrategy = async (question) => scanLexicon(question);

  const synonymScan: ResolverStrategy = async (question) => {
    const found: string[] = [];
    for (const { colloquial, canonical } of lexicon.synonyms) {
      if (question.includes(colloquial) && !found.includes(canonical)) {
        found.push(canonical);
      }
    }
    return found;
  };

  const fuzzySearch: ResolverStrategy = async (question) => fuzzyOver(question);

  const historyBackoff: ResolverStrategy = async (_question, history) => {
    if (!graph.isConnected()) {
      return [];
    }
    const turns = history.slice(-HISTORY_WINDOW).reverse();
    for (const turn of turns) {
      if (turn.role !== "user") {
        continue;
      }
      for (const term of cjkWindows(turn.content, 2, 12)) {
        const hit = await lookupDiseaseThenSymptom(term);
        if (hit) {
          return [hit];
        }
      }
    }
    return [];
  };

  const aggressiveBackoff: ResolverStrategy = async (question) => {
    if (!graph.isConnected()) {
      return [];
    }
    const cleaned = stripQuestionSuffix(question);
    if (cleaned) {
      const diseases = await lookup(cleaned, "Disease", 3);
      if (diseases.length > 0) {
        return dedupe(diseases);
      }
    }

    const text = (question.match(/[\u4e00-\u9fa5]+/gu) ?? []).join("");
    for (let length = 6; length >= 2; length -= 1) {
      for (let start = 0; start + length <= text.length; start += 1) {
        const [disease] = await lookup(text.slice(start, start + length), "Disease", 1);
        if (disease) {
          return [disease];
        }
      }
    }
    return [];
  };

  const backoff = firstNonEmpty([fuzzySearch, historyBackoff, aggressiveBackoff]);

  return {
    lexiconScan,
    synonymScan,
    fuzzySearch,
    historyBackoff,
    aggressiveBackoff,

    async resolve(question, history = []) {
      const found = [...(await lexiconScan(question, history))];
      for (const canonical of await synonymScan(question, history)) {
        if (!found.includes(canonical)) {
          found.push(canonical);
        }
      }

      if (found.length === 0) {
        found.push(...(await backoff(question, history)));
        if (found.length > 0) {
          logger.debug({ question, entities: found }, "entities recovered by backoff");
        }
      }

      if (history.length > 0 && graph.isConnected()) {
        const combined = `${history
          .slice(-HISTORY_WINDOW)
          .map((message) => message.content)
          .join(" ")} ${question}`;
        found.push(...(await fuzzyOver(combined)), ...scanLexicon(combined));
      }

      return dedupe(found);
    },

    async resolveCurrentTurnOnly(question) {
      return dedupe([...scanLexicon(question), ...(await fuzzyOver(question))]);
    },
  };
}
