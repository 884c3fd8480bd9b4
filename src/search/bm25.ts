import type { Bm25Settings } from "../config/schema.js";
import type { RankedResult } from "./types.js";

/** Guards the length normalisation when every document is empty. */
const LENGTH_EPSILON = 1e-9;

/** Lowercase runs of at least two letters or digits. */
const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

function termFrequencies(tokens: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * BM25 relevance scorer. Scoring is a batch operation: IDF and the average
 * document length depend on the whole corpus handed to {@link score}.
 */
export class RelevanceRanker {
  private readonly k1: number;
  private readonly b: number;

  constructor(settings: Bm25Settings = { k1: 1.2, b: 0.75 }) {
    this.k1 = settings.k1;
    this.b = settings.b;
  }

  /**
   * IDF with the `1 +` guard inside the logarithm, clamped at zero so a term
   * present in most documents can never subtract from a score.
   */
  idf(documentCount: number, documentFrequency: number): number {
    const ratio = (documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5);
    return Math.max(0, Math.log(1 + ratio));
  }

  /**
   * Scores every document against {@link query}. The output has one entry per
   * document, divided by the batch maximum when it is positive, so values lie
   * in `[0, 1]`. Empty or degenerate input yields zeros.
   */
  score(query: string, documents: readonly string[]): number[] {
    if (documents.length === 0) {
      return [];
    }
    const queryTerms = [...new Set(tokenize(query))];
    if (queryTerms.length === 0) {
      return documents.map(() => 0);
    }

    const corpus = documents.map((document) => {
      const tokens = tokenize(document);
      return { length: tokens.length, frequencies: termFrequencies(tokens) };
    });
    const averageLength = corpus.reduce((sum, doc) => sum + doc.length, 0) / corpus.length + LENGTH_EPSILON;

    const idfByTerm = new Map<string, number>();
    for (const term of queryTerms) {
      const documentFrequency = corpus.filter((doc) => doc.frequencies.has(term)).length;
      idfByTerm.set(term, this.idf(corpus.length, documentFrequency));
    }

    const raw = corpus.map((doc) => {
      let total = 0;
      for (const term of queryTerms) {
        const tf = doc.frequencies.get(term) ?? 0;
        if (tf === 0) {
          continue;
        }
        const norm = tf + this.k1 * (1 - this.b + this.b * (doc.length / averageLength));
        total += (idfByTerm.get(term) ?? 0) * ((tf * (this.k1 + 1)) / norm);
      }
      return Number.isFinite(total) ? total : 0;
    });

    const max = Math.max(...raw);
    if (!(max > 0)) {
      return raw.map(() => 0);
    }
    return raw.map((value) => value / max);
  }

  /**
   * Pairs URLs with their scores and sorts them by descending score. Equal
   * scores keep the order of {@link urls}.
   */
  rank(query: string, urls: readonly string[], documents: readonly string[]): RankedResult[] {
    if (urls.length !== documents.length) {
      throw new RangeError(`expected ${urls.length} documents, received ${documents.length}`);
    }
    const scores = this.score(query, documents);
    return urls
      .map((url, index) => ({ url, score: scores[index] ?? 0, index }))
      .sort((left, right) => right.score - left.score || left.index - right.index)
      .map(({ url, score }) => ({ url, score }));
  }
}
