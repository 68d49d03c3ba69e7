import { tokenize } from "../text";

export interface Bm25Params {
  /** Term-frequency saturation. */
  k1: number;
  /** Length normalisation (0 = none, 1 = full). */
  b: number;
}

export const DEFAULT_BM25_PARAMS: Bm25Params = { k1: 1.5, b: 0.75 };

/** A scored position in the index; ordinals match the knowledge store's chunk order. */
export interface IndexHit {
  readonly ordinal: number;
  readonly score: number;
}

/** Restricts a search to the given ordinals; `null` means "every document". */
export type Candidates = ReadonlySet<number> | null;

/**
 * Okapi BM25 over an in-memory inverted index. Documents are addressed by
 * ordinal (their position in the array passed to the constructor).
 */
export class Bm25Index {
  private readonly postings = new Map<string, Array<{ ordinal: number; tf: number }>>();
  private readonly lengths: Uint32Array;
  private readonly avgLength: number;
  private readonly params: Bm25Params;

  public constructor(documents: readonly string[], params: Bm25Params = DEFAULT_BM25_PARAMS) {
    this.params = params;
    this.lengths = new Uint32Array(documents.length);
    let total = 0;
    documents.forEach((doc, ordinal) => {
      const tokens = tokenize(doc);
      this.lengths[ordinal] = tokens.length;
      total += tokens.length;
      const tf = new Map<string, number>();
      for (const t of tokens) tf.set(t, (tf.get(t) ?? 0) + 1);
      for (const [term, count] of tf) {
        let list = this.postings.get(term);
        if (!list) {
          list = [];
          this.postings.set(term, list);
        }
        list.push({ ordinal, tf: count });
      }
    });
    this.avgLength = documents.length > 0 ? total / documents.length : 0;
  }

  /** Number of indexed documents. */
  public get size(): number {
    return this.lengths.length;
  }

  /** Lucene-style IDF, always positive. */
  private idf(term: string): number {
    const df = this.postings.get(term)?.length ?? 0;
    const n = this.size;
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /**
   * Score every candidate containing at least one query term. Results are
   * ordered by score descending, ties by ordinal ascending, and truncated to
   * `limit`. Documents scoring 0 (or a non-finite value) are not returned.
   */
  public search(query: string, limit: number, candidates: Candidates = null): IndexHit[] {
    if (limit <= 0 || this.size === 0) return [];
    const terms = Array.from(new Set(tokenize(query)));
    if (terms.length === 0) return [];

    const { k1, b } = this.params;
    const scores = new Map<number, number>();
    for (const term of terms) {
      const list = this.postings.get(term);
      if (!list) continue;
      const idf = this.idf(term);
      for (const { ordinal, tf } of list) {
        if (candidates && !candidates.has(ordinal)) continue;
        const norm = this.avgLength > 0 ? this.lengths[ordinal] / this.avgLength : 0;
        const s = (idf * (tf * (k1 + 1))) / (tf + k1 * (1 - b + b * norm));
        scores.set(ordinal, (scores.get(ordinal) ?? 0) + s);
      }
    }

    const hits: IndexHit[] = [];
    for (const [ordinal, score] of scores) {
      if (Number.isFinite(score) && score > 0) hits.push({ ordinal, score });
    }
    hits.sort((x, y) => y.score - x.score || x.ordinal - y.ordinal);
    return hits.slice(0, limit);
  }
}
