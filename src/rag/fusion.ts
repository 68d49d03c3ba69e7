import { Chunk, ScoredChunk } from "../types";

export interface FusionWeights {
  lexical: number;
  semantic: number;
}

export interface FusionOptions {
  /** RRF damping constant. */
  k: number;
  weights: FusionWeights;
  /**
   * Secondary ordering signal for equal RRF scores (higher first), applied
   * before the final chunk-id tie-break.
   */
  tieBreak?: (chunk: Chunk) => number;
}

export const DEFAULT_RRF_K = 60;

/**
 * Reciprocal Rank Fusion of a lexical and a semantic ranking:
 *
 *   RRF(c) = Σ_leg weight_leg / (k + rank_leg(c))
 *
 * with 1-based ranks and no term for a leg that did not return `c`. Only the
 * order of each leg is used, never its raw scores. Output is fully ordered:
 * RRF desc, then `tieBreak` desc, then chunk id ascending.
 */
export function reciprocalRankFusion(
  lexical: readonly Chunk[],
  semantic: readonly Chunk[],
  options: FusionOptions,
): ScoredChunk[] {
  const { k, weights, tieBreak } = options;
  const entries = new Map<string, { chunk: Chunk; score: number; lexicalRank?: number; semanticRank?: number }>();

  const accumulate = (leg: readonly Chunk[], weight: number, which: "lexicalRank" | "semanticRank") => {
    leg.forEach((chunk, i) => {
      const rank = i + 1;
      let entry = entries.get(chunk.id);
      if (!entry) {
        entry = { chunk, score: 0 };
        entries.set(chunk.id, entry);
      }
      // A chunk listed twice in one leg keeps its best rank only.
      if (entry[which] !== undefined) return;
      entry[which] = rank;
      entry.score += weight / (k + rank);
    });
  };
  accumulate(lexical, weights.lexical, "lexicalRank");
  accumulate(semantic, weights.semantic, "semanticRank");

  const secondary = new Map<string, number>();
  if (tieBreak) for (const { chunk } of entries.values()) secondary.set(chunk.id, tieBreak(chunk));

  const fused: ScoredChunk[] = Array.from(entries.values(), (e) => ({
    chunk: e.chunk,
    score: e.score,
    source: "FUSED" as const,
    ...(e.lexicalRank !== undefined ? { lexicalRank: e.lexicalRank } : {}),
    ...(e.semanticRank !== undefined ? { semanticRank: e.semanticRank } : {}),
  }));
  fused.sort(
    (a, b) =>
      b.score - a.score ||
      (secondary.get(b.chunk.id) ?? 0) - (secondary.get(a.chunk.id) ?? 0) ||
      (a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0),
  );
  return fused;
}
