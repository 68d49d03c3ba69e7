import { EmbeddingClient } from "../embeddings";
import { logVerbose, logWarning } from "../logger";
import { Chunk, DocumentType, ScoredChunk } from "../types";
import { Candidates, IndexHit } from "./bm25";
import { DEFAULT_RRF_K, FusionWeights, reciprocalRankFusion } from "./fusion";
import { KnowledgeStore } from "./knowledge-store";
import { hasCorruptValidity, TemporalFilter } from "./temporal-filter";

export interface HybridSearchSettings {
  rrfK: number;
  weights: FusionWeights;
  /** Per-leg fan-out before fusion; larger than topK so fusion has material. */
  lexicalFanOut: number;
  semanticFanOut: number;
  /** Default number of fused results. */
  topK: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_SEARCH_SETTINGS: HybridSearchSettings = {
  rrfK: DEFAULT_RRF_K,
  weights: { lexical: 1, semantic: 1 },
  lexicalFanOut: 20,
  semanticFanOut: 20,
  topK: 5,
  embeddingTimeoutMs: 30_000,
};

export interface SearchOptions {
  targetYear?: number;
  entities?: readonly string[];
  categories?: readonly DocumentType[];
  topK?: number;
  /** Per-query deadline; aborting cancels the in-flight embedding call. */
  signal?: AbortSignal;
}

export interface SearchOutcome {
  results: ScoredChunk[];
  /** The semantic leg failed and fusion ran on the lexical leg alone. */
  degraded: boolean;
  temporalFilterApplied: boolean;
  /** The caller's signal fired before every leg completed. */
  cancelled: boolean;
}

type LegOutcome = { chunks: Chunk[]; failed: boolean; cancelled: boolean };

const EMPTY_LEG: LegOutcome = { chunks: [], failed: false, cancelled: false };

/**
 * Lexical (BM25) + semantic (cosine) retrieval merged by Reciprocal Rank
 * Fusion, with optional candidate restriction and temporal exclusion.
 *
 * Both legs run concurrently and are joined before fusion. A failing or
 * cancelled semantic leg degrades the search to lexical-only; nothing here
 * throws for a dependency failure.
 */
export class HybridSearchEngine {
  private readonly settings: HybridSearchSettings;

  public constructor(
    private readonly store: KnowledgeStore,
    private readonly embeddings: EmbeddingClient,
    settings: Partial<HybridSearchSettings> = {},
    private readonly temporal: TemporalFilter = new TemporalFilter(),
  ) {
    this.settings = { ...DEFAULT_SEARCH_SETTINGS, ...settings };
  }

  /** Ranked chunks for a query; empty when nothing matched in either leg. */
  public async search(queryText: string, options: SearchOptions = {}): Promise<ScoredChunk[]> {
    return (await this.run(queryText, options)).results;
  }

  /** Same as {@link search}, with the degrade/cancel signals for auditing. */
  public async run(queryText: string, options: SearchOptions = {}): Promise<SearchOutcome> {
    const { targetYear, signal } = options;
    const topK = Math.max(0, Math.floor(options.topK ?? this.settings.topK));
    const temporalFilterApplied = targetYear !== undefined;

    if (queryText.trim().length === 0 || topK === 0 || this.store.size === 0) {
      return { results: [], degraded: false, temporalFilterApplied, cancelled: false };
    }
    if (signal?.aborted) {
      return { results: [], degraded: false, temporalFilterApplied, cancelled: true };
    }

    const candidates = this.store.resolveCandidates({
      types: options.categories,
      entities: options.entities,
    });

    const [lexical, semantic] = await Promise.all([
      this.lexicalLeg(queryText, candidates, signal),
      this.semanticLeg(queryText, candidates, signal),
    ]);

    const keep = (c: Chunk) => this.temporal.isValid(c, targetYear);
    const lexicalChunks = lexical.chunks.filter(keep);
    const semanticChunks = semantic.chunks.filter(keep);
    if (temporalFilterApplied) {
      const corrupt = [...lexical.chunks, ...semantic.chunks].filter(hasCorruptValidity);
      if (corrupt.length > 0) {
        logWarning("Chunks with corrupt validity window kept without temporal constraint", {
          ids: Array.from(new Set(corrupt.map((c) => c.id))),
        });
      }
    }

    const fused = reciprocalRankFusion(lexicalChunks, semanticChunks, {
      k: this.settings.rrfK,
      weights: this.settings.weights,
      tieBreak: (c) => this.temporal.rank(c, targetYear),
    });
    logVerbose("Hybrid search", {
      lexical: lexicalChunks.length,
      semantic: semanticChunks.length,
      fused: fused.length,
      targetYear,
    });

    return {
      results: fused.slice(0, topK),
      degraded: semantic.failed,
      temporalFilterApplied,
      cancelled: lexical.cancelled || semantic.cancelled,
    };
  }

  private async lexicalLeg(
    queryText: string,
    candidates: Candidates,
    signal?: AbortSignal,
  ): Promise<LegOutcome> {
    // Yield once so both legs are scheduled before this CPU-bound scan runs.
    await Promise.resolve();
    if (signal?.aborted) return { ...EMPTY_LEG, cancelled: true };
    const hits = this.store.lexicalSearch(queryText, candidates, this.settings.lexicalFanOut);
    return { chunks: this.toChunks(hits), failed: false, cancelled: false };
  }

  private async semanticLeg(
    queryText: string,
    candidates: Candidates,
    signal?: AbortSignal,
  ): Promise<LegOutcome> {
    const res = await this.embeddings.embed(queryText, {
      timeoutMs: this.settings.embeddingTimeoutMs,
      signal,
    });
    if (!res.ok) {
      const cancelled = res.error.reason === "aborted";
      logWarning("Semantic leg unavailable, using lexical results only", {
        error: res.error.message,
      });
      return { chunks: [], failed: true, cancelled };
    }
    if (this.store.dimension > 0 && res.value.length !== this.store.dimension) {
      logWarning("Query embedding dimension differs from the vector index, skipping semantic leg", {
        expected: this.store.dimension,
        actual: res.value.length,
      });
      return { chunks: [], failed: true, cancelled: false };
    }
    const hits = this.store.vectorSearch(res.value, candidates, this.settings.semanticFanOut);
    return { chunks: this.toChunks(hits), failed: false, cancelled: false };
  }

  private toChunks(hits: readonly IndexHit[]): Chunk[] {
    return hits.filter((h) => Number.isFinite(h.score)).map((h) => this.store.getChunk(h.ordinal));
  }
}
