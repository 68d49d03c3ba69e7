import { cosine } from "../embeddings";
import { ConfigurationError } from "../errors";
import { normalizeText } from "../text";
import { Chunk, DocumentType } from "../types";
import { Bm25Index, Candidates, IndexHit } from "./bm25";

/** Optional restriction of the search universe. */
export interface CandidateFilter {
  /** Keep chunks of these document types. */
  types?: readonly DocumentType[];
  /** Keep chunks whose text or source mentions at least one entity. */
  entities?: readonly string[];
}

/**
 * Read-only chunk store with an aligned lexical and vector index: ordinal
 * `i` denotes the same chunk in both.
 */
export interface KnowledgeStore {
  readonly size: number;
  /** Vector dimensionality of the semantic index (0 when empty). */
  readonly dimension: number;
  /**
   * Resolve a filter to a candidate set. `null` means the whole store: no
   * filter was given, or the filter would have excluded everything.
   */
  resolveCandidates(filter?: CandidateFilter): Candidates;
  lexicalSearch(queryText: string, candidates: Candidates, limit: number): IndexHit[];
  vectorSearch(queryVector: ArrayLike<number>, candidates: Candidates, limit: number): IndexHit[];
  getChunk(ordinal: number): Chunk;
  getChunkById(id: string): Chunk | undefined;
}

export interface InMemoryKnowledgeStoreOptions {
  chunks: readonly Chunk[];
  /** One vector per chunk, same order. */
  vectors: readonly Float32Array[];
  /** Prebuilt lexical index; built from chunk texts when omitted. */
  lexical?: Bm25Index;
}

/**
 * In-process knowledge store. Construction validates the alignment
 * invariants and throws {@link ConfigurationError} when they do not hold;
 * after that the instance is never mutated and is safe to share across
 * concurrent queries.
 */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly chunks: readonly Chunk[];
  private readonly vectors: readonly Float32Array[];
  private readonly lexical: Bm25Index;
  private readonly byId: ReadonlyMap<string, number>;
  private readonly searchable: readonly string[];
  public readonly dimension: number;

  public constructor(opts: InMemoryKnowledgeStoreOptions) {
    const { chunks, vectors } = opts;
    if (vectors.length !== chunks.length) {
      throw new ConfigurationError(
        `Index misalignment: ${chunks.length} chunks but ${vectors.length} vectors`,
      );
    }
    const lexical = opts.lexical ?? new Bm25Index(chunks.map((c) => c.text));
    if (lexical.size !== chunks.length) {
      throw new ConfigurationError(
        `Index misalignment: ${chunks.length} chunks but lexical index holds ${lexical.size}`,
      );
    }
    const dimension = vectors[0]?.length ?? 0;
    vectors.forEach((v, i) => {
      if (v.length !== dimension) {
        throw new ConfigurationError(
          `Vector ${i} (chunk ${chunks[i].id}) has dimension ${v.length}, expected ${dimension}`,
        );
      }
    });
    const byId = new Map<string, number>();
    chunks.forEach((c, i) => {
      if (byId.has(c.id)) throw new ConfigurationError(`Duplicate chunk id: ${c.id}`);
      byId.set(c.id, i);
    });

    this.chunks = chunks;
    this.vectors = vectors;
    this.lexical = lexical;
    this.byId = byId;
    this.dimension = dimension;
    this.searchable = chunks.map((c) => normalizeText(`${c.source}\n${c.text}`));
  }

  public get size(): number {
    return this.chunks.length;
  }

  public resolveCandidates(filter?: CandidateFilter): Candidates {
    const types = filter?.types?.length ? new Set(filter.types) : null;
    const entities = (filter?.entities ?? [])
      .map((e) => normalizeText(e).trim())
      .filter((e) => e.length > 0);
    if (!types && entities.length === 0) return null;

    const out = new Set<number>();
    this.chunks.forEach((chunk, i) => {
      if (types && !types.has(chunk.type)) return;
      if (entities.length > 0 && !entities.some((e) => this.searchable[i].includes(e))) return;
      out.add(i);
    });
    return out.size > 0 ? out : null;
  }

  public lexicalSearch(queryText: string, candidates: Candidates, limit: number): IndexHit[] {
    return this.lexical.search(queryText, limit, candidates);
  }

  /** Exhaustive cosine scan; NaN similarities (zero or malformed vectors) are skipped. */
  public vectorSearch(queryVector: ArrayLike<number>, candidates: Candidates, limit: number): IndexHit[] {
    if (limit <= 0) return [];
    const hits: IndexHit[] = [];
    this.vectors.forEach((v, ordinal) => {
      if (candidates && !candidates.has(ordinal)) return;
      const score = cosine(queryVector, v);
      if (Number.isFinite(score)) hits.push({ ordinal, score });
    });
    hits.sort((x, y) => y.score - x.score || x.ordinal - y.ordinal);
    return hits.slice(0, limit);
  }

  public getChunk(ordinal: number): Chunk {
    const chunk = this.chunks[ordinal];
    if (!chunk) throw new RangeError(`No chunk at ordinal ${ordinal}`);
    return chunk;
  }

  public getChunkById(id: string): Chunk | undefined {
    const ordinal = this.byId.get(id);
    return ordinal === undefined ? undefined : this.chunks[ordinal];
  }
}
