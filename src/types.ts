/**
 * Shared data model for the query engine. Everything here is a plain,
 * readonly value: chunks are loaded once and shared across queries, every
 * other record is created per query and never mutated afterwards.
 */

/** Knowledge-base document families (used for category restriction). */
export const DOCUMENT_TYPES = [
  "LAW",
  "HISTORY",
  "GEOGRAPHY",
  "CULTURE",
  "POLITICS",
  "MATH",
  "GENERAL",
] as const;
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/** `validUntil` value meaning "never expires". */
export const NO_EXPIRY_YEAR = 9999;
/** `region` value meaning "applies everywhere". */
export const ALL_REGIONS = "ALL";

/**
 * Immutable unit of retrievable knowledge. Its ordinal position inside the
 * knowledge store is the same in the lexical and the vector index.
 */
export interface Chunk {
  readonly id: string;
  readonly text: string;
  /** Human readable origin (document title, URL, legal reference...). */
  readonly source: string;
  readonly type: DocumentType;
  /** First year (inclusive) the content applies to. */
  readonly validFrom: number;
  /** Last year (inclusive) the content applies to; {@link NO_EXPIRY_YEAR} when open-ended. */
  readonly validUntil: number;
  readonly region: string;
}

export type ScoreSource = "LEXICAL" | "SEMANTIC" | "FUSED";

/** Per-query pairing of a chunk with a relevance score. */
export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
  readonly source: ScoreSource;
  /** 1-based rank in the lexical leg (fused results only, absent when the leg missed it). */
  readonly lexicalRank?: number;
  /** 1-based rank in the semantic leg (fused results only, absent when the leg missed it). */
  readonly semanticRank?: number;
}

export interface SafetyVerdict {
  readonly isUnsafe: boolean;
  /** Highest cosine similarity to the unsafe-intent matrix, clamped to [0, 1]. */
  readonly similarity: number;
  readonly matchedKeyword?: string;
  /** True when the embedding path failed and only the keyword scan ran. */
  readonly degraded: boolean;
}

export type RouteMode = "READING" | "STEM" | "RAG";

export interface RouteDecision {
  readonly mode: RouteMode;
  /** Name of the rule that selected the mode (absent for the RAG default). */
  readonly matchedPattern?: string;
  readonly extractedYear?: number;
  readonly extractedEntities: readonly string[];
  /** Document family suggested by the query wording (RAG mode only). */
  readonly categoryHint?: DocumentType;
}

/** Multiple-choice question; any number of options is allowed. */
export interface Question {
  readonly id: string;
  readonly text: string;
  readonly options: readonly string[];
}

/** Options accepted by every call that may block on an external service. */
export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Letter for a 0-based option index: 0 -> "A", 9 -> "J". */
export function optionLetter(index: number): string {
  return String.fromCharCode(65 + index);
}
