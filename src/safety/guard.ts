import { EmbeddingClient, maxCosine } from "../embeddings";
import { logWarning } from "../logger";
import { PhraseMatcher } from "../text";
import { SafetyVerdict } from "../types";
import { UNSAFE_QUERY_KEYWORDS } from "./keywords";

export const DEFAULT_SAFETY_THRESHOLD = 0.85;

export interface SafetyGuardOptions {
  /** Inclusive similarity threshold. */
  threshold?: number;
  keywords?: readonly string[];
  embeddingTimeoutMs?: number;
}

/**
 * Semantic firewall. A query is unsafe when its embedding is at least
 * `threshold`-similar to any row of the unsafe-intent matrix, or when it
 * contains one of the literal unsafe phrases. The keyword scan always runs,
 * so an embedding outage degrades to keyword-only screening.
 */
export class SafetyGuard {
  private readonly threshold: number;
  private readonly keywords: PhraseMatcher;
  private readonly embeddingTimeoutMs?: number;

  /**
   * @param unsafeIntents Precomputed unsafe-intent vectors, loaded once and never mutated.
   */
  public constructor(
    private readonly embeddings: EmbeddingClient,
    private readonly unsafeIntents: readonly Float32Array[],
    options: SafetyGuardOptions = {},
  ) {
    this.threshold = options.threshold ?? DEFAULT_SAFETY_THRESHOLD;
    this.keywords = new PhraseMatcher(options.keywords ?? UNSAFE_QUERY_KEYWORDS);
    this.embeddingTimeoutMs = options.embeddingTimeoutMs;
  }

  public async check(queryText: string, signal?: AbortSignal): Promise<SafetyVerdict> {
    const matchedKeyword = this.keywords.firstMatch(queryText);
    const keywordPart = matchedKeyword === undefined ? {} : { matchedKeyword };

    if (queryText.trim().length === 0) {
      return { isUnsafe: false, similarity: 0, degraded: false };
    }

    const res = await this.embeddings.embed(queryText, {
      timeoutMs: this.embeddingTimeoutMs,
      signal,
    });
    if (!res.ok) {
      logWarning("Safety embedding unavailable, keyword-only screening", {
        error: res.error.message,
      });
      return {
        isUnsafe: matchedKeyword !== undefined,
        similarity: 0,
        degraded: true,
        ...keywordPart,
      };
    }

    const similarity = SafetyGuard.clamp(maxCosine(res.value, this.unsafeIntents));
    return {
      isUnsafe: similarity >= this.threshold || matchedKeyword !== undefined,
      similarity,
      degraded: false,
      ...keywordPart,
    };
  }

  private static clamp(s: number): number {
    if (!Number.isFinite(s)) return 0;
    return Math.min(1, Math.max(0, s));
  }
}
