import { Chunk } from "../types";

/** Inclusive range of years accepted from query text. */
export const MIN_QUERY_YEAR = 1900;
export const MAX_QUERY_YEAR = 2100;

// "năm 2024" is preferred over any other four-digit number in the text.
const YEAR_PATTERNS: readonly RegExp[] = [/năm\s+(\d{4})(?!\d)/gu, /(?<!\d)(\d{4})(?!\d)/gu];

/**
 * Extract the first plausible year (1900-2100) from query text.
 * Returns undefined when the text carries no temporal cue.
 */
export function extractYear(text: string): number | undefined {
  const normalized = text.normalize("NFC").toLowerCase();
  for (const pattern of YEAR_PATTERNS) {
    for (const match of normalized.matchAll(pattern)) {
      const year = Number(match[1]);
      if (year >= MIN_QUERY_YEAR && year <= MAX_QUERY_YEAR) return year;
    }
  }
  return undefined;
}

/** True when a chunk's validity window is unusable (reversed or non-finite). */
export function hasCorruptValidity(chunk: Chunk): boolean {
  return (
    !Number.isFinite(chunk.validFrom) ||
    !Number.isFinite(chunk.validUntil) ||
    chunk.validFrom > chunk.validUntil
  );
}

/**
 * Year-based validity checks. Filtering is opt-in: without a target year
 * every chunk passes, and a chunk whose metadata is corrupt is treated as
 * carrying no temporal constraint.
 */
export class TemporalFilter {
  /** `validFrom <= targetYear <= validUntil`; always true without a target year. */
  public isValid(chunk: Chunk, targetYear?: number): boolean {
    if (targetYear === undefined) return true;
    if (hasCorruptValidity(chunk)) return true;
    return chunk.validFrom <= targetYear && targetYear <= chunk.validUntil;
  }

  /**
   * Recency signal in (0, 1]: 1 when the chunk starts in the target year,
   * shrinking as |validFrom - targetYear| grows. 0 without a target year or
   * when validFrom is not a finite number.
   */
  public rank(chunk: Chunk, targetYear?: number): number {
    if (targetYear === undefined || !Number.isFinite(chunk.validFrom)) return 0;
    return 1 / (1 + Math.abs(chunk.validFrom - targetYear));
  }
}
