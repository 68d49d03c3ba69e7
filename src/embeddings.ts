import { TransientDependencyError } from "./errors";
import { Result } from "./result";
import { CallOptions } from "./types";

/**
 * Text -> fixed-length vector. Implementations live under providers/ and are
 * picked once at startup; every call returns a Result instead of throwing so
 * callers can take their degrade path on `!ok`.
 */
export interface EmbeddingClient {
  /** Model identifier, persisted with artifacts to detect incompatible stores. */
  readonly modelName: string;
  embed(text: string, options?: CallOptions): Promise<Result<Float32Array, TransientDependencyError>>;
}

/**
 * Cosine similarity between two vectors. Length mismatch is handled by
 * comparing up to the shortest length. A zero vector (or any non-finite
 * intermediate) yields NaN so callers can drop it rather than rank it.
 *
 * @returns Cosine similarity in range [-1, 1], or NaN
 */
export function cosine(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0,
    na = 0,
    nb = 0;
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i],
      y = b[i];
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  const denom = Math.sqrt(na) * Math.sqrt(nb);
  if (denom === 0 || !Number.isFinite(denom)) return Number.NaN;
  return dot / denom;
}

/**
 * Highest cosine similarity between `query` and any row. NaN rows are
 * skipped; an empty (or all-NaN) matrix gives -Infinity.
 */
export function maxCosine(query: ArrayLike<number>, rows: readonly ArrayLike<number>[]): number {
  let best = Number.NEGATIVE_INFINITY;
  for (const row of rows) {
    const s = cosine(query, row);
    if (!Number.isNaN(s) && s > best) best = s;
  }
  return best;
}
