import { EmbeddingClient } from "../embeddings";
import { TransientDependencyError } from "../errors";
import { LLMClient } from "../llm";
import { Err, Ok, Result } from "../result";
import { CallOptions, Chunk } from "../types";

export function makeChunk(overrides: Partial<Chunk> & Pick<Chunk, "id" | "text">): Chunk {
  return {
    source: "test",
    type: "GENERAL",
    validFrom: 1900,
    validUntil: 9999,
    region: "ALL",
    ...overrides,
  };
}

/**
 * Embedding client backed by a lookup table. Unknown texts get `fallback`
 * (or a bad_response error when none is set); `failWith` makes every call fail.
 */
export class FakeEmbeddingClient implements EmbeddingClient {
  public readonly modelName = "fake-embedding";
  public readonly calls: string[] = [];
  public failWith?: TransientDependencyError;

  public constructor(
    private readonly table: Record<string, number[]> = {},
    private readonly fallback?: number[],
  ) {}

  public async embed(text: string, options?: CallOptions): Promise<Result<Float32Array, TransientDependencyError>> {
    this.calls.push(text);
    if (options?.signal?.aborted) {
      return Err(new TransientDependencyError("embedding", "aborted", "aborted"));
    }
    if (this.failWith) return Err(this.failWith);
    const v = this.table[text] ?? this.fallback;
    if (!v) return Err(new TransientDependencyError("embedding", "bad_response", `no vector for ${text}`));
    return Ok(Float32Array.from(v));
  }
}

/** LLM client replying from a queue; an empty queue is a timeout. */
export class FakeLLMClient implements LLMClient {
  public readonly modelName = "fake-llm";
  public readonly prompts: string[] = [];

  public constructor(private readonly replies: Array<string | TransientDependencyError> = []) {}

  public async complete(prompt: string): Promise<Result<string, TransientDependencyError>> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) return Err(new TransientDependencyError("llm", "timeout", "no reply queued"));
    return typeof reply === "string" ? Ok(reply) : Err(reply);
  }
}

/** Embedding client that never answers on its own; it fails only once its signal aborts. */
export class HangingEmbeddingClient implements EmbeddingClient {
  public readonly modelName = "fake-embedding";

  public embed(_text: string, options?: CallOptions): Promise<Result<Float32Array, TransientDependencyError>> {
    return new Promise((resolve) => {
      options?.signal?.addEventListener(
        "abort",
        () => resolve(Err(new TransientDependencyError("embedding", "aborted", "aborted"))),
        { once: true },
      );
    });
  }
}
