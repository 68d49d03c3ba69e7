import { EmbeddingClient } from "../embeddings";
import { TransientDependencyError } from "../errors";
import { LLMClient } from "../llm";
import { mapResult, Result } from "../result";
import { CallOptions } from "../types";
import {
  ChatResponseSchema,
  EmbeddingResponseSchema,
  DEFAULT_RETRY_CONFIG,
  FetchLike,
  postJson,
  RetryConfig,
  trimTrailingSlash,
} from "./http";
import { CompletionParams, DEFAULT_COMPLETION_PARAMS, ProviderSettings } from "./types";

type VnptSettings = Extract<ProviderSettings, { kind: "vnpt" }>;

export const VNPT_DEFAULT_BASE_URL = "https://api.idg.vnpt.vn";

/**
 * VNPT AI endpoints are addressed by model: `vnptai_hackathon_small` is
 * served at `.../vnptai-hackathon-small`. Chat lives under
 * `/data-service/v1/chat/completions/`, embeddings directly under
 * `/data-service/`.
 */
function modelPath(model: string): string {
  return model.trim().toLowerCase().replace(/_/g, "-");
}

function authHeaders(settings: VnptSettings): Record<string, string> {
  return {
    Authorization: `Bearer ${settings.apiKey.replace(/^Bearer\s+/i, "")}`,
    "Token-id": settings.tokenId,
    "Token-key": settings.tokenKey,
  };
}

export class VnptChatClient implements LLMClient {
  public readonly modelName: string;

  public constructor(
    private readonly settings: VnptSettings,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly params: CompletionParams = DEFAULT_COMPLETION_PARAMS,
    private readonly retry: RetryConfig = DEFAULT_RETRY_CONFIG,
  ) {
    this.modelName = settings.model;
  }

  public async complete(
    prompt: string,
    options?: CallOptions,
  ): Promise<Result<string, TransientDependencyError>> {
    const url = `${trimTrailingSlash(this.settings.baseUrl)}/data-service/v1/chat/completions/${modelPath(this.settings.model)}`;
    const res = await postJson({
      dependency: "llm",
      url,
      headers: authHeaders(this.settings),
      body: {
        model: this.settings.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.params.temperature,
        max_completion_tokens: this.params.maxTokens,
      },
      schema: ChatResponseSchema,
      fetchImpl: this.fetchImpl,
      options,
      retry: this.retry,
    });
    return mapResult(res, (data) => data.choices[0].message.content ?? "");
  }
}

export class VnptEmbeddingClient implements EmbeddingClient {
  public readonly modelName: string;

  public constructor(
    private readonly settings: VnptSettings,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly retry: RetryConfig = DEFAULT_RETRY_CONFIG,
  ) {
    this.modelName = settings.model;
  }

  public async embed(
    text: string,
    options?: CallOptions,
  ): Promise<Result<Float32Array, TransientDependencyError>> {
    const url = `${trimTrailingSlash(this.settings.baseUrl)}/data-service/${modelPath(this.settings.model)}`;
    const res = await postJson({
      dependency: "embedding",
      url,
      headers: authHeaders(this.settings),
      body: { model: this.settings.model, input: text, encoding_format: "float" },
      schema: EmbeddingResponseSchema,
      fetchImpl: this.fetchImpl,
      options,
      retry: this.retry,
    });
    return mapResult(res, (data) => Float32Array.from(data.data[0].embedding));
  }
}
