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

type OpenAiStyleSettings = Extract<ProviderSettings, { kind: "ollama" | "azure" }>;

/** URL + auth headers for an OpenAI-style operation ("chat/completions" or "embeddings"). */
function endpoint(
  settings: OpenAiStyleSettings,
  operation: "chat/completions" | "embeddings",
): { url: string; headers: Record<string, string> } {
  const base = trimTrailingSlash(settings.baseUrl);
  if (settings.kind === "azure") {
    return {
      url: `${base}/openai/deployments/${encodeURIComponent(settings.model)}/${operation}?api-version=${encodeURIComponent(settings.apiVersion)}`,
      headers: { "api-key": settings.apiKey },
    };
  }
  return {
    url: `${base}/${operation}`,
    headers: settings.apiKey ? { Authorization: `Bearer ${settings.apiKey}` } : {},
  };
}

/** Chat completions against Ollama's OpenAI-compatible API or Azure OpenAI. */
export class OpenAiCompatibleChatClient implements LLMClient {
  public readonly modelName: string;

  public constructor(
    private readonly settings: OpenAiStyleSettings,
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
    const { url, headers } = endpoint(this.settings, "chat/completions");
    const res = await postJson({
      dependency: "llm",
      url,
      headers,
      body: {
        model: this.settings.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.params.temperature,
        max_tokens: this.params.maxTokens,
      },
      schema: ChatResponseSchema,
      fetchImpl: this.fetchImpl,
      options,
      retry: this.retry,
    });
    return mapResult(res, (data) => data.choices[0].message.content ?? "");
  }
}

/** Embeddings against Ollama's OpenAI-compatible API or Azure OpenAI. */
export class OpenAiCompatibleEmbeddingClient implements EmbeddingClient {
  public readonly modelName: string;

  public constructor(
    private readonly settings: OpenAiStyleSettings,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly retry: RetryConfig = DEFAULT_RETRY_CONFIG,
  ) {
    this.modelName = settings.model;
  }

  public async embed(
    text: string,
    options?: CallOptions,
  ): Promise<Result<Float32Array, TransientDependencyError>> {
    const { url, headers } = endpoint(this.settings, "embeddings");
    const res = await postJson({
      dependency: "embedding",
      url,
      headers,
      body: { model: this.settings.model, input: text },
      schema: EmbeddingResponseSchema,
      fetchImpl: this.fetchImpl,
      options,
      retry: this.retry,
    });
    return mapResult(res, (data) => Float32Array.from(data.data[0].embedding));
  }
}
