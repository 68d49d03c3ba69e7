import { EmbeddingClient } from "../embeddings";
import { LLMClient } from "../llm";
import { DEFAULT_RETRY_CONFIG, FetchLike, RetryConfig } from "./http";
import { OpenAiCompatibleChatClient, OpenAiCompatibleEmbeddingClient } from "./openai-compatible";
import { DEFAULT_COMPLETION_PARAMS, ProviderSettings } from "./types";
import { VnptChatClient, VnptEmbeddingClient } from "./vnpt";

export type { ProviderSettings, ProviderKind } from "./types";
export type { FetchLike, RetryConfig } from "./http";

/** Build the completion client for the configured provider (called once at startup). */
export function createLlmClient(
  settings: ProviderSettings,
  fetchImpl: FetchLike = fetch,
  retry: RetryConfig = DEFAULT_RETRY_CONFIG,
): LLMClient {
  switch (settings.kind) {
    case "ollama":
    case "azure":
      return new OpenAiCompatibleChatClient(settings, fetchImpl, DEFAULT_COMPLETION_PARAMS, retry);
    case "vnpt":
      return new VnptChatClient(settings, fetchImpl, DEFAULT_COMPLETION_PARAMS, retry);
  }
}

/** Build the embedding client for the configured provider (called once at startup). */
export function createEmbeddingClient(
  settings: ProviderSettings,
  fetchImpl: FetchLike = fetch,
  retry: RetryConfig = DEFAULT_RETRY_CONFIG,
): EmbeddingClient {
  switch (settings.kind) {
    case "ollama":
    case "azure":
      return new OpenAiCompatibleEmbeddingClient(settings, fetchImpl, retry);
    case "vnpt":
      return new VnptEmbeddingClient(settings, fetchImpl, retry);
  }
}
