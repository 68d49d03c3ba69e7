import { Config, describeProvider } from "./config";
import { EmbeddingClient } from "./embeddings";
import { ConfigurationError } from "./errors";
import { LLMClient } from "./llm";
import { Persistence } from "./persistence";
import { QueryProcessor } from "./pipeline";
import { createEmbeddingClient, createLlmClient, FetchLike } from "./providers";
import { HybridSearchEngine } from "./rag/hybrid-search";
import { InMemoryKnowledgeStore, KnowledgeStore } from "./rag/knowledge-store";
import { RegexRouter } from "./router/regex-router";
import { SafetyGuard } from "./safety/guard";
import { SafetySelector } from "./safety/selector";
import { StatusManager } from "./status";

/** Every long-lived component, wired once at startup and shared by all sessions. */
export interface Engine {
  store: KnowledgeStore;
  guard: SafetyGuard;
  router: RegexRouter;
  search: HybridSearchEngine;
  selector: SafetySelector;
  processor: QueryProcessor;
}

export interface EngineParts {
  config: Config;
  embeddings: EmbeddingClient;
  llm: LLMClient;
  store: KnowledgeStore;
  unsafeIntents: readonly Float32Array[];
  status?: StatusManager;
}

/** Wire components from already-loaded parts. */
export function assembleEngine(parts: EngineParts): Engine {
  const { config, embeddings, llm, store, unsafeIntents, status } = parts;
  const guard = new SafetyGuard(embeddings, unsafeIntents, {
    threshold: config.SAFETY_THRESHOLD,
    embeddingTimeoutMs: config.EMBEDDING_TIMEOUT_MS,
  });
  const router = new RegexRouter();
  const search = new HybridSearchEngine(store, embeddings, {
    rrfK: config.RRF_K,
    weights: { lexical: config.LEXICAL_WEIGHT, semantic: config.SEMANTIC_WEIGHT },
    lexicalFanOut: config.LEXICAL_FAN_OUT,
    semanticFanOut: config.SEMANTIC_FAN_OUT,
    topK: config.TOP_K,
    embeddingTimeoutMs: config.EMBEDDING_TIMEOUT_MS,
  });
  const selector = new SafetySelector(llm, { llmTimeoutMs: config.LLM_TIMEOUT_MS });
  const processor = new QueryProcessor(
    { guard, router, search, selector, llm, status },
    {
      queryDeadlineMs: config.QUERY_DEADLINE_MS,
      llmTimeoutMs: config.LLM_TIMEOUT_MS,
      maxConcurrentQueries: config.MAX_CONCURRENT_QUERIES,
    },
  );
  return { store, guard, router, search, selector, processor };
}

/**
 * Create the provider clients, load both artifacts and assemble the engine.
 * Missing, incompatible or misaligned artifacts throw
 * {@link ConfigurationError}; startup should abort on it.
 */
export async function loadEngine(
  config: Config,
  status: StatusManager,
  fetchImpl: FetchLike = fetch,
): Promise<Engine> {
  const embeddings = createEmbeddingClient(config.EMBEDDING, fetchImpl);
  const llm = createLlmClient(config.LLM, fetchImpl);
  status.setProviders(describeProvider(config.LLM), describeProvider(config.EMBEDDING));

  const persistence = new Persistence(embeddings.modelName);
  const knowledge = await persistence.loadKnowledge(config.INDEX_STORE_PATH);
  const safety = await persistence.loadSafety(config.SAFETY_STORE_PATH);
  const { dimension } = knowledge.meta;
  if (dimension > 0 && safety.meta.dimension > 0 && safety.meta.dimension !== dimension) {
    throw new ConfigurationError(
      `Unsafe-intent vectors have dimension ${safety.meta.dimension}, knowledge store has ${dimension}`,
    );
  }

  const store = new InMemoryKnowledgeStore({ chunks: knowledge.chunks, vectors: knowledge.vectors });
  status.setArtifacts({ chunks: store.size, dimension: store.dimension, safetyVectors: safety.vectors.length });
  const engine = assembleEngine({ config, embeddings, llm, store, unsafeIntents: safety.vectors, status });
  status.markReady();
  return engine;
}
