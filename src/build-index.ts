/**
 * Offline artifact build (`npm run build-index`): embeds the knowledge
 * source files under KNOWLEDGE_DIR and the safety seed phrases, writing
 * INDEX_STORE_PATH and SAFETY_STORE_PATH.
 */
import { getConfig } from "./config";
import { describeError } from "./errors";
import { Indexer } from "./indexer";
import { logError, logInfo, setVerboseLogging } from "./logger";
import { Persistence } from "./persistence";
import { createEmbeddingClient } from "./providers";

try {
  const config = getConfig();
  setVerboseLogging(config.VERBOSE);
  const embeddings = createEmbeddingClient(config.EMBEDDING);
  const indexer = new Indexer({
    knowledgeDir: config.KNOWLEDGE_DIR,
    seedsPath: config.SAFETY_SEEDS_PATH,
    indexStorePath: config.INDEX_STORE_PATH,
    safetyStorePath: config.SAFETY_STORE_PATH,
    embeddings,
    persistence: new Persistence(embeddings.modelName),
    embeddingTimeoutMs: config.EMBEDDING_TIMEOUT_MS,
  });
  const summary = await indexer.build();
  logInfo("Artifacts written", { ...summary });
} catch (e) {
  logError("Index build failed", { error: describeError(e) });
  process.exitCode = 1;
}
