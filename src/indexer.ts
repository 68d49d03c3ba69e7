import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { EmbeddingClient } from "./embeddings";
import { ConfigurationError, describeError } from "./errors";
import { logError, logInfo, logVerbose, logWarning } from "./logger";
import { KnowledgeSourceSchema, Persistence, SafetySeedsSchema } from "./persistence";
import { Chunk } from "./types";

/**
 * Options required to construct an {@link Indexer}. Progress output goes
 * through logVerbose, so it follows the VERBOSE setting.
 */
export interface BuildIndexOptions {
  /** Directory scanned for `*.json` knowledge source files. */
  knowledgeDir: string;
  /** JSON array of unsafe-intent seed phrases. */
  seedsPath: string;
  indexStorePath: string;
  safetyStorePath: string;
  embeddings: EmbeddingClient;
  persistence: Persistence;
  embeddingTimeoutMs?: number;
}

export interface BuildSummary {
  files: number;
  chunks: number;
  /** Chunks whose vector was reused from the previous store. */
  reused: number;
  safetyVectors: number;
  dimension: number;
}

/**
 * Offline artifact build: discover knowledge source files, validate the
 * chunk records, embed each chunk and persist the knowledge store, then
 * embed the safety seeds into the unsafe-intent matrix.
 *
 * When a compatible store from a previous build exists, vectors of chunks
 * whose id and text are unchanged are reused instead of re-embedded.
 */
export class Indexer {
  public constructor(private readonly opts: BuildIndexOptions) {}

  public async build(): Promise<BuildSummary> {
    const files = await this.discoverFiles();
    logInfo(`Loading knowledge from ${this.opts.knowledgeDir} ... (${files.length} files)`);
    const chunks = await this.loadChunks(files);
    if (chunks.length === 0) {
      throw new ConfigurationError(`No knowledge chunks found under ${this.opts.knowledgeDir}`);
    }

    const previous = await this.opts.persistence.tryLoadKnowledge(this.opts.indexStorePath);
    const cached = new Map<string, { text: string; vector: Float32Array }>();
    if (previous) {
      const { chunks: oldChunks, vectors: oldVectors } = previous;
      oldChunks.forEach((c, i) => cached.set(c.id, { text: c.text, vector: oldVectors[i] }));
    }

    logInfo(`Created ${chunks.length} chunks. Generating embeddings...`);
    const vectors: Float32Array[] = [];
    let reused = 0;
    for (let i = 0; i < chunks.length; i++) {
      const hit = cached.get(chunks[i].id);
      if (hit && hit.text === chunks[i].text) {
        vectors.push(hit.vector);
        reused++;
        continue;
      }
      if (i % 50 === 0) {
        const pct = ((i / Math.max(1, chunks.length)) * 100).toFixed(1);
        logVerbose(`Embedding progress: ${i}/${chunks.length} (${pct}%)`);
      }
      vectors.push(await this.embed(chunks[i].text, `chunk ${chunks[i].id}`));
    }
    if (reused > 0) logInfo(`Reused ${reused} cached embeddings.`);
    await this.opts.persistence.saveKnowledge(this.opts.indexStorePath, chunks, vectors);

    const seeds = await this.loadSeeds();
    const seedVectors: Float32Array[] = [];
    for (const seed of seeds) seedVectors.push(await this.embed(seed, "safety seed"));
    await this.opts.persistence.saveSafety(this.opts.safetyStorePath, seeds, seedVectors);

    logInfo(`Embeddings ready.`);
    return {
      files: files.length,
      chunks: chunks.length,
      reused,
      safetyVectors: seedVectors.length,
      dimension: vectors[0]?.length ?? 0,
    };
  }

  private async discoverFiles(): Promise<string[]> {
    const files = await fg("**/*.json", { cwd: this.opts.knowledgeDir, dot: false, absolute: true });
    return files.sort();
  }

  /**
   * Read and validate every source file. A file that is unreadable or fails
   * validation is skipped with an error; a duplicate id keeps its first
   * occurrence.
   */
  private async loadChunks(files: readonly string[]): Promise<Chunk[]> {
    const chunks: Chunk[] = [];
    const seen = new Set<string>();
    for (const file of files) {
      const rel = path.relative(this.opts.knowledgeDir, file);
      let records: Chunk[];
      try {
        const parsed = KnowledgeSourceSchema.safeParse(JSON.parse(await fs.readFile(file, "utf8")));
        if (!parsed.success) {
          logError(`Skipping ${rel}: ${parsed.error.message}`);
          continue;
        }
        records = parsed.data;
      } catch (e) {
        logError(`Skipping unreadable knowledge file ${rel}`, { error: describeError(e) });
        continue;
      }
      for (const chunk of records) {
        if (seen.has(chunk.id)) {
          logWarning(`Duplicate chunk id ${chunk.id} in ${rel}, keeping the first occurrence`);
          continue;
        }
        if (chunk.validFrom > chunk.validUntil) {
          logWarning(`Chunk ${chunk.id} has validFrom after validUntil; it will match every year`);
        }
        seen.add(chunk.id);
        chunks.push(chunk);
      }
      logVerbose(`Loaded ${records.length} records from ${rel}`);
    }
    return chunks;
  }

  private async loadSeeds(): Promise<string[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.opts.seedsPath, "utf8"));
    } catch (e) {
      throw new ConfigurationError(`Cannot read safety seeds at ${this.opts.seedsPath}`, { cause: e });
    }
    const parsed = SafetySeedsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Malformed safety seeds at ${this.opts.seedsPath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async embed(text: string, what: string): Promise<Float32Array> {
    const res = await this.opts.embeddings.embed(text, { timeoutMs: this.opts.embeddingTimeoutMs });
    if (!res.ok) throw new ConfigurationError(`Embedding failed for ${what}`, { cause: res.error });
    return res.value;
  }
}
