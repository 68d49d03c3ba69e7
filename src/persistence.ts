import fs from "node:fs/promises";
import fsSync from "node:fs";
import path from "node:path";
import { z } from "zod";
import { MIN_QUERY_YEAR } from "./rag/temporal-filter";
import { ConfigurationError } from "./errors";
import { logInfo, logVerbose } from "./logger";
import { ALL_REGIONS, Chunk, DOCUMENT_TYPES, NO_EXPIRY_YEAR } from "./types";

/**
 * A chunk record as written in knowledge source files and in the persisted
 * store. Only `id` and `text` are required; the temporal window defaults to
 * "always valid" and the region to {@link ALL_REGIONS}.
 */
export const ChunkRecordSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  source: z.string().default(""),
  type: z.enum(DOCUMENT_TYPES).default("GENERAL"),
  validFrom: z.number().int().default(MIN_QUERY_YEAR),
  validUntil: z.number().int().default(NO_EXPIRY_YEAR),
  region: z.string().min(1).default(ALL_REGIONS),
});

/** A knowledge source file: a bare array of chunk records or `{ chunks: [...] }`. */
export const KnowledgeSourceSchema = z.union([
  z.array(ChunkRecordSchema),
  z.object({ chunks: z.array(ChunkRecordSchema) }).transform((o) => o.chunks),
]);

const MetaSchema = z.object({
  modelName: z.string(),
  dimension: z.number().int().nonnegative(),
  savedAt: z.string(),
  embEncoding: z.literal("f32le-base64"),
});

export type ArtifactMeta = z.infer<typeof MetaSchema>;

const StoredKnowledgeSchema = z.object({
  version: z.literal(1),
  meta: MetaSchema,
  chunks: z.array(ChunkRecordSchema.extend({ emb: z.string() })),
});

export const SafetySeedsSchema = z.array(z.string().min(1));

const StoredSafetySchema = z.object({
  version: z.literal(1),
  meta: MetaSchema,
  seeds: z.array(z.object({ text: z.string(), emb: z.string() })),
});

/** Base64 of little-endian float32 values. */
export function encodeVector(v: Float32Array): string {
  const buf = Buffer.alloc(v.length * 4);
  v.forEach((x, i) => buf.writeFloatLE(x, i * 4));
  return buf.toString("base64");
}

export function decodeVector(encoded: string): Float32Array {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) {
    throw new ConfigurationError(`Encoded vector has ${buf.byteLength} bytes, not a multiple of 4`);
  }
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

export interface StoredKnowledge {
  meta: ArtifactMeta;
  chunks: Chunk[];
  vectors: Float32Array[];
}

export interface StoredSafety {
  meta: ArtifactMeta;
  seeds: string[];
  vectors: Float32Array[];
}

/**
 * Load/save for the two artifacts: the knowledge store (chunks + aligned
 * vectors) and the unsafe-intent matrix. Loading checks the model name and
 * dimension recorded at build time against the running configuration; any
 * mismatch or malformed content is a {@link ConfigurationError}.
 */
export class Persistence {
  /**
   * @param modelName Embedding model of the running configuration.
   */
  public constructor(private readonly modelName: string) {}

  public async loadKnowledge(storePath: string): Promise<StoredKnowledge> {
    const parsed = StoredKnowledgeSchema.safeParse(await Persistence.readJson(storePath));
    if (!parsed.success) {
      throw new ConfigurationError(`Malformed knowledge store at ${storePath}: ${parsed.error.message}`);
    }
    const { meta, chunks: records } = parsed.data;
    this.checkCompatible(storePath, meta);
    const chunks: Chunk[] = [];
    const vectors: Float32Array[] = [];
    for (const { emb, ...chunk } of records) {
      chunks.push(chunk);
      vectors.push(Persistence.checkedVector(storePath, chunk.id, emb, meta.dimension));
    }
    logInfo(`Loaded knowledge store: ${chunks.length} chunks.`);
    logVerbose("Knowledge store loaded", { storePath, savedAt: meta.savedAt });
    return { meta, chunks, vectors };
  }

  public async saveKnowledge(
    storePath: string,
    chunks: readonly Chunk[],
    vectors: readonly Float32Array[],
  ): Promise<void> {
    if (chunks.length !== vectors.length) {
      throw new ConfigurationError(
        `Index misalignment: ${chunks.length} chunks but ${vectors.length} vectors`,
      );
    }
    const out: z.input<typeof StoredKnowledgeSchema> = {
      version: 1,
      meta: this.meta(vectors),
      chunks: chunks.map((c, i) => ({ ...c, emb: encodeVector(vectors[i]) })),
    };
    await Persistence.writeJson(storePath, out);
    logVerbose("Persisted knowledge store", { storePath, chunks: chunks.length });
  }

  /** The knowledge store if one exists and was built with this model, else null. */
  public async tryLoadKnowledge(storePath: string): Promise<StoredKnowledge | null> {
    if (!fsSync.existsSync(storePath)) return null;
    try {
      return await this.loadKnowledge(storePath);
    } catch (e) {
      if (!(e instanceof ConfigurationError)) throw e;
      logInfo(`Stored knowledge not reusable (${e.message}). Performing cold rebuild.`);
      return null;
    }
  }

  public async loadSafety(storePath: string): Promise<StoredSafety> {
    const parsed = StoredSafetySchema.safeParse(await Persistence.readJson(storePath));
    if (!parsed.success) {
      throw new ConfigurationError(`Malformed safety store at ${storePath}: ${parsed.error.message}`);
    }
    const { meta, seeds } = parsed.data;
    this.checkCompatible(storePath, meta);
    const vectors = seeds.map((s, i) =>
      Persistence.checkedVector(storePath, `seed ${i}`, s.emb, meta.dimension),
    );
    logInfo(`Loaded unsafe-intent matrix: ${vectors.length} vectors.`);
    return { meta, seeds: seeds.map((s) => s.text), vectors };
  }

  public async saveSafety(
    storePath: string,
    seeds: readonly string[],
    vectors: readonly Float32Array[],
  ): Promise<void> {
    if (seeds.length !== vectors.length) {
      throw new ConfigurationError(`${seeds.length} safety seeds but ${vectors.length} vectors`);
    }
    const out: z.input<typeof StoredSafetySchema> = {
      version: 1,
      meta: this.meta(vectors),
      seeds: seeds.map((text, i) => ({ text, emb: encodeVector(vectors[i]) })),
    };
    await Persistence.writeJson(storePath, out);
    logVerbose("Persisted unsafe-intent matrix", { storePath, seeds: seeds.length });
  }

  private meta(vectors: readonly Float32Array[]): ArtifactMeta {
    return {
      modelName: this.modelName,
      dimension: vectors[0]?.length ?? 0,
      savedAt: new Date().toISOString(),
      embEncoding: "f32le-base64",
    };
  }

  private checkCompatible(storePath: string, meta: ArtifactMeta): void {
    if (meta.modelName !== this.modelName) {
      throw new ConfigurationError(
        `${storePath} was built with embedding model "${meta.modelName}", configured model is "${this.modelName}"`,
      );
    }
  }

  private static checkedVector(storePath: string, id: string, emb: string, dimension: number): Float32Array {
    const v = decodeVector(emb);
    if (v.length !== dimension) {
      throw new ConfigurationError(
        `${storePath}: vector for ${id} has dimension ${v.length}, expected ${dimension}`,
      );
    }
    return v;
  }

  private static async readJson(storePath: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(storePath, "utf8");
    } catch (e) {
      throw new ConfigurationError(`Cannot read ${storePath}; run \`npm run build-index\` first`, {
        cause: e,
      });
    }
    try {
      return JSON.parse(raw);
    } catch (e) {
      throw new ConfigurationError(`${storePath} is not valid JSON`, { cause: e });
    }
  }

  private static async writeJson(storePath: string, data: unknown): Promise<void> {
    await fs.mkdir(path.dirname(storePath), { recursive: true });
    await fs.writeFile(storePath, JSON.stringify(data));
  }
}
