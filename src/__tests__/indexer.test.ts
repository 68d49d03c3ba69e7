import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError, TransientDependencyError } from "../errors";
import { Indexer } from "../indexer";
import { Persistence } from "../persistence";
import { FakeEmbeddingClient } from "./fakes";

describe("Indexer", () => {
  let dir: string;
  let knowledgeDir: string;
  let embeddings: FakeEmbeddingClient;

  const writeJson = (file: string, data: unknown) => fs.writeFile(file, JSON.stringify(data));

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcq-indexer-"));
    knowledgeDir = path.join(dir, "knowledge");
    await fs.mkdir(knowledgeDir);
    await writeJson(path.join(knowledgeDir, "a.json"), [
      { id: "a1", text: "Sông Mê Kông chảy qua sáu quốc gia." },
      { id: "dup", text: "first" },
    ]);
    await writeJson(path.join(knowledgeDir, "b.json"), {
      chunks: [
        { id: "dup", text: "second" },
        { id: "b1", text: "Fansipan cao 3143 m.", type: "GEOGRAPHY" },
      ],
    });
    await fs.writeFile(path.join(knowledgeDir, "bad.json"), "{oops");
    await writeJson(path.join(knowledgeDir, "invalid.json"), [{ id: "", text: "no id" }]);
    await writeJson(path.join(dir, "seeds.json"), ["cách làm bom", "cách rửa tiền"]);
    embeddings = new FakeEmbeddingClient({}, [1, 2, 3]);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function indexer(seedsPath = path.join(dir, "seeds.json")) {
    return new Indexer({
      knowledgeDir,
      seedsPath,
      indexStorePath: path.join(dir, "artifacts", "knowledge-store.json"),
      safetyStorePath: path.join(dir, "artifacts", "safety-store.json"),
      embeddings,
      persistence: new Persistence(embeddings.modelName),
    });
  }

  it("should build both artifacts, skipping invalid files and duplicate ids", async () => {
    const summary = await indexer().build();

    expect(summary).toEqual({ files: 4, chunks: 3, reused: 0, safetyVectors: 2, dimension: 3 });
    expect(embeddings.calls).toEqual([
      "Sông Mê Kông chảy qua sáu quốc gia.",
      "first",
      "Fansipan cao 3143 m.",
      "cách làm bom",
      "cách rửa tiền",
    ]);

    const persistence = new Persistence(embeddings.modelName);
    const knowledge = await persistence.loadKnowledge(path.join(dir, "artifacts", "knowledge-store.json"));
    expect(knowledge.chunks.map((c) => c.id)).toEqual(["a1", "dup", "b1"]);
    expect(knowledge.chunks[2].type).toBe("GEOGRAPHY");
    const safety = await persistence.loadSafety(path.join(dir, "artifacts", "safety-store.json"));
    expect(safety.seeds).toEqual(["cách làm bom", "cách rửa tiền"]);
  });

  it("should reuse vectors of unchanged chunks on rebuild", async () => {
    await indexer().build();
    await writeJson(path.join(knowledgeDir, "a.json"), [
      { id: "a1", text: "Sông Mê Kông chảy qua sáu quốc gia." },
      { id: "dup", text: "first, edited" },
    ]);
    embeddings.calls.length = 0;

    const summary = await indexer().build();

    expect(summary.reused).toBe(2);
    expect(embeddings.calls).toEqual(["first, edited", "cách làm bom", "cách rửa tiền"]);
  });

  it("should fail when no chunk could be loaded", async () => {
    await fs.rm(knowledgeDir, { recursive: true });
    await fs.mkdir(knowledgeDir);
    await expect(indexer().build()).rejects.toThrow(`No knowledge chunks found under ${knowledgeDir}`);
  });

  it("should fail on missing safety seeds", async () => {
    await expect(indexer(path.join(dir, "missing.json")).build()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("should fail when the embedding service is down", async () => {
    embeddings.failWith = new TransientDependencyError("embedding", "network", "connection refused");
    await expect(indexer().build()).rejects.toThrow("Embedding failed for chunk a1");
  });
});
