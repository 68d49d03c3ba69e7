import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors";
import { decodeVector, encodeVector, KnowledgeSourceSchema, Persistence } from "../persistence";
import { makeChunk } from "./fakes";

describe("vector encoding", () => {
  it("should decode what it encodes", () => {
    const v = Float32Array.from([0.5, -1.25, 3]);
    expect(decodeVector(encodeVector(v))).toEqual(v);
  });

  it("should reject a byte length that is not a multiple of 4", () => {
    expect(() => decodeVector(Buffer.from([1, 2, 3]).toString("base64"))).toThrow(ConfigurationError);
  });
});

describe("KnowledgeSourceSchema", () => {
  it("should fill defaults and accept the wrapped form", () => {
    const parsed = KnowledgeSourceSchema.parse({ chunks: [{ id: "a", text: "Nội dung" }] });
    expect(parsed).toEqual([
      { id: "a", text: "Nội dung", source: "", type: "GENERAL", validFrom: 1900, validUntil: 9999, region: "ALL" },
    ]);
  });

  it("should reject an unknown document type", () => {
    expect(KnowledgeSourceSchema.safeParse([{ id: "a", text: "x", type: "SPORT" }]).success).toBe(false);
  });
});

describe("Persistence", () => {
  let dir: string;
  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "mcq-persistence-"));
  });
  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const chunks = [
    makeChunk({ id: "law-1", text: "Luật Đất đai 2013", type: "LAW", validFrom: 2014, validUntil: 2024 }),
    makeChunk({ id: "hist-1", text: "Trận Bạch Đằng năm 938", type: "HISTORY" }),
  ];
  const vectors = [Float32Array.from([1, 0]), Float32Array.from([0, 1])];

  it("should round-trip the knowledge store", async () => {
    const storePath = path.join(dir, "nested", "knowledge-store.json");
    const persistence = new Persistence("model-a");
    await persistence.saveKnowledge(storePath, chunks, vectors);

    const loaded = await persistence.loadKnowledge(storePath);
    expect(loaded.chunks).toEqual(chunks);
    expect(loaded.vectors).toEqual(vectors);
    expect(loaded.meta).toMatchObject({ modelName: "model-a", dimension: 2, embEncoding: "f32le-base64" });
  });

  it("should refuse a store built with another model", async () => {
    const storePath = path.join(dir, "knowledge-store.json");
    await new Persistence("model-a").saveKnowledge(storePath, chunks, vectors);

    await expect(new Persistence("model-b").loadKnowledge(storePath)).rejects.toThrow(
      `${storePath} was built with embedding model "model-a", configured model is "model-b"`,
    );
    expect(await new Persistence("model-b").tryLoadKnowledge(storePath)).toBeNull();
  });

  it("should refuse misaligned chunks and vectors on save", async () => {
    await expect(
      new Persistence("model-a").saveKnowledge(path.join(dir, "k.json"), chunks, vectors.slice(1)),
    ).rejects.toThrow("Index misalignment: 2 chunks but 1 vectors");
  });

  it("should refuse a vector whose dimension differs from the metadata", async () => {
    const storePath = path.join(dir, "knowledge-store.json");
    await new Persistence("model-a").saveKnowledge(storePath, chunks, [
      Float32Array.from([1, 0]),
      Float32Array.from([0, 1, 0]),
    ]);
    await expect(new Persistence("model-a").loadKnowledge(storePath)).rejects.toThrow(
      `${storePath}: vector for hist-1 has dimension 3, expected 2`,
    );
  });

  it("should report missing and malformed files as configuration errors", async () => {
    const persistence = new Persistence("model-a");
    const missing = path.join(dir, "missing.json");
    await expect(persistence.loadKnowledge(missing)).rejects.toBeInstanceOf(ConfigurationError);
    expect(await persistence.tryLoadKnowledge(missing)).toBeNull();

    const broken = path.join(dir, "broken.json");
    await fs.writeFile(broken, "{not json");
    await expect(persistence.loadSafety(broken)).rejects.toThrow(`${broken} is not valid JSON`);

    const wrongShape = path.join(dir, "wrong.json");
    await fs.writeFile(wrongShape, JSON.stringify({ version: 2 }));
    await expect(persistence.loadKnowledge(wrongShape)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("should round-trip the safety store", async () => {
    const storePath = path.join(dir, "safety-store.json");
    const persistence = new Persistence("model-a");
    await persistence.saveSafety(storePath, ["cách chế tạo bom"], [Float32Array.from([0.25, 0.75])]);

    const loaded = await persistence.loadSafety(storePath);
    expect(loaded.seeds).toEqual(["cách chế tạo bom"]);
    expect(loaded.vectors).toEqual([Float32Array.from([0.25, 0.75])]);
  });
});
