import { describe, expect, it } from "vitest";
import { FakeEmbeddingClient, HangingEmbeddingClient, makeChunk } from "../../__tests__/fakes";
import { TransientDependencyError } from "../../errors";
import { createEmbeddingClient } from "../../providers";
import { HybridSearchEngine } from "../hybrid-search";
import { InMemoryKnowledgeStore } from "../knowledge-store";

const chunks = [
  makeChunk({
    id: "law-2013",
    text: "Luật Đất đai năm 2013 có hiệu lực từ năm 2014",
    type: "LAW",
    validFrom: 2014,
    validUntil: 2023,
  }),
  makeChunk({ id: "law-2024", text: "Luật Đất đai năm 2024 có hiệu lực từ năm 2024", type: "LAW", validFrom: 2024 }),
  makeChunk({ id: "history", text: "Chiến thắng Bạch Đằng năm 938", type: "HISTORY" }),
  makeChunk({ id: "culture", text: "Tết Nguyên Đán là lễ hội truyền thống", type: "CULTURE" }),
];
const vectors = [[1, 0, 0], [0.9, 0.1, 0], [0, 1, 0], [0, 0, 1]].map((v) => Float32Array.from(v));
const QUERY = "Luật Đất đai 2024";

function setup(queryVector: number[] = [1, 0, 0]) {
  const store = new InMemoryKnowledgeStore({ chunks, vectors });
  const embeddings = new FakeEmbeddingClient({}, queryVector);
  return { embeddings, engine: new HybridSearchEngine(store, embeddings) };
}

const ids = (results: ReadonlyArray<{ chunk: { id: string } }>) => results.map((r) => r.chunk.id);

describe("HybridSearchEngine", () => {
  it("should fuse both legs and break the score tie by chunk id", async () => {
    const { engine } = setup();
    const outcome = await engine.run(QUERY);

    // law-2024 leads the lexical leg, law-2013 the semantic leg: equal RRF.
    expect(ids(outcome.results)).toEqual(["law-2013", "law-2024", "history", "culture"]);
    expect(outcome.results[0]).toMatchObject({ lexicalRank: 2, semanticRank: 1, score: 1 / 62 + 1 / 61 });
    expect(outcome).toMatchObject({ degraded: false, temporalFilterApplied: false, cancelled: false });
  });

  it("should drop chunks not valid in the target year", async () => {
    const { engine } = setup();
    const outcome = await engine.run(QUERY, { targetYear: 2024 });

    expect(ids(outcome.results)).toEqual(["law-2024", "history", "culture"]);
    expect(outcome.results[0].score).toBe(1 / 61 + 1 / 61);
    expect(outcome.temporalFilterApplied).toBe(true);
  });

  it("should be deterministic across repeated calls", async () => {
    const { engine } = setup();
    const first = await engine.search(QUERY, { targetYear: 2020 });
    const second = await engine.search(QUERY, { targetYear: 2020 });
    expect(second).toEqual(first);
  });

  it("should fall back to the lexical leg when embedding fails", async () => {
    const { engine, embeddings } = setup();
    embeddings.failWith = new TransientDependencyError("embedding", "timeout", "slow");
    const outcome = await engine.run(QUERY);

    expect(ids(outcome.results)).toEqual(["law-2024", "law-2013"]);
    expect(outcome.results[0].semanticRank).toBeUndefined();
    expect(outcome.degraded).toBe(true);
  });

  it("should skip the semantic leg on a dimension mismatch", async () => {
    const { engine } = setup([1, 0]);
    const outcome = await engine.run(QUERY);
    expect(ids(outcome.results)).toEqual(["law-2024", "law-2013"]);
    expect(outcome.degraded).toBe(true);
  });

  it("should restrict to the requested categories", async () => {
    const { engine } = setup();
    expect(ids(await engine.search(QUERY, { categories: ["CULTURE"] }))).toEqual(["culture"]);
  });

  it("should search everything when the restriction matches nothing", async () => {
    const { engine } = setup();
    const restricted = await engine.search(QUERY, { categories: ["MATH"] });
    expect(restricted).toEqual(await engine.search(QUERY));
  });

  it("should cap results at topK", async () => {
    const { engine } = setup();
    expect(ids(await engine.search(QUERY, { topK: 1 }))).toEqual(["law-2013"]);
  });

  it("should return nothing for an empty query or topK 0 without calling the embedder", async () => {
    const { engine, embeddings } = setup();
    expect(await engine.search("   ")).toEqual([]);
    expect(await engine.search(QUERY, { topK: 0 })).toEqual([]);
    expect(embeddings.calls).toEqual([]);
  });

  it("should report cancellation for an already aborted signal", async () => {
    const { engine } = setup();
    const controller = new AbortController();
    controller.abort();
    const outcome = await engine.run(QUERY, { signal: controller.signal });
    expect(outcome).toEqual({ results: [], degraded: false, temporalFilterApplied: false, cancelled: true });
  });

  it("should return the lexical leg when the deadline fires during embedding", async () => {
    const store = new InMemoryKnowledgeStore({ chunks, vectors });
    const engine = new HybridSearchEngine(store, new HangingEmbeddingClient());
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const outcome = await engine.run(QUERY, { signal: controller.signal });

    expect(ids(outcome.results)).toEqual(["law-2024", "law-2013"]);
    expect(outcome).toMatchObject({ degraded: true, cancelled: true });
  });

  it("should not wait on an embedding response whose body stalls past the deadline", async () => {
    const store = new InMemoryKnowledgeStore({ chunks, vectors });
    const stalled = createEmbeddingClient(
      { kind: "ollama", baseUrl: "http://localhost:11434/v1", model: "nomic-embed-text" },
      async () => new Response(new ReadableStream<Uint8Array>(), { status: 200 }),
    );
    const engine = new HybridSearchEngine(store, stalled);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);

    const outcome = await engine.run(QUERY, { signal: controller.signal });

    expect(ids(outcome.results)).toEqual(["law-2024", "law-2013"]);
    expect(outcome).toMatchObject({ degraded: true, cancelled: true });
  });

  it("should return nothing when neither leg matches", async () => {
    const { engine } = setup([0, 0, 0]);
    const outcome = await engine.run("xyzabc");
    expect(outcome).toEqual({ results: [], degraded: false, temporalFilterApplied: false, cancelled: false });
  });

  it("should return nothing for an empty store", async () => {
    const empty = new InMemoryKnowledgeStore({ chunks: [], vectors: [] });
    const engine = new HybridSearchEngine(empty, new FakeEmbeddingClient({}, [1]));
    expect(await engine.search(QUERY)).toEqual([]);
  });
});
