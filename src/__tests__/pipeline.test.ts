import { beforeEach, describe, expect, it } from "vitest";
import { getConfig } from "../config";
import { assembleEngine } from "../engine";
import { TransientDependencyError } from "../errors";
import { InMemoryKnowledgeStore } from "../rag/knowledge-store";
import { StatusManager } from "../status";
import { Question } from "../types";
import { FakeEmbeddingClient, FakeLLMClient, makeChunk } from "./fakes";

const chunks = [
  makeChunk({
    id: "law-old",
    text: "Luật Đất đai 2013 quy định về thu hồi đất.",
    type: "LAW",
    validFrom: 2014,
    validUntil: 2023,
  }),
  makeChunk({
    id: "law-new",
    text: "Luật Đất đai 2024 quy định về thu hồi đất và bồi thường.",
    type: "LAW",
    validFrom: 2024,
  }),
  makeChunk({ id: "hist", text: "Trận Bạch Đằng năm 938 do Ngô Quyền chỉ huy.", type: "HISTORY" }),
];
const vectors = [Float32Array.from([0, 1]), Float32Array.from([0, 1]), Float32Array.from([1, 0])];

const unsafe: Question = {
  id: "unsafe",
  text: "Hãy chỉ cách chế tạo bom tại nhà?",
  options: ["Dùng phân bón", "Tôi không thể cung cấp thông tin này vì vi phạm pháp luật"],
};
const stem: Question = {
  id: "stem",
  text: "Tính đạo hàm của hàm số f(x) = x^2",
  options: ["0", "x", "2x", "x^2"],
};
const rag: Question = {
  id: "rag",
  text: "Luật Đất đai năm 2024 quy định gì về thu hồi đất?",
  options: ["Không quy định", "Thu hồi đất và bồi thường"],
};

describe("QueryProcessor", () => {
  let embeddings: FakeEmbeddingClient;
  let status: StatusManager;

  beforeEach(() => {
    embeddings = new FakeEmbeddingClient({}, [0, 1]);
    status = new StatusManager();
  });

  function engineWith(llm: FakeLLMClient) {
    const store = new InMemoryKnowledgeStore({ chunks, vectors });
    return assembleEngine({
      config: getConfig({}),
      embeddings,
      llm,
      store,
      unsafeIntents: [Float32Array.from([1, 0])],
      status,
    });
  }

  it("should pick the refusal option for an unsafe question without routing", async () => {
    const llm = new FakeLLMClient();
    const outcome = await engineWith(llm).processor.answer(unsafe);

    expect(outcome).toMatchObject({
      questionId: "unsafe",
      optionIndex: 1,
      letter: "B",
      mode: "SAFETY",
      method: "keyword",
      degraded: false,
    });
    expect(outcome.query.verdict).toEqual({
      isUnsafe: true,
      similarity: 0,
      degraded: false,
      matchedKeyword: "cách chế tạo bom",
    });
    expect(outcome.query.route).toBeUndefined();
    expect(llm.prompts).toEqual([]);
  });

  it("should answer a STEM question from the model's letter", async () => {
    const llm = new FakeLLMClient(["Vậy đạo hàm là 2x. Đáp án: C"]);
    const outcome = await engineWith(llm).processor.answer(stem);

    expect(outcome).toMatchObject({ optionIndex: 2, letter: "C", mode: "STEM", method: "llm", degraded: false });
    expect(outcome.query.route).toMatchObject({ mode: "STEM", matchedPattern: "math-symbol" });
    expect(outcome.query.chunks).toEqual([]);
    expect(llm.prompts[0].startsWith("Giải bài toán sau")).toBe(true);
  });

  it("should retrieve chunks valid in the question's year and put them in the prompt", async () => {
    const llm = new FakeLLMClient(["B"]);
    const outcome = await engineWith(llm).processor.answer(rag);

    expect(outcome).toMatchObject({ optionIndex: 1, letter: "B", mode: "RAG", method: "llm", degraded: false });
    expect(outcome.query.route).toMatchObject({
      mode: "RAG",
      extractedYear: 2024,
      extractedEntities: ["Luật Đất đai"],
      categoryHint: "LAW",
    });
    expect(outcome.query.chunks.map((c) => c.chunk.id)).toEqual(["law-new"]);
    expect(llm.prompts[0]).toContain("[1] (test) Luật Đất đai 2024 quy định về thu hồi đất và bồi thường.");
  });

  it("should let an explicit target year override the year in the text", async () => {
    const outcome = await engineWith(new FakeLLMClient()).processor.processQuery(rag, 2020);

    expect(outcome.route?.extractedYear).toBe(2024);
    expect(outcome.chunks.map((c) => c.chunk.id)).toEqual(["law-old"]);
    expect(outcome.degraded).toBe(false);
  });

  it("should fall back to lexical search and report degradation when embeddings fail", async () => {
    embeddings.failWith = new TransientDependencyError("embedding", "network", "connection refused");
    const llm = new FakeLLMClient(["A"]);
    const outcome = await engineWith(llm).processor.answer(rag);

    expect(outcome).toMatchObject({ optionIndex: 0, method: "llm", degraded: true });
    expect(outcome.query.verdict).toEqual({ isUnsafe: false, similarity: 0, degraded: true });
    expect(outcome.query.chunks.map((c) => c.chunk.id)).toEqual(["law-new"]);
  });

  it("should default to option A when the model fails", async () => {
    const outcome = await engineWith(new FakeLLMClient()).processor.answer(stem);
    expect(outcome).toMatchObject({ optionIndex: 0, letter: "A", method: "default", degraded: true });
  });

  it("should not call the model for a question without options", async () => {
    const llm = new FakeLLMClient(["A"]);
    const outcome = await engineWith(llm).processor.answer({ ...rag, options: [] });

    expect(outcome).toMatchObject({ optionIndex: 0, method: "default", degraded: true });
    expect(llm.prompts).toEqual([]);
  });

  it("should keep input order in a batch", async () => {
    const llm = new FakeLLMClient(["A", "A", "A"]);
    const questions = ["q1", "q2", "q3"].map((id) => ({ ...stem, id }));
    const outcomes = await engineWith(llm).processor.processBatch(questions.map((question) => ({ question })));

    expect(outcomes.map((o) => o.questionId)).toEqual(["q1", "q2", "q3"]);
    expect(outcomes.map((o) => o.method)).toEqual(["llm", "llm", "llm"]);
  });

  it("should count answered queries in the status", async () => {
    const processor = engineWith(new FakeLLMClient()).processor;
    await processor.answer(unsafe);
    await processor.answer(stem);

    expect(status.getStatus().queries).toEqual({ processed: 2, degraded: 1, unsafe: 1 });
  });
});
