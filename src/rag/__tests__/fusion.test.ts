import { describe, expect, it } from "vitest";
import { makeChunk } from "../../__tests__/fakes";
import { reciprocalRankFusion } from "../fusion";

const a = makeChunk({ id: "a", text: "a" });
const b = makeChunk({ id: "b", text: "b" });
const c = makeChunk({ id: "c", text: "c" });
const options = { k: 60, weights: { lexical: 1, semantic: 1 } };

describe("reciprocalRankFusion", () => {
  it("should sum reciprocal ranks across legs", () => {
    const fused = reciprocalRankFusion([a, b], [b, c], options);
    expect(fused.map((s) => s.chunk.id)).toEqual(["b", "a", "c"]);
    expect(fused[0]).toEqual({
      chunk: b,
      score: 1 / 62 + 1 / 61,
      source: "FUSED",
      lexicalRank: 2,
      semanticRank: 1,
    });
    expect(fused[1].score).toBe(1 / 61);
    expect(fused[1].semanticRank).toBeUndefined();
  });

  it("should never lower a chunk's score when another leg also returns it", () => {
    const single = reciprocalRankFusion([a], [], options)[0].score;
    const both = reciprocalRankFusion([a], [a], options)[0].score;
    expect(both).toBeGreaterThan(single);
  });

  it("should apply leg weights", () => {
    const fused = reciprocalRankFusion([a], [b], { k: 60, weights: { lexical: 1, semantic: 2 } });
    expect(fused.map((s) => s.chunk.id)).toEqual(["b", "a"]);
    expect(fused[0].score).toBe(2 / 61);
  });

  it("should break equal scores by chunk id when no tie-break is given", () => {
    expect(reciprocalRankFusion([b], [a], options).map((s) => s.chunk.id)).toEqual(["a", "b"]);
  });

  it("should order equal scores by the tie-break before the id", () => {
    const fused = reciprocalRankFusion([a], [b], { ...options, tieBreak: (ch) => (ch.id === "b" ? 1 : 0.5) });
    expect(fused.map((s) => s.chunk.id)).toEqual(["b", "a"]);
  });

  it("should count a chunk listed twice in one leg once, at its first rank", () => {
    const fused = reciprocalRankFusion([a, a], [], options);
    expect(fused).toHaveLength(1);
    expect(fused[0].score).toBe(1 / 61);
  });

  it("should return nothing for two empty legs", () => {
    expect(reciprocalRankFusion([], [], options)).toEqual([]);
  });
});
