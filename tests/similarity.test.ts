import { describe, it, expect, vi, beforeEach } from "vitest";
import { PineconeSimilarity, cosineSimilarity } from "../src/memory/similarity.js";
import { makeMemory } from "./helpers/fixtures.js";

const pinecone = vi.hoisted(() => ({
  index: { fetch: vi.fn(), query: vi.fn() },
  embedQuery: vi.fn(),
}));

vi.mock("../src/memory/pinecone.js", () => ({
  getPineconeIndex: () => pinecone.index,
}));
vi.mock("../src/memory/embedder.js", () => ({
  embedQuery: pinecone.embedQuery,
}));

beforeEach(() => {
  pinecone.index.fetch.mockReset();
  pinecone.index.query.mockReset();
  pinecone.embedQuery.mockReset();
});

describe("PineconeSimilarity.relevance", () => {
  it("scores exactly the candidates by cosine against the query", async () => {
    pinecone.embedQuery.mockResolvedValue([1, 0]);
    pinecone.index.fetch.mockResolvedValue({
      records: {
        a: { id: "a", values: [1, 0] },
        b: { id: "b", values: [0, 1] },
        c: { id: "c", values: [-1, 0] },
      },
    });
    const similarity = new PineconeSimilarity(0.9);

    const scores = await similarity.relevance("spirit-1", "hiking", [
      makeMemory({ id: "a" }),
      makeMemory({ id: "b" }),
      makeMemory({ id: "c" }),
      makeMemory({ id: "d" }),
    ]);

    expect(pinecone.embedQuery).toHaveBeenCalledWith("hiking");
    expect(pinecone.index.fetch).toHaveBeenCalledWith({ ids: ["a", "b", "c", "d"] });
    expect(pinecone.index.query).not.toHaveBeenCalled();
    // c points away from the query and clamps to 0; d has no vector
    expect([...scores.entries()]).toEqual([
      ["a", 1],
      ["b", 0],
      ["c", 0],
    ]);
  });

  it("skips a vector whose dimension does not match the query", async () => {
    pinecone.embedQuery.mockResolvedValue([1, 0]);
    pinecone.index.fetch.mockResolvedValue({
      records: {
        a: { id: "a", values: [0.6, 0.8] },
        b: { id: "b", values: [1, 0, 0] },
      },
    });

    const scores = await new PineconeSimilarity(0.9).relevance("spirit-1", "tea", [
      makeMemory({ id: "a" }),
      makeMemory({ id: "b" }),
    ]);

    expect(scores.get("a")).toBeCloseTo(0.6, 10);
    expect(scores.has("b")).toBe(false);
  });

  it("makes no remote calls without candidates", async () => {
    const scores = await new PineconeSimilarity(0.9).relevance("spirit-1", "tea", []);

    expect(scores.size).toBe(0);
    expect(pinecone.embedQuery).not.toHaveBeenCalled();
  });
});

describe("PineconeSimilarity.cluster", () => {
  it("groups neighbours at or above the threshold", async () => {
    const neighbours: Record<string, Array<{ id: string; score: number }>> = {
      a: [
        { id: "a", score: 1 },
        { id: "b", score: 0.95 },
        { id: "gone", score: 0.99 },
      ],
      b: [
        { id: "b", score: 1 },
        { id: "a", score: 0.95 },
      ],
      c: [
        { id: "c", score: 1 },
        { id: "a", score: 0.5 },
      ],
    };
    pinecone.index.query.mockImplementation(async ({ id }: { id: string }) => ({
      matches: neighbours[id] ?? [],
    }));

    const groups = await new PineconeSimilarity(0.9, 2).cluster([
      makeMemory({ id: "a" }),
      makeMemory({ id: "b" }),
      makeMemory({ id: "c" }),
    ]);

    expect(groups).toEqual([["a", "b"]]);
    expect(pinecone.index.query).toHaveBeenCalledWith({
      id: "a",
      topK: 3,
      filter: { spiritId: { $eq: "spirit-1" } },
    });
  });
});

describe("cosineSimilarity", () => {
  it("returns 0 for a zero vector", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("is scale invariant", () => {
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
  });
});
