import { describe, it, expect } from "vitest";
import { rank, compositeScore, defaultCategoryOf } from "../src/memory/recall-ranker.js";
import { DEFAULT_RECALL_POLICY } from "../src/memory/policy.js";
import { ValidationError } from "../src/memory/errors.js";
import type { Memory, RecallCandidate } from "../src/memory/types.js";
import { DAY, NOW, makeMemory } from "./helpers/fixtures.js";

function candidate(overrides: Partial<Memory>, semanticRelevance = 0.5): RecallCandidate {
  return { memory: makeMemory(overrides), semanticRelevance };
}

function ids(result: ReturnType<typeof rank>): string[] {
  return result.map((r) => r.memory.id);
}

describe("rank", () => {
  // ── Composite ──────────────────────────────────────────

  it("computes the weighted composite with default weights", () => {
    const [top] = rank([candidate({ id: "a", timeEnd: NOW }, 0.8)], { now: NOW, topK: 5 });
    // 0.4*0.8 + 0.25*0.5 + 0.15*0.5 + 0.15*1 + 0.05*(1-0)
    expect(top?.compositeScore).toBeCloseTo(0.72, 10);
    expect(top?.recencyScore).toBe(1);
    expect(top?.decayScore).toBe(0);
    expect(top?.semanticRelevance).toBe(0.8);
  });

  it("does not renormalize caller weights", () => {
    const [top] = rank([candidate({ id: "a", timeEnd: NOW }, 1)], {
      now: NOW,
      topK: 1,
      weights: { semantic: 2, importance: 0, confidence: 0, recency: 0, decayPenalty: 0 },
    });
    expect(top?.compositeScore).toBe(2);
  });

  it("orders by composite descending", () => {
    const result = rank(
      [
        candidate({ id: "low" }, 0.1),
        candidate({ id: "high" }, 0.9),
        candidate({ id: "mid" }, 0.5),
      ],
      { now: NOW, topK: 10 },
    );
    expect(ids(result)).toEqual(["high", "mid", "low"]);
  });

  // ── Tie-breaks ─────────────────────────────────────────

  it("breaks composite ties by the later timeEnd", () => {
    // zero the time-dependent weights so both composites are identical
    const weights = { recency: 0, decayPenalty: 0 };
    const result = rank(
      [
        candidate({ id: "older", timeEnd: NOW - 30 * DAY }, 0.6),
        candidate({ id: "newer", timeEnd: NOW - 2 * DAY }, 0.6),
      ],
      { now: NOW, topK: 2, weights },
    );
    expect(result[0]?.compositeScore).toBe(result[1]?.compositeScore);
    expect(ids(result)).toEqual(["newer", "older"]);
  });

  it("breaks full ties by id", () => {
    const result = rank(
      [candidate({ id: "b" }), candidate({ id: "c" }), candidate({ id: "a" })],
      { now: NOW, topK: 3 },
    );
    expect(ids(result)).toEqual(["a", "b", "c"]);
  });

  it("is deterministic for identical inputs", () => {
    const input = [
      candidate({ id: "x", importance: 0.3, timeEnd: NOW - 40 * DAY }, 0.7),
      candidate({ id: "y", importance: 0.9, timeEnd: NOW - 400 * DAY }, 0.2),
      candidate({ id: "z", confidence: 0.1, timeEnd: NOW - 1 * DAY }, 0.7),
    ];
    const first = rank(input, { now: NOW, topK: 3 });
    const second = rank([...input].reverse(), { now: NOW, topK: 3 });
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  // ── Filtering ──────────────────────────────────────────

  it("excludes archived memories unless asked", () => {
    const input = [
      candidate({ id: "live" }),
      candidate({ id: "old", state: "archived" }, 0.9),
    ];
    expect(ids(rank(input, { now: NOW, topK: 5 }))).toEqual(["live"]);
    expect(ids(rank(input, { now: NOW, topK: 5, includeArchived: true }))).toEqual([
      "old",
      "live",
    ]);
  });

  it("always excludes soft-deleted memories", () => {
    const input = [
      candidate({ id: "gone", isDeleted: true }, 1),
      candidate({ id: "kept" }, 0),
    ];
    expect(ids(rank(input, { now: NOW, topK: 5, includeArchived: true }))).toEqual(["kept"]);
  });

  it("keeps decaying memories in the candidate set", () => {
    expect(ids(rank([candidate({ id: "d", state: "decaying" })], { now: NOW, topK: 1 }))).toEqual([
      "d",
    ]);
  });

  // ── Selection ──────────────────────────────────────────

  it("returns at most topK", () => {
    const input = ["a", "b", "c", "d"].map((id) => candidate({ id }));
    expect(rank(input, { now: NOW, topK: 2 })).toHaveLength(2);
  });

  it("returns an empty list for empty input or non-positive topK", () => {
    expect(rank([], { now: NOW, topK: 5 })).toEqual([]);
    expect(rank([candidate({})], { now: NOW, topK: 0 })).toEqual([]);
  });

  it("skips over-quota categories in score order", () => {
    const work = { category: "work" };
    const input = [
      candidate({ id: "w1", meta: work }, 0.9),
      candidate({ id: "w2", meta: work }, 0.8),
      candidate({ id: "w3", meta: work }, 0.7),
      candidate({ id: "h1", meta: { category: "home" } }, 0.1),
    ];
    const result = rank(input, { now: NOW, topK: 3, perCategoryCap: { work: 2 } });
    expect(ids(result)).toEqual(["w1", "w2", "h1"]);
  });

  it("leaves uncategorized and unlisted categories uncapped", () => {
    const input = [
      candidate({ id: "a" }, 0.9),
      candidate({ id: "b" }, 0.8),
      candidate({ id: "c", meta: { category: "misc" } }, 0.7),
      candidate({ id: "d", meta: { category: "misc" } }, 0.6),
    ];
    const result = rank(input, { now: NOW, topK: 4, perCategoryCap: { work: 0 } });
    expect(ids(result)).toEqual(["a", "b", "c", "d"]);
  });

  it("uses a custom category function", () => {
    const input = [
      candidate({ id: "a", meta: { tags: ["travel"] } }, 0.9),
      candidate({ id: "b", meta: { tags: ["travel"] } }, 0.8),
    ];
    const result = rank(input, {
      now: NOW,
      topK: 5,
      perCategoryCap: { travel: 1 },
      categoryOf: (m) => {
        const tags = m.meta["tags"];
        return Array.isArray(tags) && typeof tags[0] === "string" ? tags[0] : null;
      },
    });
    expect(ids(result)).toEqual(["a"]);
  });

  // ── Cached scores ──────────────────────────────────────

  it("uses stored scores only when the caller opts in", () => {
    const stale = candidate(
      { id: "a", timeEnd: NOW, recencyScore: 0, decayScore: 1 },
      0.5,
    );
    const [fresh] = rank([stale], { now: NOW, topK: 1 });
    const [cached] = rank([stale], { now: NOW, topK: 1, useCachedScores: true });
    expect(fresh?.recencyScore).toBe(1);
    expect(cached?.recencyScore).toBe(0);
    expect(cached?.decayScore).toBe(1);
    // 0.4*0.5 + 0.25*0.5 + 0.15*0.5
    expect(cached?.compositeScore).toBeCloseTo(0.4, 10);
  });

  // ── Contract ───────────────────────────────────────────

  it("rejects semantic relevance outside [0, 1]", () => {
    expect(() => rank([candidate({}, 1.5)], { now: NOW, topK: 1 })).toThrow(ValidationError);
  });

  it("rejects invalid importance on a candidate", () => {
    expect(() => rank([candidate({ importance: 2 })], { now: NOW, topK: 1 })).toThrow(
      ValidationError,
    );
  });

  it("rejects a NaN weight override", () => {
    const input = [candidate({ id: "a" }), candidate({ id: "b" })];
    let field: string | undefined;
    try {
      rank(input, { now: NOW, topK: 2, weights: { importance: Number.NaN } });
    } catch (err) {
      if (err instanceof ValidationError) field = err.field;
    }
    expect(field).toBe("weights.importance");
  });

  it("never mutates the candidate memories", () => {
    const input = [candidate({ id: "a" })];
    rank(input, { now: NOW, topK: 1 });
    expect(input[0]?.memory.recencyScore).toBeNull();
    expect(input[0]?.memory.decayScore).toBeNull();
  });
});

describe("compositeScore", () => {
  it("rewards low decay through the penalty term", () => {
    const weights = DEFAULT_RECALL_POLICY.weights;
    const memory = { importance: 0, confidence: 0 };
    expect(compositeScore(weights, 0, memory, 0, 0)).toBeCloseTo(0.05, 10);
    expect(compositeScore(weights, 0, memory, 0, 1)).toBe(0);
  });
});

describe("defaultCategoryOf", () => {
  it("reads meta.category when it is a non-empty string", () => {
    expect(defaultCategoryOf(makeMemory({ meta: { category: "work" } }))).toBe("work");
    expect(defaultCategoryOf(makeMemory({ meta: { category: "" } }))).toBeNull();
    expect(defaultCategoryOf(makeMemory({ meta: { category: 3 } }))).toBeNull();
  });
});
