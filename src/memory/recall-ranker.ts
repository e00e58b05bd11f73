import type { Memory, RankedMemory, RecallCandidate } from "./types.js";
import {
  DEFAULT_RECALL_POLICY,
  resolveWeights,
  type RecallPolicy,
  type RecallWeights,
} from "./policy.js";
import { effectiveTimeOf, scoreMemory } from "./score-engine.js";
import { assertTimestamp, assertUnitInterval, ValidationError } from "./errors.js";

// ── Recall Ranker — composite scoring for retrieval ──────

export interface RankOptions {
  now: number;
  topK: number;
  policy?: RecallPolicy;
  /** Per-call weight override; no renormalization is applied */
  weights?: Partial<RecallWeights>;
  /** Max results per category; categories not listed are uncapped */
  perCategoryCap?: Record<string, number>;
  includeArchived?: boolean;
  /** Trust stored recency/decay scores; staleness is the caller's tradeoff */
  useCachedScores?: boolean;
  categoryOf?: (memory: Memory) => string | null;
}

/** Default category: `meta.category` when it is a non-empty string. */
export function defaultCategoryOf(memory: Memory): string | null {
  const category = memory.meta["category"];
  return typeof category === "string" && category.length > 0 ? category : null;
}

export function compositeScore(
  weights: RecallWeights,
  semanticRelevance: number,
  memory: Pick<Memory, "importance" | "confidence">,
  recencyScore: number,
  decayScore: number,
): number {
  return (
    weights.semantic * semanticRelevance +
    weights.importance * memory.importance +
    weights.confidence * memory.confidence +
    weights.recency * recencyScore +
    weights.decayPenalty * (1 - decayScore)
  );
}

/**
 * Order candidates for a retrieval query. Never mutates memories or storage.
 *
 * Ties on the composite fall back to the later time-end, then to id, so the
 * same inputs always produce the same order.
 */
export function rank(
  candidates: readonly RecallCandidate[],
  options: RankOptions,
): RankedMemory[] {
  assertTimestamp("now", options.now);
  if (!Number.isFinite(options.topK)) {
    throw new ValidationError("topK", options.topK, "must be a finite number");
  }
  if (options.topK <= 0 || candidates.length === 0) return [];

  const policy = options.policy ?? DEFAULT_RECALL_POLICY;
  const weights = resolveWeights(policy.weights, options.weights);
  const categoryOf = options.categoryOf ?? defaultCategoryOf;

  const scored: RankedMemory[] = [];
  for (const { memory, semanticRelevance } of candidates) {
    if (memory.isDeleted) continue;
    if (memory.state === "archived" && !options.includeArchived) continue;
    assertUnitInterval("semanticRelevance", semanticRelevance);

    const { recencyScore, decayScore } = scoreMemory(
      memory,
      options.now,
      policy,
      { useCached: options.useCachedScores },
    );

    scored.push({
      memory,
      semanticRelevance,
      recencyScore,
      decayScore,
      compositeScore: compositeScore(
        weights,
        semanticRelevance,
        memory,
        recencyScore,
        decayScore,
      ),
    });
  }

  scored.sort(compareRanked);
  return select(scored, Math.floor(options.topK), options.perCategoryCap, categoryOf);
}

export function compareRanked(a: RankedMemory, b: RankedMemory): number {
  if (a.compositeScore !== b.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }
  const timeA = effectiveTimeOf(a.memory);
  const timeB = effectiveTimeOf(b.memory);
  if (timeA !== timeB) return timeB - timeA;
  if (a.memory.id < b.memory.id) return -1;
  if (a.memory.id > b.memory.id) return 1;
  return 0;
}

function select(
  sorted: RankedMemory[],
  topK: number,
  caps: Record<string, number> | undefined,
  categoryOf: (memory: Memory) => string | null,
): RankedMemory[] {
  if (!caps) return sorted.slice(0, topK);

  const taken = new Map<string, number>();
  const result: RankedMemory[] = [];

  for (const entry of sorted) {
    if (result.length >= topK) break;

    const category = categoryOf(entry.memory);
    const cap = category === null ? undefined : caps[category];
    if (category !== null && cap !== undefined) {
      const count = taken.get(category) ?? 0;
      if (count >= cap) continue; // over quota — next in score order
      taken.set(category, count + 1);
    }
    result.push(entry);
  }

  return result;
}
