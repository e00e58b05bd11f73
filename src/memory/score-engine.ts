import type { Memory, MemoryScores } from "./types.js";
import type { RecallPolicy } from "./policy.js";
import { assertTimestamp, assertUnitInterval, ValidationError } from "./errors.js";

// ── Score Engine — recency & decay ───────────────────────
// Pure functions. `now` is always passed in; nothing here reads a clock.

export const MS_PER_DAY = 86_400_000;

export interface ScoreInput {
  importance: number;
  confidence: number;
  createdAt: number;
  timeEnd: number | null;
}

export interface ScoreMemoryOptions {
  /** Return the stored scores when both are present instead of recomputing */
  useCached?: boolean;
}

/** Geometric mean of importance and confidence, in [0, 1]. */
export function resistanceOf(importance: number, confidence: number): number {
  return Math.sqrt(importance * confidence);
}

/** Days between `effectiveTime` and `now`; future timestamps count as age 0. */
export function ageInDays(effectiveTime: number, now: number): number {
  return Math.max(0, (now - effectiveTime) / MS_PER_DAY);
}

/**
 * Compute recency and decay for a single memory.
 *
 * recency = 1 - age / maxAgeDays
 * decay   = 1 - exp(-baseDecayRate * age * (1 - resistance))
 *
 * Importance and confidence only slow decay; every memory still tends to 1.
 */
export function score(
  input: ScoreInput,
  now: number,
  policy: Pick<RecallPolicy, "maxAgeDays" | "baseDecayRate">,
): MemoryScores {
  assertUnitInterval("importance", input.importance);
  assertUnitInterval("confidence", input.confidence);
  assertTimestamp("createdAt", input.createdAt);
  if (input.timeEnd !== null) assertTimestamp("timeEnd", input.timeEnd);
  assertTimestamp("now", now);
  if (!Number.isFinite(policy.maxAgeDays) || policy.maxAgeDays <= 0) {
    throw new ValidationError("maxAgeDays", policy.maxAgeDays, "must be a finite positive number");
  }
  if (!Number.isFinite(policy.baseDecayRate) || policy.baseDecayRate < 0) {
    throw new ValidationError("baseDecayRate", policy.baseDecayRate, "must be a finite non-negative number");
  }

  const effectiveTime = input.timeEnd ?? input.createdAt;
  const ageDays = ageInDays(effectiveTime, now);

  const recencyScore = 1 - ageDays / policy.maxAgeDays;

  const resistance = resistanceOf(input.importance, input.confidence);
  const decayScore =
    1 - Math.exp(-policy.baseDecayRate * ageDays * (1 - resistance));

  // Float drift guard; the formulas are bounded analytically.
  return {
    recencyScore: clamp01(recencyScore),
    decayScore: clamp01(decayScore),
  };
}

/**
 * The timestamp a memory's age is measured from: the later of its last
 * reinforcement and its span end (or creation time when it has no span).
 */
export function effectiveTimeOf(
  memory: Pick<Memory, "timeEnd" | "createdAt" | "reinforcedAt">,
): number {
  const anchor = memory.timeEnd ?? memory.createdAt;
  if (memory.reinforcedAt !== null && memory.reinforcedAt > anchor) {
    return memory.reinforcedAt;
  }
  return anchor;
}

/** Score a stored memory, honouring reinforcement and the cached-score mode. */
export function scoreMemory(
  memory: Memory,
  now: number,
  policy: Pick<RecallPolicy, "maxAgeDays" | "baseDecayRate">,
  options: ScoreMemoryOptions = {},
): MemoryScores {
  if (
    options.useCached &&
    memory.recencyScore !== null &&
    memory.decayScore !== null
  ) {
    assertUnitInterval("recencyScore", memory.recencyScore);
    assertUnitInterval("decayScore", memory.decayScore);
    return {
      recencyScore: memory.recencyScore,
      decayScore: memory.decayScore,
    };
  }

  return score(
    {
      importance: memory.importance,
      confidence: memory.confidence,
      createdAt: memory.createdAt,
      timeEnd: effectiveTimeOf(memory),
    },
    now,
    policy,
  );
}

/** Clamp into [0, 1]. NaN has no place in the interval and is rejected. */
export function clamp01(value: number, field = "score"): number {
  if (Number.isNaN(value)) throw new ValidationError(field, value, "is NaN");
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}
