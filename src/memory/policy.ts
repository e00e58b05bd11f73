import { z } from "zod";
import { ValidationError } from "./errors.js";

// ── Recall Policy — tunable weights & thresholds ─────────
// Starting values only; none of them are validated product defaults.

const finite = z.number().finite();
const unit = finite.min(0).max(1);

export const recallWeightsSchema = z.object({
  semantic: finite.default(0.4),
  importance: finite.default(0.25),
  confidence: finite.default(0.15),
  recency: finite.default(0.15),
  decayPenalty: finite.default(0.05),
});

export const lifecycleThresholdsSchema = z
  .object({
    decaying: unit.default(0.5),
    archived: unit.default(0.85),
  })
  .refine((t) => t.archived >= t.decaying, {
    message: "archived threshold must be >= decaying threshold",
    path: ["archived"],
  });

export const recallPolicySchema = z.object({
  /** Recency horizon: memories this old recency-saturate at 0 */
  maxAgeDays: finite.positive().default(365),
  /** Per-day decay rate before resistance is applied */
  baseDecayRate: finite.nonnegative().default(0.01),
  weights: recallWeightsSchema.default({}),
  thresholds: lifecycleThresholdsSchema.default({}),
  /** Minimum time a memory stays DECAYING before it can be archived */
  minDecayingDays: finite.nonnegative().default(0),
});

export type RecallWeights = z.infer<typeof recallWeightsSchema>;
export type LifecycleThresholds = z.infer<typeof lifecycleThresholdsSchema>;
export type RecallPolicy = z.infer<typeof recallPolicySchema>;
export type RecallPolicyInput = z.input<typeof recallPolicySchema>;

export const DEFAULT_RECALL_POLICY: RecallPolicy = recallPolicySchema.parse({});

/**
 * Merge partial overrides over the defaults and validate the result.
 * Throws ValidationError naming the first offending field.
 */
export function resolvePolicy(input: RecallPolicyInput = {}): RecallPolicy {
  const result = recallPolicySchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? ["policy", ...issue.path].join(".") : "policy";
    throw new ValidationError(field, input, issue?.message ?? "invalid policy");
  }
  return result.data;
}

/**
 * Per-call weight overrides over a base set. Unset keys keep the base value;
 * the result is validated, never renormalized.
 */
export function resolveWeights(
  base: RecallWeights,
  override: Partial<RecallWeights> = {},
): RecallWeights {
  const result = recallWeightsSchema.safeParse({
    semantic: override.semantic ?? base.semantic,
    importance: override.importance ?? base.importance,
    confidence: override.confidence ?? base.confidence,
    recency: override.recency ?? base.recency,
    decayPenalty: override.decayPenalty ?? base.decayPenalty,
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? ["weights", ...issue.path].join(".") : "weights";
    throw new ValidationError(field, override, issue?.message ?? "invalid weights");
  }
  return result.data;
}
