// ── Public library surface ───────────────────────────────

export type {
  Memory,
  MemoryMeta,
  MemoryPatch,
  MemoryScores,
  MemoryState,
  NewMemory,
  RankedMemory,
  RecallCandidate,
} from "./memory/types.js";
export { MEMORY_STATES } from "./memory/types.js";
export {
  DEFAULT_RECALL_POLICY,
  resolvePolicy,
  resolveWeights,
  type LifecycleThresholds,
  type RecallPolicy,
  type RecallPolicyInput,
  type RecallWeights,
} from "./memory/policy.js";
export {
  ageInDays,
  effectiveTimeOf,
  resistanceOf,
  score,
  scoreMemory,
  type ScoreInput,
  type ScoreMemoryOptions,
} from "./memory/score-engine.js";
export {
  compositeScore,
  defaultCategoryOf,
  rank,
  type RankOptions,
} from "./memory/recall-ranker.js";
export { recallMemories, type RecallRequest } from "./memory/recall.js";
export { buildMemoryPack, formatAgo } from "./memory/memory-pack.js";
export type {
  ListMemoriesOptions,
  MemoryStore,
  UpdateResult,
} from "./memory/store.js";
export { SqliteMemoryStore } from "./memory/sqlite-store.js";
export type { ClusterSource, SemanticScorer } from "./memory/similarity.js";
export { groupPairs } from "./memory/clustering.js";
export { ValidationError } from "./memory/errors.js";
export {
  LifecycleManager,
  nextState,
  type MergeReport,
  type RestoreResult,
  type SweepOptions,
  type SweepReport,
} from "./lifecycle/lifecycle-manager.js";
export { SweepScheduler, type SweepCycleReport } from "./lifecycle/sweep-scheduler.js";
