import dotenv from "dotenv";
import { resolvePolicy, type RecallPolicy } from "./memory/policy.js";

dotenv.config();

// ── Helpers ──────────────────────────────────────────────

/** Parse an optional numeric env var; a set-but-unparseable value is fatal. */
function numberEnv(key: string): number | undefined {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} must be a number (got "${raw}")`);
  }
  return value;
}

function intEnv(key: string, fallback: number): number {
  const value = numberEnv(key) ?? fallback;
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return value;
}

/** Build the recall policy from RECALL_* variables over the defaults. */
export function policyFromEnv(): RecallPolicy {
  return resolvePolicy({
    maxAgeDays: numberEnv("RECALL_MAX_AGE_DAYS"),
    baseDecayRate: numberEnv("RECALL_BASE_DECAY_RATE"),
    minDecayingDays: numberEnv("RECALL_MIN_DECAYING_DAYS"),
    weights: {
      semantic: numberEnv("RECALL_WEIGHT_SEMANTIC"),
      importance: numberEnv("RECALL_WEIGHT_IMPORTANCE"),
      confidence: numberEnv("RECALL_WEIGHT_CONFIDENCE"),
      recency: numberEnv("RECALL_WEIGHT_RECENCY"),
      decayPenalty: numberEnv("RECALL_WEIGHT_DECAY_PENALTY"),
    },
    thresholds: {
      decaying: numberEnv("RECALL_DECAYING_THRESHOLD"),
      archived: numberEnv("RECALL_ARCHIVED_THRESHOLD"),
    },
  });
}

// ── Config ───────────────────────────────────────────────

export const config = {
  databasePath: process.env.DATABASE_PATH || "./data/memories.db",

  // ── Lifecycle sweep ───────────────────────────────────
  sweepCron: process.env.SWEEP_CRON || "0 3 * * *",
  sweepTimezone: process.env.SWEEP_TIMEZONE || "UTC",
  sweepBatchSize: intEnv("SWEEP_BATCH_SIZE", 200),

  // ── Semantic similarity (optional) ────────────────────
  pineconeApiKey: process.env.PINECONE_API_KEY || "",
  pineconeIndex: process.env.PINECONE_INDEX || "",
  clusterThreshold: numberEnv("CLUSTER_THRESHOLD") ?? 0.92,

  policy: policyFromEnv(),
} as const;

export type AppConfig = typeof config;
