// ── Memory Module — Shared Types ─────────────────────────

export const MEMORY_STATES = ["active", "decaying", "archived"] as const;

/** Lifecycle state: actively recalled → fading → preserved but rarely recalled. */
export type MemoryState = (typeof MEMORY_STATES)[number];

export type MemoryMeta = Record<string, unknown>;

export interface Memory {
  id: string;
  spiritId: string;
  /** Compact narrative essence, written by the external synthesizer */
  summary: string;
  importance: number; // [0, 1]
  confidence: number; // [0, 1]
  state: MemoryState;
  /** Cached scores; may be stale, null until first computed */
  recencyScore: number | null;
  decayScore: number | null;
  timeStart: number | null; // Unix ms
  /** End of the summarized event span; anchors recency and decay */
  timeEnd: number | null; // Unix ms
  /** Last explicit reinforcement; resets the memory's effective age */
  reinforcedAt: number | null;
  stateChangedAt: number | null;
  meta: MemoryMeta;
  isDeleted: boolean;
  createdAt: number; // Unix ms, immutable
  /** Optimistic concurrency token for conditional writes */
  updatedAt: number; // Unix ms
}

/** Fields the lifecycle and curation paths may change on a stored memory. */
export type MemoryPatch = Partial<
  Pick<
    Memory,
    | "summary"
    | "importance"
    | "confidence"
    | "state"
    | "recencyScore"
    | "decayScore"
    | "timeStart"
    | "timeEnd"
    | "reinforcedAt"
    | "stateChangedAt"
    | "meta"
    | "isDeleted"
  >
> & {
  /** Requested new token; the store guarantees it strictly increases */
  updatedAt?: number;
};

export interface NewMemory {
  id?: string;
  spiritId: string;
  summary: string;
  importance: number;
  confidence: number;
  timeStart?: number | null;
  timeEnd?: number | null;
  meta?: MemoryMeta;
  createdAt: number;
}

export interface MemoryScores {
  recencyScore: number;
  decayScore: number;
}

/** One retrieval candidate with relevance supplied by the similarity search. */
export interface RecallCandidate {
  memory: Memory;
  semanticRelevance: number; // [0, 1]
}

export interface RankedMemory extends MemoryScores {
  memory: Memory;
  semanticRelevance: number;
  compositeScore: number;
}
