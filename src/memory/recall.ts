import type { RankedMemory } from "./types.js";
import type { MemoryStore } from "./store.js";
import type { SemanticScorer } from "./similarity.js";
import { rank, type RankOptions } from "./recall-ranker.js";
import { log } from "../logger.js";

// ── Recall — candidates → relevance → ranked pack ────────

export interface RecallRequest extends Omit<RankOptions, "categoryOf"> {
  spiritId: string;
  query: string;
}

/**
 * Retrieve a spirit's best memories for a query. If the similarity service
 * fails, ranking falls back to the non-semantic signals alone.
 */
export async function recallMemories(
  store: MemoryStore,
  scorer: SemanticScorer,
  request: RecallRequest,
): Promise<RankedMemory[]> {
  const { spiritId, query, ...rankOptions } = request;

  const memories = await store.listMemories(spiritId, {
    states: request.includeArchived ? undefined : ["active", "decaying"],
  });
  if (memories.length === 0) return [];

  let relevance = new Map<string, number>();
  try {
    relevance = await scorer.relevance(spiritId, query, memories);
  } catch (err) {
    log.warn({ spiritId, err }, "⚠️ Semantic relevance unavailable — ranking without it");
  }

  const ranked = rank(
    memories.map((memory) => ({
      memory,
      semanticRelevance: relevance.get(memory.id) ?? 0,
    })),
    rankOptions,
  );

  log.debug(
    { spiritId, candidates: memories.length, returned: ranked.length },
    "🧠 Recall ranked",
  );
  return ranked;
}
