import type { Memory } from "./types.js";
import { getPineconeIndex } from "./pinecone.js";
import { embedQuery } from "./embedder.js";
import { groupPairs } from "./clustering.js";
import { clamp01 } from "./score-engine.js";
import { withRetry } from "../shared/retry.js";
import { log } from "../logger.js";

// ── Semantic Similarity — Pinecone-backed collaborator ───

/** Supplies semantic relevance in [0, 1] per memory id for a query. */
export interface SemanticScorer {
  relevance(
    spiritId: string,
    query: string,
    memories: readonly Memory[],
  ): Promise<Map<string, number>>;
}

/** Groups near-duplicate memories; each group lists memory ids. */
export interface ClusterSource {
  cluster(memories: readonly Memory[]): Promise<string[][]>;
}

/** Pinecone caps the ids accepted by one fetch. */
const FETCH_CHUNK = 1_000;
const DEFAULT_NEIGHBOURS = 5;

/** Cosine similarity; 0 when either vector is empty or zero. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimensions differ (${a.length} vs ${b.length})`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / Math.sqrt(normA * normB);
}

export class PineconeSimilarity implements SemanticScorer, ClusterSource {
  constructor(
    private readonly clusterThreshold: number,
    private readonly neighbours: number = DEFAULT_NEIGHBOURS,
  ) {}

  /**
   * Scores exactly the given candidates: their vectors are fetched by id and
   * compared locally, so other vectors in the index never crowd them out.
   */
  async relevance(
    spiritId: string,
    query: string,
    memories: readonly Memory[],
  ): Promise<Map<string, number>> {
    const scores = new Map<string, number>();
    if (memories.length === 0) return scores;

    const queryVector = await withRetry(() => embedQuery(query), {
      label: "pinecone embed",
    });
    const index = getPineconeIndex();
    const ids = memories.map((m) => m.id);

    for (let start = 0; start < ids.length; start += FETCH_CHUNK) {
      const chunk = ids.slice(start, start + FETCH_CHUNK);
      const result = await withRetry(() => index.fetch({ ids: chunk }), {
        label: "pinecone fetch",
      });

      for (const id of chunk) {
        const values = result.records?.[id]?.values;
        if (!values || values.length === 0) continue;
        try {
          // cosine similarity can be negative; relevance is defined on [0, 1]
          scores.set(id, clamp01(cosineSimilarity(queryVector, values)));
        } catch (err) {
          log.warn({ spiritId, memoryId: id, err }, "⚠️ Unusable memory vector");
        }
      }
    }

    log.debug(
      { spiritId, candidates: memories.length, matched: scores.size },
      "🔎 Semantic relevance scored",
    );
    return scores;
  }

  async cluster(memories: readonly Memory[]): Promise<string[][]> {
    const ids = memories.map((m) => m.id);
    const known = new Set(ids);
    const pairs: Array<[string, string]> = [];
    const index = getPineconeIndex();

    for (const memory of memories) {
      const result = await withRetry(
        () =>
          index.query({
            id: memory.id,
            topK: this.neighbours + 1,
            filter: { spiritId: { $eq: memory.spiritId } },
          }),
        { label: "pinecone neighbours" },
      );

      for (const match of result.matches ?? []) {
        if (match.id === memory.id || !known.has(match.id)) continue;
        if ((match.score ?? 0) >= this.clusterThreshold) {
          pairs.push([memory.id, match.id]);
        }
      }
    }

    const groups = groupPairs(ids, pairs);
    log.info(
      { memories: memories.length, clusters: groups.length },
      "🧩 Near-duplicate clusters found",
    );
    return groups;
  }
}
