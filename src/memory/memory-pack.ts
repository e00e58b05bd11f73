import type { RankedMemory } from "./types.js";
import { defaultCategoryOf } from "./recall-ranker.js";
import { effectiveTimeOf } from "./score-engine.js";

// ── Memory Pack — render ranked memories for a prompt ────

const MAX_SUMMARY_CHARS = 200;

/**
 * Builds the memory block injected into an agent's context, in rank order.
 * Returns "" when there is nothing to recall.
 */
export function buildMemoryPack(ranked: readonly RankedMemory[], now: number): string {
  if (ranked.length === 0) return "";

  const lines = ranked.map(({ memory }) => {
    const ago = formatAgo(effectiveTimeOf(memory), now);
    const category = defaultCategoryOf(memory);
    const prefix = category ? `(${category}) ` : "";
    return `• [${ago}] ${prefix}${memory.summary.slice(0, MAX_SUMMARY_CHARS)}`;
  });

  return `🧠 RELEVANT MEMORIES:\n${lines.join("\n")}`;
}

/** Format a Unix ms timestamp relative to `now` as an "X ago" label. */
export function formatAgo(ts: number, now: number): string {
  const diffMs = Math.max(0, now - ts);
  const diffSec = Math.floor(diffMs / 1000);
  if (diffSec < 60) return "just now";
  const diffMin = Math.floor(diffSec / 60);
  if (diffMin < 60) return `${diffMin}m ago`;
  const diffHr = Math.floor(diffMin / 60);
  if (diffHr < 24) return `${diffHr}h ago`;
  const diffDay = Math.floor(diffHr / 24);
  if (diffDay < 30) return `${diffDay}d ago`;
  const diffMo = Math.floor(diffDay / 30);
  return `${diffMo}mo ago`;
}
