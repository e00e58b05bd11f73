import type { Memory, MemoryState } from "../memory/types.js";
import type { MemoryStore } from "../memory/store.js";
import { DEFAULT_RECALL_POLICY, type RecallPolicy } from "../memory/policy.js";
import { MS_PER_DAY, scoreMemory } from "../memory/score-engine.js";
import { toErrorMessage, ValidationError } from "../memory/errors.js";
import { componentLogger } from "../logger.js";

// ── Lifecycle Manager — decay sweep, restore, merge ──────

const log = componentLogger("lifecycle");

const DEFAULT_BATCH_SIZE = 200;
const SURVIVOR_WRITE_ATTEMPTS = 3;

export interface SweepFailure {
  /** null when the failure was a batch fetch rather than a single memory */
  memoryId: string | null;
  message: string;
}

export interface SweepReport {
  spiritId: string;
  scanned: number;
  transitioned: number;
  /** Lost an optimistic-concurrency race; reconsidered by a later sweep */
  skipped: number;
  errors: number;
  failures: SweepFailure[];
  /** Resume checkpoint: pass as `afterId` to continue where this run stopped */
  lastProcessedId: string | null;
  /** Stopped before the end (cancelled, or a batch could not be fetched) */
  aborted: boolean;
}

export interface SweepOptions {
  batchSize?: number;
  afterId?: string;
  signal?: AbortSignal;
  policy?: RecallPolicy;
}

export type RestoreResult =
  | { status: "restored"; memory: Memory }
  | { status: "unchanged"; memory: Memory }
  | { status: "conflict" }
  | { status: "not_found" };

export interface MergeReport {
  clusters: number;
  /** Clusters that archived at least one member into a survivor */
  merged: number;
  archived: number;
  /** Clusters with fewer than two live members, plus members lost to conflicts */
  skipped: number;
  errors: number;
  failures: SweepFailure[];
}

export interface TransitionContext {
  thresholds: RecallPolicy["thresholds"];
  minDecayingDays: number;
  stateChangedAt: number | null;
  now: number;
}

/**
 * Forward-only lifecycle step. Moves at most one state per evaluation, so a
 * memory always spends at least one sweep visibly DECAYING before archival.
 */
export function nextState(
  current: MemoryState,
  decayScore: number,
  ctx: TransitionContext,
): MemoryState {
  switch (current) {
    case "active":
      return decayScore >= ctx.thresholds.decaying ? "decaying" : "active";
    case "decaying":
      return decayScore >= ctx.thresholds.archived && hasDwelled(ctx)
        ? "archived"
        : "decaying";
    case "archived":
      return "archived";
  }
}

function hasDwelled(ctx: TransitionContext): boolean {
  if (ctx.stateChangedAt === null) return true;
  const elapsed = ctx.now - ctx.stateChangedAt;
  return elapsed > 0 && elapsed >= ctx.minDecayingDays * MS_PER_DAY;
}

type Evaluation = "transitioned" | "unchanged" | "skipped";

export interface LifecycleManagerOptions {
  store: MemoryStore;
  policy?: RecallPolicy;
}

export class LifecycleManager {
  private readonly store: MemoryStore;
  private readonly policy: RecallPolicy;

  constructor(options: LifecycleManagerOptions) {
    this.store = options.store;
    this.policy = options.policy ?? DEFAULT_RECALL_POLICY;
  }

  /**
   * Re-score a spirit's non-archived memories and apply due transitions.
   * Per-memory failures are recorded and never abort the sweep.
   */
  async sweep(
    spiritId: string,
    now: number,
    options: SweepOptions = {},
  ): Promise<SweepReport> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ValidationError("batchSize", batchSize, "must be a positive integer");
    }
    const policy = options.policy ?? this.policy;

    const report: SweepReport = {
      spiritId,
      scanned: 0,
      transitioned: 0,
      skipped: 0,
      errors: 0,
      failures: [],
      lastProcessedId: options.afterId ?? null,
      aborted: false,
    };

    let cursor = options.afterId;

    sweepLoop: while (true) {
      if (options.signal?.aborted) {
        report.aborted = true;
        break;
      }

      // Ids only; each memory is decoded inside its own try below
      let batch: string[];
      try {
        batch = await this.store.listMemoryIds(spiritId, {
          states: ["active", "decaying"],
          afterId: cursor,
          limit: batchSize,
        });
      } catch (err) {
        report.errors++;
        report.failures.push({ memoryId: null, message: toErrorMessage(err) });
        report.aborted = true;
        log.error({ spiritId, cursor, err }, "❌ Sweep batch fetch failed");
        break;
      }

      for (const memoryId of batch) {
        if (options.signal?.aborted) {
          report.aborted = true;
          break sweepLoop;
        }

        report.scanned++;
        try {
          const outcome = await this.evaluate(memoryId, now, policy);
          if (outcome === "transitioned") report.transitioned++;
          if (outcome === "skipped") report.skipped++;
        } catch (err) {
          report.errors++;
          report.failures.push({ memoryId, message: toErrorMessage(err) });
          log.warn({ spiritId, memoryId, err }, "⚠️ Sweep item failed");
        }
        report.lastProcessedId = memoryId;
        cursor = memoryId;
      }

      if (batch.length < batchSize) break;
    }

    log.info(
      {
        spiritId,
        scanned: report.scanned,
        transitioned: report.transitioned,
        skipped: report.skipped,
        errors: report.errors,
        aborted: report.aborted,
      },
      "🌙 Sweep finished",
    );
    return report;
  }

  private async evaluate(
    memoryId: string,
    now: number,
    policy: RecallPolicy,
  ): Promise<Evaluation> {
    const memory = await this.store.getMemory(memoryId);
    // Deleted or archived since the id page was read
    if (!memory || memory.isDeleted || memory.state === "archived") return "skipped";

    const { recencyScore, decayScore } = scoreMemory(memory, now, policy);
    const target = nextState(memory.state, decayScore, {
      thresholds: policy.thresholds,
      minDecayingDays: policy.minDecayingDays,
      stateChangedAt: memory.stateChangedAt,
      now,
    });
    if (target === memory.state) return "unchanged";

    const result = await this.store.updateMemory(
      memory.id,
      {
        state: target,
        recencyScore,
        decayScore,
        stateChangedAt: now,
        updatedAt: now,
      },
      memory.updatedAt,
    );

    if (result.status !== "updated") {
      log.debug({ memoryId: memory.id, status: result.status }, "⏭️ Sweep write skipped");
      return "skipped";
    }

    log.debug(
      { memoryId: memory.id, from: memory.state, to: target, decayScore },
      "🍂 Memory transitioned",
    );
    return "transitioned";
  }

  /**
   * External curation override back to ACTIVE. Restoring an ACTIVE memory is
   * a no-op unless `reinforce` is set, which also resets its effective age.
   *
   * Without `reinforce` the memory keeps its age and decay score, so later
   * sweeps walk it through DECAYING and ARCHIVED again; a plain restore buys
   * roughly one sweep. Use `reinforce` to keep a memory live.
   */
  async restore(
    id: string,
    now: number,
    options: { reinforce?: boolean } = {},
  ): Promise<RestoreResult> {
    const memory = await this.store.getMemory(id);
    if (!memory || memory.isDeleted) return { status: "not_found" };
    if (memory.state === "active" && !options.reinforce) {
      return { status: "unchanged", memory };
    }

    const reinforcedAt = options.reinforce ? now : memory.reinforcedAt;
    const scores = scoreMemory({ ...memory, reinforcedAt }, now, this.policy);

    const result = await this.store.updateMemory(
      id,
      {
        state: "active",
        stateChangedAt: memory.state === "active" ? memory.stateChangedAt : now,
        reinforcedAt,
        recencyScore: scores.recencyScore,
        decayScore: scores.decayScore,
        updatedAt: now,
      },
      memory.updatedAt,
    );

    if (result.status === "updated") {
      log.info(
        { memoryId: id, from: memory.state, reinforce: Boolean(options.reinforce) },
        "🌱 Memory restored",
      );
      return { status: "restored", memory: result.memory };
    }
    return result;
  }

  /**
   * Collapse clusters of near-duplicates: keep the most important member,
   * archive the rest directly, and record their ids on the survivor.
   */
  async mergeClusters(
    clusters: ReadonlyArray<readonly string[]>,
    now: number,
  ): Promise<MergeReport> {
    const report: MergeReport = {
      clusters: clusters.length,
      merged: 0,
      archived: 0,
      skipped: 0,
      errors: 0,
      failures: [],
    };

    for (const cluster of clusters) {
      try {
        await this.mergeCluster(cluster, now, report);
      } catch (err) {
        report.errors++;
        report.failures.push({ memoryId: cluster[0] ?? null, message: toErrorMessage(err) });
        log.warn({ cluster, err }, "⚠️ Cluster merge failed");
      }
    }

    log.info(
      { clusters: report.clusters, merged: report.merged, archived: report.archived },
      "🧬 Near-duplicate merge finished",
    );
    return report;
  }

  private async mergeCluster(
    cluster: readonly string[],
    now: number,
    report: MergeReport,
  ): Promise<void> {
    const live: Memory[] = [];
    for (const id of new Set(cluster)) {
      const memory = await this.store.getMemory(id);
      if (memory && !memory.isDeleted && memory.state !== "archived") {
        live.push(memory);
      }
    }

    const [survivor, ...others] = [...live].sort(compareSurvivors);
    if (!survivor || others.length === 0) {
      report.skipped++;
      return;
    }

    // Every archived member is already listed on its survivor
    const previous = new Set(mergedFromOf(survivor));
    const planned = others.map((m) => m.id);
    await this.rewriteProvenance(survivor.id, survivor, now, (ids) => [
      ...new Set([...ids, ...planned]),
    ]);

    const notArchived: string[] = [];
    for (const member of others) {
      try {
        const result = await this.store.updateMemory(
          member.id,
          {
            state: "archived",
            stateChangedAt: now,
            meta: { ...member.meta, mergedInto: survivor.id },
            updatedAt: now,
          },
          member.updatedAt,
        );
        if (result.status === "updated") {
          report.archived++;
        } else {
          report.skipped++;
          notArchived.push(member.id);
        }
      } catch (err) {
        report.errors++;
        report.failures.push({ memoryId: member.id, message: toErrorMessage(err) });
        notArchived.push(member.id);
      }
    }

    if (notArchived.length < others.length) report.merged++;

    const stale = notArchived.filter((id) => !previous.has(id));
    if (stale.length === 0) return;
    try {
      await this.rewriteProvenance(survivor.id, null, now, (ids) =>
        ids.filter((id) => !stale.includes(id)),
      );
    } catch (err) {
      report.errors++;
      report.failures.push({ memoryId: survivor.id, message: toErrorMessage(err) });
      log.warn({ survivorId: survivor.id, stale, err }, "⚠️ Could not prune merge provenance");
    }
  }

  /**
   * Rewrite the survivor's `meta.mergedFrom` through `edit`, re-reading and
   * retrying when another writer got there first.
   */
  private async rewriteProvenance(
    survivorId: string,
    known: Memory | null,
    now: number,
    edit: (mergedFrom: string[]) => string[],
  ): Promise<void> {
    let current = known ?? (await this.store.getMemory(survivorId));

    for (let attempt = 0; attempt < SURVIVOR_WRITE_ATTEMPTS && current; attempt++) {
      const result = await this.store.updateMemory(
        survivorId,
        { meta: { ...current.meta, mergedFrom: edit(mergedFromOf(current)) }, updatedAt: now },
        current.updatedAt,
      );
      if (result.status === "updated") return;
      if (result.status === "not_found") break;
      current = await this.store.getMemory(survivorId);
    }

    throw new Error(`Could not record merge provenance on survivor ${survivorId}`);
  }
}

/** Highest importance first; then confidence; then id for determinism. */
function compareSurvivors(a: Memory, b: Memory): number {
  if (a.importance !== b.importance) return b.importance - a.importance;
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

export function mergedFromOf(memory: Memory): string[] {
  const value = memory.meta["mergedFrom"];
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === "string");
}
