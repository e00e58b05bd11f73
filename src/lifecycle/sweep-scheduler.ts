import cron from "node-cron";
import type { MemoryStore } from "../memory/store.js";
import type { ClusterSource } from "../memory/similarity.js";
import { ValidationError } from "../memory/errors.js";
import type { LifecycleManager, MergeReport, SweepReport } from "./lifecycle-manager.js";
import { componentLogger } from "../logger.js";

// ── Sweep Scheduler — the curation heartbeat ─────────────

const log = componentLogger("sweep-scheduler");

export interface SweepSchedulerOptions {
  manager: LifecycleManager;
  store: MemoryStore;
  cronExpression: string;
  timezone: string;
  batchSize: number;
  /** When set, each spirit's live memories are also merged by cluster */
  clusterSource?: ClusterSource;
}

export interface SweepCycleReport {
  sweeps: SweepReport[];
  merges: MergeReport[];
  /** Spirits skipped because a sweep for them was already running */
  busy: string[];
  failed: string[];
}

type CronTask = ReturnType<typeof cron.schedule>;

export class SweepScheduler {
  private readonly running = new Set<string>();
  private task: CronTask | null = null;

  constructor(private readonly options: SweepSchedulerOptions) {
    if (!cron.validate(options.cronExpression)) {
      throw new ValidationError("cronExpression", options.cronExpression, "not a valid cron expression");
    }
  }

  /**
   * Sweep every spirit once at `now`. Sweeps of the same spirit never
   * overlap; a spirit already being swept is reported as busy.
   */
  async runSweepCycle(now: number): Promise<SweepCycleReport> {
    const cycle: SweepCycleReport = { sweeps: [], merges: [], busy: [], failed: [] };
    const spiritIds = await this.options.store.listSpiritIds();

    for (const spiritId of spiritIds) {
      if (this.running.has(spiritId)) {
        log.info({ spiritId }, "⏭️ Sweep already running for spirit");
        cycle.busy.push(spiritId);
        continue;
      }

      this.running.add(spiritId);
      try {
        cycle.sweeps.push(
          await this.options.manager.sweep(spiritId, now, {
            batchSize: this.options.batchSize,
          }),
        );
        if (this.options.clusterSource) {
          cycle.merges.push(await this.mergeSpirit(spiritId, now, this.options.clusterSource));
        }
      } catch (err) {
        cycle.failed.push(spiritId);
        log.error({ spiritId, err }, "❌ Sweep failed for spirit");
      } finally {
        this.running.delete(spiritId);
      }
    }

    return cycle;
  }

  isRunning(spiritId: string): boolean {
    return this.running.has(spiritId);
  }

  private async mergeSpirit(
    spiritId: string,
    now: number,
    source: ClusterSource,
  ): Promise<MergeReport> {
    const live = await this.options.store.listMemories(spiritId, {
      states: ["active", "decaying"],
    });
    const clusters = await source.cluster(live);
    return this.options.manager.mergeClusters(clusters, now);
  }

  /** Start the cron job. The wall clock is read here and nowhere deeper. */
  start(): void {
    if (this.task) return;

    this.task = cron.schedule(
      this.options.cronExpression,
      async () => {
        log.info("💤 Sweep cycle triggered");
        try {
          const cycle = await this.runSweepCycle(Date.now());
          log.info(
            {
              spirits: cycle.sweeps.length,
              transitioned: cycle.sweeps.reduce((s, r) => s + r.transitioned, 0),
              errors: cycle.sweeps.reduce((s, r) => s + r.errors, 0),
              busy: cycle.busy.length,
              failed: cycle.failed.length,
            },
            "✅ Sweep cycle complete",
          );
        } catch (err) {
          log.error(err, "❌ Sweep cycle failed");
        }
      },
      { timezone: this.options.timezone },
    );

    log.info(
      { cron: this.options.cronExpression, timezone: this.options.timezone },
      "⏰ Lifecycle sweep scheduled",
    );
  }

  stop(): void {
    if (!this.task) return;
    void this.task.stop();
    this.task = null;
  }
}
