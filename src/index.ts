import { config } from "./config.js";
import { log } from "./logger.js";
import { SqliteMemoryStore } from "./memory/sqlite-store.js";
import { isPineconeConfigured } from "./memory/pinecone.js";
import { PineconeSimilarity } from "./memory/similarity.js";
import { LifecycleManager } from "./lifecycle/lifecycle-manager.js";
import { SweepScheduler } from "./lifecycle/sweep-scheduler.js";

// ── Main ─────────────────────────────────────────────────

async function main() {
  log.info(
    {
      database: config.databasePath,
      sweepCron: config.sweepCron,
      batchSize: config.sweepBatchSize,
      policy: config.policy,
    },
    "🐘 spirit-recall — lifecycle worker",
  );

  const store = new SqliteMemoryStore(config.databasePath);
  const manager = new LifecycleManager({ store, policy: config.policy });

  // Near-duplicate merging only runs when a vector index is configured
  const clusterSource = isPineconeConfigured()
    ? new PineconeSimilarity(config.clusterThreshold)
    : undefined;
  if (!clusterSource) {
    log.info("ℹ️ Pinecone not configured — near-duplicate merge disabled");
  }

  const scheduler = new SweepScheduler({
    manager,
    store,
    cronExpression: config.sweepCron,
    timezone: config.sweepTimezone,
    batchSize: config.sweepBatchSize,
    clusterSource,
  });
  scheduler.start();

  // Graceful shutdown
  const shutdown = () => {
    log.info("👋 Shutting down spirit-recall...");
    scheduler.stop();
    store.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  if (process.argv.includes("--sweep-now")) {
    const cycle = await scheduler.runSweepCycle(Date.now());
    log.info(
      { spirits: cycle.sweeps.length, failed: cycle.failed.length },
      "✅ Manual sweep complete",
    );
  }
}

main().catch((error) => {
  log.fatal(error, "💀 Fatal error");
  process.exit(1);
});
