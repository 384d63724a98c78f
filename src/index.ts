import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { evalConfig } from "./eval/config.js";
import { resolveResourceBudget } from "./eval/dispatch/budget.js";
import { DispatchScheduler, schedulerOptionsFromConfig } from "./eval/dispatch/scheduler.js";
import { EnsembleAggregator, aggregatorOptionsFromConfig } from "./eval/ensemble/aggregator.js";
import { createEvaluatorClient } from "./eval/models/client.js";
import { EvaluationStore } from "./db/evaluation-store.js";
import { startRestServer } from "./rest/server.js";

async function main() {
  logger.info({ pid: process.pid }, "Answer scoring service starting");

  // Validate configuration early
  const validation = validateConfig({ rest: config.rest, eval: evalConfig });
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // Prune old log files (keep 30 days)
  pruneOldLogs(30);

  const budget = resolveResourceBudget({
    tier: evalConfig.resourceBudgetTier,
    memoryUnits: evalConfig.resourceMemoryUnits,
  });
  logger.info(budget, `Resource budget: ${budget.tier} tier, ${budget.concurrency} concurrent evaluator calls`);

  const client = createEvaluatorClient(evalConfig.provider);
  const scheduler = new DispatchScheduler(client, budget, schedulerOptionsFromConfig());
  const aggregator = new EnsembleAggregator(scheduler, aggregatorOptionsFromConfig(evalConfig));
  const store = new EvaluationStore(config.db.path);

  const server = await startRestServer({ aggregator, store, budget });

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    server.close((err) => {
      if (err) logger.error({ err }, "HTTP server close error");
      store.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
