import { config, validateConfig } from "../config";
import { createEngine, createGateways, createStore } from "../app";
import { createLogger, describeError } from "../logger";

const logger = createLogger("Once");

const main = async (): Promise<void> => {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    errors.forEach((error) => logger.error(error));
    process.exit(1);
  }

  const store = createStore(config);
  const engine = createEngine(config, store, createGateways(config));
  const outcome = await engine.runCycle("manual");

  const snapshot = store.read();
  logger.info(`Outcome: ${outcome.kind}`);
  for (const entry of snapshot.logs) {
    logger.info(`${entry.level.toUpperCase()} ${entry.message}`);
  }
  logger.info("Risk metrics:", JSON.stringify(snapshot.riskMetrics));
  if (outcome.kind === "failed") process.exit(1);
};

main().catch((error: unknown) => {
  logger.error("Strategy run failed:", describeError(error));
  process.exit(1);
});
