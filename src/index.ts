import { config, describeConfig, validateConfig } from "./config";
import { createEngine, createGateways, createStore } from "./app";
import { createLogger, describeError } from "./logger";
import { DashboardServer } from "./server/server";
import { FeedHub } from "./server/feed";
import { loadState, StateFileWriter } from "./state/persistence";
import { StrategyLoop } from "./trading/loop";
import type { SnapshotPublisher } from "./trading/strategy";

const logger = createLogger("Main");

const main = async (): Promise<void> => {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    errors.forEach((error) => logger.error(error));
    process.exit(1);
  }
  describeConfig(config).forEach((line) => logger.info(line));

  const stateFile = config.store.stateFile;
  const initial = stateFile ? await loadState(stateFile) : null;
  if (initial) logger.info(`Restored ${initial.trades?.length ?? 0} trade(s) from ${stateFile}`);

  const store = createStore(config, initial ?? undefined);
  const hub = new FeedHub({
    queueSize: config.server.feedQueueSize,
    keepaliveTimeoutMs: config.server.keepaliveTimeoutMs,
    pingIntervalMs: config.server.pingIntervalMs,
    pollIntervalMs: config.server.pollIntervalMs,
    snapshot: () => store.read(),
  });
  const writer = stateFile ? new StateFileWriter(stateFile, store) : null;
  const publishers: SnapshotPublisher[] = writer ? [hub, writer] : [hub];

  const engine = createEngine(config, store, createGateways(config), publishers);
  const loop = new StrategyLoop(engine, {
    intervalMs: config.loop.intervalMs,
    runOnStart: config.loop.runOnStart,
    nextRunAt: () => store.read().status.nextRunAt,
  });
  const server = new DashboardServer(store, hub, loop, { host: config.server.host, port: config.server.port });

  await server.start();
  hub.start();
  loop.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received, shutting down...`);
    await loop.stop();
    hub.stop();
    await server.stop();
    await writer?.flush();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
};

main().catch((error: unknown) => {
  logger.error("Failed to start:", describeError(error));
  process.exit(1);
});
