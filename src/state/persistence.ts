import fs from "fs/promises";
import path from "path";
import type { InitialState, PersistedState, StateStore } from "./store";
import type { SnapshotPublisher } from "../trading/strategy";
import { createLogger, describeError } from "../logger";
import { EMPTY_PERFORMANCE } from "./metrics";
import type { LogEntry, RunStatus, TradeRecord } from "../trading/types";

const logger = createLogger("State");

export const saveState = async (filePath: string, state: PersistedState): Promise<void> => {
  const payload = { ...state, savedAt: new Date().toISOString() };
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(payload, null, 2), "utf-8");
  await fs.rename(tmpPath, filePath);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

const num = (value: unknown, fallback = 0): number =>
  typeof value === "number" && Number.isFinite(value) ? value : fallback;

const count = (value: unknown): number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : 0;

const str = (value: unknown): string | null => (typeof value === "string" ? value : null);

function parseStatus(raw: unknown): Partial<RunStatus> {
  if (!isRecord(raw)) return {};
  return {
    cycleCount: count(raw.cycleCount),
    errorCount: count(raw.errorCount),
    lastRunAt: str(raw.lastRunAt),
    nextRunAt: str(raw.nextRunAt),
    lastError: str(raw.lastError),
    lastUpdate: str(raw.lastUpdate),
  };
}

function parseTrade(raw: unknown): TradeRecord | null {
  if (!isRecord(raw)) return null;
  const { timestamp, symbol, side, status } = raw;
  if (typeof timestamp !== "string" || typeof symbol !== "string") return null;
  if (side !== "buy" && side !== "sell") return null;
  if (status !== "success" && status !== "failed") return null;
  return {
    timestamp,
    symbol,
    side,
    status,
    quantity: num(raw.quantity),
    price: num(raw.price),
    notional: num(raw.notional),
    reason: str(raw.reason) ?? "",
    orderId: str(raw.orderId),
  };
}

function parseLog(raw: unknown): LogEntry | null {
  if (!isRecord(raw)) return null;
  const { timestamp, level, message } = raw;
  if (typeof timestamp !== "string" || typeof message !== "string") return null;
  if (level !== "info" && level !== "success" && level !== "warning" && level !== "error") return null;
  return { timestamp, level, message };
}

const notNull = <T>(value: T | null): value is T => value !== null;

/**
 * Loads a saved state file, without positions or predictions. A missing
 * file resolves to null.
 */
export const loadState = async (filePath: string): Promise<InitialState | null> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") return null;
    throw error;
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`${filePath} does not contain a saved state object.`);
  }

  const performance = isRecord(parsed.performance)
    ? {
        totalTrades: count(parsed.performance.totalTrades),
        successfulTrades: count(parsed.performance.successfulTrades),
        failedTrades: count(parsed.performance.failedTrades),
        totalVolume: num(parsed.performance.totalVolume),
      }
    : EMPTY_PERFORMANCE;

  return {
    status: parseStatus(parsed.status),
    trades: asArray(parsed.trades).map(parseTrade).filter(notNull),
    logs: asArray(parsed.logs).map(parseLog).filter(notNull),
    performance,
  };
};

/** Saves the store after every published change, one write at a time. */
export class StateFileWriter implements SnapshotPublisher {
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly store: StateStore
  ) {}

  publish(): void {
    const state = this.store.toPersisted();
    this.pending = this.pending
      .then(() => saveState(this.filePath, state))
      .catch((error: unknown) => {
        logger.error(`Could not save state to ${this.filePath}:`, describeError(error));
      });
  }

  /** Resolves once every queued write has finished. */
  flush(): Promise<void> {
    return this.pending;
  }
}
