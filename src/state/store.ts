import { v4 as uuidv4 } from "uuid";
import { BoundedHistory } from "./history";
import {
  EMPTY_PERFORMANCE,
  accumulatePerformance,
  computeRiskMetrics,
} from "./metrics";
import { StateInvariantViolation, StoreTokenError } from "../trading/errors";
import type {
  LogEntry,
  PerformanceStats,
  Position,
  PositionMap,
  PredictionMap,
  PredictionSnapshot,
  RiskMetrics,
  RunStatus,
  TradeRecord,
} from "../trading/types";

export interface StateSnapshot {
  readonly version: number;
  readonly status: Readonly<RunStatus>;
  readonly positions: Readonly<Record<string, Readonly<Position>>>;
  readonly predictions: Readonly<Record<string, Readonly<PredictionSnapshot>>>;
  readonly trades: readonly Readonly<TradeRecord>[];
  readonly logs: readonly Readonly<LogEntry>[];
  readonly performance: Readonly<PerformanceStats>;
  readonly riskMetrics: Readonly<RiskMetrics>;
}

/** What survives a restart; risk metrics are always derived again. */
export interface PersistedState {
  status: RunStatus;
  positions: PositionMap;
  predictions: PredictionMap;
  trades: TradeRecord[];
  logs: LogEntry[];
  performance: PerformanceStats;
}

export type InitialState = Partial<Omit<PersistedState, "status">> & { status?: Partial<RunStatus> };

export interface StateUpdate {
  status?: Partial<Omit<RunStatus, "lastUpdate">>;
  /** Replaces the whole position set. */
  positions?: PositionMap;
  /** Replaces the whole prediction set. */
  predictions?: PredictionMap;
  trades?: TradeRecord[];
  logs?: LogEntry[];
}

export interface StoreOptions {
  maxTradeHistory: number;
  maxLogHistory: number;
  quoteAsset?: string;
  simulationMode?: boolean;
  clock?: () => Date;
}

export class WriteToken {
  readonly id = uuidv4();
  constructor(readonly issuedAt: string) {}
}

export type BeginCycleResult =
  | { ok: true; token: WriteToken }
  | { ok: false; reason: "busy" };

export const initialRunStatus = (simulationMode = true): RunStatus => ({
  isRunning: false,
  simulationMode,
  cycleCount: 0,
  errorCount: 0,
  lastRunAt: null,
  nextRunAt: null,
  lastError: null,
  lastUpdate: null,
});

const isNonNegative = (n: number): boolean => Number.isFinite(n) && n >= 0;

const freezeRecord = <T extends object>(map: Record<string, T>): Readonly<Record<string, Readonly<T>>> =>
  Object.freeze(
    Object.fromEntries(
      Object.entries(map).map(([key, value]): [string, Readonly<T>] => [key, Object.freeze({ ...value })])
    )
  );

const freezeList = <T extends object>(items: readonly T[]): readonly Readonly<T>[] =>
  Object.freeze(items.map((item) => Object.freeze({ ...item })));

export function checkPosition(key: string, position: Position): void {
  const field = `positions.${key}`;
  if (position.asset !== key) {
    throw new StateInvariantViolation(field, `keyed under "${key}" but asset is "${position.asset}"`);
  }
  if (!isNonNegative(position.freeAmount) || !isNonNegative(position.lockedAmount)) {
    throw new StateInvariantViolation(field, "free and locked amounts must be non-negative");
  }
  if (!isNonNegative(position.lastPrice)) {
    throw new StateInvariantViolation(field, "last price must be non-negative");
  }
  const expected = (position.freeAmount + position.lockedAmount) * position.lastPrice;
  if (Math.abs(position.usdValue - expected) > 1e-6 * Math.max(1, expected)) {
    throw new StateInvariantViolation(field, `usd value ${position.usdValue} != (free+locked)*price ${expected}`);
  }
  if (position.entryPrice !== null && !isNonNegative(position.entryPrice)) {
    throw new StateInvariantViolation(field, "entry price must be non-negative");
  }
}

export function checkPrediction(key: string, prediction: PredictionSnapshot): void {
  const field = `predictions.${key}`;
  if (prediction.symbol !== key) {
    throw new StateInvariantViolation(field, `keyed under "${key}" but symbol is "${prediction.symbol}"`);
  }
  const p = prediction.upsideProbability;
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw new StateInvariantViolation(field, `upside probability ${p} outside [0, 1]`);
  }
  if (!isNonNegative(prediction.volatilityAmplification)) {
    throw new StateInvariantViolation(field, "volatility amplification must be non-negative");
  }
  if (!(prediction.minPredictedPrice <= prediction.maxPredictedPrice)) {
    throw new StateInvariantViolation(field, "min predicted price exceeds max predicted price");
  }
}

function checkTrade(index: number, trade: TradeRecord): void {
  const field = `trades[${index}]`;
  if (!isNonNegative(trade.quantity)) {
    throw new StateInvariantViolation(field, `quantity ${trade.quantity} must be non-negative`);
  }
  if (!isNonNegative(trade.price) || !isNonNegative(trade.notional)) {
    throw new StateInvariantViolation(field, "price and notional must be non-negative");
  }
}

function checkStatus(previous: RunStatus, next: RunStatus): void {
  if (!Number.isInteger(next.cycleCount) || next.cycleCount < previous.cycleCount) {
    throw new StateInvariantViolation("status.cycleCount", `cannot move from ${previous.cycleCount} to ${next.cycleCount}`);
  }
  if (next.errorCount < previous.errorCount) {
    throw new StateInvariantViolation("status.errorCount", "cannot decrease");
  }
  if (next.lastRunAt && next.nextRunAt && Date.parse(next.nextRunAt) < Date.parse(next.lastRunAt)) {
    throw new StateInvariantViolation("status.nextRunAt", "must not precede lastRunAt");
  }
}

/**
 * Holds the latest snapshot of everything the dashboard can see.
 *
 * One writer at a time: a cycle takes the write token with `beginCycle`,
 * commits, then releases it with `endCycle`. Readers get the current frozen
 * snapshot and never wait on a writer; `commit` swaps the snapshot in one
 * assignment, so a reader sees either the old state or the new one.
 */
export class StateStore {
  private readonly trades: BoundedHistory<TradeRecord>;
  private readonly logs: BoundedHistory<LogEntry>;
  private readonly quoteAsset: string;
  private readonly clock: () => Date;
  private activeToken: WriteToken | null = null;
  private snapshot: StateSnapshot;

  constructor(options: StoreOptions, initial?: InitialState) {
    this.quoteAsset = options.quoteAsset ?? "USDT";
    this.clock = options.clock ?? (() => new Date());
    this.trades = new BoundedHistory(options.maxTradeHistory, initial?.trades ?? []);
    this.logs = new BoundedHistory(options.maxLogHistory, initial?.logs ?? []);

    const status: RunStatus = {
      ...initialRunStatus(options.simulationMode ?? true),
      ...initial?.status,
      isRunning: false,
    };
    if (options.simulationMode !== undefined) status.simulationMode = options.simulationMode;

    this.snapshot = this.buildSnapshot(
      0,
      status,
      initial?.positions ?? {},
      initial?.predictions ?? {},
      initial?.performance ?? EMPTY_PERFORMANCE
    );
  }

  read(): StateSnapshot {
    return this.snapshot;
  }

  readTrades(limit = 0): readonly Readonly<TradeRecord>[] {
    return tail(this.snapshot.trades, limit);
  }

  readLogs(limit = 0): readonly Readonly<LogEntry>[] {
    return tail(this.snapshot.logs, limit);
  }

  get busy(): boolean {
    return this.activeToken !== null;
  }

  beginCycle(): BeginCycleResult {
    if (this.activeToken) return { ok: false, reason: "busy" };
    const token = new WriteToken(this.clock().toISOString());
    this.activeToken = token;
    return { ok: true, token };
  }

  endCycle(token: WriteToken): void {
    this.assertHolder(token);
    this.activeToken = null;
  }

  /**
   * Validates the whole update first and applies it only if every check
   * passes; a StateInvariantViolation leaves the store unchanged.
   */
  commit(token: WriteToken, update: StateUpdate): StateSnapshot {
    this.assertHolder(token);
    const current = this.snapshot;

    const status: RunStatus = {
      ...current.status,
      ...update.status,
      lastUpdate: this.clock().toISOString(),
    };
    checkStatus(current.status, status);

    const positions = update.positions ?? current.positions;
    if (update.positions) {
      for (const [key, position] of Object.entries(update.positions)) checkPosition(key, position);
    }
    const predictions = update.predictions ?? current.predictions;
    if (update.predictions) {
      for (const [key, prediction] of Object.entries(update.predictions)) checkPrediction(key, prediction);
    }
    const newTrades = update.trades ?? [];
    newTrades.forEach((trade, index) => checkTrade(index, trade));

    this.trades.appendAll(newTrades.map((trade) => ({ ...trade })));
    this.logs.appendAll((update.logs ?? []).map((entry) => ({ ...entry })));

    this.snapshot = this.buildSnapshot(
      current.version + 1,
      status,
      positions,
      predictions,
      accumulatePerformance(current.performance, newTrades)
    );
    return this.snapshot;
  }

  toPersisted(): PersistedState {
    const { status, positions, predictions, performance } = this.snapshot;
    return {
      status: { ...status },
      positions: { ...positions },
      predictions: { ...predictions },
      trades: this.trades.toArray(),
      logs: this.logs.toArray(),
      performance: { ...performance },
    };
  }

  private assertHolder(token: WriteToken): void {
    if (this.activeToken === null) {
      throw new StoreTokenError("No cycle holds the write token");
    }
    if (this.activeToken !== token) {
      throw new StoreTokenError(`Write token ${token.id} is not the active token`);
    }
  }

  private buildSnapshot(
    version: number,
    status: RunStatus,
    positions: Readonly<Record<string, Readonly<Position>>>,
    predictions: Readonly<Record<string, Readonly<PredictionSnapshot>>>,
    performance: PerformanceStats
  ): StateSnapshot {
    return Object.freeze({
      version,
      status: Object.freeze({ ...status }),
      positions: freezeRecord(positions),
      predictions: freezeRecord(predictions),
      trades: freezeList(this.trades.toArray()),
      logs: freezeList(this.logs.toArray()),
      performance: Object.freeze({ ...performance }),
      riskMetrics: Object.freeze(computeRiskMetrics(positions, this.quoteAsset)),
    });
  }
}

function tail<T>(items: readonly T[], limit: number): readonly T[] {
  return limit > 0 && limit < items.length ? items.slice(items.length - limit) : items;
}
