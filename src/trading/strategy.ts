import { createLogger, describeError } from "../logger";
import { computeRiskMetrics } from "../state/metrics";
import { checkPosition, checkPrediction } from "../state/store";
import type { StateSnapshot, StateStore, StateUpdate, WriteToken } from "../state/store";
import { GatewayTimeout, StateInvariantViolation } from "./errors";
import type { DecisionGateway, ExchangeGateway, ForecastGateway } from "./gateways";
import { DEFAULT_RETRY_POLICY, sleep, withRetry, withTimeout } from "./retry";
import type { RetryPolicy, Sleep } from "./retry";
import { evaluateAction, isTradeProposal, projectApproval } from "./risk";
import type { ApprovedDecision, RejectedDecision, RiskContext } from "./risk";
import type {
  LogEntry,
  LogLevel,
  Position,
  PositionMap,
  PredictionMap,
  ProposedAction,
  RiskPolicy,
  TradeRecord,
} from "./types";

const logger = createLogger("Strategy");

// A timer may fire a little before the instant it was set for.
const DUE_TOLERANCE_MS = 1000;

export type CyclePhase = "idle" | "fetching" | "deciding" | "evaluating" | "executing" | "recording";
export type CycleTrigger = "scheduled" | "manual";

export type CycleOutcome =
  | { kind: "skipped"; reason: "busy" | "not_due" }
  | {
      kind: "completed";
      cycle: number;
      approved: number;
      rejected: number;
      trades: TradeRecord[];
      droppedSymbols: string[];
    }
  | { kind: "failed"; cycle: number; error: string };

export interface SnapshotPublisher {
  publish(snapshot: StateSnapshot): void;
}

export interface StrategyDeps {
  store: StateStore;
  forecast: ForecastGateway;
  decision: DecisionGateway;
  exchange: ExchangeGateway;
  publishers?: SnapshotPublisher[];
}

export interface StrategyOptions {
  symbols: string[];
  quoteAsset: string;
  intervalMs: number;
  policy: RiskPolicy;
  retry?: RetryPolicy;
  clock?: () => Date;
  sleep?: Sleep;
}

type Note = (level: LogLevel, message: string) => void;

const LOG_METHOD: Record<LogLevel, "info" | "warn" | "error"> = {
  info: "info",
  success: "info",
  warning: "warn",
  error: "error",
};

export function validateProposal(action: ProposedAction, index: number): void {
  const field = `proposals[${index}]`;
  if (action.side !== "buy" && action.side !== "sell" && action.side !== "hold") {
    throw new StateInvariantViolation(field, `unknown side "${String(action.side)}"`);
  }
  if (!Number.isFinite(action.quantity) || action.quantity < 0) {
    throw new StateInvariantViolation(field, `quantity ${action.quantity} must be a non-negative number`);
  }
  if (action.side === "hold" && action.quantity !== 0) {
    throw new StateInvariantViolation(field, "hold must carry quantity 0");
  }
  if (!(action.confidence >= 0 && action.confidence <= 1)) {
    throw new StateInvariantViolation(field, `confidence ${action.confidence} outside [0, 1]`);
  }
}

const toPositionMap = (positions: Position[]): PositionMap =>
  Object.fromEntries(positions.map((position): [string, Position] => [position.asset, position]));

/** Throws StateInvariantViolation on the first position the store would refuse. */
const checkedPositionMap = (positions: Position[]): PositionMap => {
  const map = toPositionMap(positions);
  for (const [key, position] of Object.entries(map)) checkPosition(key, position);
  return map;
};

/**
 * Drives one strategy cycle end to end:
 * fetching -> deciding -> evaluating -> executing -> recording.
 *
 * Holds the store's write token for the whole cycle and releases it before
 * publishing, so a cycle started while another is in flight is skipped.
 */
export class StrategyEngine {
  private currentPhase: CyclePhase = "idle";
  private readonly retry: RetryPolicy;
  private readonly clock: () => Date;
  private readonly wait: Sleep;

  constructor(
    private readonly deps: StrategyDeps,
    private readonly options: StrategyOptions
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.clock = options.clock ?? (() => new Date());
    this.wait = options.sleep ?? sleep;
  }

  get phase(): CyclePhase {
    return this.currentPhase;
  }

  isDue(now: Date = this.clock()): boolean {
    const { nextRunAt } = this.deps.store.read().status;
    return nextRunAt === null || now.getTime() >= Date.parse(nextRunAt) - DUE_TOLERANCE_MS;
  }

  async runCycle(trigger: CycleTrigger = "scheduled"): Promise<CycleOutcome> {
    const startedAt = this.clock();
    if (trigger === "scheduled" && !this.isDue(startedAt)) {
      return { kind: "skipped", reason: "not_due" };
    }

    const begun = this.deps.store.beginCycle();
    if (!begun.ok) {
      logger.warn(`Cycle already in flight; skipping ${trigger} run.`);
      return { kind: "skipped", reason: "busy" };
    }

    let outcome: CycleOutcome;
    try {
      outcome = await this.executeCycle(begun.token, startedAt, trigger);
    } finally {
      this.currentPhase = "idle";
      this.deps.store.endCycle(begun.token);
    }

    this.publish();
    return outcome;
  }

  /** Writes `isRunning` outside a cycle; false if a cycle holds the token. */
  setRunning(isRunning: boolean, nextRunAt?: Date): boolean {
    const begun = this.deps.store.beginCycle();
    if (!begun.ok) return false;
    try {
      this.deps.store.commit(begun.token, {
        status: nextRunAt ? { isRunning, nextRunAt: nextRunAt.toISOString() } : { isRunning },
      });
    } finally {
      this.deps.store.endCycle(begun.token);
    }
    this.publish();
    return true;
  }

  private publish(): void {
    const snapshot = this.deps.store.read();
    for (const publisher of this.deps.publishers ?? []) {
      try {
        publisher.publish(snapshot);
      } catch (error) {
        logger.error("Snapshot publisher failed:", describeError(error));
      }
    }
  }

  private async executeCycle(
    token: WriteToken,
    startedAt: Date,
    trigger: CycleTrigger
  ): Promise<CycleOutcome> {
    const journal: LogEntry[] = [];
    const note: Note = (level, message) => {
      journal.push({ timestamp: this.clock().toISOString(), level, message });
      logger[LOG_METHOD[level]](message);
    };
    const cycle = this.deps.store.read().status.cycleCount + 1;
    const partial: StateUpdate = {};
    const trades: TradeRecord[] = [];

    try {
      note("info", `Cycle ${cycle} started (${trigger})`);

      this.currentPhase = "fetching";
      const { predictions, dropped } = await this.fetchPredictions(note);
      partial.predictions = predictions;
      if (Object.keys(predictions).length === 0) {
        return this.recordFailure(token, startedAt, cycle, journal, note, "No forecasts available; cycle aborted", partial);
      }

      this.currentPhase = "deciding";
      let positions: PositionMap;
      try {
        positions = checkedPositionMap(
          await this.callGateway("exchange.getPositions", () => this.deps.exchange.getPositions())
        );
      } catch (error) {
        const reason = error instanceof StateInvariantViolation ? "Portfolio rejected" : "Portfolio fetch failed";
        return this.recordFailure(token, startedAt, cycle, journal, note, `${reason}: ${describeError(error)}`, partial);
      }
      partial.positions = positions;

      const metrics = computeRiskMetrics(positions, this.options.quoteAsset);
      let proposals: ProposedAction[];
      try {
        proposals = await this.callGateway("decision.propose", () =>
          this.deps.decision.propose({ predictions, positions, reserve: metrics.usdtReserve })
        );
      } catch (error) {
        return this.recordFailure(token, startedAt, cycle, journal, note, `Decision service failed: ${describeError(error)}`, partial);
      }
      note("info", `Decision service proposed ${proposals.length} action(s)`);

      this.currentPhase = "evaluating";
      proposals.forEach(validateProposal);
      const { approved, rejected } = this.evaluate(proposals, {
        positions,
        metrics,
        prices: this.referencePrices(predictions, positions),
        quoteAsset: this.options.quoteAsset,
      }, note);

      this.currentPhase = "executing";
      for (const decision of approved) {
        const record = await this.executeApproved(decision);
        trades.push(record);
        note(
          record.status === "success" ? "success" : "error",
          `${record.side.toUpperCase()} ${record.symbol} ${record.quantity} @ $${record.price.toFixed(4)} ` +
            `($${record.notional.toFixed(2)}) ${record.status}${record.status === "failed" ? `: ${record.reason}` : ""}`
        );
      }

      if (trades.some((trade) => trade.status === "success")) {
        try {
          positions = checkedPositionMap(
            await this.callGateway("exchange.getPositions", () => this.deps.exchange.getPositions())
          );
        } catch (error) {
          note("warning", `Could not refresh portfolio after trading: ${describeError(error)}`);
        }
      }

      this.currentPhase = "recording";
      note("success", `Cycle ${cycle} completed: ${approved.length} approved, ${rejected.length} rejected`);
      this.deps.store.commit(token, {
        status: {
          cycleCount: cycle,
          lastRunAt: startedAt.toISOString(),
          nextRunAt: new Date(startedAt.getTime() + this.options.intervalMs).toISOString(),
          lastError: null,
        },
        positions,
        predictions,
        trades,
        logs: journal,
      });

      return {
        kind: "completed",
        cycle,
        approved: approved.length,
        rejected: rejected.length,
        trades,
        droppedSymbols: dropped,
      };
    } catch (error) {
      const prefix = error instanceof StateInvariantViolation ? "State invariant violated" : "Cycle failed";
      // Orders already sent stay on record; the sets that failed validation do not.
      return this.recordFailure(token, startedAt, cycle, journal, note, `${prefix}: ${describeError(error)}`, { trades });
    }
  }

  private callGateway<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(label, fn, this.retry, this.wait);
  }

  private async fetchPredictions(note: Note): Promise<{ predictions: PredictionMap; dropped: string[] }> {
    const results = await Promise.all(
      this.options.symbols.map(async (symbol) => {
        try {
          const prediction = await this.callGateway(`forecast ${symbol}`, () =>
            this.deps.forecast.getPrediction(symbol)
          );
          return { symbol, prediction };
        } catch (error) {
          note("warning", `Forecast for ${symbol} unavailable, dropped from this cycle: ${describeError(error)}`);
          return { symbol, prediction: null };
        }
      })
    );

    const predictions: PredictionMap = {};
    const dropped: string[] = [];
    for (const { symbol, prediction } of results) {
      if (!prediction) {
        dropped.push(symbol);
        continue;
      }
      const entry = { ...prediction, symbol };
      try {
        checkPrediction(symbol, entry);
        predictions[symbol] = entry;
      } catch (error) {
        note("warning", `Forecast for ${symbol} rejected, dropped from this cycle: ${describeError(error)}`);
        dropped.push(symbol);
      }
    }
    note("info", `Forecasts ready for ${Object.keys(predictions).length}/${this.options.symbols.length} symbols`);
    return { predictions, dropped };
  }

  private referencePrices(predictions: PredictionMap, positions: PositionMap): Record<string, number> {
    const prices: Record<string, number> = {};
    for (const position of Object.values(positions)) {
      if (position.asset !== this.options.quoteAsset && position.lastPrice > 0) {
        prices[`${position.asset}${this.options.quoteAsset}`] = position.lastPrice;
      }
    }
    for (const prediction of Object.values(predictions)) {
      if (prediction.currentPrice > 0) prices[prediction.symbol] = prediction.currentPrice;
    }
    return prices;
  }

  private evaluate(
    proposals: ProposedAction[],
    initial: RiskContext,
    note: Note
  ): { approved: ApprovedDecision[]; rejected: RejectedDecision[] } {
    const approved: ApprovedDecision[] = [];
    const rejected: RejectedDecision[] = [];
    let context = initial;

    for (const proposal of proposals) {
      if (!isTradeProposal(proposal)) {
        note("info", `${proposal.symbol}: hold (${proposal.rationale || "no rationale"})`);
        continue;
      }

      const decision = evaluateAction(proposal, context, this.options.policy);
      if (decision.approved) {
        approved.push(decision);
        context = projectApproval(context, decision);
        note(
          "info",
          `Approved ${proposal.side} ${proposal.symbol} $${decision.notional.toFixed(2)}` +
            `${decision.stopLoss ? " (stop-loss exit)" : ""}: ${proposal.rationale}`
        );
      } else {
        rejected.push(decision);
        note("warning", `Rejected ${proposal.side} ${proposal.symbol} [${decision.ruleId}]: ${decision.message}`);
      }
    }

    return { approved, rejected };
  }

  // Orders are not idempotent: one attempt, bounded by the per-call timeout.
  private async executeApproved(decision: ApprovedDecision): Promise<TradeRecord> {
    const { action, price, notional } = decision;
    const failed = (reason: string): TradeRecord => ({
      timestamp: this.clock().toISOString(),
      symbol: action.symbol,
      side: action.side,
      quantity: action.quantity,
      price,
      notional,
      status: "failed",
      reason,
      orderId: null,
    });

    try {
      return await withTimeout(this.deps.exchange.execute(action, price), this.retry.timeoutMs, "exchange.execute");
    } catch (error) {
      return failed(
        error instanceof GatewayTimeout
          ? `order outcome unknown: ${describeError(error)}`
          : `execution error: ${describeError(error)}`
      );
    }
  }

  private recordFailure(
    token: WriteToken,
    startedAt: Date,
    cycle: number,
    journal: LogEntry[],
    note: Note,
    message: string,
    partial: StateUpdate
  ): CycleOutcome {
    note("error", message);
    const previous = this.deps.store.read().status;
    const status: StateUpdate["status"] = {
      cycleCount: cycle,
      errorCount: previous.errorCount + 1,
      lastRunAt: startedAt.toISOString(),
      nextRunAt: new Date(startedAt.getTime() + this.options.intervalMs).toISOString(),
      lastError: message,
    };

    const attempts: StateUpdate[] = [
      { ...partial, status, logs: journal },
      { status, logs: journal },
    ];
    for (const update of attempts) {
      try {
        this.deps.store.commit(token, update);
        break;
      } catch (error) {
        logger.error(`Could not record failed cycle ${cycle}:`, describeError(error));
      }
    }

    return { kind: "failed", cycle, error: message };
  }
}
