import { baseAssetOf } from "./gateways";
import { computeRiskMetrics } from "../state/metrics";
import type {
  Position,
  PositionMap,
  ProposedAction,
  RiskMetrics,
  RiskPolicy,
  TradeSide,
} from "./types";

export type TradeProposal = ProposedAction & { side: TradeSide };

export type RiskRuleId =
  | "no_price"
  | "min_notional"
  | "max_notional"
  | "total_exposure"
  | "single_asset"
  | "insufficient_balance";

export type RiskDecision =
  | {
      approved: true;
      action: TradeProposal;
      price: number;
      notional: number;
      /** Loss-cutting sell; exposure caps were not applied. */
      stopLoss: boolean;
    }
  | {
      approved: false;
      action: TradeProposal;
      ruleId: RiskRuleId;
      message: string;
    };

export type ApprovedDecision = Extract<RiskDecision, { approved: true }>;
export type RejectedDecision = Extract<RiskDecision, { approved: false }>;

export interface RiskContext {
  positions: PositionMap;
  metrics: RiskMetrics;
  /** Reference price per trading symbol. */
  prices: Record<string, number>;
  quoteAsset: string;
}

export const isTradeProposal = (action: ProposedAction): action is TradeProposal =>
  action.side === "buy" || action.side === "sell";

const EPSILON = 1e-9;

const fmt = (n: number): string => n.toFixed(2);

const pct = (n: number): string => `${(n * 100).toFixed(1)}%`;

export function unrealizedReturn(position: Position | undefined, price: number): number | null {
  if (!position || position.entryPrice === null || position.entryPrice <= 0) return null;
  return price / position.entryPrice - 1;
}

/**
 * Checks one proposal against the policy. The first failing rule decides:
 * minimum notional, maximum notional, total exposure cap (buys), per-asset
 * cap (buys), then available balance. Sells never meet the exposure caps;
 * one out of a position down more than the stop-loss ratio is flagged
 * `stopLoss` so it is reported as a loss cut.
 */
export function evaluateAction(
  action: TradeProposal,
  context: RiskContext,
  policy: RiskPolicy
): RiskDecision {
  const reject = (ruleId: RiskRuleId, message: string): RiskDecision => ({
    approved: false,
    action,
    ruleId,
    message,
  });

  const asset = baseAssetOf(action.symbol, context.quoteAsset);
  const position = context.positions[asset];
  const price = context.prices[action.symbol] ?? position?.lastPrice ?? 0;
  if (!(price > 0)) {
    return reject("no_price", `no reference price for ${action.symbol}`);
  }

  const notional = action.quantity * price;
  const { metrics } = context;

  const ret = unrealizedReturn(position, price);
  const stopLoss = action.side === "sell" && ret !== null && ret < -policy.stopLossRatio;

  if (notional < policy.minTradeNotional) {
    return reject("min_notional", `notional $${fmt(notional)} below minimum $${fmt(policy.minTradeNotional)}`);
  }

  if (notional > policy.maxTradeNotional) {
    return reject("max_notional", `notional $${fmt(notional)} above maximum $${fmt(policy.maxTradeNotional)}`);
  }

  if (action.side === "buy") {
    if (metrics.totalValue <= 0) {
      return reject("total_exposure", "portfolio has no value to size exposure against");
    }

    const exposureAfter = (metrics.totalExposureValue + notional) / metrics.totalValue;
    if (exposureAfter > policy.maxTotalExposureRatio + EPSILON) {
      return reject(
        "total_exposure",
        `total exposure would reach ${pct(exposureAfter)} (cap ${pct(policy.maxTotalExposureRatio)})`
      );
    }

    const assetAfter = ((position?.usdValue ?? 0) + notional) / metrics.totalValue;
    if (assetAfter > policy.maxSingleAssetRatio + EPSILON) {
      return reject(
        "single_asset",
        `${asset} would reach ${pct(assetAfter)} of portfolio (cap ${pct(policy.maxSingleAssetRatio)})`
      );
    }
  }

  if (action.side === "sell") {
    const free = position?.freeAmount ?? 0;
    if (action.quantity > free + EPSILON) {
      return reject("insufficient_balance", `sell ${action.quantity} ${asset} exceeds free balance ${free}`);
    }
  } else if (notional > metrics.usdtReserve + EPSILON) {
    return reject(
      "insufficient_balance",
      `buy $${fmt(notional)} exceeds ${context.quoteAsset} reserve $${fmt(metrics.usdtReserve)}`
    );
  }

  return { approved: true, action, price, notional, stopLoss };
}

const withAmount = (
  existing: Position | undefined,
  asset: string,
  price: number,
  delta: number
): Position => {
  const freeAmount = Math.max(0, (existing?.freeAmount ?? 0) + delta);
  const lockedAmount = existing?.lockedAmount ?? 0;
  return {
    asset,
    freeAmount,
    lockedAmount,
    lastPrice: price,
    usdValue: (freeAmount + lockedAmount) * price,
    entryPrice: existing?.entryPrice ?? null,
  };
};

/**
 * The context as it would look once an approved trade fills at its
 * reference price. Applied between approvals so a batch is checked
 * cumulatively.
 */
export function projectApproval(context: RiskContext, decision: RiskDecision): RiskContext {
  if (!decision.approved) return context;

  const { action, price, notional } = decision;
  const asset = baseAssetOf(action.symbol, context.quoteAsset);
  const sign = action.side === "buy" ? 1 : -1;

  const positions: PositionMap = {
    ...context.positions,
    [asset]: withAmount(context.positions[asset], asset, price, sign * action.quantity),
    [context.quoteAsset]: withAmount(
      context.positions[context.quoteAsset],
      context.quoteAsset,
      1,
      -sign * notional
    ),
  };

  return {
    ...context,
    positions,
    metrics: computeRiskMetrics(positions, context.quoteAsset),
  };
}
