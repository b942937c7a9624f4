import type { DecisionGateway, DecisionInput } from "../trading/gateways";
import { baseAssetOf } from "../trading/gateways";
import type { ProposedAction } from "../trading/types";

export interface RuleDecisionOptions {
  quoteAsset: string;
  /** USDT size of a full-confidence buy. */
  baseNotional: number;
  buyThreshold?: number;
  sellThreshold?: number;
  /** Amplification above which buys are halved. */
  highVolatility?: number;
  /** Sell the whole holding once it is this far below its entry price. */
  stopLossRatio?: number;
}

/**
 * Deterministic thresholds over the forecasts. Confidence is the distance
 * of the upside probability from a coin flip, scaled to [0, 1].
 */
export class RuleDecisionGateway implements DecisionGateway {
  constructor(private readonly options: RuleDecisionOptions) {}

  async propose({ predictions, positions, reserve }: DecisionInput): Promise<ProposedAction[]> {
    const buyThreshold = this.options.buyThreshold ?? 0.6;
    const sellThreshold = this.options.sellThreshold ?? 0.4;
    const highVolatility = this.options.highVolatility ?? 1.5;
    let budget = reserve;

    const actions: ProposedAction[] = [];
    for (const prediction of Object.values(predictions).sort((a, b) => a.symbol.localeCompare(b.symbol))) {
      const { symbol, upsideProbability: upside, currentPrice: price } = prediction;
      const held = positions[baseAssetOf(symbol, this.options.quoteAsset)];
      const heldAmount = held?.freeAmount ?? 0;
      const confidence = Math.min(1, Math.abs(upside - 0.5) * 2);
      const hold = (rationale: string): ProposedAction => ({ symbol, side: "hold", quantity: 0, rationale, confidence });

      if (price <= 0) {
        actions.push(hold("no usable price"));
        continue;
      }

      const entry = held?.entryPrice ?? null;
      if (heldAmount > 0 && entry !== null && this.options.stopLossRatio !== undefined && price <= entry * (1 - this.options.stopLossRatio)) {
        actions.push({
          symbol,
          side: "sell",
          quantity: heldAmount,
          rationale: `price ${price} is ${((1 - price / entry) * 100).toFixed(1)}% below entry ${entry}`,
          confidence: 1,
        });
      } else if (upside >= buyThreshold) {
        let notional = this.options.baseNotional * confidence;
        if (prediction.volatilityAmplification > highVolatility) notional /= 2;
        notional = Math.min(notional, budget);
        if (notional <= 0) {
          actions.push(hold(`upside ${upside} but no reserve left`));
          continue;
        }
        budget -= notional;
        actions.push({
          symbol,
          side: "buy",
          quantity: notional / price,
          rationale: `upside probability ${upside} >= ${buyThreshold}`,
          confidence,
        });
      } else if (upside <= sellThreshold && heldAmount > 0) {
        actions.push({
          symbol,
          side: "sell",
          quantity: heldAmount * confidence,
          rationale: `upside probability ${upside} <= ${sellThreshold}`,
          confidence,
        });
      } else {
        actions.push(hold(`upside probability ${upside} in the neutral band`));
      }
    }
    return actions;
  }
}
