import { GatewayError } from "../trading/errors";
import { baseAssetOf } from "../trading/gateways";
import type { ExchangeGateway } from "../trading/gateways";
import type { Position, ProposedAction, TradeRecord } from "../trading/types";
import { createLogger, describeError } from "../logger";

const logger = createLogger("Paper");

export interface PriceSource {
  getPrices(): Promise<Record<string, number>>;
}

export interface PaperExchangeOptions {
  startingBalance: number;
  quoteAsset?: string;
  /** Marks holdings to market on every portfolio read when set. */
  priceSource?: PriceSource;
  clock?: () => Date;
}

interface Holding {
  amount: number;
  entryPrice: number | null;
  mark: number;
}

/**
 * In-memory spot account. Orders fill in full at the reference price they
 * were approved at.
 */
export class PaperExchangeGateway implements ExchangeGateway {
  private readonly holdings = new Map<string, Holding>();
  private readonly quoteAsset: string;
  private readonly clock: () => Date;
  private orderSeq = 0;

  constructor(private readonly options: PaperExchangeOptions) {
    this.quoteAsset = options.quoteAsset ?? "USDT";
    this.clock = options.clock ?? (() => new Date());
    this.holdings.set(this.quoteAsset, { amount: options.startingBalance, entryPrice: null, mark: 1 });
  }

  /** Seeds a holding, e.g. to start from an existing portfolio. */
  deposit(asset: string, amount: number, price: number): void {
    const holding = this.holdings.get(asset);
    const held = holding?.amount ?? 0;
    const entry = asset === this.quoteAsset ? null : ((holding?.entryPrice ?? price) * held + price * amount) / (held + amount);
    this.holdings.set(asset, { amount: held + amount, entryPrice: entry, mark: asset === this.quoteAsset ? 1 : price });
  }

  async getPositions(): Promise<Position[]> {
    if (this.options.priceSource) {
      let prices: Record<string, number>;
      try {
        prices = await this.options.priceSource.getPrices();
      } catch (error) {
        throw new GatewayError("paper", `price refresh failed: ${describeError(error)}`, { cause: error });
      }
      for (const [asset, holding] of this.holdings) {
        const price = prices[`${asset}${this.quoteAsset}`];
        if (asset !== this.quoteAsset && price !== undefined && price > 0) holding.mark = price;
      }
    }

    return [...this.holdings.entries()]
      .filter(([, holding]) => holding.amount > 0)
      .map(([asset, holding]) => ({
        asset,
        freeAmount: holding.amount,
        lockedAmount: 0,
        lastPrice: holding.mark,
        usdValue: holding.amount * holding.mark,
        entryPrice: holding.entryPrice,
      }));
  }

  async execute(action: ProposedAction, referencePrice: number): Promise<TradeRecord> {
    const asset = baseAssetOf(action.symbol, this.quoteAsset);
    const notional = action.quantity * referencePrice;
    const base: Omit<TradeRecord, "status" | "reason" | "orderId"> = {
      timestamp: this.clock().toISOString(),
      symbol: action.symbol,
      side: action.side === "sell" ? "sell" : "buy",
      quantity: action.quantity,
      price: referencePrice,
      notional,
    };
    const fail = (reason: string): TradeRecord => ({ ...base, status: "failed", reason, orderId: null });

    if (action.side === "hold") return fail("hold is not an order");
    if (!(referencePrice > 0) || !(action.quantity > 0)) return fail("order needs a positive price and quantity");

    const quote = this.holdings.get(this.quoteAsset) ?? { amount: 0, entryPrice: null, mark: 1 };
    const holding = this.holdings.get(asset) ?? { amount: 0, entryPrice: null, mark: referencePrice };

    if (action.side === "buy") {
      if (notional > quote.amount + 1e-9) {
        return fail(`insufficient ${this.quoteAsset}: need ${notional.toFixed(2)}, have ${quote.amount.toFixed(2)}`);
      }
      const amount = holding.amount + action.quantity;
      holding.entryPrice = ((holding.entryPrice ?? referencePrice) * holding.amount + notional) / amount;
      holding.amount = amount;
      quote.amount -= notional;
    } else {
      if (action.quantity > holding.amount + 1e-12) {
        return fail(`insufficient ${asset}: need ${action.quantity}, have ${holding.amount}`);
      }
      holding.amount = Math.max(0, holding.amount - action.quantity);
      if (holding.amount === 0) holding.entryPrice = null;
      quote.amount += notional;
    }

    holding.mark = referencePrice;
    this.holdings.set(asset, holding);
    this.holdings.set(this.quoteAsset, quote);

    this.orderSeq += 1;
    const orderId = `paper-${this.orderSeq}`;
    logger.info(`Filled ${base.side} ${action.quantity} ${asset} @ ${referencePrice} (${orderId})`);
    return { ...base, status: "success", reason: action.rationale, orderId };
  }
}
