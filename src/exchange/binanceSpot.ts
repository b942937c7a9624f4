import type { ExchangeGateway } from "../trading/gateways";
import type { Position, ProposedAction, TradeRecord, TradeSide } from "../trading/types";
import type { AccountTrade, BinanceClient } from "./binanceClient";
import { formatQuantity } from "./binanceClient";
import { createLogger, describeError } from "../logger";

const logger = createLogger("Binance");

const FILLED_STATUSES = new Set(["FILLED", "PARTIALLY_FILLED"]);

/**
 * Average cost of what is still held after replaying fills oldest first.
 * Sells release cost at the running average. Null when nothing is held.
 */
export function averageEntryPrice(trades: readonly AccountTrade[]): number | null {
  let qty = 0;
  let cost = 0;
  for (const trade of [...trades].sort((a, b) => a.time - b.time)) {
    if (trade.isBuyer) {
      qty += trade.qty;
      cost += trade.qty * trade.price;
    } else if (qty > 0) {
      const sold = Math.min(trade.qty, qty);
      cost -= (cost / qty) * sold;
      qty -= sold;
    }
    if (qty <= 1e-12) {
      qty = 0;
      cost = 0;
    }
  }
  return qty > 0 ? cost / qty : null;
}

export class BinanceSpotGateway implements ExchangeGateway {
  constructor(
    private readonly client: BinanceClient,
    private readonly quoteAsset = "USDT",
    private readonly clock: () => Date = () => new Date()
  ) {}

  async getPositions(): Promise<Position[]> {
    const [balances, prices] = await Promise.all([this.client.getBalances(), this.client.getAllPrices()]);

    const positions: Position[] = [];
    for (const balance of balances) {
      const isQuote = balance.asset === this.quoteAsset;
      const symbol = `${balance.asset}${this.quoteAsset}`;
      const lastPrice = isQuote ? 1 : prices[symbol];
      if (lastPrice === undefined) {
        logger.debug(`No ${symbol} price; leaving ${balance.asset} out of the portfolio.`);
        continue;
      }

      positions.push({
        asset: balance.asset,
        freeAmount: balance.free,
        lockedAmount: balance.locked,
        lastPrice,
        usdValue: (balance.free + balance.locked) * lastPrice,
        entryPrice: isQuote ? null : await this.entryPriceOf(symbol),
      });
    }
    return positions;
  }

  async execute(action: ProposedAction, referencePrice: number): Promise<TradeRecord> {
    const side: TradeSide = action.side === "sell" ? "sell" : "buy";
    const record = (fields: Partial<TradeRecord> & Pick<TradeRecord, "status" | "reason">): TradeRecord => ({
      timestamp: this.clock().toISOString(),
      symbol: action.symbol,
      side,
      quantity: action.quantity,
      price: referencePrice,
      notional: action.quantity * referencePrice,
      orderId: null,
      ...fields,
    });

    if (action.side === "hold") {
      return record({ status: "failed", reason: "hold is not an order" });
    }

    try {
      const stepSize = await this.client.getStepSize(action.symbol);
      const quantity = formatQuantity(action.quantity, stepSize);
      if (!(Number(quantity) > 0)) {
        return record({ status: "failed", reason: `quantity ${action.quantity} is below lot step ${stepSize}` });
      }

      const order = await this.client.placeMarketOrder(action.symbol, side === "buy" ? "BUY" : "SELL", quantity);
      logger.info(`Market ${side} ${action.symbol} qty ${quantity}: order ${order.orderId} ${order.status}`);

      const filled = order.executedQty > 0 && FILLED_STATUSES.has(order.status);
      const price = order.executedQty > 0 ? order.quoteQty / order.executedQty : referencePrice;
      return record({
        quantity: filled ? order.executedQty : Number(quantity),
        price,
        notional: filled ? order.quoteQty : Number(quantity) * price,
        orderId: order.orderId,
        status: filled ? "success" : "failed",
        reason: filled ? action.rationale : `order ${order.status}`,
      });
    } catch (error) {
      logger.error(`Order ${side} ${action.symbol} failed:`, describeError(error));
      return record({ status: "failed", reason: describeError(error) });
    }
  }

  private async entryPriceOf(symbol: string): Promise<number | null> {
    try {
      return averageEntryPrice(await this.client.getMyTrades(symbol));
    } catch (error) {
      logger.warn(`Cost basis for ${symbol} unavailable:`, describeError(error));
      return null;
    }
  }
}
