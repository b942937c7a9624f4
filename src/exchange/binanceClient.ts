import crypto from "crypto";
import axios from "axios";
import type { AxiosInstance, Method } from "axios";
import { GatewayError } from "../trading/errors";

export interface Kline {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface Balance {
  asset: string;
  free: number;
  locked: number;
}

export interface OrderResult {
  orderId: string;
  status: string;
  executedQty: number;
  quoteQty: number;
}

export interface AccountTrade {
  time: number;
  price: number;
  qty: number;
  isBuyer: boolean;
}

export interface BinanceCredentials {
  apiKey: string;
  apiSecret: string;
}

const RECV_WINDOW = 5000;
const STEP_CACHE_TTL_MS = 60 * 60 * 1000;

export const requireNumber = (value: unknown, label: string): number => {
  const num = typeof value === "string" ? parseFloat(value) : Number(value);
  if (!Number.isFinite(num)) {
    throw new GatewayError("binance", `missing or invalid numeric value for ${label}`);
  }
  return num;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const describeAxiosError = (error: unknown): string => {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (isRecord(data) && typeof data.msg === "string") {
      return `HTTP ${error.response?.status ?? "?"} (${String(data.code)}): ${data.msg}`;
    }
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
};

/** Rounds down to the exchange's lot step, e.g. 0.12345678 @ 0.001 -> "0.123". */
export const formatQuantity = (quantity: number, stepSize: number): string => {
  if (!(stepSize > 0)) return quantity.toString();
  const decimals = Math.max(0, Math.round(-Math.log10(stepSize)));
  const steps = Math.floor(quantity / stepSize + 1e-9);
  return (steps * stepSize).toFixed(decimals);
};

/**
 * Thin REST client for Binance spot. Public endpoints need no credentials;
 * account and order endpoints are HMAC-SHA256 signed.
 */
export class BinanceClient {
  private readonly http: AxiosInstance;
  private readonly stepSizes = new Map<string, { stepSize: number; expiresAt: number }>();

  constructor(
    baseUrl: string,
    private readonly credentials: BinanceCredentials | null = null,
    timeoutMs = 10_000,
    http?: AxiosInstance
  ) {
    this.http = http ?? axios.create({ baseURL: baseUrl, timeout: timeoutMs });
  }

  async getKlines(symbol: string, interval = "1h", limit = 72): Promise<Kline[]> {
    const data = await this.request("GET", "/api/v3/klines", { symbol, interval, limit });
    if (!Array.isArray(data)) {
      throw new GatewayError("binance", `klines for ${symbol} were not an array`);
    }
    return data.map((row: unknown, i) => {
      if (!Array.isArray(row) || row.length < 6) {
        throw new GatewayError("binance", `malformed kline #${i} for ${symbol}`);
      }
      return {
        openTime: requireNumber(row[0], "kline.openTime"),
        open: requireNumber(row[1], "kline.open"),
        high: requireNumber(row[2], "kline.high"),
        low: requireNumber(row[3], "kline.low"),
        close: requireNumber(row[4], "kline.close"),
        volume: requireNumber(row[5], "kline.volume"),
      };
    });
  }

  async getAllPrices(): Promise<Record<string, number>> {
    const data = await this.request("GET", "/api/v3/ticker/price", {});
    if (!Array.isArray(data)) {
      throw new GatewayError("binance", "ticker prices were not an array");
    }
    const prices: Record<string, number> = {};
    for (const ticker of data) {
      if (isRecord(ticker) && typeof ticker.symbol === "string") {
        const price = Number(ticker.price);
        if (Number.isFinite(price)) prices[ticker.symbol] = price;
      }
    }
    return prices;
  }

  async getBalances(): Promise<Balance[]> {
    const data = await this.request("GET", "/api/v3/account", {}, true);
    if (!isRecord(data) || !Array.isArray(data.balances)) {
      throw new GatewayError("binance", "account response has no balances");
    }
    return data.balances
      .filter(isRecord)
      .map((b) => ({
        asset: String(b.asset),
        free: requireNumber(b.free, `${String(b.asset)}.free`),
        locked: requireNumber(b.locked, `${String(b.asset)}.locked`),
      }))
      .filter((b) => b.free + b.locked > 0);
  }

  async getStepSize(symbol: string): Promise<number> {
    const cached = this.stepSizes.get(symbol);
    if (cached && cached.expiresAt > Date.now()) return cached.stepSize;

    const data = await this.request("GET", "/api/v3/exchangeInfo", { symbol });
    const info = isRecord(data) && Array.isArray(data.symbols) ? data.symbols.find(isRecord) : undefined;
    const filters = info && Array.isArray(info.filters) ? info.filters.filter(isRecord) : [];
    const lot = filters.find((f) => f.filterType === "LOT_SIZE");
    if (!lot) {
      throw new GatewayError("binance", `no LOT_SIZE filter for ${symbol}`);
    }
    const stepSize = requireNumber(lot.stepSize, `${symbol}.stepSize`);
    this.stepSizes.set(symbol, { stepSize, expiresAt: Date.now() + STEP_CACHE_TTL_MS });
    return stepSize;
  }

  async placeMarketOrder(symbol: string, side: "BUY" | "SELL", quantity: string): Promise<OrderResult> {
    const data = await this.request("POST", "/api/v3/order", {
      symbol,
      side,
      type: "MARKET",
      quantity,
      newOrderRespType: "FULL",
    }, true);
    if (!isRecord(data)) {
      throw new GatewayError("binance", "order response was not an object");
    }
    return {
      orderId: String(data.orderId),
      status: String(data.status),
      executedQty: requireNumber(data.executedQty, "order.executedQty"),
      quoteQty: requireNumber(data.cummulativeQuoteQty, "order.cummulativeQuoteQty"),
    };
  }

  async getMyTrades(symbol: string, limit = 100): Promise<AccountTrade[]> {
    const data = await this.request("GET", "/api/v3/myTrades", { symbol, limit }, true);
    if (!Array.isArray(data)) {
      throw new GatewayError("binance", `trades for ${symbol} were not an array`);
    }
    return data.filter(isRecord).map((t) => ({
      time: requireNumber(t.time, "trade.time"),
      price: requireNumber(t.price, "trade.price"),
      qty: requireNumber(t.qty, "trade.qty"),
      isBuyer: t.isBuyer === true,
    }));
  }

  sign(query: string): string {
    if (!this.credentials) {
      throw new GatewayError("binance", "signed endpoint called without API credentials");
    }
    return crypto.createHmac("sha256", this.credentials.apiSecret).update(query).digest("hex");
  }

  private async request(
    method: Method,
    path: string,
    params: Record<string, string | number>,
    signed = false
  ): Promise<unknown> {
    const query = new URLSearchParams(
      Object.entries(params).map(([key, value]): [string, string] => [key, String(value)])
    );
    if (signed) {
      query.set("recvWindow", String(RECV_WINDOW));
      query.set("timestamp", String(Date.now()));
      query.set("signature", this.sign(query.toString()));
    }

    try {
      const response = await this.http.request<unknown>({
        method,
        url: `${path}?${query.toString()}`,
        headers: signed && this.credentials ? { "X-MBX-APIKEY": this.credentials.apiKey } : undefined,
      });
      return response.data;
    } catch (error) {
      throw new GatewayError("binance", `${method} ${path} failed: ${describeAxiosError(error)}`, { cause: error });
    }
  }
}
