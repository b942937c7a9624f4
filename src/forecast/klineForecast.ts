import { GatewayError } from "../trading/errors";
import type { ForecastGateway } from "../trading/gateways";
import type { PredictionSnapshot } from "../trading/types";
import type { BinanceClient } from "../exchange/binanceClient";
import { buildPrediction, MIN_CLOSES } from "./indicators";

/** Forecasts from the last three days of public hourly klines. */
export class KlineForecastGateway implements ForecastGateway {
  constructor(
    private readonly client: Pick<BinanceClient, "getKlines">,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async getPrediction(symbol: string): Promise<PredictionSnapshot> {
    const klines = await this.client.getKlines(symbol, "1h", 72);
    const closes = klines.map((k) => k.close).filter((c) => c > 0);
    if (closes.length < MIN_CLOSES) {
      throw new GatewayError("forecast", `only ${closes.length} usable closes for ${symbol}`);
    }
    return buildPrediction(symbol, closes, this.clock());
  }
}
