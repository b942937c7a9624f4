import fs from "fs/promises";
import path from "path";
import { GatewayError } from "../trading/errors";
import type { ForecastGateway } from "../trading/gateways";
import type { PredictionSnapshot } from "../trading/types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const parsePredictionEntry = (symbol: string, entry: unknown, fallbackTime: string): PredictionSnapshot => {
  if (
    !isRecord(entry) ||
    !isFiniteNumber(entry.currentPrice) ||
    !isFiniteNumber(entry.upsideProbability) ||
    !isFiniteNumber(entry.volatilityAmplification) ||
    !isFiniteNumber(entry.minPredictedPrice) ||
    !isFiniteNumber(entry.maxPredictedPrice)
  ) {
    throw new GatewayError("file-forecast", `${symbol} entry is missing required fields or has invalid types.`);
  }
  if (entry.upsideProbability < 0 || entry.upsideProbability > 1) {
    throw new GatewayError("file-forecast", `${symbol} upsideProbability must be within [0, 1].`);
  }
  if (entry.volatilityAmplification < 0 || entry.minPredictedPrice > entry.maxPredictedPrice) {
    throw new GatewayError("file-forecast", `${symbol} has a negative amplification or an inverted price band.`);
  }

  return {
    symbol,
    currentPrice: entry.currentPrice,
    upsideProbability: entry.upsideProbability,
    volatilityAmplification: entry.volatilityAmplification,
    minPredictedPrice: entry.minPredictedPrice,
    maxPredictedPrice: entry.maxPredictedPrice,
    fetchedAt: typeof entry.fetchedAt === "string" ? entry.fetchedAt : fallbackTime,
  };
};

/**
 * Reads forecasts another process writes as
 * `{ "generatedAt": "...", "predictions": { "BTCUSDT": { ... } } }`.
 */
export class FileForecastGateway implements ForecastGateway {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
  }

  async getPrediction(symbol: string): Promise<PredictionSnapshot> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(this.filePath, "utf-8"));
    } catch (error) {
      throw new GatewayError("file-forecast", `cannot read ${this.filePath}`, { cause: error });
    }

    if (!isRecord(parsed) || !isRecord(parsed.predictions)) {
      throw new GatewayError("file-forecast", `${this.filePath} has no predictions object.`);
    }
    const entry = parsed.predictions[symbol];
    if (entry === undefined) {
      throw new GatewayError("file-forecast", `no prediction for ${symbol}`);
    }
    const generatedAt = typeof parsed.generatedAt === "string" ? parsed.generatedAt : new Date().toISOString();
    return parsePredictionEntry(symbol, entry, generatedAt);
  }
}
