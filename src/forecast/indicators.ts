import type { PredictionSnapshot } from "../trading/types";

export type TrendDirection = "UP" | "DOWN" | "RANGE";

export interface DerivedIndicators {
  emaShort: number;
  emaLong: number;
  trendDirection: TrendDirection;
  trendStrengthPct: number;
  volatility24hPct: number;
  volatilityPrev24hPct: number;
}

/** Fewest hourly closes that still give a 24h trend. */
export const MIN_CLOSES = 26;

export function computeEma(values: number[], period: number): number {
  if (values.length === 0) {
    throw new Error("Cannot compute EMA of empty array");
  }
  const k = 2 / (period + 1);
  let ema = values[0];
  for (let i = 1; i < values.length; i++) {
    ema = values[i] * k + ema * (1 - k);
  }
  return ema;
}

export function computeStdDevPct(values: number[]): number {
  if (values.length < 2) return 0;
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    const curr = values[i];
    if (prev !== 0) {
      returns.push(((curr - prev) / prev) * 100);
    }
  }
  if (returns.length === 0) return 0;
  const mean = returns.reduce((a, b) => a + b, 0) / returns.length;
  const variance =
    returns.reduce((sum, r) => sum + (r - mean) * (r - mean), 0) /
    returns.length;
  return Math.sqrt(variance);
}

export function deriveIndicators(closes: number[]): DerivedIndicators {
  if (closes.length < MIN_CLOSES) {
    throw new Error(`Need at least ${MIN_CLOSES} closes, got ${closes.length}`);
  }

  const closesWindow = closes.slice(-48);
  const emaShort = computeEma(closesWindow, Math.min(10, closesWindow.length));
  const emaLong = computeEma(closesWindow, Math.min(50, closesWindow.length));

  let trendDirection: TrendDirection;
  if (emaShort > emaLong * 1.002) {
    trendDirection = "UP";
  } else if (emaShort < emaLong * 0.998) {
    trendDirection = "DOWN";
  } else {
    trendDirection = "RANGE";
  }

  const close24Ago = closes[closes.length - 25];
  const lastClose = closes[closes.length - 1];
  const trendStrengthPct = close24Ago ? ((lastClose - close24Ago) / close24Ago) * 100 : 0;

  return {
    emaShort,
    emaLong,
    trendDirection,
    trendStrengthPct,
    volatility24hPct: computeStdDevPct(closes.slice(-25)),
    volatilityPrev24hPct: computeStdDevPct(closes.slice(-49, -24)),
  };
}

const round = (value: number, digits: number): number => {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
};

/**
 * Turns hourly closes into a 24h forecast. The upside probability is a
 * logistic of the 24h move measured in daily standard deviations; the
 * band is two daily deviations either side of the last close.
 */
export function buildPrediction(symbol: string, closes: number[], fetchedAt: Date): PredictionSnapshot {
  const derived = deriveIndicators(closes);
  const currentPrice = closes[closes.length - 1];
  const dailySigmaPct = derived.volatility24hPct * Math.sqrt(24);

  const z = derived.trendStrengthPct / Math.max(dailySigmaPct, 0.01);
  const upside = Math.min(0.99, Math.max(0.01, 1 / (1 + Math.exp(-z))));
  const amplification = derived.volatilityPrev24hPct > 0
    ? derived.volatility24hPct / derived.volatilityPrev24hPct
    : 1;
  const band = (2 * dailySigmaPct) / 100;

  return {
    symbol,
    currentPrice,
    upsideProbability: round(upside, 4),
    volatilityAmplification: round(amplification, 4),
    minPredictedPrice: Math.max(0, currentPrice * (1 - band)),
    maxPredictedPrice: currentPrice * (1 + band),
    fetchedAt: fetchedAt.toISOString(),
  };
}
