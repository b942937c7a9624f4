import type { PerformanceStats, PositionMap, RiskMetrics, TradeRecord } from "../trading/types";

export const EMPTY_PERFORMANCE: PerformanceStats = {
  totalTrades: 0,
  successfulTrades: 0,
  failedTrades: 0,
  totalVolume: 0,
};

// Exposure is everything that is not the quote reserve.
export function computeRiskMetrics(positions: PositionMap, quoteAsset = "USDT"): RiskMetrics {
  let totalValue = 0;
  let usdtReserve = 0;
  let maxSinglePosition = 0;
  let positionCount = 0;

  for (const position of Object.values(positions)) {
    totalValue += position.usdValue;
    if (position.asset === quoteAsset) {
      usdtReserve += position.usdValue;
    } else {
      positionCount += 1;
      maxSinglePosition = Math.max(maxSinglePosition, position.usdValue);
    }
  }

  const totalExposureValue = totalValue - usdtReserve;

  return {
    totalExposureRatio: totalValue > 0 ? totalExposureValue / totalValue : 0,
    totalExposureValue,
    usdtReserve,
    positionCount,
    maxSinglePosition,
    totalValue,
  };
}

export function accumulatePerformance(
  stats: PerformanceStats,
  trades: readonly TradeRecord[]
): PerformanceStats {
  return trades.reduce<PerformanceStats>(
    (acc, trade) =>
      trade.status === "success"
        ? {
            ...acc,
            totalTrades: acc.totalTrades + 1,
            successfulTrades: acc.successfulTrades + 1,
            totalVolume: acc.totalVolume + trade.notional,
          }
        : { ...acc, totalTrades: acc.totalTrades + 1, failedTrades: acc.failedTrades + 1 },
    stats
  );
}
