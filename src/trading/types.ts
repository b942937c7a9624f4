export type TradeSide = "buy" | "sell";
export type ActionSide = TradeSide | "hold";
export type TradeStatus = "success" | "failed";
export type LogLevel = "info" | "success" | "warning" | "error";

export interface RunStatus {
  isRunning: boolean;
  simulationMode: boolean;
  cycleCount: number;
  errorCount: number;
  lastRunAt: string | null;
  nextRunAt: string | null;
  lastError: string | null;
  lastUpdate: string | null;
}

export interface Position {
  asset: string;
  freeAmount: number;
  lockedAmount: number;
  lastPrice: number;
  usdValue: number;
  /** Average cost of the current holding, when the exchange can tell. */
  entryPrice: number | null;
}

export interface PredictionSnapshot {
  symbol: string;
  currentPrice: number;
  upsideProbability: number;
  volatilityAmplification: number;
  minPredictedPrice: number;
  maxPredictedPrice: number;
  fetchedAt: string;
}

export interface ProposedAction {
  symbol: string;
  side: ActionSide;
  /** Base-asset units. */
  quantity: number;
  rationale: string;
  confidence: number;
}

export interface TradeRecord {
  timestamp: string;
  symbol: string;
  side: TradeSide;
  quantity: number;
  price: number;
  notional: number;
  status: TradeStatus;
  reason: string;
  orderId: string | null;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export interface RiskMetrics {
  totalExposureRatio: number;
  totalExposureValue: number;
  usdtReserve: number;
  positionCount: number;
  maxSinglePosition: number;
  totalValue: number;
}

export interface PerformanceStats {
  totalTrades: number;
  successfulTrades: number;
  failedTrades: number;
  totalVolume: number;
}

export interface RiskPolicy {
  minTradeNotional: number;
  maxTradeNotional: number;
  maxTotalExposureRatio: number;
  maxSingleAssetRatio: number;
  stopLossRatio: number;
}

export type PositionMap = Record<string, Position>;
export type PredictionMap = Record<string, PredictionSnapshot>;
