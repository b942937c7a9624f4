import type {
  Position,
  PositionMap,
  PredictionMap,
  PredictionSnapshot,
  ProposedAction,
  TradeRecord,
} from "./types";

export interface ForecastGateway {
  /** Rejects with GatewayError on transient failure. */
  getPrediction(symbol: string): Promise<PredictionSnapshot>;
}

export interface DecisionInput {
  predictions: PredictionMap;
  positions: PositionMap;
  reserve: number;
}

export interface DecisionGateway {
  propose(input: DecisionInput): Promise<ProposedAction[]>;
}

export interface ExchangeGateway {
  getPositions(): Promise<Position[]>;
  /**
   * Failed or rejected orders resolve to a record with status "failed";
   * this never rejects.
   */
  execute(action: ProposedAction, referencePrice: number): Promise<TradeRecord>;
}

export const baseAssetOf = (symbol: string, quoteAsset = "USDT"): string =>
  symbol.endsWith(quoteAsset) ? symbol.slice(0, -quoteAsset.length) : symbol;
