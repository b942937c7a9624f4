import type { AppConfig } from "./config";
import { RuleDecisionGateway } from "./decision/ruleDecision";
import { LlmDecisionGateway } from "./decision/llmDecision";
import { BinanceClient } from "./exchange/binanceClient";
import { BinanceSpotGateway } from "./exchange/binanceSpot";
import { PaperExchangeGateway } from "./exchange/paperExchange";
import { FileForecastGateway } from "./forecast/predictionReader";
import { KlineForecastGateway } from "./forecast/klineForecast";
import { StateStore } from "./state/store";
import type { InitialState } from "./state/store";
import type { DecisionGateway, ExchangeGateway, ForecastGateway } from "./trading/gateways";
import { StrategyEngine } from "./trading/strategy";
import type { SnapshotPublisher } from "./trading/strategy";

export interface Gateways {
  forecast: ForecastGateway;
  decision: DecisionGateway;
  exchange: ExchangeGateway;
}

export function createGateways(cfg: AppConfig): Gateways {
  const credentials =
    cfg.binance.apiKey && cfg.binance.apiSecret
      ? { apiKey: cfg.binance.apiKey, apiSecret: cfg.binance.apiSecret }
      : null;
  const client = new BinanceClient(cfg.binance.baseUrl, credentials, cfg.loop.gatewayTimeoutMs);

  const forecast =
    cfg.forecast.source === "file"
      ? new FileForecastGateway(cfg.forecast.predictionsFile)
      : new KlineForecastGateway(client);

  const decision =
    cfg.decision.mode === "llm"
      ? new LlmDecisionGateway({
          apiKey: cfg.decision.openRouterApiKey,
          model: cfg.decision.model,
          siteUrl: cfg.decision.siteUrl,
          timeoutMs: cfg.loop.gatewayTimeoutMs,
        })
      : new RuleDecisionGateway({
          quoteAsset: cfg.quoteAsset,
          baseNotional: cfg.risk.maxTradeNotional,
          stopLossRatio: cfg.risk.stopLossRatio,
        });

  const exchange = cfg.simulationMode
    ? new PaperExchangeGateway({
        startingBalance: cfg.paperStartingBalance,
        quoteAsset: cfg.quoteAsset,
        priceSource: { getPrices: () => client.getAllPrices() },
      })
    : new BinanceSpotGateway(client, cfg.quoteAsset);

  return { forecast, decision, exchange };
}

export function createStore(cfg: AppConfig, initial?: InitialState): StateStore {
  return new StateStore(
    {
      maxTradeHistory: cfg.store.maxTradeHistory,
      maxLogHistory: cfg.store.maxLogHistory,
      quoteAsset: cfg.quoteAsset,
      simulationMode: cfg.simulationMode,
    },
    initial
  );
}

export function createEngine(
  cfg: AppConfig,
  store: StateStore,
  gateways: Gateways,
  publishers: SnapshotPublisher[] = []
): StrategyEngine {
  return new StrategyEngine(
    { store, ...gateways, publishers },
    {
      symbols: cfg.symbols,
      quoteAsset: cfg.quoteAsset,
      intervalMs: cfg.loop.intervalMs,
      policy: cfg.risk,
      retry: {
        attempts: cfg.loop.retryAttempts,
        baseDelayMs: cfg.loop.retryBaseDelayMs,
        factor: 2,
        timeoutMs: cfg.loop.gatewayTimeoutMs,
      },
    }
  );
}
