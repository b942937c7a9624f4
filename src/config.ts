import "dotenv/config";
import type { RiskPolicy } from "./trading/types";

export type ForecastSource = "klines" | "file";
export type DecisionMode = "llm" | "rules";

export interface AppConfig {
  symbols: string[];
  quoteAsset: string;
  risk: RiskPolicy;
  loop: {
    intervalMs: number;
    runOnStart: boolean;
    gatewayTimeoutMs: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };
  store: {
    maxTradeHistory: number;
    maxLogHistory: number;
    stateFile: string | null;
  };
  server: {
    host: string;
    port: number;
    feedQueueSize: number;
    keepaliveTimeoutMs: number;
    pingIntervalMs: number;
    pollIntervalMs: number;
  };
  simulationMode: boolean;
  paperStartingBalance: number;
  forecast: {
    source: ForecastSource;
    predictionsFile: string;
  };
  decision: {
    mode: DecisionMode;
    openRouterApiKey: string;
    model: string;
    siteUrl: string;
  };
  binance: {
    apiKey: string;
    apiSecret: string;
    baseUrl: string;
  };
}

const env = (key: string): string | undefined => {
  const value = process.env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
};

const parseEnvNumber = (
  key: string,
  defaultValue: number,
  min = -Infinity,
  max = Infinity
): number => {
  const raw = env(key);
  if (raw === undefined) return defaultValue;
  const num = Number(raw);
  if (!Number.isFinite(num)) {
    console.error(`Invalid ${key}="${raw}" - must be a number. Using default: ${defaultValue}`);
    return defaultValue;
  }
  if (num < min || num > max) {
    console.error(`Invalid ${key}=${num} - must be between ${min} and ${max}. Using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
};

const parseEnvBool = (key: string, defaultValue: boolean): boolean => {
  const raw = env(key);
  if (raw === undefined) return defaultValue;
  return raw.toLowerCase() === "true" || raw === "1";
};

const openRouterApiKey = env("OPENROUTER_API_KEY") ?? "";

export const config: AppConfig = {
  symbols: (env("SYMBOLS") ?? "BNBUSDT,ETHUSDT,BTCUSDT,SOLUSDT,DOGEUSDT,ADAUSDT")
    .split(",")
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean),
  quoteAsset: (env("QUOTE_ASSET") ?? "USDT").toUpperCase(),

  risk: {
    minTradeNotional: parseEnvNumber("MIN_TRADE_AMOUNT", 50, 0),
    maxTradeNotional: parseEnvNumber("MAX_SINGLE_TRADE", 500, 0),
    maxTotalExposureRatio: parseEnvNumber("MAX_TOTAL_EXPOSURE", 0.8, 0, 1),
    maxSingleAssetRatio: parseEnvNumber("MAX_SINGLE_POSITION", 0.3, 0, 1),
    stopLossRatio: parseEnvNumber("STOP_LOSS_PERCENTAGE", 0.05, 0, 1),
  },

  loop: {
    intervalMs: parseEnvNumber("STRATEGY_INTERVAL_MINUTES", 60, 1, 24 * 60) * 60 * 1000,
    runOnStart: parseEnvBool("RUN_ON_START", true),
    gatewayTimeoutMs: parseEnvNumber("GATEWAY_TIMEOUT_MS", 30_000, 1000),
    retryAttempts: parseEnvNumber("RETRY_ATTEMPTS", 3, 1, 10),
    retryBaseDelayMs: parseEnvNumber("RETRY_BASE_DELAY_MS", 1000, 0),
  },

  store: {
    maxTradeHistory: parseEnvNumber("MAX_TRADE_HISTORY", 1000, 1),
    maxLogHistory: parseEnvNumber("MAX_LOG_HISTORY", 1000, 1),
    stateFile: env("STATE_FILE") ?? null,
  },

  server: {
    host: env("WEB_HOST") ?? "0.0.0.0",
    port: parseEnvNumber("WEB_PORT", 8000, 1, 65535),
    feedQueueSize: parseEnvNumber("FEED_QUEUE_SIZE", 16, 1),
    keepaliveTimeoutMs: parseEnvNumber("FEED_KEEPALIVE_TIMEOUT_MS", 60_000, 1000),
    pingIntervalMs: parseEnvNumber("FEED_PING_INTERVAL_MS", 15_000, 1000),
    pollIntervalMs: parseEnvNumber("POLL_INTERVAL_MS", 30_000, 1000),
  },

  simulationMode: parseEnvBool("SIMULATION_MODE", true),
  paperStartingBalance: parseEnvNumber("PAPER_STARTING_BALANCE", 10_000, 0),

  forecast: {
    source: env("FORECAST_SOURCE") === "file" ? "file" : "klines",
    predictionsFile: env("PREDICTIONS_FILE") ?? "public/predictions.json",
  },

  decision: {
    mode: (env("DECISION_MODE") ?? (openRouterApiKey ? "llm" : "rules")) === "llm" ? "llm" : "rules",
    openRouterApiKey,
    model: env("OPENROUTER_MODEL") ?? "openai/gpt-4.1-mini",
    siteUrl: env("OPENROUTER_SITE_URL") ?? "http://localhost",
  },

  binance: {
    apiKey: env("BINANCE_API_KEY") ?? "",
    apiSecret: env("BINANCE_API_SECRET") ?? "",
    baseUrl: env("BINANCE_BASE_URL") ?? "https://api.binance.com",
  },
};

export function validateConfig(cfg: AppConfig = config): string[] {
  const errors: string[] = [];

  if (cfg.symbols.length === 0) {
    errors.push("At least one symbol must be specified in SYMBOLS");
  }
  if (cfg.risk.minTradeNotional > cfg.risk.maxTradeNotional) {
    errors.push("MIN_TRADE_AMOUNT must not exceed MAX_SINGLE_TRADE");
  }
  if (cfg.risk.maxTotalExposureRatio <= 0 || cfg.risk.maxSingleAssetRatio <= 0) {
    errors.push("MAX_TOTAL_EXPOSURE and MAX_SINGLE_POSITION must be greater than 0");
  }
  if (cfg.decision.mode === "llm" && !cfg.decision.openRouterApiKey) {
    errors.push("DECISION_MODE=llm requires OPENROUTER_API_KEY");
  }
  if (!cfg.simulationMode && (!cfg.binance.apiKey || !cfg.binance.apiSecret)) {
    errors.push("SIMULATION_MODE=false requires BINANCE_API_KEY and BINANCE_API_SECRET");
  }

  return errors;
}

const mask = (secret: string): string => (secret ? `${secret.slice(0, 6)}...` : "not set");

export function describeConfig(cfg: AppConfig = config): string[] {
  return [
    `Simulation mode: ${cfg.simulationMode}`,
    `Symbols: ${cfg.symbols.join(", ")}`,
    `Forecast source: ${cfg.forecast.source}`,
    `Decision mode: ${cfg.decision.mode} (${cfg.decision.model})`,
    `Interval: ${(cfg.loop.intervalMs / 60_000).toFixed(0)} minutes`,
    `Trade size: $${cfg.risk.minTradeNotional} - $${cfg.risk.maxTradeNotional}`,
    `Max total exposure: ${(cfg.risk.maxTotalExposureRatio * 100).toFixed(0)}%`,
    `Max single position: ${(cfg.risk.maxSingleAssetRatio * 100).toFixed(0)}%`,
    `Stop loss: ${(cfg.risk.stopLossRatio * 100).toFixed(1)}%`,
    `Binance API key: ${mask(cfg.binance.apiKey)}`,
    `OpenRouter API key: ${mask(cfg.decision.openRouterApiKey)}`,
    `Dashboard: http://${cfg.server.host}:${cfg.server.port}`,
  ];
}
