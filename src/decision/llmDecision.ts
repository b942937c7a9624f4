import axios from "axios";
import type { AxiosInstance } from "axios";
import { GatewayError } from "../trading/errors";
import type { DecisionGateway, DecisionInput } from "../trading/gateways";
import type { ActionSide, PredictionMap, ProposedAction } from "../trading/types";
import { createLogger, describeError } from "../logger";
import { buildUserMessage, PORTFOLIO_TRADER_SYSTEM_PROMPT } from "./prompt";

const logger = createLogger("LLM");

const OPENROUTER_URL = "https://openrouter.ai/api/v1/chat/completions";

const SIDES: Record<string, ActionSide> = { BUY: "buy", SELL: "sell", HOLD: "hold" };

export interface LlmDecisionOptions {
  apiKey: string;
  model: string;
  siteUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Pulls the JSON object out of a reply that may wrap it in prose or fences. */
export const extractJsonBlock = (raw: string): string => {
  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new GatewayError("decision", "no JSON object in model response.");
  }
  return raw.slice(start, end + 1);
};

/**
 * Turns the model's reply into proposals. Entries for symbols without a
 * forecast are dropped; USDT sizes become base quantities at the
 * forecast's current price.
 */
export const parseDecision = (raw: string, predictions: PredictionMap): ProposedAction[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonBlock(raw));
  } catch (error) {
    if (error instanceof GatewayError) throw error;
    throw new GatewayError("decision", `model response is not valid JSON: ${describeError(error)}`);
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.trading_actions)) {
    throw new GatewayError("decision", "model response has no trading_actions array.");
  }

  const actions: ProposedAction[] = [];
  for (const entry of parsed.trading_actions) {
    if (!isRecord(entry) || typeof entry.symbol !== "string" || typeof entry.action !== "string") {
      throw new GatewayError("decision", "trading action is missing symbol or action.");
    }
    const symbol = entry.symbol.toUpperCase();
    const side = SIDES[entry.action.toUpperCase()];
    if (side === undefined) {
      throw new GatewayError("decision", `unknown action "${entry.action}" for ${symbol}.`);
    }
    const prediction = predictions[symbol];
    if (!prediction) {
      logger.warn(`Ignoring action for ${symbol}: no forecast this cycle.`);
      continue;
    }

    const quantityUsdt = Number(entry.quantity_usdt ?? 0);
    const rawConfidence = Number(entry.confidence ?? 0);
    if (!Number.isFinite(quantityUsdt) || !Number.isFinite(rawConfidence)) {
      throw new GatewayError("decision", `non-numeric size or confidence for ${symbol}.`);
    }
    // Some models answer in percent.
    const confidence = rawConfidence > 1 ? rawConfidence / 100 : rawConfidence;

    actions.push({
      symbol,
      side,
      quantity: side === "hold" || prediction.currentPrice <= 0 ? 0 : quantityUsdt / prediction.currentPrice,
      rationale: typeof entry.reasoning === "string" ? entry.reasoning : "",
      confidence,
    });
  }

  if (typeof parsed.market_analysis === "string" && parsed.market_analysis) {
    logger.info(`Market analysis: ${parsed.market_analysis}`);
  }
  return actions;
};

export class LlmDecisionGateway implements DecisionGateway {
  private readonly http: AxiosInstance;

  constructor(private readonly options: LlmDecisionOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 60_000 });
  }

  async propose(input: DecisionInput): Promise<ProposedAction[]> {
    const messages = [
      { role: "system", content: PORTFOLIO_TRADER_SYSTEM_PROMPT },
      { role: "user", content: buildUserMessage(input) },
    ];

    let rawText: unknown;
    try {
      const response = await this.http.post<unknown>(
        OPENROUTER_URL,
        { model: this.options.model, messages },
        {
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            "Content-Type": "application/json",
            "HTTP-Referer": this.options.siteUrl ?? "http://localhost",
            "X-Title": "Strategy Desk",
          },
        }
      );
      const data = response.data;
      const choice = isRecord(data) && Array.isArray(data.choices) ? data.choices[0] : undefined;
      rawText = isRecord(choice) && isRecord(choice.message) ? choice.message.content : undefined;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new GatewayError("decision", `OpenRouter request failed${status ? ` (HTTP ${status})` : ""}: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (typeof rawText !== "string" || !rawText.trim()) {
      throw new GatewayError("decision", "No decision text received from OpenRouter.");
    }
    return parseDecision(rawText.trim(), input.predictions);
  }
}
