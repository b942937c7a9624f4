import axios from 'axios';
import type { InternalAxiosRequestConfig } from 'axios';
import { extractJsonBlock, LlmDecisionGateway, parseDecision } from '../../decision/llmDecision';
import { RuleDecisionGateway } from '../../decision/ruleDecision';
import { GatewayError } from '../../trading/errors';
import type { DecisionInput } from '../../trading/gateways';
import { position, prediction } from '../fakes';

const predictions = {
  BTCUSDT: prediction('BTCUSDT', 50000, 0.8),
  ETHUSDT: prediction('ETHUSDT', 2000, 0.3),
  SOLUSDT: prediction('SOLUSDT', 100, 0.5),
};

const REPLY = [
  'Here is my plan:',
  '```json',
  JSON.stringify({
    trading_actions: [
      { symbol: 'btcusdt', action: 'BUY', quantity_usdt: 250, confidence: 0.8, reasoning: 'trend' },
      { symbol: 'XRPUSDT', action: 'SELL', quantity_usdt: 100, confidence: 0.5, reasoning: 'no forecast' },
      { symbol: 'ETHUSDT', action: 'HOLD', quantity_usdt: 0, confidence: 60 },
    ],
    market_analysis: 'mixed',
  }),
  '```',
].join('\n');

describe('parseDecision', () => {
  test('converts USDT sizes to base quantities and drops unknown symbols', () => {
    expect(parseDecision(REPLY, predictions)).toEqual([
      { symbol: 'BTCUSDT', side: 'buy', quantity: 0.005, rationale: 'trend', confidence: 0.8 },
      { symbol: 'ETHUSDT', side: 'hold', quantity: 0, rationale: '', confidence: 0.6 },
    ]);
  });

  test('rejects replies without a JSON object', () => {
    expect(() => extractJsonBlock('I would rather not say.')).toThrow(GatewayError);
  });

  test('rejects malformed JSON and missing actions', () => {
    expect(() => parseDecision('{"trading_actions": [}', predictions)).toThrow('not valid JSON');
    expect(() => parseDecision('{"market_analysis": "calm"}', predictions)).toThrow('no trading_actions');
  });

  test('rejects an unknown action', () => {
    const raw = JSON.stringify({ trading_actions: [{ symbol: 'BTCUSDT', action: 'SHORT', quantity_usdt: 100 }] });
    expect(() => parseDecision(raw, predictions)).toThrow('unknown action "SHORT"');
  });
});

describe('LlmDecisionGateway', () => {
  const input: DecisionInput = { predictions, positions: { USDT: position('USDT', 1000, 1) }, reserve: 1000 };

  test('sends the model, prompt and key, and parses the reply', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async (config) => {
        requests.push(config);
        return {
          data: { choices: [{ message: { content: REPLY } }] },
          status: 200,
          statusText: 'OK',
          headers: {},
          config,
        };
      },
    });
    const gateway = new LlmDecisionGateway({ apiKey: 'test-key', model: 'test-model', http });

    const actions = await gateway.propose(input);

    expect(actions.map((a) => a.side)).toEqual(['buy', 'hold']);
    expect(requests).toHaveLength(1);
    expect(requests[0].headers.Authorization).toBe('Bearer test-key');
    const body: unknown = JSON.parse(String(requests[0].data));
    expect(body).toMatchObject({ model: 'test-model' });
  });

  test('wraps an empty reply in a GatewayError', async () => {
    const http = axios.create({
      adapter: async (config) => ({ data: { choices: [] }, status: 200, statusText: 'OK', headers: {}, config }),
    });
    const gateway = new LlmDecisionGateway({ apiKey: 'test-key', model: 'test-model', http });

    await expect(gateway.propose(input)).rejects.toBeInstanceOf(GatewayError);
  });
});

describe('RuleDecisionGateway', () => {
  const gateway = new RuleDecisionGateway({ quoteAsset: 'USDT', baseNotional: 500, stopLossRatio: 0.05 });

  test('buys on high upside, sells held assets on low upside, holds otherwise', async () => {
    const actions = await gateway.propose({
      predictions,
      positions: { USDT: position('USDT', 10000, 1), ETH: position('ETH', 1, 2000, 1950) },
      reserve: 10000,
    });

    expect(actions.map((a) => [a.symbol, a.side])).toEqual([
      ['BTCUSDT', 'buy'],
      ['ETHUSDT', 'sell'],
      ['SOLUSDT', 'hold'],
    ]);
    expect(actions[0].quantity).toBeCloseTo(300 / 50000, 12);
    expect(actions[0].confidence).toBeCloseTo(0.6, 12);
    expect(actions[1].quantity).toBeCloseTo(0.4, 12);
    expect(actions[2].quantity).toBe(0);
  });

  test('does not sell what it does not hold', async () => {
    const actions = await gateway.propose({ predictions: { ETHUSDT: predictions.ETHUSDT }, positions: {}, reserve: 0 });
    expect(actions[0].side).toBe('hold');
  });

  test('halves buys when volatility is rising', async () => {
    const actions = await gateway.propose({
      predictions: { BTCUSDT: prediction('BTCUSDT', 50000, 0.8, { volatilityAmplification: 2 }) },
      positions: {},
      reserve: 10000,
    });
    expect(actions[0].quantity).toBeCloseTo(150 / 50000, 12);
  });

  test('never plans to spend more than the reserve', async () => {
    const actions = await gateway.propose({ predictions: { BTCUSDT: predictions.BTCUSDT }, positions: {}, reserve: 100 });
    expect(actions[0].quantity).toBeCloseTo(100 / 50000, 12);
  });

  test('exits a holding that fell through its stop loss', async () => {
    const actions = await gateway.propose({
      predictions: { ETHUSDT: prediction('ETHUSDT', 2000, 0.55) },
      positions: { ETH: position('ETH', 1, 2000, 2200) },
      reserve: 0,
    });
    expect(actions).toEqual([
      expect.objectContaining({ symbol: 'ETHUSDT', side: 'sell', quantity: 1, confidence: 1 }),
    ]);
  });
});
