import crypto from 'crypto';
import axios, { AxiosError } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { BinanceClient, formatQuantity } from '../../exchange/binanceClient';
import { averageEntryPrice, BinanceSpotGateway } from '../../exchange/binanceSpot';
import { PaperExchangeGateway } from '../../exchange/paperExchange';
import { GatewayError } from '../../trading/errors';
import { action, fixedClock } from '../fakes';

type Route = (config: InternalAxiosRequestConfig) => unknown;

const fakeBinance = (routes: Record<string, Route>) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      const path = (config.url ?? '').split('?')[0];
      const route = routes[`${config.method?.toUpperCase() ?? 'GET'} ${path}`];
      if (!route) throw new Error(`unexpected request ${path}`);
      return { data: route(config), status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  const client = new BinanceClient('https://binance.test', { apiKey: 'test-key', apiSecret: 'test-secret' }, 1000, http);
  return { client, requests };
};

describe('formatQuantity', () => {
  test('rounds down to the lot step', () => {
    expect(formatQuantity(0.12345678, 0.001)).toBe('0.123');
    expect(formatQuantity(1.9999, 0.01)).toBe('1.99');
    expect(formatQuantity(15.7, 1)).toBe('15');
  });

  test('keeps exact multiples', () => {
    expect(formatQuantity(0.3, 0.1)).toBe('0.3');
  });

  test('returns zero below one step', () => {
    expect(formatQuantity(0.0004, 0.001)).toBe('0.000');
  });
});

describe('averageEntryPrice', () => {
  test('averages buys and releases cost at the average on sells', () => {
    expect(
      averageEntryPrice([
        { time: 1, price: 100, qty: 1, isBuyer: true },
        { time: 2, price: 200, qty: 1, isBuyer: true },
        { time: 3, price: 300, qty: 1, isBuyer: false },
      ])
    ).toBeCloseTo(150, 9);
  });

  test('restarts after the holding was closed out', () => {
    expect(
      averageEntryPrice([
        { time: 3, price: 120, qty: 2, isBuyer: true },
        { time: 2, price: 90, qty: 1, isBuyer: false },
        { time: 1, price: 80, qty: 1, isBuyer: true },
      ])
    ).toBe(120);
  });

  test('is null when nothing is held', () => {
    expect(averageEntryPrice([])).toBeNull();
  });
});

describe('BinanceClient', () => {
  test('signs account requests with HMAC-SHA256 and sends the key', async () => {
    const { client, requests } = fakeBinance({
      'GET /api/v3/account': () => ({ balances: [{ asset: 'USDT', free: '10.5', locked: '0' }, { asset: 'XRP', free: '0', locked: '0' }] }),
    });

    await expect(client.getBalances()).resolves.toEqual([{ asset: 'USDT', free: 10.5, locked: 0 }]);

    const url = requests[0].url ?? '';
    const [unsigned, signature] = url.slice(url.indexOf('?') + 1).split('&signature=');
    expect(unsigned).toMatch(/^recvWindow=5000&timestamp=\d+$/);
    expect(signature).toBe(crypto.createHmac('sha256', 'test-secret').update(unsigned).digest('hex'));
    expect(requests[0].headers['X-MBX-APIKEY']).toBe('test-key');
  });

  test('parses klines and rejects malformed rows', async () => {
    const { client } = fakeBinance({
      'GET /api/v3/klines': (config) =>
        (config.url ?? '').includes('BADUSDT') ? [[1, '2']] : [[1, '100', '110', '90', '105', '12.5', 2]],
    });

    await expect(client.getKlines('BTCUSDT')).resolves.toEqual([
      { openTime: 1, open: 100, high: 110, low: 90, close: 105, volume: 12.5 },
    ]);
    await expect(client.getKlines('BADUSDT')).rejects.toBeInstanceOf(GatewayError);
  });
});

describe('BinanceSpotGateway', () => {
  const routes: Record<string, Route> = {
    'GET /api/v3/account': () => ({
      balances: [
        { asset: 'USDT', free: '1000', locked: '0' },
        { asset: 'BTC', free: '0.01', locked: '0.01' },
        { asset: 'LDBTC', free: '1', locked: '0' },
      ],
    }),
    'GET /api/v3/ticker/price': () => [{ symbol: 'BTCUSDT', price: '50000' }],
    'GET /api/v3/myTrades': () => [{ time: 1, price: '40000', qty: '0.02', isBuyer: true }],
    'GET /api/v3/exchangeInfo': () => ({
      symbols: [{ filters: [{ filterType: 'LOT_SIZE', stepSize: '0.00100000' }] }],
    }),
  };

  test('values balances at market and skips assets without a price', async () => {
    const { client } = fakeBinance(routes);
    const positions = await new BinanceSpotGateway(client).getPositions();

    expect(positions).toEqual([
      { asset: 'USDT', freeAmount: 1000, lockedAmount: 0, lastPrice: 1, usdValue: 1000, entryPrice: null },
      { asset: 'BTC', freeAmount: 0.01, lockedAmount: 0.01, lastPrice: 50000, usdValue: 1000, entryPrice: 40000 },
    ]);
  });

  test('places a market order rounded to the lot step', async () => {
    const { client, requests } = fakeBinance({
      ...routes,
      'POST /api/v3/order': () => ({
        orderId: 77,
        status: 'FILLED',
        executedQty: '0.004',
        cummulativeQuoteQty: '200.4',
        fills: [{ price: '50100', qty: '0.004' }],
      }),
    });
    const gateway = new BinanceSpotGateway(client, 'USDT', fixedClock());

    const record = await gateway.execute(action('BTCUSDT', 'buy', 0.0041234), 50000);

    const orderUrl = requests.find((r) => r.method === 'post')?.url ?? '';
    expect(orderUrl).toContain('quantity=0.004&');
    expect(orderUrl).toContain('type=MARKET');
    expect(record).toMatchObject({ status: 'success', orderId: '77', quantity: 0.004, notional: 200.4 });
    expect(record.price).toBeCloseTo(50100, 6);
  });

  test('turns an exchange rejection into a failed record', async () => {
    const { client } = fakeBinance({
      ...routes,
      'POST /api/v3/order': (config) => {
        throw new AxiosError('Request failed with status code 400', 'ERR_BAD_REQUEST', config, null, {
          data: { code: -2010, msg: 'Account has insufficient balance' },
          status: 400,
          statusText: 'Bad Request',
          headers: {},
          config,
        });
      },
    });

    const record = await new BinanceSpotGateway(client).execute(action('BTCUSDT', 'sell', 1), 50000);

    expect(record.status).toBe('failed');
    expect(record.orderId).toBeNull();
    expect(record.reason).toBe('binance: POST /api/v3/order failed: HTTP 400 (-2010): Account has insufficient balance');
  });

  test('fails a quantity below one lot step without ordering', async () => {
    const { client, requests } = fakeBinance(routes);
    const record = await new BinanceSpotGateway(client).execute(action('BTCUSDT', 'buy', 0.0004), 50000);

    expect(record.status).toBe('failed');
    expect(requests.some((r) => r.method === 'post')).toBe(false);
  });
});

describe('PaperExchangeGateway', () => {
  test('fills buys from the reserve and averages the entry price', async () => {
    const paper = new PaperExchangeGateway({ startingBalance: 10000, clock: fixedClock() });

    const first = await paper.execute(action('BTCUSDT', 'buy', 0.01), 50000);
    const second = await paper.execute(action('BTCUSDT', 'buy', 0.01), 60000);

    expect(first).toMatchObject({ status: 'success', orderId: 'paper-1', notional: 500 });
    expect(second.orderId).toBe('paper-2');

    const positions = await paper.getPositions();
    const btc = positions.find((p) => p.asset === 'BTC');
    const usdt = positions.find((p) => p.asset === 'USDT');
    expect(usdt?.freeAmount).toBeCloseTo(8900, 6);
    expect(btc?.freeAmount).toBeCloseTo(0.02, 12);
    expect(btc?.entryPrice).toBeCloseTo(55000, 6);
    expect(btc?.lastPrice).toBe(60000);
  });

  test('refuses orders it cannot cover', async () => {
    const paper = new PaperExchangeGateway({ startingBalance: 100 });

    const buy = await paper.execute(action('BTCUSDT', 'buy', 0.01), 50000);
    const sell = await paper.execute(action('ETHUSDT', 'sell', 1), 2000);

    expect(buy.status).toBe('failed');
    expect(buy.reason).toBe('insufficient USDT: need 500.00, have 100.00');
    expect(sell.status).toBe('failed');
    expect(sell.reason).toBe('insufficient ETH: need 1, have 0');
  });

  test('a full sell clears the holding', async () => {
    const paper = new PaperExchangeGateway({ startingBalance: 0 });
    paper.deposit('ETH', 1, 2000);

    const sell = await paper.execute(action('ETHUSDT', 'sell', 1), 2100);

    expect(sell.status).toBe('success');
    expect(await paper.getPositions()).toEqual([
      { asset: 'USDT', freeAmount: 2100, lockedAmount: 0, lastPrice: 1, usdValue: 2100, entryPrice: null },
    ]);
  });

  test('marks holdings to the price source', async () => {
    const paper = new PaperExchangeGateway({
      startingBalance: 0,
      priceSource: { getPrices: async () => ({ ETHUSDT: 2500 }) },
    });
    paper.deposit('ETH', 2, 2000);

    const [eth] = await paper.getPositions();
    expect(eth).toEqual({ asset: 'ETH', freeAmount: 2, lockedAmount: 0, lastPrice: 2500, usdValue: 5000, entryPrice: 2000 });
  });

  test('a failing price source rejects with a GatewayError', async () => {
    const paper = new PaperExchangeGateway({
      startingBalance: 10,
      priceSource: { getPrices: async () => { throw new Error('offline'); } },
    });
    await expect(paper.getPositions()).rejects.toBeInstanceOf(GatewayError);
  });
});
