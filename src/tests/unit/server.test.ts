import { FeedHub } from '../../server/feed';
import { DashboardServer, parseLimit } from '../../server/server';
import { StateStore } from '../../state/store';
import type { TradeRecord } from '../../trading/types';
import { MemorySink, T0 } from '../fakes';

const trade = (n: number): TradeRecord => ({
  timestamp: T0,
  symbol: 'ETHUSDT',
  side: 'sell',
  quantity: n,
  price: 2000,
  notional: n * 2000,
  status: 'success',
  reason: 'test',
  orderId: `o-${n}`,
});

const setup = (runAccepted = true) => {
  const store = new StateStore({ maxTradeHistory: 10, maxLogHistory: 10 });
  const begun = store.beginCycle();
  if (!begun.ok) throw new Error('store unexpectedly busy');
  store.commit(begun.token, {
    status: { cycleCount: 3 },
    trades: [trade(1), trade(2), trade(3)],
    logs: [{ timestamp: T0, level: 'info', message: 'hello' }],
  });
  store.endCycle(begun.token);

  const hub = new FeedHub({ queueSize: 4, keepaliveTimeoutMs: 60000, pingIntervalMs: 15000, pollIntervalMs: 30000 });
  let runs = 0;
  const server = new DashboardServer(
    store,
    hub,
    { requestRun: () => { runs += 1; return runAccepted; }, phase: 'idle' },
    { host: '127.0.0.1', port: 0 }
  );
  return { store, hub, server, runs: () => runs };
};

describe('parseLimit', () => {
  test('uses the fallback when absent', () => {
    expect(parseLimit(null, 50)).toBe(50);
    expect(parseLimit('', 100)).toBe(100);
  });

  test('accepts positive integers up to 1000', () => {
    expect(parseLimit('1', 50)).toBe(1);
    expect(parseLimit('1000', 50)).toBe(1000);
  });

  test('rejects anything else', () => {
    expect(parseLimit('0', 50)).toBeNull();
    expect(parseLimit('-5', 50)).toBeNull();
    expect(parseLimit('2.5', 50)).toBeNull();
    expect(parseLimit('abc', 50)).toBeNull();
    expect(parseLimit('1001', 50)).toBeNull();
  });
});

describe('DashboardServer.route', () => {
  test('serves the pieces of the current snapshot', () => {
    const { store, server } = setup();
    const snapshot = store.read();

    expect(server.route('GET', '/api/status')).toEqual({ status: 200, body: snapshot.status });
    expect(server.route('GET', '/api/snapshot').body).toBe(snapshot);
    expect(server.route('GET', '/api/performance').body).toBe(snapshot.performance);
    expect(server.route('GET', '/api/risk-metrics').body).toBe(snapshot.riskMetrics);
    expect(server.route('GET', '/api/positions').body).toBe(snapshot.positions);
    expect(server.route('GET', '/api/predictions').body).toBe(snapshot.predictions);
  });

  test('limits trade history to the newest entries', () => {
    const { server } = setup();
    const response = server.route('GET', '/api/trading-history?limit=2');

    expect(response.status).toBe(200);
    expect(response.body).toEqual([trade(2), trade(3)]);
  });

  test('returns 400 for an invalid limit', () => {
    const { server } = setup();
    expect(server.route('GET', '/api/strategy-logs?limit=zero').status).toBe(400);
    expect(server.route('GET', '/api/trading-history?limit=0').status).toBe(400);
  });

  test('returns 404 for unknown paths and 405 for other methods', () => {
    const { server } = setup();
    expect(server.route('GET', '/api/nothing').status).toBe(404);
    expect(server.route('DELETE', '/api/status').status).toBe(405);
  });

  test('reports health with the cycle count', () => {
    const { server } = setup();
    expect(server.route('GET', '/health')).toEqual({
      status: 200,
      body: { status: 'healthy', isRunning: false, cycleCount: 3, phase: 'idle', subscribers: 0 },
    });
  });

  test('starts a run on request and reports a busy loop with 409', () => {
    const accepted = setup(true);
    expect(accepted.server.route('POST', '/api/run').status).toBe(202);
    expect(accepted.runs()).toBe(1);

    const busy = setup(false);
    expect(busy.server.route('POST', '/api/run').status).toBe(409);
  });

  test('acknowledges keepalives only for known subscribers', () => {
    const { hub, server } = setup();
    const id = hub.subscribe(new MemorySink());

    expect(server.route('POST', `/api/stream/${id}/keepalive`).status).toBe(204);
    expect(server.route('POST', '/api/stream/0000-dead/keepalive').status).toBe(404);
    hub.stop();
  });
});
