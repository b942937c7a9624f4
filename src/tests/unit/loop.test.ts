import { StateStore } from '../../state/store';
import { StrategyLoop } from '../../trading/loop';
import type { CycleRunner } from '../../trading/loop';
import { StrategyEngine } from '../../trading/strategy';
import type { CycleOutcome, CyclePhase } from '../../trading/strategy';
import type { DecisionGateway } from '../../trading/gateways';
import type { ProposedAction, RiskPolicy } from '../../trading/types';
import { FakeExchange, FakeForecast, fixedClock, noSleep, position, prediction, T0 } from '../fakes';

const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;

const policy: RiskPolicy = {
  minTradeNotional: 50,
  maxTradeNotional: 500,
  maxTotalExposureRatio: 0.8,
  maxSingleAssetRatio: 0.3,
  stopLossRatio: 0.05,
};

class GatedDecision implements DecisionGateway {
  calls = 0;
  private release: (() => void) | null = null;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = () => resolve();
  });

  open(): void {
    this.release?.();
  }

  async propose(): Promise<ProposedAction[]> {
    this.calls += 1;
    await this.gate;
    return [];
  }
}

class CrashingRunner implements CycleRunner {
  readonly phase: CyclePhase = 'idle';
  runs = 0;

  async runCycle(): Promise<CycleOutcome> {
    this.runs += 1;
    throw new Error('store offline');
  }

  setRunning(): boolean {
    return true;
  }
}

const setup = (options: { runOnStart: boolean; clock?: () => Date; gate?: GatedDecision }) => {
  const clock = options.clock;
  const store = new StateStore({ maxTradeHistory: 10, maxLogHistory: 10, clock });
  const forecast = new FakeForecast({ BTCUSDT: prediction('BTCUSDT', 50000) });
  const decision = options.gate ?? new GatedDecision();
  if (!options.gate) decision.open();
  const engine = new StrategyEngine(
    { store, forecast, decision, exchange: new FakeExchange([position('USDT', 1000, 1)]) },
    {
      symbols: ['BTCUSDT'],
      quoteAsset: 'USDT',
      intervalMs: HOUR,
      policy,
      retry: { attempts: 1, baseDelayMs: 0, factor: 2, timeoutMs: 10 * HOUR },
      clock,
      sleep: noSleep,
    }
  );
  const loop = new StrategyLoop(engine, {
    intervalMs: HOUR,
    runOnStart: options.runOnStart,
    nextRunAt: () => store.read().status.nextRunAt,
    clock,
  });
  return { store, forecast, decision, loop };
};

describe('StrategyLoop', () => {
  test('refuses a manual run while one is in flight and finishes it on stop', async () => {
    const gate = new GatedDecision();
    const { store, loop } = setup({ runOnStart: false, clock: fixedClock(), gate });

    loop.start();
    expect(store.read().status.isRunning).toBe(true);
    expect(store.read().status.nextRunAt).toBe('2024-05-01T13:00:00.000Z');

    expect(loop.requestRun()).toBe(true);
    expect(store.busy).toBe(true);
    expect(loop.phase).toBe('fetching');
    expect(loop.requestRun()).toBe(false);

    gate.open();
    await loop.stop();

    const { status } = store.read();
    expect(status.cycleCount).toBe(1);
    expect(status.isRunning).toBe(false);
    expect(loop.isRunning).toBe(false);
    expect(loop.phase).toBe('idle');
  });
});

describe('StrategyLoop scheduling', () => {
  beforeEach(() => {
    jest.useFakeTimers({ now: new Date(T0), doNotFake: ['nextTick', 'setImmediate', 'queueMicrotask'] });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('runs a due cycle and the next one an interval later', async () => {
    const { store, loop } = setup({ runOnStart: true });

    loop.start();
    expect(store.read().status.nextRunAt).toBe(T0);
    await jest.advanceTimersByTimeAsync(0);
    expect(store.read().status.cycleCount).toBe(1);
    expect(store.read().status.nextRunAt).toBe('2024-05-01T13:00:00.000Z');

    await jest.advanceTimersByTimeAsync(HOUR - 1);
    expect(store.read().status.cycleCount).toBe(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(store.read().status.cycleCount).toBe(2);

    await loop.stop();
  });

  test('a tick made early by a manual run reports not due and waits for the new time', async () => {
    const { store, forecast, loop } = setup({ runOnStart: false });

    loop.start();
    await jest.advanceTimersByTimeAsync(30 * MINUTE);
    expect(loop.requestRun()).toBe(true);
    await jest.advanceTimersByTimeAsync(0);
    expect(store.read().status.cycleCount).toBe(1);
    expect(store.read().status.nextRunAt).toBe('2024-05-01T13:30:00.000Z');

    // The 13:00 tick finds nothing due.
    await jest.advanceTimersByTimeAsync(30 * MINUTE);
    expect(store.read().status.cycleCount).toBe(1);
    expect(forecast.calls).toHaveLength(1);

    await jest.advanceTimersByTimeAsync(30 * MINUTE - 1);
    expect(store.read().status.cycleCount).toBe(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(store.read().status.cycleCount).toBe(2);

    await loop.stop();
  });

  test.each([
    ['an hourly', HOUR, 5 * MINUTE],
    ['a one-minute', MINUTE, MINUTE],
  ])('retries %s loop after a crashed cycle on the floor', async (_label, intervalMs, floorMs) => {
    const runner = new CrashingRunner();
    const loop = new StrategyLoop(runner, { intervalMs, runOnStart: true, nextRunAt: () => T0 });

    loop.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(runner.runs).toBe(1);

    await jest.advanceTimersByTimeAsync(floorMs - 1);
    expect(runner.runs).toBe(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(runner.runs).toBe(2);

    await loop.stop();
  });

  test('a tick that lands on a manual cycle is skipped, not queued', async () => {
    const gate = new GatedDecision();
    const { store, loop } = setup({ runOnStart: false, gate });

    loop.start();
    expect(loop.requestRun()).toBe(true);
    await jest.advanceTimersByTimeAsync(HOUR);
    expect(gate.calls).toBe(1);
    expect(store.read().status.cycleCount).toBe(0);

    gate.open();
    await jest.advanceTimersByTimeAsync(0);
    expect(store.read().status.cycleCount).toBe(1);
    expect(gate.calls).toBe(1);

    await jest.advanceTimersByTimeAsync(5 * MINUTE - 1);
    expect(gate.calls).toBe(1);
    await jest.advanceTimersByTimeAsync(1);
    expect(gate.calls).toBe(2);
    expect(store.read().status.cycleCount).toBe(2);

    await loop.stop();
  });
});
