import { createLogger, describeError } from "../logger";
import type { CycleOutcome, CyclePhase, CycleTrigger, StrategyEngine } from "./strategy";

const logger = createLogger("Loop");

// Floor between ticks when the store's due time did not move forward.
const RETRY_FLOOR_MS = 5 * 60 * 1000;

export type CycleRunner = Pick<StrategyEngine, "runCycle" | "setRunning" | "phase">;

export interface LoopOptions {
  intervalMs: number;
  runOnStart: boolean;
  /** Reads the store's next due time; null means "now". */
  nextRunAt: () => string | null;
  clock?: () => Date;
}

/**
 * Runs the strategy on a fixed period plus on demand. One worker: a tick
 * that finds a cycle in flight is skipped, never queued.
 */
export class StrategyLoop {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleOutcome> | null = null;
  private running = false;
  private readonly clock: () => Date;

  constructor(
    private readonly engine: CycleRunner,
    private readonly options: LoopOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  get phase(): CyclePhase {
    return this.engine.phase;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    const firstRun = this.options.runOnStart
      ? this.clock()
      : new Date(this.clock().getTime() + this.options.intervalMs);
    this.engine.setRunning(true, firstRun);
    logger.info(`Started; first cycle at ${firstRun.toISOString()}`);
    this.scheduleNext();
  }

  /** Starts a cycle now. False when one is already in flight. */
  requestRun(): boolean {
    if (this.inFlight) {
      logger.warn("Manual run requested while a cycle is in flight; ignored.");
      return false;
    }
    void this.launch("manual");
    return true;
  }

  /** Lets the in-flight cycle finish, then stops scheduling. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      logger.info("Waiting for the in-flight cycle to finish...");
      await this.inFlight;
    }
    this.engine.setRunning(false);
    logger.info("Stopped.");
  }

  private scheduleNext(minDelayMs = 0): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);

    const nextRunAt = this.options.nextRunAt();
    const untilDue = nextRunAt === null ? 0 : Date.parse(nextRunAt) - this.clock().getTime();
    const delay = Math.max(minDelayMs, untilDue, 0);
    logger.debug(`Next tick in ${(delay / 1000).toFixed(0)}s`);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delay);
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      logger.warn("Tick while a cycle is in flight; skipping.");
      await this.inFlight;
    } else {
      const outcome = await this.launch("scheduled");
      if (outcome.kind === "skipped") logger.debug(`Tick skipped: ${outcome.reason}`);
    }
    this.scheduleNext(Math.min(this.options.intervalMs, RETRY_FLOOR_MS));
  }

  private launch(trigger: CycleTrigger): Promise<CycleOutcome> {
    logger.info(`Running ${trigger} cycle @ ${this.clock().toISOString()}`);
    const run = this.engine
      .runCycle(trigger)
      .catch((error: unknown): CycleOutcome => {
        logger.error("Cycle crashed:", describeError(error));
        return { kind: "failed", cycle: -1, error: describeError(error) };
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = run;
    return run;
  }
}
