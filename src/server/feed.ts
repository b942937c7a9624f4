import { v4 as uuidv4 } from "uuid";
import { createLogger } from "../logger";
import type { StateSnapshot } from "../state/store";
import type { SnapshotPublisher } from "../trading/strategy";

const logger = createLogger("Feed");

/** Where a subscriber's bytes go; an HTTP response in production. */
export interface FeedSink {
  /** False when the sink is backed up; wait for `onDrain` before writing more. */
  write(chunk: string): boolean;
  onDrain(listener: () => void): void;
  close(): void;
}

export interface FeedHubOptions {
  queueSize: number;
  keepaliveTimeoutMs: number;
  pingIntervalMs: number;
  pollIntervalMs: number;
  /** Current state, sent to each new subscriber right after `hello`. */
  snapshot?: () => StateSnapshot;
  now?: () => number;
}

interface Subscriber {
  id: string;
  sink: FeedSink;
  queue: string[];
  lastSeen: number;
  flushScheduled: boolean;
  awaitingDrain: boolean;
  dropped: number;
}

export const formatEvent = (event: string, payload: unknown): string =>
  `event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`;

const stateUpdate = (snapshot: StateSnapshot): string =>
  formatEvent("state_update", { type: "state_update", data: snapshot });

export const PING_CHUNK = ": ping\n\n";

/**
 * Fans snapshots out to push subscribers. Each subscriber has a bounded
 * queue drained off the publisher's call stack; a full queue loses its
 * oldest pending message. Subscribers that stop sending keepalives are
 * closed by the sweep.
 */
export class FeedHub implements SnapshotPublisher {
  private readonly subscribers = new Map<string, Subscriber>();
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: FeedHubOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.subscribers.size;
  }

  subscribe(sink: FeedSink): string {
    const id = uuidv4();
    const subscriber: Subscriber = {
      id,
      sink,
      queue: [],
      lastSeen: this.now(),
      flushScheduled: false,
      awaitingDrain: false,
      dropped: 0,
    };
    this.subscribers.set(id, subscriber);
    this.enqueue(subscriber, formatEvent("hello", { subscriberId: id, pollIntervalMs: this.options.pollIntervalMs }));
    if (this.options.snapshot) this.enqueue(subscriber, stateUpdate(this.options.snapshot()));
    logger.info(`Subscriber ${id} connected (${this.subscribers.size} active)`);
    return id;
  }

  /** False when the subscriber is unknown, e.g. already swept. */
  keepalive(id: string): boolean {
    const subscriber = this.subscribers.get(id);
    if (!subscriber) return false;
    subscriber.lastSeen = this.now();
    return true;
  }

  unsubscribe(id: string): void {
    const subscriber = this.subscribers.get(id);
    if (!subscriber) return;
    this.subscribers.delete(id);
    if (subscriber.dropped > 0) {
      logger.warn(`Subscriber ${id} lost ${subscriber.dropped} queued update(s)`);
    }
    logger.info(`Subscriber ${id} disconnected (${this.subscribers.size} active)`);
  }

  publish(snapshot: StateSnapshot): void {
    const chunk = stateUpdate(snapshot);
    for (const subscriber of this.subscribers.values()) {
      this.enqueue(subscriber, chunk);
    }
  }

  /** Closes subscribers silent for longer than the keepalive timeout. */
  sweep(): string[] {
    const cutoff = this.now() - this.options.keepaliveTimeoutMs;
    const expired = [...this.subscribers.values()].filter((s) => s.lastSeen < cutoff);
    for (const subscriber of expired) {
      logger.warn(`Subscriber ${subscriber.id} missed its keepalive; closing.`);
      this.unsubscribe(subscriber.id);
      subscriber.sink.close();
    }
    return expired.map((s) => s.id);
  }

  ping(): void {
    for (const subscriber of this.subscribers.values()) {
      if (subscriber.queue.length === 0 && !subscriber.awaitingDrain) {
        subscriber.sink.write(PING_CHUNK);
      }
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep();
      this.ping();
    }, this.options.pingIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    for (const subscriber of [...this.subscribers.values()]) {
      this.unsubscribe(subscriber.id);
      subscriber.sink.close();
    }
  }

  private enqueue(subscriber: Subscriber, chunk: string): void {
    if (subscriber.queue.length >= this.options.queueSize) {
      subscriber.queue.shift();
      subscriber.dropped += 1;
    }
    subscriber.queue.push(chunk);
    if (subscriber.flushScheduled || subscriber.awaitingDrain) return;

    subscriber.flushScheduled = true;
    setImmediate(() => {
      subscriber.flushScheduled = false;
      this.flush(subscriber);
    });
  }

  private flush(subscriber: Subscriber): void {
    if (!this.subscribers.has(subscriber.id)) return;
    while (subscriber.queue.length > 0) {
      const chunk = subscriber.queue.shift();
      if (chunk === undefined) break;
      if (!subscriber.sink.write(chunk)) {
        subscriber.awaitingDrain = true;
        subscriber.sink.onDrain(() => {
          subscriber.awaitingDrain = false;
          this.flush(subscriber);
        });
        return;
      }
    }
  }
}
