import { Readable } from "stream";
import axios from "axios";
import type { AxiosInstance } from "axios";
import { createLogger, describeError } from "../logger";
import type { StateSnapshot } from "../state/store";

const logger = createLogger("FeedClient");

export interface FeedEvent {
  event: string;
  data: string;
}

export interface StreamHandlers {
  onEvent(event: FeedEvent): void;
  onClose(error?: unknown): void;
}

export interface PushConnection {
  close(): void;
}

export interface FeedTransport {
  openStream(handlers: StreamHandlers): Promise<PushConnection>;
  sendKeepalive(subscriberId: string): Promise<void>;
  fetchSnapshot(): Promise<unknown>;
}

export type FeedMode = "idle" | "push" | "poll";

export interface FeedClientOptions {
  onSnapshot(snapshot: StateSnapshot): void;
  onModeChange?(mode: FeedMode): void;
  pollIntervalMs?: number;
  keepaliveIntervalMs?: number;
  reconnectDelayMs?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isStateSnapshot = (value: unknown): value is StateSnapshot =>
  isRecord(value) &&
  typeof value.version === "number" &&
  isRecord(value.status) &&
  isRecord(value.positions) &&
  isRecord(value.predictions) &&
  Array.isArray(value.trades) &&
  Array.isArray(value.logs) &&
  isRecord(value.performance) &&
  isRecord(value.riskMetrics);

/** Incremental text/event-stream parser; comment lines are skipped. */
export class SseParser {
  private buffer = "";

  push(chunk: string): FeedEvent[] {
    this.buffer += chunk.replace(/\r\n/g, "\n");
    const events: FeedEvent[] = [];
    let boundary = this.buffer.indexOf("\n\n");
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      boundary = this.buffer.indexOf("\n\n");

      let event = "message";
      const data: string[] = [];
      for (const line of block.split("\n")) {
        if (line.startsWith(":")) continue;
        if (line.startsWith("event:")) event = line.slice(6).trim();
        else if (line.startsWith("data:")) data.push(line.slice(5).replace(/^ /, ""));
      }
      if (data.length > 0) events.push({ event, data: data.join("\n") });
    }
    return events;
  }
}

export class HttpFeedTransport implements FeedTransport {
  private readonly http: AxiosInstance;

  constructor(baseUrl: string, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: baseUrl, timeout: 10_000 });
  }

  async openStream(handlers: StreamHandlers): Promise<PushConnection> {
    const response = await this.http.get<unknown>("/api/stream", {
      responseType: "stream",
      timeout: 0,
      headers: { Accept: "text/event-stream" },
    });
    const stream = response.data;
    if (!(stream instanceof Readable)) {
      throw new Error("stream response is not readable");
    }

    const parser = new SseParser();
    let closed = false;
    const finish = (error?: unknown): void => {
      if (closed) return;
      closed = true;
      handlers.onClose(error);
    };
    stream.setEncoding("utf-8");
    stream.on("data", (chunk: string) => {
      for (const event of parser.push(chunk)) handlers.onEvent(event);
    });
    stream.on("error", (error) => finish(error));
    stream.on("end", () => finish());
    stream.on("close", () => finish());

    return {
      close: () => {
        closed = true;
        stream.destroy();
      },
    };
  }

  async sendKeepalive(subscriberId: string): Promise<void> {
    await this.http.post(`/api/stream/${subscriberId}/keepalive`);
  }

  async fetchSnapshot(): Promise<unknown> {
    const response = await this.http.get<unknown>("/api/snapshot");
    return response.data;
  }
}

/**
 * Keeps a viewer supplied with snapshots: push while the stream is up,
 * polling `/api/snapshot` while it is not, retrying push in the background.
 */
export class FeedClient {
  private mode: FeedMode = "idle";
  private connection: PushConnection | null = null;
  private subscriberId: string | null = null;
  private pollIntervalMs: number;
  private pollTimer: NodeJS.Timeout | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = true;

  constructor(
    private readonly transport: FeedTransport,
    private readonly options: FeedClientOptions
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 30_000;
  }

  get currentMode(): FeedMode {
    return this.mode;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    void this.connect();
  }

  stop(): void {
    this.stopped = true;
    this.clearTimers();
    this.connection?.close();
    this.connection = null;
    this.subscriberId = null;
    this.setMode("idle");
  }

  private async connect(): Promise<void> {
    if (this.stopped) return;
    try {
      const connection = await this.transport.openStream({
        onEvent: (event) => this.handleEvent(event),
        onClose: (error) => {
          if (this.connection !== connection) return;
          this.connection = null;
          this.fallBack(error ?? new Error("stream closed"));
        },
      });
      if (this.stopped) {
        connection.close();
        return;
      }
      this.connection = connection;
    } catch (error) {
      this.fallBack(error);
    }
  }

  private handleEvent(event: FeedEvent): void {
    let payload: unknown;
    try {
      payload = JSON.parse(event.data);
    } catch (error) {
      logger.warn(`Ignoring malformed ${event.event} event:`, describeError(error));
      return;
    }

    if (event.event === "hello" && isRecord(payload) && typeof payload.subscriberId === "string") {
      this.subscriberId = payload.subscriberId;
      if (typeof payload.pollIntervalMs === "number" && payload.pollIntervalMs > 0) {
        this.pollIntervalMs = payload.pollIntervalMs;
      }
      this.enterPush();
    } else if (event.event === "state_update" && isRecord(payload) && isStateSnapshot(payload.data)) {
      this.options.onSnapshot(payload.data);
    }
  }

  private enterPush(): void {
    this.clearTimers();
    this.setMode("push");
    const interval = this.options.keepaliveIntervalMs ?? Math.max(1000, Math.floor(this.pollIntervalMs / 2));
    this.keepaliveTimer = setInterval(() => {
      void this.sendKeepalive();
    }, interval);
  }

  private async sendKeepalive(): Promise<void> {
    const id = this.subscriberId;
    if (id === null) return;
    try {
      await this.transport.sendKeepalive(id);
    } catch (error) {
      const connection = this.connection;
      this.connection = null;
      connection?.close();
      this.fallBack(error);
    }
  }

  private fallBack(error: unknown): void {
    if (this.stopped) return;
    logger.warn(`Push unavailable, polling every ${this.pollIntervalMs}ms:`, describeError(error));
    this.subscriberId = null;
    this.clearTimers();
    this.setMode("poll");

    void this.poll();
    this.pollTimer = setInterval(() => {
      void this.poll();
    }, this.pollIntervalMs);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.connect();
    }, this.options.reconnectDelayMs ?? this.pollIntervalMs);
  }

  private async poll(): Promise<void> {
    try {
      const snapshot = await this.transport.fetchSnapshot();
      if (this.stopped || this.mode !== "poll") return;
      if (isStateSnapshot(snapshot)) this.options.onSnapshot(snapshot);
      else logger.warn("Snapshot response had an unexpected shape.");
    } catch (error) {
      logger.warn("Snapshot poll failed:", describeError(error));
    }
  }

  private clearTimers(): void {
    for (const timer of [this.pollTimer, this.reconnectTimer]) if (timer) clearTimeout(timer);
    if (this.keepaliveTimer) clearInterval(this.keepaliveTimer);
    this.pollTimer = null;
    this.keepaliveTimer = null;
    this.reconnectTimer = null;
  }

  private setMode(mode: FeedMode): void {
    if (this.mode === mode) return;
    this.mode = mode;
    this.options.onModeChange?.(mode);
  }
}
