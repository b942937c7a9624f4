import http from "node:http";
import { createLogger, describeError } from "../logger";
import type { StateStore } from "../state/store";
import type { FeedHub, FeedSink } from "./feed";
import type { CyclePhase } from "../trading/strategy";

const logger = createLogger("Web");

export interface RunTrigger {
  requestRun(): boolean;
  readonly phase: CyclePhase;
}

export interface DashboardServerOptions {
  host: string;
  port: number;
}

export type ApiResponse = { status: number; body: unknown };

const MAX_LIMIT = 1000;
const KEEPALIVE_PATH = /^\/api\/stream\/([0-9a-f-]+)\/keepalive$/;

/** Positive integer up to MAX_LIMIT, or the fallback when absent. */
export const parseLimit = (raw: string | null, fallback: number): number | null => {
  if (raw === null || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) return null;
  const limit = Number(raw);
  return limit >= 1 && limit <= MAX_LIMIT ? limit : null;
};

const responseSink = (res: http.ServerResponse): FeedSink => ({
  write: (chunk) => res.write(chunk),
  onDrain: (listener) => {
    res.once("drain", listener);
  },
  close: () => {
    res.end();
  },
});

export class DashboardServer {
  private server: http.Server | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly hub: FeedHub,
    private readonly trigger: RunTrigger,
    private readonly options: DashboardServerOptions
  ) {}

  /** Answers every non-streaming request; the stream is wired in `handle`. */
  route(method: string, rawUrl: string): ApiResponse {
    const url = new URL(rawUrl, "http://localhost");
    const path = url.pathname;

    if (method === "POST") {
      if (path === "/api/run") {
        return this.trigger.requestRun()
          ? { status: 202, body: { started: true } }
          : { status: 409, body: { started: false, error: "A strategy cycle is already in flight" } };
      }
      const keepalive = KEEPALIVE_PATH.exec(path);
      if (keepalive) {
        return this.hub.keepalive(keepalive[1])
          ? { status: 204, body: null }
          : { status: 404, body: { error: "Unknown subscriber" } };
      }
      return { status: 404, body: { error: "Not found" } };
    }

    if (method !== "GET") {
      return { status: 405, body: { error: `Method ${method} not allowed` } };
    }

    const snapshot = this.store.read();
    switch (path) {
      case "/api/status":
        return { status: 200, body: snapshot.status };
      case "/api/positions":
        return { status: 200, body: snapshot.positions };
      case "/api/predictions":
        return { status: 200, body: snapshot.predictions };
      case "/api/performance":
        return { status: 200, body: snapshot.performance };
      case "/api/risk-metrics":
        return { status: 200, body: snapshot.riskMetrics };
      case "/api/snapshot":
        return { status: 200, body: snapshot };
      case "/api/trading-history": {
        const limit = parseLimit(url.searchParams.get("limit"), 50);
        return limit === null
          ? { status: 400, body: { error: `limit must be an integer between 1 and ${MAX_LIMIT}` } }
          : { status: 200, body: this.store.readTrades(limit) };
      }
      case "/api/strategy-logs": {
        const limit = parseLimit(url.searchParams.get("limit"), 100);
        return limit === null
          ? { status: 400, body: { error: `limit must be an integer between 1 and ${MAX_LIMIT}` } }
          : { status: 200, body: this.store.readLogs(limit) };
      }
      case "/health":
        return {
          status: 200,
          body: {
            status: "healthy",
            isRunning: snapshot.status.isRunning,
            cycleCount: snapshot.status.cycleCount,
            phase: this.trigger.phase,
            subscribers: this.hub.size,
          },
        };
      default:
        return { status: 404, body: { error: "Not found" } };
    }
  }

  start(): Promise<void> {
    this.server = http.createServer((req, res) => this.handle(req, res));
    const server = this.server;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.port, this.options.host, () => {
        logger.info(`Dashboard API listening on http://${this.options.host}:${this.options.port}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }

  private handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    const method = req.method ?? "GET";
    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && (req.url ?? "").split("?")[0] === "/api/stream") {
      res.writeHead(200, {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      });
      const id = this.hub.subscribe(responseSink(res));
      res.on("close", () => this.hub.unsubscribe(id));
      return;
    }

    try {
      const { status, body } = this.route(method, req.url ?? "/");
      if (body === null) {
        res.writeHead(status);
        res.end();
        return;
      }
      res.writeHead(status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(body));
    } catch (error) {
      logger.error(`${method} ${req.url ?? ""} failed:`, describeError(error));
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: describeError(error) }));
    }
  }
}
