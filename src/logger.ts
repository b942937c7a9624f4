type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const parseLevel = (raw: string | undefined): Level => {
  const value = (raw ?? "info").toLowerCase();
  return value === "debug" || value === "warn" || value === "error" ? value : "info";
};

const threshold: Level = parseLevel(process.env.LOG_LEVEL);

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const ts = (): string => new Date().toISOString();

export const createLogger = (tag: string): Logger => {
  const emit = (level: Level, args: unknown[]): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    const prefix = `${ts()} [${tag}]`;
    if (level === "error") console.error(prefix, ...args);
    else if (level === "warn") console.warn(prefix, ...args);
    else console.log(prefix, ...args);
  };

  return {
    debug: (...args) => emit("debug", args),
    info: (...args) => emit("info", args),
    warn: (...args) => emit("warn", args),
    error: (...args) => emit("error", args),
  };
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
