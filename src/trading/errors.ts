export class GatewayError extends Error {
  readonly gateway: string;

  constructor(gateway: string, message: string, options?: { cause?: unknown }) {
    super(`${gateway}: ${message}`, options);
    this.name = "GatewayError";
    this.gateway = gateway;
  }
}

export class GatewayTimeout extends GatewayError {
  readonly timeoutMs: number;

  constructor(gateway: string, timeoutMs: number) {
    super(gateway, `timed out after ${timeoutMs}ms`);
    this.name = "GatewayTimeout";
    this.timeoutMs = timeoutMs;
  }
}

export class StoreTokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreTokenError";
  }
}

/** A write would break a store invariant; nothing from that write is applied. */
export class StateInvariantViolation extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "StateInvariantViolation";
    this.field = field;
  }
}
