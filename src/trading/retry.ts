import { GatewayError, GatewayTimeout } from "./errors";
import { createLogger, describeError } from "../logger";

const logger = createLogger("Retry");

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  factor: number;
  timeoutMs: number;
}

/** Three attempts, waiting 1s then 2s between them. */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  factor: 2,
  timeoutMs: 30_000,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function withTimeout<T>(work: Promise<T>, timeoutMs: number, gateway: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new GatewayTimeout(gateway, timeoutMs)), timeoutMs);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

export const backoffDelay = (policy: RetryPolicy, failedAttempt: number): number =>
  policy.baseDelayMs * Math.pow(policy.factor, failedAttempt - 1);

/**
 * Runs `fn` under the per-call timeout, retrying on GatewayError only.
 * Any other error is rethrown immediately.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: Sleep = sleep
): Promise<T> {
  let lastError: GatewayError | undefined;

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await withTimeout(fn(), policy.timeoutMs, label);
    } catch (error) {
      if (!(error instanceof GatewayError)) throw error;
      lastError = error;

      if (attempt < policy.attempts) {
        const delay = backoffDelay(policy, attempt);
        logger.warn(
          `${label} failed (attempt ${attempt}/${policy.attempts}): ${describeError(error)}; retrying in ${delay}ms`
        );
        await wait(delay);
      }
    }
  }

  throw lastError ?? new GatewayError(label, "no attempts were made");
}
