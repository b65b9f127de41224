import { RetriableCapabilityError } from "./errors.js";
import type { Logger } from "../log/jobLogger.js";

export type RetryPolicy = {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  // Random offset in [-jitterMs, +jitterMs] added to each wait.
  jitterMs: number;
};

export type RetryDeps = {
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 2000,
  backoffFactor: 2,
  jitterMs: 1000
};

export function sleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms));
}

export function isRetriable(err: unknown): err is RetriableCapabilityError {
  return err instanceof RetriableCapabilityError;
}

export async function withRetry<T>(label: string, fn: () => Promise<T>, policy: RetryPolicy, deps: RetryDeps): Promise<T> {
  const wait = deps.sleep ?? sleep;
  const random = deps.random ?? Math.random;
  let delay = policy.initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetriable(err)) {
        deps.logger.error(`${label}: non-retriable failure, giving up: ${err instanceof Error ? err.message : String(err)}`);
        throw err;
      }

      const budget = Math.min(policy.maxRetries, err.retryLimit ?? policy.maxRetries);
      if (attempt >= budget) {
        deps.logger.error(`${label}: failed after ${attempt} retries: ${err.message}`);
        throw err;
      }

      const jitter = policy.jitterMs ? (random() * 2 - 1) * policy.jitterMs : 0;
      const waitMs = Math.max(0, delay + jitter);
      deps.logger.warn(`${label}: ${err.name} (${err.message}); retry ${attempt + 1}/${budget} in ${Math.round(waitMs)}ms`);
      await wait(waitMs);
      delay *= policy.backoffFactor;
    }
  }
}
