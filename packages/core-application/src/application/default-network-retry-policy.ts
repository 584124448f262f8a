import type { RetryPolicy } from "../ports/retry-policy";
import { ConfigError, LocalIoError, httpStatusOf } from "./errors";

export function isRetryableNetworkError(err: unknown): boolean {
  if (err instanceof LocalIoError || err instanceof ConfigError) return false;

  const status = httpStatusOf(err);
  if (status === undefined) return true; // timeout / socket
  if (status === 408 || status === 429) return true;
  return status >= 500;
}

export function defaultNetworkRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 300,
    maxDelayMs: 5000,
    jitterRatio: 0.2,
    shouldRetry: isRetryableNetworkError,
    ...overrides,
  };
}
