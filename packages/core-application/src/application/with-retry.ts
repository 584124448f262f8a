import type { RetryContext, RetryPolicy, Sleeper } from "../ports/retry-policy";

export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  const jitter = exp * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(exp + jitter));
}

/**
 * Runs `fn` until it resolves, the policy refuses the error, or
 * `maxAttempts` is reached. The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (ctx: RetryContext) => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleeper
): Promise<T> {
  const ctx: RetryContext = { attempt: 0, startedAt: Date.now() };

  for (;;) {
    ctx.attempt += 1;
    try {
      return await fn(ctx);
    } catch (err) {
      ctx.lastError = err;
      if (ctx.attempt >= policy.maxAttempts || !policy.shouldRetry(err)) {
        throw err;
      }
      await sleep(computeBackoffDelay(policy, ctx.attempt));
    }
  }
}
