/**
 * Bounded Retry with Exponential Backoff
 * Layer: Shared
 *
 * Runs `fn` up to `policy.maxAttempts` times. The delay before attempt n+1 is
 * `baseDelayMs * multiplier^(n-1)`, capped at `maxDelayMs`, plus a small
 * jitter. `shouldRetry` decides per error and may ask for a specific delay
 * (a 429 with Retry-After). The last error is rethrown unchanged so callers
 * can classify it.
 */
import type { RetryPolicy } from '@core/config';

export type RetryDecision = boolean | { retry: boolean; delayMs?: number };

export interface RetryOptions {
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1));
}

export async function retry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const { shouldRetry, onRetry, onGiveUp, randomFn = Math.random, jitterRatio = 0.2 } = options;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === 'boolean' ? { retry: decision } : decision;
      if (!normalized.retry || attempt >= maxAttempts) {
        onGiveUp?.({ attempt, maxAttempts, error: err });
        throw err;
      }

      const requested = normalized.delayMs;
      const backoff =
        typeof requested === 'number' && Number.isFinite(requested) && requested >= 0
          ? Math.min(policy.maxDelayMs, requested)
          : backoffDelay(policy, attempt);
      const ratio = Math.min(1, Math.max(0, jitterRatio));
      const random = Math.min(1, Math.max(0, randomFn()));
      const delayMs = backoff + Math.floor(backoff * ratio * random);

      onRetry?.({ attempt, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}
