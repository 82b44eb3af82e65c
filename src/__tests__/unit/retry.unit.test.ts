/**
 * Unit Tests: Bounded Retry
 */
import type { RetryPolicy } from '@core/config';
import { backoffDelay, retry } from '@shared/retry';

const instant: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, multiplier: 2, maxDelayMs: 0 };

describe('backoffDelay', () => {
  it('should grow exponentially up to the cap', () => {
    const policy: RetryPolicy = { maxAttempts: 10, baseDelayMs: 100, multiplier: 2, maxDelayMs: 1000 };

    expect(backoffDelay(policy, 1)).toBe(100);
    expect(backoffDelay(policy, 3)).toBe(400);
    expect(backoffDelay(policy, 5)).toBe(1000);
  });
});

describe('retry', () => {
  it('should return the first successful result', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');
    const onRetry = jest.fn();

    await expect(retry(fn, instant, { shouldRetry: () => true, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([ctx]) => ctx.attempt)).toEqual([1, 2]);
  });

  it('should rethrow a non-retryable error after one attempt', async () => {
    const error = new Error('fatal');
    const fn = jest.fn<Promise<string>, []>().mockRejectedValue(error);
    const onGiveUp = jest.fn();

    await expect(retry(fn, instant, { shouldRetry: () => false, onGiveUp })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onGiveUp).toHaveBeenCalledWith({ attempt: 1, maxAttempts: 3, error });
  });

  it('should rethrow the last error once attempts run out', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('one'))
      .mockRejectedValueOnce(new Error('two'))
      .mockRejectedValueOnce(new Error('three'));

    await expect(retry(fn, instant, { shouldRetry: () => true })).rejects.toThrow('three');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should cap a requested delay at maxDelayMs', async () => {
    const policy: RetryPolicy = { maxAttempts: 2, baseDelayMs: 0, multiplier: 2, maxDelayMs: 5 };
    const fn = jest.fn<Promise<string>, []>().mockRejectedValueOnce(new Error('429')).mockResolvedValue('ok');
    const onRetry = jest.fn();

    await retry(fn, policy, {
      shouldRetry: () => ({ retry: true, delayMs: 60_000 }),
      onRetry,
      randomFn: () => 0,
    });

    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, delayMs: 5 }));
  });

  it('should add jitter proportional to the backoff', async () => {
    const policy: RetryPolicy = { maxAttempts: 2, baseDelayMs: 10, multiplier: 2, maxDelayMs: 100 };
    const fn = jest.fn<Promise<string>, []>().mockRejectedValueOnce(new Error('503')).mockResolvedValue('ok');
    const onRetry = jest.fn();

    await retry(fn, policy, { shouldRetry: () => true, onRetry, randomFn: () => 1, jitterRatio: 0.5 });

    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ delayMs: 15 }));
  });
});
