import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../../src/retry.js';

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const operation = vi.fn((attempt: number) => Promise.resolve(attempt * 10));

    expect(await withRetry(operation, { maxRetries: 3, retryDelayMs: 1 })).toBe(10);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should back off exponentially between attempts', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    const result = await withRetry(
      () => {
        calls++;
        return calls < 3 ? Promise.reject(new Error(`failure ${String(calls)}`)) : Promise.resolve('done');
      },
      { maxRetries: 3, retryDelayMs: 5, onRetry },
    );

    expect(result).toBe('done');
    expect(onRetry.mock.calls.map(([, attempt, delayMs]: unknown[]) => [attempt, delayMs])).toEqual([
      [1, 5],
      [2, 10],
    ]);
  });

  it('should give up after maxRetries retries', async () => {
    const operation = vi.fn(() => Promise.reject(new Error('still down')));

    await expect(withRetry(operation, { maxRetries: 2, retryDelayMs: 1 })).rejects.toThrow('still down');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry errors that are not retryable', async () => {
    const operation = vi.fn(() => Promise.reject(new Error('bad request')));

    await expect(
      withRetry(operation, { maxRetries: 5, retryDelayMs: 1, isRetryable: () => false }),
    ).rejects.toThrow('bad request');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
