import { describe, expect, it, vi } from 'vitest';
import { NonRetryableError, withRetry } from '../retry.js';

describe('withRetry', () => {
  it('returns the first successful attempt', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`attempt ${attempt} failed`);
      return 'ok';
    });
    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once attempts run out', async () => {
    const fn = vi.fn(async (attempt: number): Promise<string> => {
      throw new Error(`attempt ${attempt} failed`);
    });
    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toThrow('attempt 2 failed');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not repeat a NonRetryableError', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new NonRetryableError('binary missing');
    });
    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 0 })).rejects.toThrow('binary missing');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    const fn = async (attempt: number) => {
      if (attempt < 3) throw new Error('flaky');
      return attempt;
    };
    await withRetry(fn, { maxAttempts: 3, baseDelayMs: 0, onRetry });
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });
});
