import { describe, it, expect, vi } from 'vitest';
import { withRetry } from './with-retry';
import {
  MARKET_DATA_ERROR_CODES,
  MarketDataError,
  RetryStrategy,
} from '../errors';

const INSTANT: RetryStrategy = {
  maxRetries: 2,
  initialDelayMs: 0,
  maxDelayMs: 0,
  backoffMultiplier: 2,
};

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue(42);

    await expect(withRetry(fn, INSTANT)).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry until the call succeeds', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('503'))
      .mockResolvedValue('bars');
    const onRetry = vi.fn();

    await expect(withRetry(fn, INSTANT, onRetry)).resolves.toBe('bars');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it('should rethrow the last error once retries run out', async () => {
    const error = new MarketDataError(
      MARKET_DATA_ERROR_CODES.HTTP_ERROR,
      'Market data HTTP 500',
      'error',
    );
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, INSTANT)).rejects.toBe(error);
    // initial + 2 retries
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should wrap non-Error rejections', async () => {
    const fn = vi.fn().mockRejectedValue('timeout');

    await expect(
      withRetry(fn, { ...INSTANT, maxRetries: 0 }),
    ).rejects.toThrow('timeout');
  });
});
