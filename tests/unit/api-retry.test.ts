/**
 * Unit Tests: Retry Logic
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ApiRequestError,
  DEFAULT_RETRY_CONFIG,
  calculateDelay,
  isRetryableError,
  parseRetryAfter,
  withRetry,
} from '../../src/api/retry.js';
import { ApiLogger } from '../../src/api/logger.js';

const quiet = new ApiLogger({ level: 'error' });
const fast = { baseDelayMs: 1, maxDelayMs: 1, jitterFactor: 0, logger: quiet };

describe('calculateDelay', () => {
  const config = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0 };

  it('should double the delay on each attempt', () => {
    expect(calculateDelay(1, config)).toBe(1000);
    expect(calculateDelay(2, config)).toBe(2000);
    expect(calculateDelay(3, config)).toBe(4000);
  });

  it('should cap the delay', () => {
    expect(calculateDelay(10, config)).toBe(30000);
  });

  it('should prefer Retry-After', () => {
    expect(calculateDelay(1, config, 5)).toBe(5000);
  });
});

describe('isRetryableError', () => {
  it('should retry configured statuses only', () => {
    expect(isRetryableError(new ApiRequestError('busy', 503), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new ApiRequestError('bad', 422), DEFAULT_RETRY_CONFIG)).toBe(false);
  });

  it('should retry network failures', () => {
    expect(isRetryableError(new Error('connect ECONNREFUSED 10.0.0.2:443'), DEFAULT_RETRY_CONFIG)).toBe(true);
  });
});

describe('parseRetryAfter', () => {
  it('should read seconds', () => {
    expect(parseRetryAfter('3')).toBe(3);
  });

  it('should ignore missing values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
  });
});

describe('withRetry', () => {
  it('should succeed after a transient failure', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ApiRequestError('busy', 503))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { ...fast, maxRetries: 2, onRetry });

    expect(result).toMatchObject({ success: true, data: 'ok', attempts: 2 });
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('should stop at a non-retryable error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ApiRequestError('bad', 422));

    const result = await withRetry(fn, { ...fast, maxRetries: 3 });

    expect(result).toMatchObject({ success: false, attempts: 1 });
    expect(result.success ? undefined : result.error.message).toBe('bad');
  });

  it('should give up after maxRetries', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new ApiRequestError('busy', 503));
    const onExhausted = vi.fn();

    const result = await withRetry(fn, { ...fast, maxRetries: 2, onExhausted });

    expect(result.success).toBe(false);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onExhausted).toHaveBeenCalledWith(expect.any(ApiRequestError), 3);
  });
});
