/**
 * Retry and pacing tests
 */

import { backoffDelay, withRetry, type RetryOptions } from '@/lib/retry';
import { createPacer } from '@/lib/pacing';
import {
  AuthError,
  MalformedPayloadError,
  RateLimitedError,
  StoreUnavailableError,
  VendorUnavailableError,
} from '@/lib/errors';

describe('withRetry', () => {
  let sleep: jest.Mock<Promise<void>, [number]>;
  let options: RetryOptions;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    options = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30000, sleep };
  });

  it('returns the first successful result', async () => {
    const fn = jest.fn<Promise<string>, []>().mockResolvedValue('ok');
    await expect(withRetry(fn, options)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries retryable errors with exponential backoff', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new VendorUnavailableError('502', 502))
      .mockRejectedValueOnce(new StoreUnavailableError('busy'))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, options)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const last = new VendorUnavailableError('503 again', 503);
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new VendorUnavailableError('503', 503))
      .mockRejectedValueOnce(new VendorUnavailableError('503', 503))
      .mockRejectedValueOnce(last);

    await expect(withRetry(fn, options)).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-retryable errors', async () => {
    for (const error of [new AuthError('401'), new MalformedPayloadError('bad'), new Error('boom')]) {
      const fn = jest.fn<Promise<string>, []>().mockRejectedValue(error);
      await expect(withRetry(fn, options)).rejects.toBe(error);
      expect(fn).toHaveBeenCalledTimes(1);
    }
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits the Retry-After value of a rate-limit error', async () => {
    const fn = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new RateLimitedError('429', 7000))
      .mockResolvedValue('ok');

    await withRetry(fn, options);
    expect(sleep).toHaveBeenCalledWith(7000);
  });
});

describe('backoffDelay', () => {
  const options: RetryOptions = { maxAttempts: 10, baseDelayMs: 1000, maxDelayMs: 5000 };

  it('caps the delay', () => {
    expect(backoffDelay(1, new Error('x'), options)).toBe(1000);
    expect(backoffDelay(3, new Error('x'), options)).toBe(4000);
    expect(backoffDelay(4, new Error('x'), options)).toBe(5000);
    expect(backoffDelay(1, new RateLimitedError('429', 60000), options)).toBe(5000);
  });
});

describe('createPacer', () => {
  it('waits a delay inside the configured window', async () => {
    const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    const low = createPacer({ minDelayMs: 2000, maxDelayMs: 5000, sleep, random: () => 0 });
    const high = createPacer({ minDelayMs: 2000, maxDelayMs: 5000, sleep, random: () => 0.9999 });

    await expect(low()).resolves.toBe(2000);
    await expect(high()).resolves.toBe(5000);
    expect(sleep.mock.calls).toEqual([[2000], [5000]]);
  });

  it('skips sleeping for a zero window', async () => {
    const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
    const pause = createPacer({ minDelayMs: 0, maxDelayMs: 0, sleep });
    await expect(pause()).resolves.toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });
});
