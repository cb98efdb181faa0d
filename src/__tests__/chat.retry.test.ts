import { describe, expect, it, vi } from 'vitest';

import { extractStatus, isRetryableStatus, withRetry } from '@infra/openai/chat.retry.js';

const httpError = (status: number) => Object.assign(new Error(`status ${status}`), { status });

describe('withRetry', () => {
  it('retries rate limits and server errors', async () => {
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(httpError(429))
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValue('ok');

    await expect(withRetry(fn, { retries: 2, baseDelayMs: 1, maxDelayMs: 2 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(httpError(400));

    await expect(withRetry(fn, { baseDelayMs: 1 })).rejects.toThrow('status 400');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(httpError(500));

    await expect(withRetry(fn, { retries: 1, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow('status 500');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('extractStatus', () => {
  it('reads the status from the error or its response', () => {
    expect(extractStatus(httpError(429))).toBe(429);
    expect(extractStatus({ response: { status: '502' } })).toBe(502);
    expect(extractStatus(new Error('plain'))).toBeNull();
    expect(extractStatus('nope')).toBeNull();
  });

  it('marks timeouts, rate limits and 5xx as retryable', () => {
    expect([408, 429, 500, 400, null].map(isRetryableStatus)).toEqual([true, true, true, false, false]);
  });
});
