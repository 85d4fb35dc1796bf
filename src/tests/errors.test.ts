/**
 * Tests for error classification and retry with backoff
 */
import {
  getRetryDelayMs,
  isRetryableError,
  OracleApiError,
  OracleAuthError,
  OracleTimeoutError,
  withRetry,
} from '../utils/errors';

function networkError(code: string): Error {
  return Object.assign(new Error('socket hang up'), { code });
}

describe('isRetryableError', () => {
  test('retries timeouts, rate limits, server errors and dropped connections', () => {
    expect(isRetryableError(new OracleTimeoutError('/ask', 1000))).toBe(true);
    expect(isRetryableError(new OracleApiError('busy', '/ask', 503))).toBe(true);
    expect(isRetryableError(new OracleApiError('slow down', '/ask', 429))).toBe(true);
    expect(isRetryableError(networkError('ECONNRESET'))).toBe(true);
  });

  test('does not retry auth failures, client errors or unknown errors', () => {
    expect(isRetryableError(new OracleAuthError('/ask', 401))).toBe(false);
    expect(isRetryableError(new OracleApiError('bad request', '/ask', 400))).toBe(false);
    expect(isRetryableError(new Error('boom'))).toBe(false);
    expect(isRetryableError('boom')).toBe(false);
  });
});

describe('getRetryDelayMs', () => {
  test('is zero when the base delay is zero', () => {
    expect(getRetryDelayMs(0, 0)).toBe(0);
    expect(getRetryDelayMs(4, 0)).toBe(0);
  });

  test('stays within the jitter band and the cap', () => {
    for (let i = 0; i < 20; i++) {
      const first = getRetryDelayMs(0, 500);
      expect(first).toBeGreaterThanOrEqual(500);
      expect(first).toBeLessThanOrEqual(562);

      const capped = getRetryDelayMs(3, 500, 1000);
      expect(capped).toBeGreaterThanOrEqual(500);
      expect(capped).toBeLessThanOrEqual(1000);
    }
  });
});

describe('withRetry', () => {
  test('retries retryable failures until the call succeeds', async () => {
    const fn = jest.fn()
      .mockRejectedValueOnce(new OracleApiError('busy', '/ask', 503))
      .mockRejectedValueOnce(networkError('ECONNRESET'))
      .mockResolvedValueOnce('ok');
    const onRetry = jest.fn();

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 0, onRetry })).resolves.toBe('ok');

    expect(fn).toHaveBeenCalledTimes(3);
    expect(fn.mock.calls.map(call => call[0])).toEqual([0, 1, 2]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[1][0]).toBe(2);
  });

  test('gives up after maxRetries and rethrows the last error', async () => {
    const fn = jest.fn().mockRejectedValue(new OracleApiError('busy', '/ask', 503));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 0 })).rejects.toBeInstanceOf(OracleApiError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('does not retry a non-retryable error', async () => {
    const fn = jest.fn().mockRejectedValue(new OracleAuthError('/ask', 401));

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 0 })).rejects.toBeInstanceOf(OracleAuthError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
