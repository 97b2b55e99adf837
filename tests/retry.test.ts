/**
 * Tests for Retry and Circuit Breaker logic
 */

import {
  withRetry,
  CircuitBreaker,
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  RetryLog,
  isRetryableError,
} from '../src/utils/retry.js';

const FAST = {
  ...DEFAULT_RETRY_CONFIG,
  initialDelayMs: 10,
  maxDelayMs: 20,
  timeoutMs: 1000,
};

describe('Retry Logic', () => {
  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const result = await withRetry(fn, FAST);

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      let attempts = 0;
      const fn = jest.fn().mockImplementation(() => {
        attempts++;
        if (attempts < 3) {
          return Promise.reject(new Error('Temporary failure'));
        }
        return Promise.resolve('success');
      });

      const result = await withRetry(fn, FAST);
      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should throw after max attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Always fails'));

      await expect(withRetry(fn, { ...FAST, maxAttempts: 3 })).rejects.toThrow(
        'Failed after 3 attempts. Last error: Always fails'
      );

      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should keep the last error as the cause', async () => {
      const cause = new Error('Still down');
      const fn = jest.fn().mockRejectedValue(cause);

      const error = await withRetry(fn, { ...FAST, maxAttempts: 2 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RetryExhaustedError);
      expect(error instanceof RetryExhaustedError && error.cause).toBe(cause);
    });

    it('should rethrow non-retryable errors without retrying', async () => {
      const rejection = new Error('Invalid request');
      const fn = jest.fn().mockRejectedValue(rejection);

      await expect(withRetry(fn, { ...FAST, shouldRetry: () => false })).rejects.toBe(rejection);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log retry attempts', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail 1'))
        .mockRejectedValueOnce(new Error('Fail 2'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, FAST, (log) => logs.push(log));

      expect(logs.map((log) => log.success)).toEqual([false, false, true]);
      expect(logs[0].error).toBe('Fail 1');
      expect(logs[0].nextRetryInMs).toBe(10);
      expect(logs[1].nextRetryInMs).toBe(20);
    });
  });

  describe('Exponential Backoff', () => {
    it('should wait before retrying', async () => {
      const startTime = Date.now();
      const fn = jest.fn().mockRejectedValueOnce(new Error('Fail')).mockResolvedValueOnce('success');

      await withRetry(fn, {
        maxAttempts: 2,
        initialDelayMs: 100,
        maxDelayMs: 1000,
        multiplier: 2,
        timeoutMs: 30000,
      });

      const duration = Date.now() - startTime;
      expect(duration).toBeGreaterThanOrEqual(90);
    });
  });

  describe('Timeout Handling', () => {
    it('should timeout if function takes too long', async () => {
      const fn = jest.fn(
        () =>
          new Promise((resolve) => {
            setTimeout(() => resolve('slow'), 300);
          })
      );

      await expect(
        withRetry(fn, {
          maxAttempts: 1,
          initialDelayMs: 10,
          maxDelayMs: 10,
          multiplier: 1,
          timeoutMs: 50,
        })
      ).rejects.toThrow('Timeout after 50ms');
    });
  });
});

describe('Circuit Breaker', () => {
  let breaker: CircuitBreaker;

  beforeEach(() => {
    breaker = new CircuitBreaker(3, 100);
  });

  async function openCircuit() {
    const fn = jest.fn().mockRejectedValue(new Error('Fail'));
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fn)).rejects.toThrow('Fail');
    }
  }

  const waitForReset = () => new Promise((resolve) => setTimeout(resolve, 150));

  describe('States', () => {
    it('should start in closed state', () => {
      expect(breaker.getState()).toBe('closed');
    });

    it('should open after failure threshold', async () => {
      await openCircuit();
      expect(breaker.getState()).toBe('open');

      const fn = jest.fn().mockResolvedValue('ok');
      await expect(breaker.execute(fn)).rejects.toThrow('Circuit breaker is OPEN');
      expect(fn).not.toHaveBeenCalled();
    });

    it('should transition to half-open after timeout', async () => {
      await openCircuit();
      await waitForReset();

      await breaker.execute(jest.fn().mockResolvedValue('success'));

      expect(breaker.getState()).toBe('half-open');
    });

    it('should close after successful recovery', async () => {
      await openCircuit();
      await waitForReset();

      const successFn = jest.fn().mockResolvedValue('ok');
      await breaker.execute(successFn);
      expect(breaker.getState()).toBe('half-open');

      await breaker.execute(successFn);
      expect(breaker.getState()).toBe('closed');
    });

    it('should reopen if fails during half-open', async () => {
      await openCircuit();
      await waitForReset();

      await expect(breaker.execute(jest.fn().mockRejectedValue(new Error('Fail')))).rejects.toThrow('Fail');

      expect(breaker.getState()).toBe('open');
    });
  });

  describe('Manual Reset', () => {
    it('should reset to closed state', async () => {
      await openCircuit();
      expect(breaker.getState()).toBe('open');

      breaker.reset();
      expect(breaker.getState()).toBe('closed');

      const result = await breaker.execute(jest.fn().mockResolvedValue('ok'));
      expect(result).toBe('ok');
    });
  });
});

describe('Error Classification', () => {
  it('should identify retryable errors', () => {
    expect(isRetryableError(new Error('Connection timeout'))).toBe(true);
    expect(isRetryableError(new Error('ECONNREFUSED'))).toBe(true);
    expect(isRetryableError(new Error('Service Unavailable'))).toBe(true);
  });

  it('should identify non-retryable errors', () => {
    expect(isRetryableError(new Error('Invalid request'))).toBe(false);
    expect(isRetryableError(new Error('Authentication failed'))).toBe(false);
    expect(isRetryableError('timeout')).toBe(false);
  });
});
