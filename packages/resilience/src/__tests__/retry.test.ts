import { ConfigurationError } from '@telemetry-guard/errors';
import { describe, it, expect, vi } from 'vitest';

import { CancelledError, RetryExhaustedError } from '../errors.js';
import { RetryPolicy, defaultSleep } from '../retry.js';
import type { RetryConfig } from '../types.js';

import { createFakeTime } from './fake-time.js';

const noJitter: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 1_000,
  backoffMultiplier: 2,
  jitter: false,
};

describe('RetryPolicy', () => {
  describe('calculateDelay', () => {
    it('should grow exponentially and cap at the maximum without jitter', () => {
      const policy = new RetryPolicy(noJitter);

      expect([0, 1, 2, 3, 4, 5].map(i => policy.calculateDelay(i))).toEqual([
        100, 200, 400, 800, 1_000, 1_000,
      ]);
    });

    it('should scale the capped delay into [0.5, 1.0] with jitter', () => {
      const low = new RetryPolicy({ ...noJitter, jitter: true }, { random: () => 0 });
      const mid = new RetryPolicy({ ...noJitter, jitter: true }, { random: () => 0.5 });

      expect(low.calculateDelay(1)).toBe(100);
      expect(mid.calculateDelay(1)).toBe(150);
      expect(mid.calculateDelay(10)).toBe(750);
    });

    it('should stay within bounds with the default random source', () => {
      const policy = new RetryPolicy({ ...noJitter, jitter: true });

      for (let i = 0; i < 50; i++) {
        const delay = policy.calculateDelay(2);
        expect(delay).toBeGreaterThanOrEqual(200);
        expect(delay).toBeLessThanOrEqual(400);
      }
    });
  });

  describe('execute', () => {
    it('should invoke an always-failing operation maxAttempts times', async () => {
      const time = createFakeTime();
      const policy = new RetryPolicy(noJitter, { sleep: time.sleep });
      const finalError = new Error('attempt 3');
      let calls = 0;

      const result = await policy.execute(async () => {
        calls += 1;
        throw calls === 3 ? finalError : new Error(`attempt ${calls}`);
      });

      expect(calls).toBe(3);
      expect(time.sleeps).toEqual([100, 200]);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(RetryExhaustedError);
        if (result.error instanceof RetryExhaustedError) {
          expect(result.error.attempts).toBe(3);
          expect(result.error.lastError).toBe(finalError);
          expect(result.error.message).toBe('Operation failed after 3 attempts: attempt 3');
          expect(result.error.code).toBe('RETRY_EXHAUSTED');
        }
      }
    });

    it('should return as soon as an attempt succeeds', async () => {
      const time = createFakeTime();
      const policy = new RetryPolicy(noJitter, { sleep: time.sleep });
      const operation = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error('flaky'))
        .mockResolvedValueOnce('ok');

      const result = await policy.execute(operation);

      expect(result).toEqual({ success: true, data: 'ok' });
      expect(operation).toHaveBeenCalledTimes(2);
      expect(time.sleeps).toEqual([100]);
    });

    it('should pass 1-based attempt numbers to the operation', async () => {
      const time = createFakeTime();
      const policy = new RetryPolicy(noJitter, { sleep: time.sleep });
      const seen: number[] = [];

      await policy.execute(async ({ attempt }) => {
        seen.push(attempt);
        throw new Error('nope');
      });

      expect(seen).toEqual([1, 2, 3]);
    });

    it('should report each intermediate failure to onRetry', async () => {
      const time = createFakeTime();
      const policy = new RetryPolicy(noJitter, { sleep: time.sleep });
      const error = new Error('down');
      const onRetry = vi.fn();

      await policy.execute(
        async () => {
          throw error;
        },
        { onRetry }
      );

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, { attempt: 1, error, delayMs: 100 });
      expect(onRetry).toHaveBeenNthCalledWith(2, { attempt: 2, error, delayMs: 200 });
    });

    it('should stop early when isRetryable returns false', async () => {
      const time = createFakeTime();
      const policy = new RetryPolicy(noJitter, { sleep: time.sleep });
      const operation = vi.fn(async () => {
        throw new Error('permanent');
      });

      const result = await policy.execute(operation, { isRetryable: () => false });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(time.sleeps).toEqual([]);
      expect(!result.success && result.error instanceof RetryExhaustedError).toBe(true);
      if (!result.success && result.error instanceof RetryExhaustedError) {
        expect(result.error.attempts).toBe(1);
      }
    });

    it('should not run at all when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn(async () => 'never');

      const result = await new RetryPolicy(noJitter).execute(operation, {
        signal: controller.signal,
      });

      expect(operation).not.toHaveBeenCalled();
      expect(!result.success && result.error instanceof CancelledError).toBe(true);
      if (!result.success) {
        expect(result.error.attempts).toBe(0);
      }
    });

    it('should cancel during a backoff sleep', async () => {
      const controller = new AbortController();
      const policy = new RetryPolicy(
        { ...noJitter, baseDelayMs: 60_000, maxDelayMs: 60_000 },
        { sleep: defaultSleep }
      );
      const lastError = new Error('first failure');
      const operation = vi.fn(async () => {
        throw lastError;
      });

      setTimeout(() => controller.abort(), 10);
      const result = await policy.execute(operation, { signal: controller.signal });

      expect(operation).toHaveBeenCalledTimes(1);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(CancelledError);
        expect(result.error.attempts).toBe(1);
        expect(result.error.lastError).toBe(lastError);
        expect(result.error.code).toBe('CANCELLED');
      }
    });

    it('should cancel when the operation fails because the signal fired', async () => {
      const controller = new AbortController();
      const time = createFakeTime();
      const policy = new RetryPolicy(noJitter, { sleep: time.sleep });

      const result = await policy.execute(
        async ({ signal }) => {
          controller.abort();
          throw new Error(signal?.aborted ? 'aborted' : 'unexpected');
        },
        { signal: controller.signal }
      );

      expect(time.sleeps).toEqual([]);
      expect(!result.success && result.error instanceof CancelledError).toBe(true);
    });
  });

  describe('configuration', () => {
    it('should freeze its configuration', () => {
      const config = { ...noJitter };
      const policy = new RetryPolicy(config);
      config.maxAttempts = 10;

      expect(policy.config.maxAttempts).toBe(3);
      expect(Object.isFrozen(policy.config)).toBe(true);
    });

    const invalid: Array<[Partial<RetryConfig>, string]> = [
      [{ maxAttempts: 0 }, 'maxAttempts must be an integer of at least 1'],
      [{ baseDelayMs: 0 }, 'baseDelayMs must be positive'],
      [{ maxDelayMs: 50 }, 'maxDelayMs must be greater than or equal to baseDelayMs'],
      [{ maxDelayMs: 2_592_000_000 }, 'maxDelayMs must not exceed 2147483647'],
      [{ backoffMultiplier: 0.5 }, 'backoffMultiplier must be at least 1'],
    ];

    it.each(invalid)('should reject %o', (override, message) => {
      expect(() => new RetryPolicy({ ...noJitter, ...override })).toThrow(ConfigurationError);
      expect(() => new RetryPolicy({ ...noJitter, ...override })).toThrow(message);
    });
  });
});
