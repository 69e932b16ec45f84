import { describe, it, expect, vi, beforeEach } from 'vitest';

import { DegradationCoordinator, fallbackServiceName } from '../degradation.js';
import { CancelledError, RetryExhaustedError } from '../errors.js';
import { ResilienceRegistry } from '../registry.js';

import { createFakeTime } from './fake-time.js';

describe('DegradationCoordinator', () => {
  let registry: ResilienceRegistry;
  let coordinator: DegradationCoordinator;

  beforeEach(() => {
    const time = createFakeTime();
    registry = new ResilienceRegistry({
      clock: time.clock,
      sleep: time.sleep,
      retry: { maxAttempts: 1, jitter: false },
    });
    coordinator = new DegradationCoordinator(registry);
  });

  it('should name fallbacks with the fallback suffix', () => {
    expect(fallbackServiceName('loki')).toBe('loki_fallback');
  });

  it('should report primaries that succeed', async () => {
    const fallback = vi.fn(async () => 'backup');

    const outcomes = await coordinator.executeWithFallback(
      { loki: async () => 'primary' },
      { loki: fallback }
    );

    expect(outcomes).toEqual({ loki: { status: 'success', result: 'primary' } });
    expect(fallback).not.toHaveBeenCalled();
    expect(registry.has('loki_fallback')).toBe(false);
  });

  it('should use the fallback when the primary fails', async () => {
    const outcomes = await coordinator.executeWithFallback(
      {
        grafana: async () => {
          throw new Error('connection refused');
        },
      },
      { grafana: async () => 'cached' }
    );

    const outcome = outcomes['grafana'];
    expect(outcome?.status).toBe('fallback_success');
    if (outcome?.status === 'fallback_success') {
      expect(outcome.result).toBe('cached');
      expect(outcome.originalError).toBeInstanceOf(RetryExhaustedError);
      expect(outcome.originalError.message).toBe(
        'Operation failed after 1 attempt: connection refused'
      );
    }
    expect(registry.has('grafana')).toBe(true);
    expect(registry.has('grafana_fallback')).toBe(true);
    expect(registry.getStatus('grafana_fallback')?.failureCount).toBe(0);
  });

  it('should report both errors when the fallback fails too', async () => {
    const outcomes = await coordinator.executeWithFallback(
      {
        influxdb: async () => {
          throw new Error('primary down');
        },
      },
      {
        influxdb: async () => {
          throw new Error('fallback down');
        },
      }
    );

    const outcome = outcomes['influxdb'];
    expect(outcome?.status).toBe('failed');
    if (outcome?.status === 'failed') {
      expect(outcome.error.message).toBe('Operation failed after 1 attempt: primary down');
      expect(outcome.fallbackError?.message).toBe(
        'Operation failed after 1 attempt: fallback down'
      );
    }
    expect(registry.getStatus('influxdb_fallback')?.failureCount).toBe(1);
  });

  it('should fail without a fallback error when no fallback is given', async () => {
    const outcomes = await coordinator.executeWithFallback({
      elastic: async () => {
        throw new Error('timeout');
      },
    });

    const outcome = outcomes['elastic'];
    expect(outcome?.status).toBe('failed');
    expect(outcome).not.toHaveProperty('fallbackError');
    expect(registry.has('elastic_fallback')).toBe(false);
  });

  it('should run primaries concurrently', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const started: string[] = [];
    const waitForGate = (name: string) => async () => {
      started.push(name);
      await gate;
      return name;
    };

    const pending = coordinator.executeWithFallback({
      loki: waitForGate('loki'),
      grafana: waitForGate('grafana'),
    });
    await new Promise(resolve => setTimeout(resolve, 0));

    expect(started).toEqual(['loki', 'grafana']);
    release();
    expect(await pending).toEqual({
      loki: { status: 'success', result: 'loki' },
      grafana: { status: 'success', result: 'grafana' },
    });
  });

  it('should skip the fallback once the caller has cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fallback = vi.fn(async () => 'backup');

    const outcomes = await coordinator.executeWithFallback(
      { loki: async () => 'primary' },
      { loki: fallback },
      { signal: controller.signal }
    );

    const outcome = outcomes['loki'];
    expect(outcome?.status).toBe('failed');
    if (outcome?.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(CancelledError);
    }
    expect(fallback).not.toHaveBeenCalled();
  });

  it('should wrap non-Error throws', async () => {
    const outcomes = await coordinator.executeWithFallback({
      loki: async () => {
        throw 'plain string';
      },
    });

    const outcome = outcomes['loki'];
    if (outcome?.status === 'failed') {
      expect(outcome.error.message).toBe('Operation failed after 1 attempt: plain string');
    } else {
      expect.fail('expected a failed outcome');
    }
  });

  it('should report a service whose settings fail validation instead of rejecting', async () => {
    const strict = new DegradationCoordinator(
      new ResilienceRegistry({
        retry: { maxAttempts: 1, jitter: false },
        services: { loki: { retry: { baseDelayMs: 120_000 } } },
      })
    );

    const outcomes = await strict.executeWithFallback({
      loki: async () => 'never runs',
      grafana: async () => 'ok',
    });

    expect(outcomes['grafana']).toEqual({ status: 'success', result: 'ok' });
    const loki = outcomes['loki'];
    if (loki?.status === 'failed') {
      expect(loki.error).toBeInstanceOf(RetryExhaustedError);
      expect(loki.error.message).toBe(
        'Operation failed after 0 attempts: maxDelayMs must be greater than or equal to baseDelayMs'
      );
    } else {
      expect.fail('expected a failed outcome');
    }
  });

  it('should only use fallbacks given for that exact name', async () => {
    const outcomes = await coordinator.executeWithFallback({
      toString: async () => {
        throw new Error('down');
      },
      constructor: async () => {
        throw new Error('down');
      },
    });

    expect(outcomes['toString']?.status).toBe('failed');
    expect(outcomes['constructor']?.status).toBe('failed');
    expect(registry.has('toString_fallback')).toBe(false);
  });
});
