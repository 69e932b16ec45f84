/**
 * Translation from the file's snake_case resilience section to registry options
 */

import type {
  CircuitBreakerConfig,
  ResilienceRegistryOptions,
  RetryConfig,
  ServiceOverrides,
} from '@telemetry-guard/resilience';

import type { ResilienceConfig, ServiceOverrideConfig } from './schemas.js';

type RetrySection = NonNullable<ServiceOverrideConfig['retry']>;
type BreakerSection = NonNullable<ServiceOverrideConfig['circuit_breaker']>;

function breakerOverrides(section: BreakerSection): Partial<CircuitBreakerConfig> {
  return {
    ...(section.failure_threshold !== undefined && {
      failureThreshold: section.failure_threshold,
    }),
    ...(section.recovery_timeout !== undefined && {
      recoveryTimeoutMs: section.recovery_timeout,
    }),
  };
}

function retryOverrides(section: RetrySection): Partial<RetryConfig> {
  return {
    ...(section.max_attempts !== undefined && { maxAttempts: section.max_attempts }),
    ...(section.base_delay !== undefined && { baseDelayMs: section.base_delay }),
    ...(section.max_delay !== undefined && { maxDelayMs: section.max_delay }),
    ...(section.backoff_multiplier !== undefined && {
      backoffMultiplier: section.backoff_multiplier,
    }),
    ...(section.jitter !== undefined && { jitter: section.jitter }),
  };
}

/**
 * Build the configuration part of ResilienceRegistryOptions. Runtime hooks (logger, clock,
 * sleep, random) are left to the caller.
 */
export function toRegistryOptions(config: ResilienceConfig): ResilienceRegistryOptions {
  const services: Record<string, ServiceOverrides> = {};
  for (const [name, override] of Object.entries(config.services)) {
    services[name] = {
      ...(override.circuit_breaker && {
        circuitBreaker: breakerOverrides(override.circuit_breaker),
      }),
      ...(override.retry && { retry: retryOverrides(override.retry) }),
    };
  }

  return {
    circuitBreaker: {
      failureThreshold: config.circuit_breaker.failure_threshold,
      recoveryTimeoutMs: config.circuit_breaker.recovery_timeout,
    },
    retry: {
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay,
      maxDelayMs: config.retry.max_delay,
      backoffMultiplier: config.retry.backoff_multiplier,
      jitter: config.retry.jitter,
    },
    failFastOnOpen: config.fail_fast_on_open,
    services,
  };
}
