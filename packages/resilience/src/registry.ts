/**
 * Registry owning one breaker and retry policy per service name
 */

import type { Result } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';

import { CircuitBreaker } from './circuit-breaker.js';
import { ProtectedExecutor } from './executor.js';
import { RetryPolicy } from './retry.js';
import {
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RETRY_CONFIG,
  type CircuitBreakerConfig,
  type CircuitStatus,
  type ExecuteOptions,
  type ExecutionError,
  type Operation,
  type ResetResult,
  type ResilienceRuntime,
  type RetryConfig,
} from './types.js';

export interface ServiceOverrides {
  circuitBreaker?: Partial<CircuitBreakerConfig> | undefined;
  retry?: Partial<RetryConfig> | undefined;
}

export interface ResilienceRegistryOptions extends ResilienceRuntime {
  /** Defaults applied to every service created by this registry */
  circuitBreaker?: Partial<CircuitBreakerConfig> | undefined;
  retry?: Partial<RetryConfig> | undefined;
  /** Per-service settings layered over the defaults */
  services?: Readonly<Record<string, ServiceOverrides>> | undefined;
  failFastOnOpen?: boolean | undefined;
}

/**
 * Construct one per process and pass it to whatever needs protection. Entries are created
 * on first use and live as long as the registry; `reset` mutates in place.
 */
export class ResilienceRegistry {
  private readonly entries = new Map<string, ProtectedExecutor>();
  private readonly logger: Logger | undefined;

  constructor(private readonly options: ResilienceRegistryOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Return the executor for `name`, creating it on first reference. Configs passed for a
   * name that already exists are ignored. Lookup and insertion happen in one synchronous
   * step, so concurrent first uses still share a single breaker.
   */
  getOrCreate(
    name: string,
    circuitBreaker?: Partial<CircuitBreakerConfig>,
    retry?: Partial<RetryConfig>
  ): ProtectedExecutor {
    const existing = this.entries.get(name);
    if (existing) {
      return existing;
    }

    const services: Readonly<Record<string, ServiceOverrides>> = this.options.services ?? {};
    const overrides = Object.hasOwn(services, name) ? services[name] : undefined;
    const breakerConfig: CircuitBreakerConfig = {
      ...DEFAULT_CIRCUIT_BREAKER_CONFIG,
      ...this.options.circuitBreaker,
      ...overrides?.circuitBreaker,
      ...circuitBreaker,
    };
    const retryConfig: RetryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      ...this.options.retry,
      ...overrides?.retry,
      ...retry,
    };

    const logger = this.logger?.child(name);
    const executor = new ProtectedExecutor(
      name,
      new CircuitBreaker(name, breakerConfig, { clock: this.options.clock, logger }),
      new RetryPolicy(retryConfig, {
        sleep: this.options.sleep,
        random: this.options.random,
        logger,
      }),
      { logger, failFastOnOpen: this.options.failFastOnOpen }
    );

    this.entries.set(name, executor);
    this.logger?.debug(`Registered resilience entry for ${name}`, {
      failureThreshold: breakerConfig.failureThreshold,
      recoveryTimeoutMs: breakerConfig.recoveryTimeoutMs,
      maxAttempts: retryConfig.maxAttempts,
    });

    return executor;
  }

  execute<T>(
    name: string,
    operation: Operation<T>,
    options?: ExecuteOptions
  ): Promise<Result<T, ExecutionError>> {
    return this.getOrCreate(name).execute(operation, options);
  }

  /**
   * Snapshot of one breaker, or undefined when the name was never used. Never creates one.
   */
  getStatus(name: string): CircuitStatus | undefined {
    return this.entries.get(name)?.getStatus();
  }

  getAllStatuses(): Record<string, CircuitStatus> {
    const statuses: Record<string, CircuitStatus> = {};
    for (const [name, executor] of this.entries) {
      statuses[name] = executor.getStatus();
    }
    return statuses;
  }

  reset(name: string): ResetResult {
    const executor = this.entries.get(name);
    if (!executor) {
      this.logger?.info(`No circuit breaker found for ${name}`);
      return 'not_found';
    }

    executor.reset();
    this.logger?.info(`Reset circuit breaker for ${name}`);
    return 'ok';
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }
}
