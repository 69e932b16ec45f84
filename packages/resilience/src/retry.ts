/**
 * Bounded retry with exponential backoff and optional jitter
 */

import { setTimeout as delay } from 'timers/promises';

import { ConfigurationError, failure, success, type Result } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';

import { CancelledError, RetryExhaustedError } from './errors.js';
import {
  MAX_TIMER_DELAY_MS,
  type ExecuteOptions,
  type ExecutionError,
  type Operation,
  type RetryConfig,
  type Sleep,
} from './types.js';

export interface RetryExecuteOptions extends ExecuteOptions {
  /** Ends the loop early when it returns false. Every error is retryable by default. */
  isRetryable?: ((error: unknown) => boolean) | undefined;
  /** Name used in log lines and error context */
  serviceName?: string | undefined;
}

export interface RetryPolicyOptions {
  sleep?: Sleep | undefined;
  random?: (() => number) | undefined;
  logger?: Logger | undefined;
}

export const defaultSleep: Sleep = (ms, signal) =>
  delay(ms, undefined, signal ? { signal } : undefined);

/**
 * Immutable retry policy that both calculates delays and drives attempts
 */
export class RetryPolicy {
  public readonly config: Readonly<RetryConfig>;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly logger: Logger | undefined;

  constructor(config: RetryConfig, options: RetryPolicyOptions = {}) {
    RetryPolicy.validateConfig(config);
    this.config = Object.freeze({ ...config });
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger;
  }

  /**
   * Delay after the failed attempt at `attemptIndex` (0-based):
   * min(base * multiplier^index, max), scaled by a factor in [0.5, 1.0] when jitter is on.
   */
  calculateDelay(attemptIndex: number): number {
    const { baseDelayMs, backoffMultiplier, maxDelayMs, jitter } = this.config;
    const capped = Math.min(baseDelayMs * Math.pow(backoffMultiplier, attemptIndex), maxDelayMs);

    return jitter ? capped * (0.5 + this.random() * 0.5) : capped;
  }

  async execute<T>(
    operation: Operation<T>,
    options: RetryExecuteOptions = {}
  ): Promise<Result<T, ExecutionError>> {
    const { signal, onRetry, isRetryable, serviceName } = options;
    const label = serviceName ?? 'operation';
    let lastError: unknown;
    let attempts = 0;

    for (let index = 0; index < this.config.maxAttempts; index++) {
      if (signal?.aborted) {
        return failure(new CancelledError(attempts, lastError, serviceName));
      }

      try {
        attempts = index + 1;
        return success(await operation({ attempt: attempts, signal }));
      } catch (error) {
        lastError = error;
      }

      if (signal?.aborted) {
        return failure(new CancelledError(attempts, lastError, serviceName));
      }

      const isLast = attempts >= this.config.maxAttempts;
      if (isLast || (isRetryable && !isRetryable(lastError))) {
        break;
      }

      const delayMs = this.calculateDelay(index);
      const progress = `${attempts}/${this.config.maxAttempts}`;
      this.logger?.warn(
        `Attempt ${progress} for ${label} failed, retrying in ${Math.round(delayMs)}ms`,
        { service: serviceName, attempt: attempts, delayMs, error: errorMessage(lastError) }
      );
      onRetry?.({ attempt: attempts, error: lastError, delayMs });

      try {
        await this.sleep(delayMs, signal);
      } catch (sleepError) {
        if (signal?.aborted) {
          return failure(new CancelledError(attempts, lastError, serviceName));
        }
        throw sleepError;
      }
    }

    return failure(new RetryExhaustedError(lastError, attempts, serviceName));
  }

  private static validateConfig(config: RetryConfig): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new ConfigurationError('maxAttempts must be an integer of at least 1');
    }
    if (config.baseDelayMs <= 0) {
      throw new ConfigurationError('baseDelayMs must be positive');
    }
    if (config.maxDelayMs < config.baseDelayMs) {
      throw new ConfigurationError('maxDelayMs must be greater than or equal to baseDelayMs');
    }
    if (config.maxDelayMs > MAX_TIMER_DELAY_MS) {
      throw new ConfigurationError(`maxDelayMs must not exceed ${MAX_TIMER_DELAY_MS}`);
    }
    if (config.backoffMultiplier < 1) {
      throw new ConfigurationError('backoffMultiplier must be at least 1');
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
