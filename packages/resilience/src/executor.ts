/**
 * Circuit breaker gated retry loop for a single named service
 */

import type { Result } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';

import { CircuitBreaker } from './circuit-breaker.js';
import { CircuitOpenError } from './errors.js';
import { RetryPolicy } from './retry.js';
import type { CircuitStatus, ExecuteOptions, ExecutionError, Operation } from './types.js';

export interface ProtectedExecutorOptions {
  logger?: Logger | undefined;
  /** Stop retrying on the first breaker rejection instead of sleeping through the budget */
  failFastOnOpen?: boolean | undefined;
}

export class ProtectedExecutor {
  private readonly logger: Logger | undefined;
  private readonly failFastOnOpen: boolean;

  constructor(
    public readonly name: string,
    private readonly breaker: CircuitBreaker,
    private readonly retryPolicy: RetryPolicy,
    options: ProtectedExecutorOptions = {}
  ) {
    this.logger = options.logger;
    this.failFastOnOpen = options.failFastOnOpen ?? false;
  }

  /**
   * Run `operation` under the retry policy, asking the breaker before every attempt.
   * A rejected attempt fails with CircuitOpenError and consumes its share of the budget
   * (including the backoff sleep) like any other failure.
   */
  async execute<T>(
    operation: Operation<T>,
    options: ExecuteOptions = {}
  ): Promise<Result<T, ExecutionError>> {
    const startedAt = Date.now();

    const result = await this.retryPolicy.execute<T>(
      async context => {
        if (!this.breaker.allow()) {
          throw new CircuitOpenError(this.name, this.breaker.getState());
        }

        try {
          const data = await operation(context);
          this.breaker.recordSuccess();
          return data;
        } catch (error) {
          // A call the caller cancelled says nothing about the downstream service
          if (context.signal?.aborted) {
            this.breaker.release();
          } else {
            this.breaker.recordFailure(error);
          }
          throw error;
        }
      },
      {
        ...options,
        serviceName: this.name,
        isRetryable: error => !(this.failFastOnOpen && error instanceof CircuitOpenError),
      }
    );

    const durationMs = Date.now() - startedAt;
    if (result.success) {
      this.logger?.debug(`Call to ${this.name} succeeded`, { service: this.name, durationMs });
    } else {
      this.logger?.error(`Call to ${this.name} failed: ${result.error.message}`, result.error, {
        service: this.name,
        durationMs,
        state: this.breaker.getState(),
      });
    }

    return result;
  }

  getStatus(): CircuitStatus {
    return this.breaker.getStatus();
  }

  reset(): void {
    this.breaker.reset();
  }

  get retryConfig(): RetryPolicy['config'] {
    return this.retryPolicy.config;
  }
}
