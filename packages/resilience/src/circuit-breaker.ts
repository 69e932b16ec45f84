/**
 * Per-service circuit breaker state machine
 */

import { ConfigurationError } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';

import {
  CircuitState,
  type CircuitBreakerConfig,
  type CircuitStatus,
  type Clock,
} from './types.js';

export interface CircuitBreakerOptions {
  clock?: Clock | undefined;
  logger?: Logger | undefined;
}

/**
 * Closed -> Open after `failureThreshold` recorded failures. Open -> HalfOpen lazily in
 * `allow()` once `recoveryTimeoutMs` has passed since the last failure, granting one probe.
 * The probe's outcome closes the circuit or reopens it with a fresh timer.
 *
 * Every method runs to completion without awaiting, so concurrent callers on the event
 * loop never interleave a check with a write. Each breaker owns its fields; there is no
 * shared lock across services.
 */
export class CircuitBreaker {
  private state = CircuitState.CLOSED;
  private failureCount = 0;
  private lastFailureTimestamp: number | undefined;
  private lastFailureAt: Date | undefined;
  private probeInFlight = false;

  private readonly clock: Clock;
  private readonly logger: Logger | undefined;

  constructor(
    public readonly name: string,
    private readonly config: Readonly<CircuitBreakerConfig>,
    options: CircuitBreakerOptions = {}
  ) {
    this.validateConfig(config);
    this.clock = options.clock ?? (() => performance.now());
    this.logger = options.logger;
  }

  /**
   * Decide whether the next call may proceed. `false` means rejected by the gate.
   */
  allow(): boolean {
    switch (this.state) {
      case CircuitState.CLOSED:
        return true;

      case CircuitState.OPEN: {
        const elapsed = this.clock() - (this.lastFailureTimestamp ?? 0);
        if (elapsed >= this.config.recoveryTimeoutMs) {
          this.transitionTo(CircuitState.HALF_OPEN);
          this.probeInFlight = true;
          return true;
        }
        return false;
      }

      case CircuitState.HALF_OPEN:
        if (this.probeInFlight) {
          return false;
        }
        this.probeInFlight = true;
        return true;
    }
  }

  recordSuccess(): void {
    this.failureCount = 0;
    this.probeInFlight = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  /**
   * Record a failed call. Returns false when the classifier says the error does not count.
   */
  recordFailure(error: unknown): boolean {
    const counts = this.config.isFailure ? this.config.isFailure(error) : true;

    if (!counts) {
      this.release();
      return false;
    }

    this.failureCount += 1;
    this.lastFailureTimestamp = this.clock();
    this.lastFailureAt = new Date();
    this.probeInFlight = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.transitionTo(CircuitState.OPEN);
    } else if (
      this.state === CircuitState.CLOSED &&
      this.failureCount >= this.config.failureThreshold
    ) {
      this.transitionTo(CircuitState.OPEN);
    }

    return true;
  }

  /**
   * End a granted call without an outcome, for example when its caller cancelled it.
   * Counts are untouched; in HalfOpen the next caller may probe instead.
   */
  release(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.probeInFlight = false;
    }
  }

  /**
   * Force the breaker closed and clear the failure count
   */
  reset(): void {
    this.failureCount = 0;
    this.probeInFlight = false;
    if (this.state !== CircuitState.CLOSED) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getStatus(): CircuitStatus {
    return Object.freeze({
      name: this.name,
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTimestamp: this.lastFailureTimestamp,
      lastFailureAt: this.lastFailureAt ? new Date(this.lastFailureAt.getTime()) : undefined,
    });
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;

    const data = {
      service: this.name,
      from: previous,
      to: next,
      failureCount: this.failureCount,
    };
    if (next === CircuitState.OPEN) {
      this.logger?.warn(`Circuit opened for ${this.name}`, data);
    } else {
      const label = next === CircuitState.CLOSED ? 'closed' : 'half-open';
      this.logger?.info(`Circuit ${label} for ${this.name}`, data);
    }
  }

  private validateConfig(config: Readonly<CircuitBreakerConfig>): void {
    if (!Number.isInteger(config.failureThreshold) || config.failureThreshold <= 0) {
      throw new ConfigurationError('failureThreshold must be a positive integer', {
        context: { service: this.name },
      });
    }
    if (config.recoveryTimeoutMs < 0) {
      throw new ConfigurationError('recoveryTimeoutMs must be non-negative', {
        context: { service: this.name },
      });
    }
  }
}
