/**
 * Errors raised by the resilience layer itself, as opposed to the protected operation
 */

import { ResilienceGateError, toError } from '@telemetry-guard/errors';

import type { CircuitState } from './types.js';

/**
 * The breaker rejected the attempt; the protected operation never ran
 */
export class CircuitOpenError extends ResilienceGateError {
  constructor(
    public readonly serviceName: string,
    public readonly state: CircuitState
  ) {
    super(`Circuit breaker for '${serviceName}' is ${state}`, 'CIRCUIT_OPEN', {
      context: { service: serviceName, operation: 'circuit_gate' },
      data: { state },
    });
  }
}

/**
 * Every attempt failed. Wraps the last CircuitOpenError or operation error.
 */
export class RetryExhaustedError extends ResilienceGateError {
  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number,
    serviceName?: string
  ) {
    super(
      `Operation failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${toError(lastError).message}`,
      'RETRY_EXHAUSTED',
      {
        cause: toError(lastError),
        context: { service: serviceName, operation: 'retry' },
        data: { attempts },
      }
    );
  }

  /**
   * True when the final attempt was rejected by the breaker rather than run
   */
  get circuitOpen(): boolean {
    return this.lastError instanceof CircuitOpenError;
  }
}

/**
 * The caller's abort signal fired before the retry loop finished
 */
export class CancelledError extends ResilienceGateError {
  constructor(
    public readonly attempts: number,
    public readonly lastError?: unknown,
    serviceName?: string
  ) {
    super(
      `Operation cancelled after ${attempts} attempt${attempts === 1 ? '' : 's'}`,
      'CANCELLED',
      {
        ...(lastError !== undefined && { cause: toError(lastError) }),
        context: { service: serviceName, operation: 'retry' },
        data: { attempts },
      }
    );
  }
}
