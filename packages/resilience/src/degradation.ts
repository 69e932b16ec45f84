/**
 * Graceful degradation: run primaries, fall back to alternates, report outcomes as data
 */

import { failure, type Result } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';

import { CancelledError, RetryExhaustedError } from './errors.js';
import type { ResilienceRegistry } from './registry.js';
import type { ExecuteOptions, ExecutionError, Operation } from './types.js';

/**
 * Suffix of the service name a fallback is protected under
 */
export const FALLBACK_SUFFIX = '_fallback';

export type DegradationOutcome<T> =
  | { readonly status: 'success'; readonly result: T }
  | {
      readonly status: 'fallback_success';
      readonly result: T;
      readonly originalError: ExecutionError;
    }
  | {
      readonly status: 'failed';
      readonly error: ExecutionError;
      readonly fallbackError?: ExecutionError;
    };

export type OperationMap<T> = Readonly<Record<string, Operation<T>>>;

export function fallbackServiceName(name: string): string {
  return `${name}${FALLBACK_SUFFIX}`;
}

export class DegradationCoordinator {
  private readonly logger: Logger | undefined;

  constructor(
    private readonly registry: ResilienceRegistry,
    options: { logger?: Logger | undefined } = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Run every primary concurrently through the registry. A failed primary with a matching
   * fallback runs that fallback under `<name>_fallback`, which has its own breaker and
   * retry state. Only own properties of `fallbacks` count as fallbacks. Never rejects.
   */
  async executeWithFallback<T>(
    primaries: OperationMap<T>,
    fallbacks: OperationMap<T> = {},
    options: ExecuteOptions = {}
  ): Promise<Record<string, DegradationOutcome<T>>> {
    const entries = await Promise.all(
      Object.entries(primaries).map(
        async ([name, primary]) =>
          [
            name,
            await this.runWithFallback(name, primary, ownEntry(fallbacks, name), options),
          ] as const
      )
    );

    return Object.fromEntries(entries);
  }

  private async runWithFallback<T>(
    name: string,
    primary: Operation<T>,
    fallback: Operation<T> | undefined,
    options: ExecuteOptions
  ): Promise<DegradationOutcome<T>> {
    const primaryResult = await this.protect(name, primary, options);
    if (primaryResult.success) {
      return { status: 'success', result: primaryResult.data };
    }

    const originalError = primaryResult.error;
    if (!fallback || originalError instanceof CancelledError) {
      return { status: 'failed', error: originalError };
    }

    this.logger?.warn(`Primary ${name} failed, trying fallback`, {
      service: name,
      error: originalError.message,
    });

    const fallbackResult = await this.protect(fallbackServiceName(name), fallback, options);
    if (fallbackResult.success) {
      return { status: 'fallback_success', result: fallbackResult.data, originalError };
    }

    this.logger?.error(`Fallback for ${name} failed`, fallbackResult.error, { service: name });
    return { status: 'failed', error: originalError, fallbackError: fallbackResult.error };
  }

  /**
   * Registry execution that turns anything thrown on the way (such as a service whose merged
   * settings fail validation) into a failure result with no attempts made
   */
  private async protect<T>(
    name: string,
    operation: Operation<T>,
    options: ExecuteOptions
  ): Promise<Result<T, ExecutionError>> {
    try {
      return await this.registry.execute(name, operation, options);
    } catch (error) {
      this.logger?.error(`Could not run ${name}`, error, { service: name });
      return failure(new RetryExhaustedError(error, 0, name));
    }
  }
}

function ownEntry<T>(operations: OperationMap<T>, name: string): Operation<T> | undefined {
  return Object.hasOwn(operations, name) ? operations[name] : undefined;
}
