/**
 * Resilience types shared by the circuit breaker, retry policy and registry
 */

import type { Logger } from '@telemetry-guard/logging';

import type { CancelledError, RetryExhaustedError } from './errors.js';

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half_open',
}

/**
 * Monotonic time source in milliseconds
 */
export type Clock = () => number;

/**
 * Suspends the calling async flow; rejects when the signal aborts
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface AttemptContext {
  /** 1-based attempt number */
  readonly attempt: number;
  readonly signal?: AbortSignal | undefined;
}

/**
 * A protected operation. It receives the attempt context so it can observe cancellation.
 */
export type Operation<T> = (context: AttemptContext) => Promise<T>;

export interface CircuitBreakerConfig {
  /** Consecutive recorded failures that open the circuit */
  failureThreshold: number;
  /** Time the circuit stays open before a single probe is let through */
  recoveryTimeoutMs: number;
  /** Decides whether an error counts against the breaker; every error counts by default */
  isFailure?: ((error: unknown) => boolean) | undefined;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

/**
 * Immutable snapshot of one breaker
 */
export interface CircuitStatus {
  readonly name: string;
  readonly state: CircuitState;
  readonly failureCount: number;
  /** Monotonic clock reading of the last recorded failure */
  readonly lastFailureTimestamp?: number | undefined;
  /** Wall-clock time of the last recorded failure */
  readonly lastFailureAt?: Date | undefined;
}

export type ResetResult = 'ok' | 'not_found';

/**
 * Errors `execute` can resolve with. Operation errors arrive wrapped in RetryExhaustedError.
 */
export type ExecutionError = RetryExhaustedError | CancelledError;

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that failed */
  readonly attempt: number;
  readonly error: unknown;
  /** Delay before the next attempt */
  readonly delayMs: number;
}

export interface ExecuteOptions {
  signal?: AbortSignal | undefined;
  onRetry?: ((info: RetryAttemptInfo) => void) | undefined;
}

export interface ResilienceRuntime {
  logger?: Logger | undefined;
  clock?: Clock | undefined;
  sleep?: Sleep | undefined;
  /** Uniform random source in [0, 1) used for jitter */
  random?: (() => number) | undefined;
}

/**
 * Longest delay Node's timers honour; larger values fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: Readonly<CircuitBreakerConfig> = {
  failureThreshold: 5,
  recoveryTimeoutMs: 60_000,
};

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  backoffMultiplier: 2,
  jitter: true,
};
