/**
 * @telemetry-guard/resilience - Circuit breaking, retry and graceful degradation
 *
 * - Per-service circuit breaker with lazy half-open probing
 * - Retry policy with exponential backoff, jitter and cancellation
 * - Registry binding one breaker and retry policy to each service name
 * - Degradation coordinator running fallbacks and reporting outcomes as data
 */

export {
  CircuitState,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  DEFAULT_RETRY_CONFIG,
  MAX_TIMER_DELAY_MS,
  type AttemptContext,
  type CircuitBreakerConfig,
  type CircuitStatus,
  type Clock,
  type ExecuteOptions,
  type ExecutionError,
  type Operation,
  type ResetResult,
  type ResilienceRuntime,
  type RetryAttemptInfo,
  type RetryConfig,
  type Sleep,
} from './types.js';

export { CircuitOpenError, RetryExhaustedError, CancelledError } from './errors.js';

export { CircuitBreaker, type CircuitBreakerOptions } from './circuit-breaker.js';

export {
  RetryPolicy,
  defaultSleep,
  type RetryExecuteOptions,
  type RetryPolicyOptions,
} from './retry.js';

export { ProtectedExecutor, type ProtectedExecutorOptions } from './executor.js';

export {
  ResilienceRegistry,
  type ResilienceRegistryOptions,
  type ServiceOverrides,
} from './registry.js';

export {
  DegradationCoordinator,
  FALLBACK_SUFFIX,
  fallbackServiceName,
  type DegradationOutcome,
  type OperationMap,
} from './degradation.js';
