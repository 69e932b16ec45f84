/**
 * @telemetry-guard/errors - Shared error handling
 *
 * - Base error class with severity, category and correlation context
 * - Domain-specific error types
 * - Result types for returning failures as values
 */

export {
  ErrorSeverity,
  ErrorCategory,
  TelemetryGuardError,
  type ErrorContext,
  type ErrorMetadata,
} from './types.js';

export {
  NetworkError,
  ConfigurationError,
  ResilienceGateError,
  type DomainErrorOptions,
} from './domain.js';

export { createErrorContext, generateCorrelationId, type ErrorContextOptions } from './context.js';

export { type Result, success, failure, toError, extractErrorInfo } from './utils.js';
