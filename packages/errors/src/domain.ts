/**
 * Domain-specific error classes
 */

import { createErrorContext, type ErrorContextOptions } from './context.js';
import { TelemetryGuardError, ErrorSeverity, ErrorCategory, type ErrorMetadata } from './types.js';

export interface DomainErrorOptions {
  code?: string;
  cause?: Error;
  data?: Record<string, unknown>;
  severity?: ErrorSeverity;
  context?: ErrorContextOptions;
}

function buildMetadata(
  category: ErrorCategory,
  defaultSeverity: ErrorSeverity,
  options: DomainErrorOptions
): ErrorMetadata {
  const metadata: ErrorMetadata = {
    severity: options.severity ?? defaultSeverity,
    category,
    context: createErrorContext(options.context),
  };

  if (options.cause !== undefined) {
    metadata.cause = options.cause;
  }
  if (options.data !== undefined) {
    metadata.data = options.data;
  }

  return metadata;
}

/**
 * Network-level failures: refused connections, DNS failures, socket timeouts
 */
export class NetworkError extends TelemetryGuardError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'NETWORK_ERROR',
      buildMetadata(ErrorCategory.NETWORK, ErrorSeverity.HIGH, options)
    );
  }
}

export class ConfigurationError extends TelemetryGuardError {
  constructor(message: string, options: DomainErrorOptions = {}) {
    super(
      message,
      options.code ?? 'CONFIGURATION_ERROR',
      buildMetadata(ErrorCategory.CONFIGURATION, ErrorSeverity.HIGH, options)
    );
  }
}

/**
 * Base for errors raised by resilience gates rather than by the protected operation
 */
export abstract class ResilienceGateError extends TelemetryGuardError {
  constructor(message: string, code: string, options: DomainErrorOptions = {}) {
    super(message, code, buildMetadata(ErrorCategory.RESILIENCE, ErrorSeverity.MEDIUM, options));
  }
}
