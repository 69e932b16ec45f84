/**
 * Error types and base classes shared by every telemetry-guard package
 */

/**
 * Error severity levels for classification and handling
 */
export enum ErrorSeverity {
  /** Informational, the operation can continue */
  LOW = 'low',
  /** Some functionality is affected */
  MEDIUM = 'medium',
  /** Significant functionality is affected */
  HIGH = 'high',
  /** Core functionality is unavailable */
  CRITICAL = 'critical',
}

/**
 * Error categories for domain-specific error handling
 */
export enum ErrorCategory {
  /** Timeouts, refused connections, DNS failures */
  NETWORK = 'network',
  /** Invalid or unreadable configuration */
  CONFIGURATION = 'configuration',
  /** A resilience gate (circuit breaker, retry budget, cancellation) stopped the call */
  RESILIENCE = 'resilience',
  UNKNOWN = 'unknown',
}

/**
 * Error context for tracking operations and debugging
 */
export interface ErrorContext {
  /** Unique correlation ID for tracking errors across operations */
  correlationId: string;
  /** Operation name or identifier */
  operation?: string;
  /** Service name the operation was protecting */
  service?: string;
  /** Component or module where the error occurred */
  component?: string;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  context: ErrorContext;
  /** Original error that caused this error */
  cause?: Error;
  data?: Record<string, unknown>;
}

/**
 * Base error class with metadata and context tracking
 */
export abstract class TelemetryGuardError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(message: string, code: string, metadata: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get severity(): ErrorSeverity {
    return this.metadata.severity;
  }

  get category(): ErrorCategory {
    return this.metadata.category;
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      correlationId: this.metadata.context.correlationId,
      operation: this.metadata.context.operation,
      service: this.metadata.context.service,
      component: this.metadata.context.component,
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }
}
