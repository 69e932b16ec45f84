/**
 * Result type and error helper functions
 */

import { TelemetryGuardError } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

/**
 * Create a successful result
 */
export function success<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

/**
 * Create a failed result
 */
export function failure<E = Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Normalise any thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Flatten any thrown value into the fields a log entry carries
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof TelemetryGuardError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
