/**
 * Backend health check types
 */

import type { BackendName } from '@telemetry-guard/configuration';

export enum BackendStatus {
  /** Answered with the expected status */
  HEALTHY = 'healthy',
  /** Reachable but answering unexpectedly */
  WARNING = 'warning',
  /** Not reachable, or its circuit is open */
  UNHEALTHY = 'unhealthy',
  /** Any other failure, including timeouts */
  ERROR = 'error',
}

/**
 * What a single HTTP probe learned about a backend
 */
export interface ProbeResult {
  status: BackendStatus.HEALTHY | BackendStatus.WARNING;
  endpoint: string;
  statusCode: number;
  /** Reason for a warning */
  detail?: string | undefined;
  /** Grafana's reported database state */
  database?: string | undefined;
}

export interface BackendReport {
  backend: BackendName;
  status: BackendStatus;
  /** Endpoint that produced the answer, the fallback one when it was used */
  endpoint: string;
  statusCode?: number | undefined;
  database?: string | undefined;
  /** Warning detail or failure message */
  error?: string | undefined;
  viaFallback: boolean;
}

export interface HealthSummary {
  healthy: number;
  total: number;
}

export interface HealthCheckReport {
  timestamp: Date;
  durationMs: number;
  results: Partial<Record<BackendName, BackendReport>>;
  summary: HealthSummary;
  recommendations: string[];
}
