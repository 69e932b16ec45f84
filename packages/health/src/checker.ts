import {
  BACKEND_NAMES,
  type BackendName,
  type BackendsConfig,
} from '@telemetry-guard/configuration';
import { NetworkError, toError } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';
import {
  CircuitOpenError,
  DegradationCoordinator,
  RetryExhaustedError,
  type DegradationOutcome,
  type ExecuteOptions,
  type ExecutionError,
  type Operation,
  type ResilienceRegistry,
} from '@telemetry-guard/resilience';
import type { AxiosInstance } from 'axios';

import { BACKEND_PROBES, BackendProbe, CONNECTION_REFUSED, createHttpClient } from './probes.js';
import {
  BackendStatus,
  type BackendReport,
  type HealthCheckReport,
  type ProbeResult,
} from './types.js';

export interface ExporterHealthCheckerOptions {
  backends: BackendsConfig;
  /** Shared registry; breaker state for each backend accumulates across checks */
  registry: ResilienceRegistry;
  http?: AxiosInstance | undefined;
  logger?: Logger | undefined;
}

export const ALL_HEALTHY = 'All backend services are healthy!';

/**
 * Checks every enabled telemetry backend through the resilience layer. Each backend is
 * protected under its own name, its fallback endpoint under `<name>_fallback`.
 */
export class ExporterHealthChecker {
  private readonly backends: BackendsConfig;
  private readonly coordinator: DegradationCoordinator;
  private readonly http: AxiosInstance;
  private readonly logger: Logger | undefined;

  constructor(options: ExporterHealthCheckerOptions) {
    this.backends = options.backends;
    this.http = options.http ?? createHttpClient();
    this.logger = options.logger;
    this.coordinator = new DegradationCoordinator(options.registry, {
      logger: options.logger?.child('degradation'),
    });
  }

  async checkAll(options: ExecuteOptions = {}): Promise<HealthCheckReport> {
    const startedAt = Date.now();
    const primaries: Record<string, Operation<ProbeResult>> = {};
    const fallbacks: Record<string, Operation<ProbeResult>> = {};

    for (const name of BACKEND_NAMES) {
      const backend = this.backends[name];
      if (!backend.enabled) {
        continue;
      }

      const probe = new BackendProbe(BACKEND_PROBES[name], this.http, this.logger?.child(name));
      primaries[name] = ({ signal }) => probe.probe(backend.endpoint, backend.timeout, signal);

      const fallbackEndpoint = backend.fallback_endpoint;
      if (fallbackEndpoint) {
        fallbacks[name] = ({ signal }) => probe.probe(fallbackEndpoint, backend.timeout, signal);
      }
    }

    this.logger?.info(`Checking ${Object.keys(primaries).length} backend services`);
    const outcomes = await this.coordinator.executeWithFallback(primaries, fallbacks, options);

    const results: Partial<Record<BackendName, BackendReport>> = {};
    const reports: BackendReport[] = [];
    for (const name of BACKEND_NAMES) {
      const outcome = outcomes[name];
      if (outcome) {
        const report = toReport(name, outcome, this.backends[name].endpoint);
        results[name] = report;
        reports.push(report);
      }
    }

    const summary = {
      healthy: reports.filter(report => report.status === BackendStatus.HEALTHY).length,
      total: reports.length,
    };
    this.logger?.info(`Backend health: ${summary.healthy}/${summary.total} healthy`);

    return {
      timestamp: new Date(startedAt),
      durationMs: Date.now() - startedAt,
      results,
      summary,
      recommendations: ExporterHealthChecker.getRecommendations(reports),
    };
  }

  static getRecommendations(reports: readonly BackendReport[]): string[] {
    const recommendations: string[] = [];

    for (const report of reports) {
      if (report.status === BackendStatus.UNHEALTHY) {
        recommendations.push(`Start ${report.backend} service: ${report.endpoint}`);
      } else if (report.status === BackendStatus.WARNING) {
        recommendations.push(
          `Check ${report.backend} configuration: ${report.error ?? 'unknown issue'}`
        );
      }
    }

    if (recommendations.length === 0) {
      recommendations.push(ALL_HEALTHY);
    }

    return recommendations;
  }
}

function fromProbe(
  backend: BackendName,
  result: ProbeResult,
  viaFallback: boolean
): BackendReport {
  return {
    backend,
    status: result.status,
    endpoint: result.endpoint,
    statusCode: result.statusCode,
    ...(result.database !== undefined && { database: result.database }),
    ...(result.detail !== undefined && { error: result.detail }),
    viaFallback,
  };
}

function fromFailure(
  backend: BackendName,
  error: ExecutionError,
  endpoint: string
): BackendReport {
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;

  if (cause instanceof CircuitOpenError) {
    return {
      backend,
      status: BackendStatus.UNHEALTHY,
      endpoint,
      error: cause.message,
      viaFallback: false,
    };
  }
  if (cause instanceof NetworkError && cause.code === CONNECTION_REFUSED) {
    return {
      backend,
      status: BackendStatus.UNHEALTHY,
      endpoint,
      error: 'connection refused',
      viaFallback: false,
    };
  }

  // Timeouts, cancellation and anything else unexpected
  return {
    backend,
    status: BackendStatus.ERROR,
    endpoint,
    error: toError(cause).message,
    viaFallback: false,
  };
}

function toReport(
  backend: BackendName,
  outcome: DegradationOutcome<ProbeResult>,
  endpoint: string
): BackendReport {
  switch (outcome.status) {
    case 'success':
      return fromProbe(backend, outcome.result, false);
    case 'fallback_success':
      return fromProbe(backend, outcome.result, true);
    case 'failed':
      return fromFailure(backend, outcome.error, endpoint);
  }
}
