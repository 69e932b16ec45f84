/**
 * @telemetry-guard/health - Telemetry backend health checks behind circuit breakers
 */

export {
  ExporterHealthChecker,
  ALL_HEALTHY,
  type ExporterHealthCheckerOptions,
} from './checker.js';
export {
  BackendProbe,
  BACKEND_PROBES,
  CONNECTION_REFUSED,
  PROBE_FAILED,
  createHttpClient,
  type BackendProbeDefinition,
} from './probes.js';
export {
  BackendStatus,
  type BackendReport,
  type HealthCheckReport,
  type HealthSummary,
  type ProbeResult,
} from './types.js';
