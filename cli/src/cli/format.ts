/**
 * Console rendering of health reports and breaker status
 */

import {
  BackendStatus,
  type BackendReport,
  type HealthCheckReport,
} from '@telemetry-guard/health';
import { CircuitState, type CircuitStatus } from '@telemetry-guard/resilience';
import chalk, { type ChalkInstance } from 'chalk';

export const NO_SERVICES = 'ℹ️  No services being monitored for resilience';

const STATE_ICONS: Record<CircuitState, string> = {
  [CircuitState.CLOSED]: '✅',
  [CircuitState.HALF_OPEN]: '⚠️',
  [CircuitState.OPEN]: '❌',
};

export function backendIcon(status: BackendStatus): string {
  switch (status) {
    case BackendStatus.HEALTHY:
      return '✅';
    case BackendStatus.WARNING:
      return '⚠️';
    case BackendStatus.UNHEALTHY:
    case BackendStatus.ERROR:
      return '❌';
  }
}

function describeBackend(report: BackendReport): string {
  const line = `   ${backendIcon(report.status)} ${report.backend}: ${report.status}`;
  if (report.viaFallback) {
    return `${line} (fallback ${report.endpoint})`;
  }
  return report.error && report.status !== BackendStatus.HEALTHY
    ? `${line} - ${report.error}`
    : line;
}

export function formatHealthReport(
  report: HealthCheckReport,
  paint: ChalkInstance = chalk
): string[] {
  const lines = [
    paint.bold('📊 Backend Health Summary:'),
    `   Healthy: ${report.summary.healthy}/${report.summary.total}`,
  ];

  for (const backend of Object.values(report.results)) {
    if (backend) {
      lines.push(describeBackend(backend));
    }
  }

  lines.push('', paint.bold('💡 Recommendations:'));
  for (const recommendation of report.recommendations) {
    lines.push(`   • ${recommendation}`);
  }

  return lines;
}

/**
 * One block per breaker: icon, name and state, plus a failure line when failures are counted
 */
export function formatStatusTable(
  statuses: Readonly<Record<string, CircuitStatus>>,
  paint: ChalkInstance = chalk
): string[] {
  const entries = Object.entries(statuses);
  const lines: string[] = [];

  if (entries.length === 0) {
    lines.push(NO_SERVICES);
  } else {
    lines.push(paint.bold('📊 Resilience Status:'));
    for (const [name, status] of entries) {
      lines.push(`   ${STATE_ICONS[status.state]} ${name}: ${status.state}`);
      if (status.failureCount > 0) {
        lines.push(`      Failures: ${status.failureCount}`);
      }
    }
  }

  lines.push(
    '',
    paint.bold('💡 To reset a circuit breaker:'),
    '   telemetry-guard reset <service>'
  );
  return lines;
}
