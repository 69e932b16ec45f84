import { BackendStatus, type HealthCheckReport } from '@telemetry-guard/health';
import { CircuitState, type CircuitStatus } from '@telemetry-guard/resilience';
import { Chalk } from 'chalk';
import { describe, it, expect } from 'vitest';

import { NO_SERVICES, formatHealthReport, formatStatusTable } from '../cli/format.js';

const plain = new Chalk({ level: 0 });

const status = (name: string, state: CircuitState, failureCount: number): CircuitStatus => ({
  name,
  state,
  failureCount,
  lastFailureTimestamp: undefined,
  lastFailureAt: undefined,
});

describe('formatStatusTable', () => {
  it('should explain an empty registry and still show the reset hint', () => {
    expect(formatStatusTable({}, plain)).toEqual([
      NO_SERVICES,
      '',
      '💡 To reset a circuit breaker:',
      '   telemetry-guard reset <service>',
    ]);
  });

  it('should show an icon per state and failures only when counted', () => {
    const lines = formatStatusTable(
      {
        loki: status('loki', CircuitState.CLOSED, 0),
        grafana: status('grafana', CircuitState.OPEN, 5),
        elastic: status('elastic', CircuitState.HALF_OPEN, 5),
      },
      plain
    );

    expect(lines).toEqual([
      '📊 Resilience Status:',
      '   ✅ loki: closed',
      '   ❌ grafana: open',
      '      Failures: 5',
      '   ⚠️ elastic: half_open',
      '      Failures: 5',
      '',
      '💡 To reset a circuit breaker:',
      '   telemetry-guard reset <service>',
    ]);
  });
});

describe('formatHealthReport', () => {
  it('should list each backend with its detail and the recommendations', () => {
    const report: HealthCheckReport = {
      timestamp: new Date('2024-01-02T03:04:05.000Z'),
      durationMs: 12,
      results: {
        elastic: {
          backend: 'elastic',
          status: BackendStatus.UNHEALTHY,
          endpoint: 'http://localhost:8200',
          error: 'connection refused',
          viaFallback: false,
        },
        loki: {
          backend: 'loki',
          status: BackendStatus.HEALTHY,
          endpoint: 'http://loki-backup:3100',
          statusCode: 200,
          viaFallback: true,
        },
        grafana: {
          backend: 'grafana',
          status: BackendStatus.WARNING,
          endpoint: 'http://localhost:3000',
          statusCode: 200,
          database: 'failing',
          error: 'database failing',
          viaFallback: false,
        },
      },
      summary: { healthy: 1, total: 3 },
      recommendations: [
        'Start elastic service: http://localhost:8200',
        'Check grafana configuration: database failing',
      ],
    };

    expect(formatHealthReport(report, plain)).toEqual([
      '📊 Backend Health Summary:',
      '   Healthy: 1/3',
      '   ❌ elastic: unhealthy - connection refused',
      '   ✅ loki: healthy (fallback http://loki-backup:3100)',
      '   ⚠️ grafana: warning - database failing',
      '',
      '💡 Recommendations:',
      '   • Start elastic service: http://localhost:8200',
      '   • Check grafana configuration: database failing',
    ]);
  });
});
