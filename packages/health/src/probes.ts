/**
 * HTTP probes for the telemetry backends
 */

import type { BackendName } from '@telemetry-guard/configuration';
import { NetworkError, toError } from '@telemetry-guard/errors';
import type { Logger } from '@telemetry-guard/logging';
import axios, { isAxiosError, type AxiosInstance, type AxiosResponse } from 'axios';

import { BackendStatus, type ProbeResult } from './types.js';

export interface BackendProbeDefinition {
  name: BackendName;
  path: string;
  expectedStatus: number;
  /** Inspect a response with the expected status; a returned detail makes it a warning */
  inspectBody?: ((body: unknown) => { detail?: string; database?: string }) | undefined;
}

/**
 * Error codes meaning nothing is listening at the endpoint
 */
const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

export const CONNECTION_REFUSED = 'CONNECTION_REFUSED';
export const PROBE_FAILED = 'PROBE_FAILED';

function readDatabase(body: unknown): string | undefined {
  if (body && typeof body === 'object' && 'database' in body) {
    return typeof body.database === 'string' ? body.database : undefined;
  }
  return undefined;
}

export const BACKEND_PROBES: Readonly<Record<BackendName, BackendProbeDefinition>> = {
  elastic: { name: 'elastic', path: '/', expectedStatus: 200 },
  loki: { name: 'loki', path: '/ready', expectedStatus: 200 },
  influxdb: { name: 'influxdb', path: '/ping', expectedStatus: 204 },
  grafana: {
    name: 'grafana',
    path: '/api/health',
    expectedStatus: 200,
    inspectBody: body => {
      const database = readDatabase(body);
      return database === 'ok'
        ? { database }
        : { detail: `database ${database ?? 'unknown'}`, ...(database && { database }) };
    },
  },
};

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: { 'User-Agent': 'telemetry-guard/0.1' },
    // Every HTTP answer is classified by the probe, not by axios
    validateStatus: () => true,
  });
}

/**
 * Probes one backend. HTTP answers resolve as healthy or warning; transport failures throw
 * NetworkError so the resilience layer retries them and counts them against the breaker.
 */
export class BackendProbe {
  constructor(
    private readonly definition: BackendProbeDefinition,
    private readonly http: AxiosInstance,
    private readonly logger?: Logger | undefined
  ) {}

  get name(): BackendName {
    return this.definition.name;
  }

  async probe(endpoint: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeResult> {
    const url = `${endpoint.replace(/\/+$/, '')}${this.definition.path}`;
    this.logger?.debug(`Probing ${this.definition.name} at ${url}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(url, {
        timeout: timeoutMs,
        ...(signal && { signal }),
      });
    } catch (error) {
      throw this.toNetworkError(error, endpoint);
    }

    if (response.status !== this.definition.expectedStatus) {
      return {
        status: BackendStatus.WARNING,
        endpoint,
        statusCode: response.status,
        detail: `unexpected status ${response.status}`,
      };
    }

    const inspection = this.definition.inspectBody?.(response.data) ?? {};
    return {
      status: inspection.detail ? BackendStatus.WARNING : BackendStatus.HEALTHY,
      endpoint,
      statusCode: response.status,
      ...(inspection.detail && { detail: inspection.detail }),
      ...(inspection.database && { database: inspection.database }),
    };
  }

  private toNetworkError(error: unknown, endpoint: string): NetworkError {
    const code = isAxiosError(error) ? error.code : undefined;
    const unreachable = code !== undefined && UNREACHABLE_CODES.has(code);

    return new NetworkError(
      unreachable
        ? `${this.definition.name} is not reachable at ${endpoint}: connection refused`
        : `Error checking ${this.definition.name}: ${toError(error).message}`,
      {
        code: unreachable ? CONNECTION_REFUSED : PROBE_FAILED,
        cause: toError(error),
        context: { service: this.definition.name, operation: 'probe', metadata: { endpoint } },
        data: { axiosCode: code },
      }
    );
  }
}
