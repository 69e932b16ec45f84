import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';

export type StubAnswer = { status: number; data?: unknown } | { code: string };

export const HEALTHY_ROUTES: Record<string, StubAnswer> = {
  'http://localhost:8200/': { status: 200 },
  'http://localhost:3100/ready': { status: 200 },
  'http://localhost:8086/ping': { status: 204 },
  'http://localhost:3000/api/health': { status: 200, data: { database: 'ok' } },
};

/**
 * axios instance answering from a URL table; unknown URLs refuse the connection
 */
export function createStubHttp(routes: Record<string, StubAnswer>): {
  http: AxiosInstance;
  calls: string[];
} {
  const calls: string[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const url = config.url ?? '';
      calls.push(url);
      const answer = routes[url] ?? { code: 'ECONNREFUSED' };
      if ('code' in answer) {
        throw new AxiosError(`connect ${answer.code}`, answer.code, config);
      }
      return {
        data: answer.data ?? '',
        status: answer.status,
        statusText: '',
        headers: {},
        config,
      };
    },
  });
  return { http, calls };
}
