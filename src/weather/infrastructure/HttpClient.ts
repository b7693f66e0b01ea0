// src/weather/infrastructure/HttpClient.ts

/**
 * Shared outbound HTTP client.
 *
 * One axios instance per process, backed by keep-alive agents whose socket
 * pool is bounded by `maxSockets`. Every request gets the configured timeout;
 * callers add their own AbortSignal per request.
 */

import http from 'http';
import https from 'https';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';

export type HttpClientOptions = {
  baseURL?: string;
  timeoutMs: number;
  maxSockets: number;

  /**
   * Replaces the network transport (in-process stand-ins for tests).
   */
  adapter?: AxiosAdapter;
};

export interface HttpClient {
  readonly axios: AxiosInstance;

  /**
   * Close pooled sockets. Call during shutdown.
   */
  destroy(): void;
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const httpAgent = new http.Agent({ keepAlive: true, maxSockets: options.maxSockets });
  const httpsAgent = new https.Agent({ keepAlive: true, maxSockets: options.maxSockets });

  const instance = axios.create({
    ...(options.baseURL ? { baseURL: options.baseURL } : {}),
    timeout: options.timeoutMs,
    httpAgent,
    httpsAgent,
    headers: { Accept: 'application/json' },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  return {
    axios: instance,
    destroy: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}
