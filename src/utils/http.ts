import fetch from 'node-fetch';
import { logger } from './logger';
import { UpstreamHttpError } from './ErrorHandler';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  body?: string;
  timeoutMs: number;
}

export interface HttpResult {
  status: number;
  body: string;
}

/** Outbound HTTP seam; swapped for an in-process fake in tests. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResult>;

export const nodeFetchTransport: HttpTransport = async (request) => {
  const startTime = Date.now();
  const response = await fetch(request.url, {
    method: request.method,
    body: request.body,
    headers: request.body !== undefined ? { 'Content-Type': 'application/json' } : undefined,
    timeout: request.timeoutMs,
  });
  const body = await response.text();
  logger.logApiCall(request.method, request.url, response.status, Date.now() - startTime);
  return { status: response.status, body };
};

/** GET and parse JSON, throwing UpstreamHttpError on a non-2xx status. */
export async function getJson(
  transport: HttpTransport,
  service: string,
  url: string,
  timeoutMs: number
): Promise<unknown> {
  const result = await transport({ method: 'GET', url, timeoutMs });
  if (result.status < 200 || result.status >= 300) {
    throw new UpstreamHttpError(service, result.status, url);
  }
  return JSON.parse(result.body);
}

export async function postJson(
  transport: HttpTransport,
  service: string,
  url: string,
  payload: unknown,
  timeoutMs: number
): Promise<number> {
  const result = await transport({ method: 'POST', url, body: JSON.stringify(payload), timeoutMs });
  if (result.status < 200 || result.status >= 300) {
    throw new UpstreamHttpError(service, result.status, url);
  }
  return result.status;
}
