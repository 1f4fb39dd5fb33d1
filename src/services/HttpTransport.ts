import axios from 'axios';
import { CancelledError, describeError, RequestError } from '../types/errors';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, unknown>;
  data: unknown;
}

// Status codes are left to the caller; only "no response at all" is an error here
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export function createAxiosTransport(timeoutMs: number): HttpTransport {
  return async (request) => {
    try {
      const response = await axios.request({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        signal: request.signal,
        timeout: timeoutMs,
        validateStatus: () => true,
      });

      return {
        status: response.status,
        headers: response.headers,
        data: response.data,
      };
    } catch (error) {
      if (request.signal?.aborted || axios.isCancel(error)) {
        throw new CancelledError(`${request.method} ${request.url} cancelled`);
      }
      // Timeouts, refused/reset connections, DNS hiccups
      throw RequestError.transient(`Network error calling ${request.url}: ${describeError(error)}`);
    }
  };
}

export function headerValue(headers: Record<string, unknown>, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  }
  return undefined;
}

// Retry-After is either delta-seconds or an HTTP date
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;

  const seconds = Number(trimmed);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
