import { linkSignal } from '../abort.js';
import { TransientError, ValidationError, errorMessage } from '../errors.js';

export interface FetchResponse {
  status: number;
  url: string;
  headers: Record<string, string>;
  body: Buffer;
}

export interface FetchOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchFn = (url: string, options?: FetchOptions) => Promise<FetchResponse>;

export const defaultFetch: FetchFn = async (url, options = {}) => {
  const response = await fetch(url, {
    method: options.method ?? 'GET',
    headers: options.headers,
    body: options.body,
    signal: options.signal,
    redirect: 'follow',
  });
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return {
    status: response.status,
    url: response.url || url,
    headers,
    body: Buffer.from(await response.arrayBuffer()),
  };
};

/** 429 and 5xx can succeed later; any other non-2xx will not. */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Perform a request with a timeout and map failures onto the pipeline taxonomy:
 * network errors, timeouts and retryable statuses are transient, other non-2xx
 * responses are validation failures.
 */
export async function request(
  fetchFn: FetchFn,
  url: string,
  options: FetchOptions & { timeoutMs: number; what: string }
): Promise<FetchResponse> {
  const link = linkSignal(options.signal, options.timeoutMs);
  let response: FetchResponse;
  try {
    response = await fetchFn(url, {
      method: options.method,
      headers: options.headers,
      body: options.body,
      signal: link.signal,
    });
  } catch (e) {
    const reason = link.timedOut() ? `timed out after ${options.timeoutMs}ms` : errorMessage(e);
    throw new TransientError(`${options.what}: ${reason}`, { cause: e });
  } finally {
    link.dispose();
  }

  if (response.status >= 200 && response.status < 300) {
    return response;
  }
  const message = `${options.what}: HTTP ${response.status}`;
  if (isRetryableStatus(response.status)) {
    throw new TransientError(message);
  }
  throw new ValidationError(message);
}

export function parseJsonBody(response: FetchResponse, what: string): unknown {
  try {
    return JSON.parse(response.body.toString('utf-8'));
  } catch (e) {
    throw new ValidationError(`${what}: response is not JSON (${errorMessage(e)})`);
  }
}

export async function postJson(
  fetchFn: FetchFn,
  url: string,
  payload: unknown,
  options: { headers?: Record<string, string>; timeoutMs: number; what: string; signal?: AbortSignal }
): Promise<unknown> {
  const response = await request(fetchFn, url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', accept: 'application/json', ...options.headers },
    body: JSON.stringify(payload),
    timeoutMs: options.timeoutMs,
    what: options.what,
    signal: options.signal,
  });
  return parseJsonBody(response, options.what);
}
