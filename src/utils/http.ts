import axios, { type AxiosResponse } from 'axios';
import type { ApiCallInput } from '../trace/types';
import { BaseError, RateLimitError, describeError } from './errors';
import { defaultIsRetryable, retry } from './retry';

export class HttpRequestError extends BaseError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly method: string,
    public readonly body?: string
  ) {
    super(`HTTP ${method} ${url} failed with ${status} ${statusText}`, {
      url,
      status,
      statusText,
      method
    });
  }
}

export type QueryValue = string | number | boolean | null | undefined;

export interface HttpRequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  query?: Record<string, QueryValue>;
  /** JSON body for POST requests */
  body?: unknown;
  timeout?: number;
  signal?: AbortSignal;
  /** Extra attempts for transient failures (network, 429, 5xx) */
  retries?: number;
  retryDelayMs?: number;
  /** Receives one record per attempt */
  recordCall?: (call: ApiCallInput) => void;
}

export interface HttpTextResponse {
  status: number;
  body: string;
}

const SENSITIVE_PARAM = /(api[_-]?key|apikey|token|secret|password|auth)/i;

export function buildUrl(baseUrl: string, query?: HttpRequestOptions['query']): string {
  if (!query) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Replace credential-looking query values so URLs can be traced and logged
 */
export function redactUrl(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    for (const key of [...url.searchParams.keys()]) {
      if (SENSITIVE_PARAM.test(key)) {
        url.searchParams.set(key, 'REDACTED');
      }
    }
    return url.toString();
  } catch {
    return rawUrl;
  }
}

export function isTransientHttpError(error: unknown): boolean {
  if (error instanceof HttpRequestError) {
    return error.status >= 500;
  }
  return error instanceof RateLimitError || defaultIsRetryable(error);
}

function readBody(response: AxiosResponse<unknown>): string {
  const { data } = response;
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}

function readRetryAfter(response: AxiosResponse<unknown>): number | undefined {
  const value: unknown = response.headers['retry-after'];
  if (typeof value !== 'string') return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Perform a request and return the raw body. Non-2xx responses throw
 * HttpRequestError (RateLimitError for 429); every attempt is reported to
 * `recordCall`.
 */
export async function requestText(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpTextResponse> {
  const method = options.method ?? 'GET';
  const fullUrl = buildUrl(url, options.query);
  const endpoint = redactUrl(fullUrl);

  const attempt = async (): Promise<HttpTextResponse> => {
    const started = Date.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await axios.request<unknown>({
        url: fullUrl,
        method,
        headers: options.headers,
        data: options.body,
        timeout: options.timeout,
        signal: options.signal,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
        validateStatus: () => true
      });
    } catch (error) {
      options.recordCall?.({
        endpoint,
        method,
        status: null,
        latencyMs: Date.now() - started,
        cached: false,
        error: describeError(error)
      });
      throw error;
    }

    const latencyMs = Date.now() - started;
    const body = readBody(response);

    if (response.status === 429) {
      const error = new RateLimitError(new URL(fullUrl).hostname, readRetryAfter(response));
      options.recordCall?.({ endpoint, method, status: 429, latencyMs, cached: false, error: error.message });
      throw error;
    }

    if (response.status >= 400) {
      const error = new HttpRequestError(endpoint, response.status, response.statusText, method, body);
      options.recordCall?.({
        endpoint,
        method,
        status: response.status,
        latencyMs,
        cached: false,
        error: error.message
      });
      throw error;
    }

    options.recordCall?.({ endpoint, method, status: response.status, latencyMs, cached: false });
    return { status: response.status, body };
  };

  return retry(attempt, {
    maxAttempts: 1 + (options.retries ?? 0),
    initialDelay: options.retryDelayMs ?? 1000,
    backoff: 'linear',
    jitter: 0,
    isRetryable: isTransientHttpError,
    signal: options.signal
  });
}

/**
 * Parse a body as JSON into `unknown`; callers validate the shape
 */
export function parseJsonBody(body: string, url: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new BaseError('Failed to parse JSON response', {
      url: redactUrl(url),
      error: describeError(error)
    });
  }
}
