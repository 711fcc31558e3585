import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { HttpStatusError } from '../../core/errors.js';
import {
  DEFAULT_RETRY_CONFIG,
  RetryConfig,
  RetryLog,
  isRetryableError,
  isRetryableStatus,
  withRetry,
} from '../../utils/retry.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpRequest {
  url: string;
  params?: QueryParams;
}

/**
 * A completed exchange; the body has already been read in full
 */
export interface TransportResponse {
  status: number;
  text: string;
}

export interface TransportOptions {
  retry?: RetryConfig;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  random?: () => number;
  onRetryLog?: (log: RetryLog) => void;
}

/**
 * Issues a GET and retries network faults, timeouts, 429 and 5xx.
 * Other 4xx answers fail on the first attempt. The body is read inside the
 * retried call, so a stream cut off mid-transfer counts as a network fault.
 */
export class RetryingTransport {
  private readonly retryConfig: RetryConfig;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TransportOptions = {}) {
    this.retryConfig = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async execute(request: HttpRequest): Promise<TransportResponse> {
    const url = buildUrl(request);

    return withRetry(
      async () => {
        const res = await this.fetchImpl(url, {
          method: 'GET',
          timeout: this.timeoutMs,
        });

        const text = await res.text();

        if (res.status >= 400) {
          throw new HttpStatusError(res.status, url, isRetryableStatus(res.status));
        }

        return { status: res.status, text };
      },
      this.retryConfig,
      {
        shouldRetry: isRetryableTransportError,
        onLog: this.options.onRetryLog,
        random: this.options.random,
      }
    );
  }
}

const RETRYABLE_FETCH_ERRORS: ReadonlySet<string> = new Set(['system', 'request-timeout', 'body-timeout']);

export function isRetryableTransportError(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.retryable;
  }
  if (error instanceof FetchError) {
    return RETRYABLE_FETCH_ERRORS.has(error.type);
  }
  return isRetryableError(error);
}

export function buildUrl(request: HttpRequest): string {
  if (!request.params) {
    return request.url;
  }

  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(request.params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }

  const query = search.toString();
  return query ? `${request.url}?${query}` : request.url;
}
