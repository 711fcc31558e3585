import { readFileSync } from 'fs';
import { join } from 'path';
import { PassThrough } from 'stream';
import { RequestInit, Response } from 'node-fetch';
import { EntrezApiClient, EntrezClientSettings } from '../../src/infrastructure/http/EntrezApiClient.js';
import { RetryingTransport } from '../../src/infrastructure/http/RetryingTransport.js';
import { TokenBucketRateLimiter } from '../../src/utils/rateLimiter.js';

export type Endpoint = 'esearch' | 'esummary' | 'elink' | 'efetch';

export type RouteHandler = (params: URLSearchParams) => Response | Promise<Response>;

export const TEST_SETTINGS: EntrezClientSettings = {
  baseUrl: 'https://eutils.test/entrez/eutils',
  tool: 'harvester-tests',
  email: 'tests@example.org',
  rateLimit: 1000,
  burst: 100,
};

export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, '..', 'fixtures', name), 'utf-8');
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/**
 * 200 response whose body stream dies after the first chunk
 */
export function brokenBodyResponse(reason: string): Response {
  const body = new PassThrough();
  body.write('LOCUS       NC_000913');
  setImmediate(() => body.destroy(new Error(reason)));
  return new Response(body, { status: 200 });
}

/**
 * Fetch stand-in that dispatches on the endpoint name; unrouted endpoints answer 404
 */
export function entrezFetch(routes: Partial<Record<Endpoint, RouteHandler>>) {
  return jest.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    const parsed = new URL(url);
    const endpoint = parsed.pathname.split('/').pop()?.replace(/\.fcgi$/, '') ?? '';
    const handler = isEndpoint(endpoint) ? routes[endpoint] : undefined;
    return handler ? handler(parsed.searchParams) : textResponse('not routed', 404);
  });
}

function isEndpoint(name: string): name is Endpoint {
  return name === 'esearch' || name === 'esummary' || name === 'elink' || name === 'efetch';
}

export function buildTestClient(
  fetchImpl: ReturnType<typeof entrezFetch>,
  settings: Partial<EntrezClientSettings> = {}
): EntrezApiClient {
  const merged = { ...TEST_SETTINGS, ...settings };
  const transport = new RetryingTransport({
    fetchImpl,
    retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 2, jitter: 0 },
  });
  return new EntrezApiClient(merged, new TokenBucketRateLimiter(merged.rateLimit, merged.burst), transport);
}
