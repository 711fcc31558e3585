/**
 * Tests for the retrying HTTP transport
 */

import { FetchError, RequestInit, Response } from 'node-fetch';
import { HttpStatusError } from '../src/core/errors.js';
import {
  buildUrl,
  isRetryableTransportError,
  RetryingTransport,
} from '../src/infrastructure/http/RetryingTransport.js';
import { RetryLog } from '../src/utils/retry.js';
import { brokenBodyResponse } from './helpers/entrez.js';

function statusResponse(status: number, body = ''): Response {
  return new Response(body, { status });
}

function stubFetch() {
  return jest.fn(async (_url: string, _init?: RequestInit): Promise<Response> => statusResponse(200));
}

describe('RetryingTransport', () => {
  it('should retry 5xx answers until one succeeds', async () => {
    const fetchImpl = stubFetch()
      .mockResolvedValueOnce(statusResponse(500))
      .mockResolvedValueOnce(statusResponse(500))
      .mockResolvedValueOnce(statusResponse(200, 'ok'));

    const transport = new RetryingTransport({
      fetchImpl,
      retry: { maxRetries: 3, baseDelayMs: 100, maxDelayMs: 1000, jitter: 0.25 },
    });

    const start = performance.now();
    const res = await transport.execute({ url: 'https://eutils.test/esearch.fcgi' });
    const elapsed = performance.now() - start;

    expect(res).toEqual({ status: 200, text: 'ok' });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    // Two backoffs of at least 75ms and 150ms
    expect(elapsed).toBeGreaterThanOrEqual(150);
  });

  it('should raise the final status error after exactly maxRetries + 1 attempts', async () => {
    const fetchImpl = stubFetch().mockImplementation(async () => statusResponse(500));

    const transport = new RetryingTransport({
      fetchImpl,
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 },
    });

    await expect(transport.execute({ url: 'https://eutils.test/efetch.fcgi' })).rejects.toMatchObject({
      name: 'HttpStatusError',
      status: 500,
      message: 'HTTP error! status: 500',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it('should fail a 400 on the first attempt', async () => {
    const fetchImpl = stubFetch().mockImplementation(async () => statusResponse(400));

    const transport = new RetryingTransport({
      fetchImpl,
      retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 },
    });

    await expect(transport.execute({ url: 'https://eutils.test/esearch.fcgi' })).rejects.toBeInstanceOf(
      HttpStatusError
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('should retry 429 and network faults', async () => {
    const fetchImpl = stubFetch()
      .mockResolvedValueOnce(statusResponse(429))
      .mockRejectedValueOnce(
        new FetchError('request to https://eutils.test/ failed, reason: connect ECONNREFUSED', 'system')
      )
      .mockResolvedValueOnce(statusResponse(200, 'ok'));

    const logs: RetryLog[] = [];
    const transport = new RetryingTransport({
      fetchImpl,
      retry: { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 },
      onRetryLog: (log) => logs.push(log),
    });

    const res = await transport.execute({ url: 'https://eutils.test/' });

    expect(res.status).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(logs.map((log) => log.success)).toEqual([false, false, true]);
    expect(logs[0].error).toBe('HTTP error! status: 429');
  });

  it('should retry a body that breaks off mid-stream', async () => {
    const fetchImpl = stubFetch()
      .mockResolvedValueOnce(brokenBodyResponse('socket hang up'))
      .mockResolvedValueOnce(statusResponse(200, 'LOCUS       NC_000913\n//\n'));

    const transport = new RetryingTransport({
      fetchImpl,
      retry: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 },
    });

    const res = await transport.execute({ url: 'https://eutils.test/efetch.fcgi' });

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(res.text).toBe('LOCUS       NC_000913\n//\n');
  });

  it('should give up on a body that keeps breaking once the budget is spent', async () => {
    const fetchImpl = stubFetch().mockImplementation(async () => brokenBodyResponse('read ECONNRESET'));

    const transport = new RetryingTransport({
      fetchImpl,
      retry: { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 },
    });

    await expect(transport.execute({ url: 'https://eutils.test/efetch.fcgi' })).rejects.toMatchObject({
      name: 'FetchError',
      type: 'system',
    });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('should send a GET with the configured timeout and encoded query', async () => {
    const fetchImpl = stubFetch();
    const transport = new RetryingTransport({ fetchImpl, timeoutMs: 1234 });

    await transport.execute({
      url: 'https://eutils.test/esearch.fcgi',
      params: { db: 'assembly', term: 'Escherichia coli[Organism]', retmax: 5, api_key: undefined },
    });

    expect(fetchImpl).toHaveBeenCalledWith(
      'https://eutils.test/esearch.fcgi?db=assembly&term=Escherichia+coli%5BOrganism%5D&retmax=5',
      { method: 'GET', timeout: 1234 }
    );
  });
});

describe('isRetryableTransportError', () => {
  it('should follow the status error flag', () => {
    expect(isRetryableTransportError(new HttpStatusError(503, 'u', true))).toBe(true);
    expect(isRetryableTransportError(new HttpStatusError(404, 'u', false))).toBe(false);
  });

  it('should retry system, request and body timeout fetch errors only', () => {
    expect(isRetryableTransportError(new FetchError('boom', 'system'))).toBe(true);
    expect(isRetryableTransportError(new FetchError('slow', 'request-timeout'))).toBe(true);
    expect(isRetryableTransportError(new FetchError('stalled body', 'body-timeout'))).toBe(true);
    expect(isRetryableTransportError(new FetchError('bad json', 'invalid-json'))).toBe(false);
  });
});

describe('buildUrl', () => {
  it('should leave the url alone without params', () => {
    expect(buildUrl({ url: 'https://eutils.test/einfo.fcgi' })).toBe('https://eutils.test/einfo.fcgi');
    expect(buildUrl({ url: 'https://eutils.test/einfo.fcgi', params: { a: undefined } })).toBe(
      'https://eutils.test/einfo.fcgi'
    );
  });
});
