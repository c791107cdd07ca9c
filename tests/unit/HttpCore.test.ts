// tests/unit/HttpCore.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import type { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  ApiClientError,
  AuthenticationFailedError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
  UpstreamUnavailableError,
  isRetriable,
} from '../../src/utils/errors';
import { createTestLogger, createTestMetrics } from '../helpers/fixtures';

const API = 'https://graph.example.test';

describe('HttpCore', () => {
  const logger = createTestLogger();
  let metrics: MetricsCollector;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let httpCore: HttpCore;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    metrics = createTestMetrics();
    sleep = vi.fn(async (_ms: number) => {});
    httpCore = new HttpCore(
      { timeoutMs: 200, retry: { maxRetries: 2, baseDelay: 10, maxDelay: 100 } },
      metrics,
      logger,
      sleep
    );
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should return data, status and lower-cased headers', async () => {
    nock(API).get('/items').query({ top: '5' }).reply(200, { value: [] }, { 'X-Custom': 'yes' });

    const response = await httpCore.get(`${API}/items`, { query: { top: 5 } });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ value: [] });
    expect(response.headers['x-custom']).toBe('yes');
    expect(await metrics.getCounterValue('http_requests_total', { method: 'GET', status: '200' })).toBe(1);
  });

  it('should send a request id and caller headers', async () => {
    const scope = nock(API)
      .get('/me')
      .matchHeader('authorization', 'Bearer test-token')
      .matchHeader('x-request-id', /^[0-9a-f-]{36}$/)
      .reply(200, {});

    await httpCore.get(`${API}/me`, { headers: { Authorization: 'Bearer test-token' } });

    expect(scope.isDone()).toBe(true);
  });

  it('should map 401 to AuthenticationFailedError without retrying', async () => {
    nock(API).get('/me').reply(401, { error: { code: 'InvalidAuthenticationToken' } });

    const error = await httpCore.get(`${API}/me`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationFailedError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should map 403 to a permanent client error', async () => {
    nock(API).get('/chats/1').reply(403, { error: { code: 'Forbidden' } });

    const error = await httpCore.get(`${API}/chats/1`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiClientError);
    expect(error).toMatchObject({ status: 403, code: 'CLIENT_ERROR' });
    expect(isRetriable(error)).toBe(false);
  });

  it('should map 404 to a client error', async () => {
    nock(API).get('/chats/missing').reply(404);

    await expect(httpCore.get(`${API}/chats/missing`)).rejects.toMatchObject({ status: 404 });
  });

  it('should surface 429 with the last Retry-After once retries run out', async () => {
    nock(API).get('/busy').times(3).reply(429, {}, { 'Retry-After': '7' });

    const error = await httpCore.get(`${API}/busy`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 7, status: 429 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 100]);
    expect(await metrics.getCounterValue('rate_limit_hits')).toBe(1);
  });

  it('should recover when a retry succeeds', async () => {
    nock(API).get('/flaky').reply(502).get('/flaky').reply(200, { ok: true });

    const response = await httpCore.get(`${API}/flaky`);

    expect(response.data).toEqual({ ok: true });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('should map persistent 5xx to UpstreamUnavailableError', async () => {
    nock(API).get('/down').times(3).reply(503);

    const error = await httpCore.get(`${API}/down`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamUnavailableError);
    expect(error).toMatchObject({ status: 503 });
    expect(isRetriable(error)).toBe(true);
    expect(await metrics.getCounterValue('http_errors', { status: '503' })).toBe(1);
  });

  it('should map timeouts to NetworkTimeoutError', async () => {
    nock(API).get('/slow').times(3).delay(1000).reply(200, {});

    const error = await httpCore.get(`${API}/slow`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkTimeoutError);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should map transport failures to NetworkError', async () => {
    nock(API)
      .get('/reset')
      .times(3)
      .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' });

    const error = await httpCore.get(`${API}/reset`).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).not.toBeInstanceOf(NetworkTimeoutError);
    expect(error).toMatchObject({ message: 'Network error: socket hang up' });
  });

  it('should pace requests through the rate limiter', async () => {
    const paced = new HttpCore(
      {
        timeoutMs: 200,
        retry: { maxRetries: 0, baseDelay: 1, maxDelay: 1 },
        rateLimit: { qps: 100, concurrency: 1 },
      },
      metrics,
      logger
    );
    nock(API).get('/a').reply(200, 'a').get('/b').reply(200, 'b');

    const [a, b] = await Promise.all([paced.get(`${API}/a`), paced.get(`${API}/b`)]);

    expect([a.data, b.data]).toEqual(['a', 'b']);
    expect(paced.getQueueSize()).toBe(0);
  });
});
