// tests/unit/ResourceClient.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import { ResourceClient, normalizeResourcePath } from '../../src/core/http/ResourceClient';
import type { GetTokenOptions, TokenSource } from '../../src/core/http/types';
import { AuthenticationFailedError, UpstreamUnavailableError } from '../../src/utils/errors';
import { GRAPH_BASE_URL, GRAPH_HOST, createTestLogger, createTestMetrics } from '../helpers/fixtures';

describe('normalizeResourcePath', () => {
  it('should prefix a bare path with a slash', () => {
    expect(normalizeResourcePath("chats('19:abc')/messages('1')")).toBe("/chats('19:abc')/messages('1')");
  });

  it('should strip the API version segment', () => {
    expect(normalizeResourcePath('/v1.0/teams/t/channels/c/messages/1')).toBe('/teams/t/channels/c/messages/1');
    expect(normalizeResourcePath('beta/users/u')).toBe('/users/u');
  });

  it('should reduce absolute urls to path and query', () => {
    expect(normalizeResourcePath(`${GRAPH_BASE_URL}/chats/1/messages?$skiptoken=abc`)).toBe(
      '/chats/1/messages?$skiptoken=abc'
    );
  });

  it('should leave a path that only looks like a version alone', () => {
    expect(normalizeResourcePath('/v1.0beta/things')).toBe('/v1.0beta/things');
  });
});

describe('ResourceClient', () => {
  const logger = createTestLogger();
  let tokens: { getValidToken: Mock<(userId: string, opts?: GetTokenOptions) => Promise<string>> };
  let client: ResourceClient;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    tokens = {
      getValidToken: vi.fn(async (_userId: string, _opts?: GetTokenOptions) => 'fresh-token'),
    };
    const source: TokenSource = tokens;
    const http = new HttpCore(
      { timeoutMs: 2000, retry: { maxRetries: 0, baseDelay: 1, maxDelay: 1 } },
      createTestMetrics(),
      logger
    );
    client = new ResourceClient(http, source, { baseUrl: `${GRAPH_BASE_URL}/` }, logger);
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('should resolve paths against the base url', () => {
    expect(client.resolveUrl('/v1.0/me')).toBe(`${GRAPH_BASE_URL}/me`);
  });

  it('should send the bearer token', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/chats/1/messages/2')
      .matchHeader('authorization', 'Bearer stored-token')
      .reply(200, { id: '2' });

    const response = await client.fetch('GET', 'chats/1/messages/2', 'stored-token', 'user-1');

    expect(response.data).toEqual({ id: '2' });
    expect(tokens.getValidToken).not.toHaveBeenCalled();
  });

  it('should refresh once and replay after a 401', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/chats/1/messages/2')
      .matchHeader('authorization', 'Bearer stale-token')
      .reply(401)
      .get('/v1.0/chats/1/messages/2')
      .matchHeader('authorization', 'Bearer fresh-token')
      .reply(200, { id: '2' });

    const response = await client.fetch('GET', '/chats/1/messages/2', 'stale-token', 'user-1');

    expect(response.data).toEqual({ id: '2' });
    expect(tokens.getValidToken).toHaveBeenCalledTimes(1);
    expect(tokens.getValidToken).toHaveBeenCalledWith('user-1', {
      forceRefresh: true,
      rejectedToken: 'stale-token',
    });
  });

  it('should fail when the refreshed token is rejected too', async () => {
    const scope = nock(GRAPH_HOST).get('/v1.0/chats/1/messages/2').times(2).reply(401);

    const error = await client.fetch('GET', '/chats/1/messages/2', 'stale-token', 'user-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthenticationFailedError);
    expect(error).toMatchObject({ message: 'Upstream rejected the refreshed access token' });
    expect(tokens.getValidToken).toHaveBeenCalledTimes(1);
    expect(scope.isDone()).toBe(true);
  });

  it('should not refresh without a user to refresh for', async () => {
    nock(GRAPH_HOST).get('/v1.0/me').reply(401);

    await expect(client.fetch('GET', '/me', 'stale-token')).rejects.toThrow(AuthenticationFailedError);
    expect(tokens.getValidToken).not.toHaveBeenCalled();
  });

  it('should pass other failures through untouched', async () => {
    nock(GRAPH_HOST).get('/v1.0/me').reply(503);

    await expect(client.fetch('GET', '/me', 'stored-token', 'user-1')).rejects.toThrow(
      UpstreamUnavailableError
    );
    expect(tokens.getValidToken).not.toHaveBeenCalled();
  });

  describe('listAll', () => {
    it('should follow nextLink across pages', async () => {
      nock(GRAPH_HOST)
        .get('/v1.0/chats/1/messages')
        .reply(200, {
          value: [{ id: 'a' }, { id: 'b' }],
          '@odata.nextLink': `${GRAPH_BASE_URL}/chats/1/messages?$skiptoken=page2`,
        })
        .get('/v1.0/chats/1/messages')
        .query({ $skiptoken: 'page2' })
        .reply(200, { value: [{ id: 'c' }] });

      const items = await client.listAll('/chats/1/messages', 'stored-token', 'user-1');

      expect(items).toEqual([{ id: 'a' }, { id: 'b' }, { id: 'c' }]);
    });

    it('should keep using the refreshed token on later pages', async () => {
      nock(GRAPH_HOST)
        .get('/v1.0/chats/1/messages')
        .reply(401)
        .get('/v1.0/chats/1/messages')
        .matchHeader('authorization', 'Bearer fresh-token')
        .reply(200, {
          value: [{ id: 'a' }],
          '@odata.nextLink': `${GRAPH_BASE_URL}/chats/1/messages?$skiptoken=page2`,
        })
        .get('/v1.0/chats/1/messages')
        .query({ $skiptoken: 'page2' })
        .matchHeader('authorization', 'Bearer fresh-token')
        .reply(200, { value: [{ id: 'b' }] });

      const items = await client.listAll('/chats/1/messages', 'stale-token', 'user-1');

      expect(items).toEqual([{ id: 'a' }, { id: 'b' }]);
      expect(tokens.getValidToken).toHaveBeenCalledTimes(1);
    });

    it('should stop at a response that is not a page', async () => {
      nock(GRAPH_HOST).get('/v1.0/chats/1').reply(200, { id: '1' });

      expect(await client.listAll('/chats/1', 'stored-token')).toEqual([]);
    });
  });
});
