// tests/unit/NotificationWorker.test.ts

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import nock from 'nock';
import { NotificationWorker } from '../../src/pipeline/NotificationWorker';
import { SubscriptionRegistry } from '../../src/pipeline/SubscriptionRegistry';
import { HttpCore } from '../../src/core/http/HttpCore';
import { ResourceClient } from '../../src/core/http/ResourceClient';
import type { GetTokenOptions } from '../../src/core/http/types';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import { MessageRepository } from '../../src/storage/MessageRepository';
import { NotificationRepository } from '../../src/storage/NotificationRepository';
import type { SqliteDatabase } from '../../src/storage/Database';
import type { NewNotification } from '../../src/storage/types';
import type { WorkerOptions } from '../../src/pipeline/types';
import type { MetricsCollector } from '../../src/observability/MetricsCollector';
import { NoSessionError } from '../../src/utils/errors';
import {
  GRAPH_BASE_URL,
  GRAPH_HOST,
  channelMessage,
  createTestConfig,
  createTestDatabase,
  createTestLogger,
  createTestMetrics,
} from '../helpers/fixtures';

function notification(overrides: Partial<NewNotification> = {}): NewNotification {
  return {
    subscriptionId: 'sub-1',
    resourcePath: '/teams/team-1/channels/channel-1/messages/m1',
    changeType: 'created',
    rawPayload: '{}',
    ...overrides,
  };
}

describe('NotificationWorker', () => {
  const logger = createTestLogger();
  let db: SqliteDatabase;
  let notifications: NotificationRepository;
  let messages: MessageRepository;
  let registry: SubscriptionRegistry;
  let metrics: MetricsCollector;
  let tokens: { getValidToken: Mock<(userId: string, opts?: GetTokenOptions) => Promise<string>> };
  let resources: ResourceClient;
  let worker: NotificationWorker;

  function createWorker(
    options: Partial<WorkerOptions> = {},
    queue: NotificationRepository = notifications
  ): NotificationWorker {
    return new NotificationWorker(
      {
        notifications: queue,
        messages,
        owners: registry,
        tokens,
        resources,
        normalizer: new Normalizer(),
        logger,
        metrics,
      },
      { ...createTestConfig().worker, ...options }
    );
  }

  function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    db = createTestDatabase();
    notifications = new NotificationRepository(db, 3);
    messages = new MessageRepository(db);
    registry = new SubscriptionRegistry({ backend: 'memory' }, logger, 'user-1');
    metrics = createTestMetrics();
    tokens = {
      getValidToken: vi.fn(async (_userId: string, _opts?: GetTokenOptions) => 'test-access-token'),
    };

    const http = new HttpCore(
      { timeoutMs: 2000, retry: { maxRetries: 0, baseDelay: 1, maxDelay: 1 } },
      metrics,
      logger
    );
    resources = new ResourceClient(http, tokens, { baseUrl: GRAPH_BASE_URL }, logger);
    worker = createWorker();
  });

  afterEach(async () => {
    await worker.stop();
    await registry.disconnect();
    nock.cleanAll();
    db.close();
  });

  it('should fetch, normalize and store a created message', async () => {
    const scope = nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .matchHeader('authorization', 'Bearer test-access-token')
      .reply(200, channelMessage('m1'));
    const id = notifications.enqueue(notification());

    expect(await worker.runOnce()).toBe(1);

    expect(scope.isDone()).toBe(true);
    expect(notifications.getById(id)?.status).toBe('done');
    expect(messages.getById('m1')).toMatchObject({
      messageId: 'm1',
      teamId: 'team-1',
      channelId: 'channel-1',
      senderName: 'Ada Lovelace',
      bodyText: 'Build passed',
    });
    expect(tokens.getValidToken).toHaveBeenCalledWith('user-1');
    expect(await metrics.getCounterValue('messages_stored', { result: 'inserted' })).toBe(1);
  });

  it('should resolve the token for the registered subscription owner', async () => {
    await registry.register('sub-2', 'user-2');
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(200, channelMessage('m1'));
    notifications.enqueue(notification({ subscriptionId: 'sub-2' }));

    await worker.runOnce();

    expect(tokens.getValidToken).toHaveBeenCalledWith('user-2');
  });

  it('should complete a notification for an already stored message without a duplicate', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .times(2)
      .reply(200, channelMessage('m1'));
    const first = notifications.enqueue(notification());
    const second = notifications.enqueue(notification({ changeType: 'updated' }));

    await worker.runOnce();

    expect(notifications.getById(first)?.status).toBe('done');
    expect(notifications.getById(second)?.status).toBe('done');
    expect(messages.count()).toBe(1);
    expect(await metrics.getCounterValue('messages_stored', { result: 'duplicate' })).toBe(1);
  });

  it('should complete a deletion without fetching', async () => {
    const id = notifications.enqueue(notification({ changeType: 'deleted' }));

    await worker.runOnce();

    expect(notifications.getById(id)?.status).toBe('done');
    expect(tokens.getValidToken).not.toHaveBeenCalled();
    expect(messages.count()).toBe(0);
  });

  it('should store every item of a collection across pages', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/chats/chat-1/messages')
      .reply(200, {
        value: [channelMessage('m1'), { body: { content: 'no id' } }],
        '@odata.nextLink': `${GRAPH_BASE_URL}/chats/chat-1/messages?$skiptoken=page2`,
      })
      .get('/v1.0/chats/chat-1/messages')
      .query({ $skiptoken: 'page2' })
      .reply(200, { value: [channelMessage('m2')] });
    const id = notifications.enqueue(notification({ resourcePath: '/chats/chat-1/messages' }));

    await worker.runOnce();

    expect(notifications.getById(id)?.status).toBe('done');
    expect(messages.listRecent(10).map((message) => message.messageId).sort()).toEqual(['m1', 'm2']);
  });

  it('should abandon a forbidden resource after one attempt', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(403, { error: { code: 'Forbidden' } });
    const id = notifications.enqueue(notification());

    await worker.runOnce();

    expect(notifications.getById(id)).toMatchObject({
      status: 'failed',
      attempts: 1,
      permanent: true,
      lastError: 'CLIENT_ERROR: Client error: 403',
    });
    expect(await metrics.getCounterValue('notifications_poisoned')).toBe(1);
    expect(await worker.runOnce()).toBe(0);
  });

  it('should abandon a payload without a message id', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(200, { body: { content: 'orphan' } });
    const id = notifications.enqueue(notification());

    await worker.runOnce();

    expect(notifications.getById(id)).toMatchObject({ status: 'failed', permanent: true });
  });

  it('should retry a missing session until the attempt cap', async () => {
    tokens.getValidToken.mockRejectedValue(new NoSessionError('user-1'));
    const id = notifications.enqueue(notification());

    expect(await worker.runOnce()).toBe(1);
    expect(await worker.runOnce()).toBe(1);
    expect(await worker.runOnce()).toBe(1);
    expect(await worker.runOnce()).toBe(0);

    expect(notifications.getById(id)).toMatchObject({
      status: 'failed',
      attempts: 3,
      permanent: false,
    });
    expect(notifications.counts().poisoned).toBe(1);
    expect(await metrics.getCounterValue('notifications_processed', { outcome: 'failed' })).toBe(3);
  });

  it('should retry after an upstream outage', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(503)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(200, channelMessage('m1'));
    const id = notifications.enqueue(notification());

    await worker.runOnce();
    expect(notifications.getById(id)).toMatchObject({ status: 'failed', attempts: 1, permanent: false });

    await worker.runOnce();
    expect(notifications.getById(id)?.status).toBe('done');
    expect(messages.exists('m1')).toBe(true);
  });

  it('should hold a throttled row back for the Retry-After period', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(429, {}, { 'Retry-After': '30' });
    const before = Date.now();
    const id = notifications.enqueue(notification());

    await worker.runOnce();

    const row = notifications.getById(id);
    expect(row?.status).toBe('failed');
    expect(row?.nextAttemptAt.getTime()).toBeGreaterThanOrEqual(before + 30_000);
    expect(await worker.runOnce()).toBe(0);
  });

  it('should run no more rows at once than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    tokens.getValidToken.mockImplementation(async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(30);
      active--;
      return 'test-access-token';
    });
    for (const id of ['m1', 'm2', 'm3', 'm4']) {
      nock(GRAPH_HOST)
        .get(`/v1.0/teams/team-1/channels/channel-1/messages/${id}`)
        .reply(200, channelMessage(id));
      notifications.enqueue(
        notification({ resourcePath: `/teams/team-1/channels/channel-1/messages/${id}` })
      );
    }

    expect(await worker.runOnce()).toBe(4);

    expect(peak).toBe(2);
    expect(messages.count()).toBe(4);
    expect(notifications.counts().done).toBe(4);
  });

  it('should release rows whose lock went stale before claiming', async () => {
    const id = notifications.enqueue(notification({ changeType: 'deleted' }));
    notifications.claimBatch(1, Date.now() - 120_000);

    expect(await worker.runOnce()).toBe(1);

    expect(notifications.getById(id)).toMatchObject({ status: 'done', attempts: 1 });
  });

  it('should report a stale row at the attempt cap as abandoned', async () => {
    const capped = new NotificationRepository(db, 1);
    const id = capped.enqueue(notification());
    capped.claimBatch(1, Date.now() - 120_000);
    const cappedWorker = createWorker({}, capped);

    expect(await cappedWorker.runOnce()).toBe(0);

    expect(capped.getById(id)).toMatchObject({
      status: 'failed',
      attempts: 1,
      lastError: 'Processing interrupted: lock expired',
    });
    expect(await metrics.getCounterValue('notifications_poisoned')).toBe(1);
  });

  it('should not complete a row whose lock was released while it ran', async () => {
    nock(GRAPH_HOST)
      .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
      .reply(200, channelMessage('m1'));
    const id = notifications.enqueue(notification());

    const run = worker.runOnce();
    expect(notifications.recoverStaleLocks(0, Date.now() + 1)).toHaveLength(1);
    expect(await run).toBe(1);

    expect(notifications.getById(id)).toMatchObject({ status: 'failed', attempts: 1 });
    expect(messages.exists('m1')).toBe(true);
    expect(await metrics.getCounterValue('notifications_processed', { outcome: 'done' })).toBe(0);
  });

  it('should publish queue depth after a batch', async () => {
    notifications.enqueue(notification({ changeType: 'deleted' }));

    await worker.runOnce();

    expect(await metrics.getMetrics()).toContain('notification_queue_depth{status="done"} 1');
  });

  describe('lifecycle', () => {
    it('should process rows in the background after a wake', async () => {
      worker.start();
      expect(worker.getStatus().running).toBe(true);

      const id = notifications.enqueue(notification({ changeType: 'deleted' }));
      worker.wake();

      await vi.waitFor(() => expect(notifications.getById(id)?.status).toBe('done'), {
        timeout: 2000,
      });

      await worker.stop();
      expect(worker.getStatus().running).toBe(false);
      expect(worker.getStatus().lastPollAt).toBeDefined();
    });

    it('should recover a row whose lock goes stale after the worker started', async () => {
      worker = createWorker({ staleLockMs: 200, pollIntervalMs: 20 });
      const id = notifications.enqueue(notification({ changeType: 'deleted' }));
      notifications.claimBatch(1);

      worker.start();

      await vi.waitFor(() => expect(notifications.getById(id)?.status).toBe('done'), {
        timeout: 2000,
      });
      expect(notifications.getById(id)?.attempts).toBe(1);
    });

    it('should let an in-flight row finish within the shutdown grace period', async () => {
      nock(GRAPH_HOST)
        .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
        .delay(200)
        .reply(200, channelMessage('m1'));
      const id = notifications.enqueue(notification());

      worker.start();
      await vi.waitFor(() => expect(worker.getStatus().inFlight).toBe(1), { timeout: 1000 });
      await worker.stop();

      expect(notifications.getById(id)?.status).toBe('done');
      expect(messages.exists('m1')).toBe(true);
    });

    it('should return once the shutdown grace period expires', async () => {
      worker = createWorker({ shutdownGraceMs: 100 });
      nock(GRAPH_HOST)
        .get('/v1.0/teams/team-1/channels/channel-1/messages/m1')
        .delay(1000)
        .reply(200, channelMessage('m1'));
      const id = notifications.enqueue(notification());

      worker.start();
      await vi.waitFor(() => expect(worker.getStatus().inFlight).toBe(1), { timeout: 1000 });
      const stoppedAt = Date.now();
      await worker.stop();

      expect(Date.now() - stoppedAt).toBeLessThan(800);
      expect(worker.getStatus().running).toBe(false);
      expect(notifications.getById(id)?.status).toBe('processing');

      // The abandoned request still settles before the database closes
      await vi.waitFor(() => expect(notifications.getById(id)?.status).toBe('done'), {
        timeout: 3000,
      });
    });

    it('should recover rows left processing by an earlier run', async () => {
      const id = notifications.enqueue(notification({ changeType: 'deleted' }));
      notifications.claimBatch(1, Date.now() - 120_000);

      worker.start();

      await vi.waitFor(() => expect(notifications.getById(id)?.status).toBe('done'), {
        timeout: 2000,
      });
      expect(notifications.getById(id)?.attempts).toBe(1);
    });
  });
});
