// tests/helpers/fixtures.ts

import type { Server } from 'http';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { openDatabase } from '../../src/storage/Database';
import type { SqliteDatabase } from '../../src/storage/Database';

export const TENANT_ID = 'test-tenant';
export const LOGIN_HOST = 'https://login.microsoftonline.com';
export const TOKEN_PATH = `/${TENANT_ID}/oauth2/v2.0/token`;
export const GRAPH_HOST = 'https://graph.microsoft.com';
export const GRAPH_BASE_URL = `${GRAPH_HOST}/v1.0`;

export const CLIENT_STATE = 'test-client-state';
export const STATE_SECRET = 'test-state-secret-0123456789';

export function createTestLogger(): Logger {
  return new Logger({ level: 'error', silent: true });
}

export function createTestMetrics(): MetricsCollector {
  return new MetricsCollector({ enabled: true });
}

export function createTestDatabase(): SqliteDatabase {
  return openDatabase(':memory:');
}

export const oauthSettings = {
  tenantId: TENANT_ID,
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:3000/auth/callback',
  scopes: ['offline_access', 'User.Read', 'Chat.Read'],
};

/**
 * A complete, valid service configuration backed by in-memory stores.
 */
export function createTestConfig() {
  return {
    server: { port: 0, webhookPath: '/notifications' },
    oauth: { ...oauthSettings, stateSecret: STATE_SECRET, refreshMarginSeconds: 60 },
    graph: {
      baseUrl: GRAPH_BASE_URL,
      timeoutMs: 2000,
      retry: { maxRetries: 2, baseDelay: 1, maxDelay: 5 },
      rateLimit: { qps: 100, concurrency: 4 },
    },
    notifications: { clientState: CLIENT_STATE, defaultOwnerUserId: 'user-1' },
    worker: {
      pollIntervalMs: 50,
      batchSize: 10,
      concurrency: 2,
      maxAttempts: 3,
      retryBaseDelayMs: 0,
      staleLockMs: 60_000,
      shutdownGraceMs: 1000,
    },
    database: { path: ':memory:' },
    sessionStore: { backend: 'memory' as const },
    metrics: { enabled: true },
    logging: { level: 'error' as const, silent: true },
  };
}

export function channelMessage(id: string, overrides: Record<string, unknown> = {}) {
  return {
    '@odata.context': `${GRAPH_BASE_URL}/$metadata#teams('team-1')/channels('channel-1')/messages/$entity`,
    id,
    createdDateTime: '2024-03-01T09:15:00Z',
    channelIdentity: { teamId: 'team-1', channelId: 'channel-1' },
    from: { user: { id: 'sender-1', displayName: 'Ada Lovelace' } },
    body: { contentType: 'html', content: '<p>Build <b>passed</b></p>' },
    mentions: [],
    attachments: [],
    ...overrides,
  };
}

export function baseUrlOf(server: Server): string {
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}
