// src/config/env.ts

import { validateConfig } from './ConfigValidator';
import type { AppConfig } from './ConfigValidator';

export const DEFAULT_SCOPES = ['offline_access', 'User.Read', 'Chat.Read', 'ChannelMessage.Read.All'];

function num(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
}

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value === '1' || value.toLowerCase() === 'true';
}

function list(value: string | undefined, separator: RegExp): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function optional(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Build the service configuration from environment variables and validate it.
 * Call `dotenv.config()` first when a .env file should be honoured.
 *
 * @throws {z.ZodError} When a required variable is missing or malformed
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = num(env.PORT, 3000);
  const publicBaseUrl = optional(env.PUBLIC_BASE_URL);
  const encryptionKey = optional(env.ENCRYPTION_KEY);

  return validateConfig({
    server: {
      port,
      webhookPath: env.WEBHOOK_PATH ?? '/notifications',
      publicBaseUrl,
    },
    oauth: {
      tenantId: env.TENANT_ID ?? 'common',
      clientId: env.CLIENT_ID,
      clientSecret: env.CLIENT_SECRET,
      redirectUri:
        env.REDIRECT_URI ?? `${publicBaseUrl ?? `http://localhost:${port}`}/auth/callback`,
      scopes: list(env.OAUTH_SCOPES, /[\s,]+/) ?? DEFAULT_SCOPES,
      authorizationEndpoint: optional(env.AUTHORIZATION_ENDPOINT),
      tokenEndpoint: optional(env.TOKEN_ENDPOINT),
      stateSecret: env.STATE_SECRET,
      refreshMarginSeconds: num(env.TOKEN_REFRESH_MARGIN_SECONDS, 60),
    },
    graph: {
      baseUrl: env.GRAPH_BASE_URL ?? 'https://graph.microsoft.com/v1.0',
      timeoutMs: num(env.GRAPH_TIMEOUT_MS, 10_000),
      retry: {
        maxRetries: num(env.GRAPH_MAX_RETRIES, 4),
        baseDelay: num(env.GRAPH_RETRY_BASE_MS, 500),
        maxDelay: num(env.GRAPH_RETRY_MAX_MS, 30_000),
      },
      rateLimit: {
        qps: num(env.GRAPH_QPS, 10),
        concurrency: num(env.GRAPH_CONCURRENCY, 4),
      },
    },
    notifications: {
      clientState: env.NOTIFICATION_CLIENT_STATE,
      defaultOwnerUserId: optional(env.DEFAULT_OWNER_USER_ID),
    },
    worker: {
      pollIntervalMs: num(env.WORKER_POLL_INTERVAL_MS, 5_000),
      batchSize: num(env.WORKER_BATCH_SIZE, 10),
      concurrency: num(env.WORKER_CONCURRENCY, 4),
      maxAttempts: num(env.WORKER_MAX_ATTEMPTS, 5),
      retryBaseDelayMs: num(env.WORKER_RETRY_BASE_MS, 5_000),
      staleLockMs: num(env.WORKER_STALE_LOCK_MS, 300_000),
      shutdownGraceMs: num(env.WORKER_SHUTDOWN_GRACE_MS, 30_000),
    },
    database: {
      path: env.DATABASE_PATH ?? 'ingestor.db',
    },
    sessionStore: {
      backend: env.SESSION_STORE_BACKEND ?? 'memory',
      url: optional(env.SESSION_STORE_URL),
      encryption: encryptionKey
        ? {
            key: encryptionKey,
            previousKeys: list(env.ENCRYPTION_PREVIOUS_KEYS, /,/),
            algorithm: 'aes-256-gcm',
          }
        : undefined,
    },
    redisUrl: optional(env.REDIS_URL),
    metrics: {
      enabled: bool(env.METRICS_ENABLED, true),
      port: env.METRICS_PORT ? num(env.METRICS_PORT, 9464) : undefined,
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
      format: env.LOG_FORMAT ?? 'json',
    },
  });
}
