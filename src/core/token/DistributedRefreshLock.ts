// src/core/token/DistributedRefreshLock.ts

import { createClient } from 'redis';
import { v4 as uuidv4 } from 'uuid';
import type { RefreshLock } from './types';
import type { Logger } from '../../observability/Logger';
import { errorMessage } from '../../utils/errors';

type RedisClient = ReturnType<typeof createClient>;

// Delete only when the lock still holds our token
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

export interface RefreshLockStatus {
  connected: boolean;
  mode: 'distributed' | 'local-only';
  healthy: boolean;
}

/**
 * Cross-instance refresh serialization over Redis `SET NX PX`.
 * Without a Redis URL (or when Redis cannot be reached) every acquire succeeds.
 */
export class DistributedRefreshLock implements RefreshLock {
  private redis?: RedisClient;
  private ready: Promise<void>;
  private connected = false;
  private held: Map<string, string> = new Map();
  private logger: Logger;

  constructor(
    redisUrl: string | undefined,
    logger: Logger,
    private lockTTL = 10_000
  ) {
    this.logger = logger;

    if (!redisUrl) {
      this.ready = Promise.resolve();
      return;
    }

    const client = createClient({
      url: redisUrl,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            this.logger.error('Redis reconnect failed after 10 attempts');
            return new Error('Max reconnect attempts reached');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });
    this.redis = client;

    client.on('error', (err: Error) => {
      this.logger.error('Redis client error', { error: err.message });
      this.connected = false;
    });
    client.on('ready', () => {
      this.connected = true;
    });
    client.on('end', () => {
      this.logger.warn('Redis disconnected');
      this.connected = false;
    });

    this.ready = client
      .connect()
      .then(() => {
        this.connected = true;
        this.logger.info('DistributedRefreshLock ready');
      })
      .catch((err: unknown) => {
        this.logger.error('Failed to connect to Redis for refresh lock', {
          error: errorMessage(err),
        });
        this.logger.warn('Distributed refresh locks disabled, running in local-only mode');
        this.redis = undefined;
      });
  }

  /**
   * Resolves once the initial connection attempt settled.
   */
  async initialize(): Promise<void> {
    await this.ready;
  }

  getConnectionStatus(): RefreshLockStatus {
    const distributed = this.redis !== undefined;
    return {
      connected: this.connected && distributed,
      mode: distributed ? 'distributed' : 'local-only',
      healthy: distributed ? this.connected : true,
    };
  }

  async tryAcquire(userId: string): Promise<boolean> {
    const redis = this.client();
    if (!redis) return true;

    const key = this.key(userId);
    const token = uuidv4();

    try {
      const result = await redis.set(key, token, { PX: this.lockTTL, NX: true });
      const acquired = result === 'OK';
      if (acquired) {
        this.held.set(userId, token);
      }
      this.logger.debug(
        acquired ? 'Acquired distributed refresh lock' : 'Distributed refresh lock already held',
        { userId }
      );
      return acquired;
    } catch (error: unknown) {
      this.logger.error('Failed to acquire distributed lock', {
        userId,
        error: errorMessage(error),
      });
      return true;
    }
  }

  /**
   * Poll until the lock is gone. The default deadline is the lock TTL, by which
   * time a crashed holder's lock has expired.
   */
  async waitForRelease(userId: string, timeoutMs: number = this.lockTTL): Promise<boolean> {
    const redis = this.client();
    if (!redis) return true;

    const key = this.key(userId);
    const startTime = Date.now();

    try {
      while (Date.now() - startTime < timeoutMs) {
        if (!(await redis.exists(key))) {
          this.logger.debug('Distributed lock released', { userId });
          return true;
        }
        await new Promise((resolve) => setTimeout(resolve, 100));
      }
      this.logger.warn('Timeout waiting for distributed lock release', { userId, timeoutMs });
    } catch (error: unknown) {
      this.logger.error('Error waiting for lock release', { userId, error: errorMessage(error) });
    }
    return false;
  }

  async release(userId: string): Promise<void> {
    const token = this.held.get(userId);
    this.held.delete(userId);

    const redis = this.client();
    if (!redis || !token) return;

    try {
      await redis.eval(RELEASE_SCRIPT, { keys: [this.key(userId)], arguments: [token] });
      this.logger.debug('Released distributed lock', { userId });
    } catch (error: unknown) {
      this.logger.error('Failed to release distributed lock', {
        userId,
        error: errorMessage(error),
      });
    }
  }

  async disconnect(): Promise<void> {
    const redis = this.redis;
    this.redis = undefined;
    if (!redis || !this.connected) return;

    try {
      await redis.quit();
      this.logger.info('DistributedRefreshLock disconnected');
    } catch (error: unknown) {
      this.logger.error('Error disconnecting Redis', { error: errorMessage(error) });
    } finally {
      this.connected = false;
    }
  }

  private client(): RedisClient | undefined {
    if (!this.redis) return undefined;
    if (!this.connected) {
      this.logger.warn('Redis not connected, skipping distributed lock');
      return undefined;
    }
    return this.redis;
  }

  private key(userId: string): string {
    return `refresh_lock:${userId}`;
  }
}
