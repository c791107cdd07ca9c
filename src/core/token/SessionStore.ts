// src/core/token/SessionStore.ts

import type Keyv from 'keyv';
import { EventEmitter } from 'events';
import { z } from 'zod';
import type { OAuthSession, SessionRefresh, SessionStoreConfig } from './types';
import { TokenEncryption } from './TokenEncryption';
import type { Logger } from '../../observability/Logger';
import { withTokenSpan } from '../../observability/tracing';
import { createKeyv } from '../../storage/keyv';

const StoredSessionSchema = z.object({
  userId: z.string(),
  email: z.string().optional(),
  accessToken: z.string(),
  accessTokenExpiresAt: z.coerce.date(),
  refreshToken: z.string().optional(),
  acquiredAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

/**
 * Persists delegated sessions keyed by user id.
 *
 * Emits `sessionSaved`, `sessionRefreshed` and `sessionDeleted` with `{ userId }`.
 */
export class SessionStore extends EventEmitter {
  private store: Keyv<string>;
  private encryption?: TokenEncryption;
  private logger: Logger;

  constructor(config: SessionStoreConfig, logger: Logger) {
    super();
    this.logger = logger;
    this.store = createKeyv(config, config.namespace ?? 'sessions');

    this.store.on('error', (error: unknown) => {
      this.logger.error('Session store backend error', {
        backend: config.backend,
        error: error instanceof Error ? error.message : String(error),
      });
    });

    if (config.encryption) {
      this.encryption = new TokenEncryption(config.encryption.key, config.encryption.previousKeys);
    }
  }

  async get(userId: string): Promise<OAuthSession | null> {
    const raw = await this.store.get(userId);
    if (raw === undefined) {
      this.logger.debug('Session not found', { userId });
      return null;
    }

    const json = this.encryption ? this.encryption.decrypt(raw) : raw;
    const parsed = StoredSessionSchema.safeParse(JSON.parse(json));
    if (!parsed.success) {
      this.logger.error('Stored session is malformed, discarding', { userId });
      await this.store.delete(userId);
      return null;
    }
    return parsed.data;
  }

  async save(session: OAuthSession): Promise<void> {
    return withTokenSpan('save', session.userId, async () => {
      await this.write(session);

      this.logger.info('Session saved', {
        userId: session.userId,
        expiresAt: session.accessTokenExpiresAt.toISOString(),
      });
      this.emit('sessionSaved', { userId: session.userId });
    });
  }

  /**
   * Replace the token material of an existing session after a refresh grant.
   * A refresh response without a new refresh token keeps the previous one.
   */
  async update(userId: string, refresh: SessionRefresh): Promise<OAuthSession | null> {
    return withTokenSpan('update', userId, async () => {
      const existing = await this.get(userId);
      if (!existing) {
        this.logger.warn('Session disappeared during refresh', { userId });
        return null;
      }

      const updated: OAuthSession = {
        ...existing,
        accessToken: refresh.accessToken,
        accessTokenExpiresAt: refresh.accessTokenExpiresAt,
        refreshToken: refresh.refreshToken ?? existing.refreshToken,
        updatedAt: new Date(),
      };
      await this.write(updated);

      this.logger.info('Session refreshed', {
        userId,
        expiresAt: updated.accessTokenExpiresAt.toISOString(),
      });
      this.emit('sessionRefreshed', { userId });
      return updated;
    });
  }

  async delete(userId: string): Promise<void> {
    await this.store.delete(userId);
    this.logger.info('Session deleted', { userId });
    this.emit('sessionDeleted', { userId });
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private async write(session: OAuthSession): Promise<void> {
    const json = JSON.stringify(session);
    await this.store.set(session.userId, this.encryption ? this.encryption.encrypt(json) : json);
  }
}
