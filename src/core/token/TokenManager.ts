// src/core/token/TokenManager.ts

import { generators } from 'openid-client';
import type { AuthCore } from '../auth/AuthCore';
import type { StateSigner } from '../auth/StateSigner';
import { secureEqual } from '../auth/StateSigner';
import type { AuthorizationCallback, AuthorizationRequest } from '../auth/types';
import type { GetTokenOptions, TokenSource } from '../http/types';
import type { SessionStore } from './SessionStore';
import { SingleFlight } from './SingleFlight';
import type { OAuthSession, RefreshLock } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { addSpanEvent, withOAuthSpan, withSpan } from '../../observability/tracing';
import {
  InvalidSignatureError,
  InvalidStateError,
  NoSessionError,
  TokenExchangeError,
  TokenRefreshError,
  errorMessage,
} from '../../utils/errors';

export interface TokenManagerOptions {
  refreshMarginSeconds?: number;
  lock?: RefreshLock;
}

/**
 * Owns the delegated session of every signed-in user: the authorization
 * handshake, token hand-out and refresh.
 *
 * At most one refresh per user runs in this process; with a RefreshLock,
 * at most one across instances.
 */
export class TokenManager implements TokenSource {
  private flights = new SingleFlight<OAuthSession>();
  private refreshMarginMs: number;
  private lock?: RefreshLock;

  constructor(
    private auth: AuthCore,
    private signer: StateSigner,
    private sessions: SessionStore,
    private logger: Logger,
    private metrics: MetricsCollector,
    options: TokenManagerOptions = {}
  ) {
    this.refreshMarginMs = (options.refreshMarginSeconds ?? 60) * 1000;
    this.lock = options.lock;
  }

  beginAuthorization(): AuthorizationRequest {
    const state = generators.state();
    return {
      authorizationUrl: this.auth.createAuthUrl(state),
      state,
      signature: this.signer.sign(state),
    };
  }

  /**
   * Validate the callback against the signed state cookie, exchange the code and store the session.
   *
   * @throws {InvalidStateError} state missing or different from the cookie
   * @throws {InvalidSignatureError} cookie signature does not match the state
   * @throws {TokenExchangeError} code exchange or profile lookup failed
   */
  async completeAuthorization(callback: AuthorizationCallback): Promise<OAuthSession> {
    return withSpan('OAuth callback', async () => {
      const { state, cookieState, signature, code } = callback;

      if (!state || !cookieState || !secureEqual(state, cookieState)) {
        throw new InvalidStateError();
      }
      if (!signature || !this.signer.verify(state, signature)) {
        throw new InvalidSignatureError();
      }
      if (!code) {
        throw new TokenExchangeError('Authorization code missing from callback');
      }

      const grant = await this.auth.exchangeCode(code, state);
      const profile = await this.auth.fetchProfile(grant.accessToken);
      const now = new Date();

      const session: OAuthSession = {
        userId: profile.id,
        email: profile.email,
        accessToken: grant.accessToken,
        accessTokenExpiresAt: grant.expiresAt,
        refreshToken: grant.refreshToken,
        acquiredAt: now,
        updatedAt: now,
      };

      await this.sessions.save(session);
      this.logger.info('User authorized', { userId: session.userId, email: session.email });
      return session;
    });
  }

  async getValidToken(userId: string, opts: GetTokenOptions = {}): Promise<string> {
    const session = await this.sessions.get(userId);
    if (!session) {
      throw new NoSessionError(userId);
    }

    if (!opts.forceRefresh && !this.isExpiring(session)) {
      return session.accessToken;
    }

    if (this.flights.has(userId)) {
      this.metrics.incrementCounter('token_refresh_dedup_local');
      addSpanEvent('token.refresh.joined', { 'token.user_id': userId });
      this.logger.debug('Joining in-flight refresh', { userId });
    }

    const refreshed = await this.flights.run(userId, () => this.refreshInFlight(userId, opts));
    return refreshed.accessToken;
  }

  async revoke(userId: string): Promise<void> {
    await this.sessions.delete(userId);
  }

  async getSession(userId: string): Promise<OAuthSession | null> {
    return this.sessions.get(userId);
  }

  private isExpiring(session: OAuthSession, now: number = Date.now()): boolean {
    return session.accessTokenExpiresAt.getTime() - now <= this.refreshMarginMs;
  }

  /**
   * A stored token that is fresh and is not the one the caller saw rejected
   * means someone else already refreshed.
   */
  private alreadyRefreshed(session: OAuthSession, opts: GetTokenOptions): boolean {
    if (this.isExpiring(session)) return false;
    if (!opts.forceRefresh) return true;
    return opts.rejectedToken !== undefined && session.accessToken !== opts.rejectedToken;
  }

  private async refreshInFlight(userId: string, opts: GetTokenOptions): Promise<OAuthSession> {
    // Re-read inside the flight: the refresh token may have rotated since the caller looked.
    const current = await this.sessions.get(userId);
    if (!current) {
      throw new NoSessionError(userId);
    }
    if (this.alreadyRefreshed(current, opts)) {
      return current;
    }

    const lock = this.lock;
    if (!lock) {
      return this.executeRefresh(current);
    }

    let latest = current;
    if (!(await lock.tryAcquire(userId))) {
      this.metrics.incrementCounter('token_refresh_dedup_distributed');
      const released = await lock.waitForRelease(userId);

      const after = await this.sessions.get(userId);
      if (!after) {
        throw new TokenRefreshError(`Session for user ${userId} ended during refresh`, { userId });
      }
      if (after.accessToken !== current.accessToken && !this.isExpiring(after)) {
        return after;
      }

      // The holder gave up or crashed; refresh from the stored session, which
      // carries any refresh token it rotated.
      if (!(await lock.tryAcquire(userId))) {
        this.logger.warn('Refresh still held by another instance', { userId, released });
        throw new TokenRefreshError(
          `Refresh for user ${userId} is still in progress on another instance`,
          { userId }
        );
      }
      this.logger.warn('Distributed refresh did not produce a new token, refreshing locally', {
        userId,
      });
      latest = after;
    }

    try {
      return await this.executeRefresh(latest);
    } finally {
      await lock.release(userId);
    }
  }

  private async executeRefresh(session: OAuthSession): Promise<OAuthSession> {
    const { userId } = session;

    return withOAuthSpan('refresh', userId, async () => {
      const startTime = Date.now();

      try {
        if (!session.refreshToken) {
          throw new TokenRefreshError('Session has no refresh token', { userId });
        }

        const grant = await this.auth.refreshGrant(session.refreshToken);
        const updated = await this.sessions.update(userId, {
          accessToken: grant.accessToken,
          accessTokenExpiresAt: grant.expiresAt,
          refreshToken: grant.refreshToken,
        });
        if (!updated) {
          throw new NoSessionError(userId);
        }

        this.metrics.incrementCounter('token_refresh_total', { status: 'success' });
        this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
          status: 'success',
        });
        return updated;
      } catch (error: unknown) {
        if (error instanceof NoSessionError) {
          throw error;
        }

        this.metrics.incrementCounter('token_refresh_total', { status: 'failure' });
        this.metrics.incrementCounter('token_refresh_failures', {
          errorType: error instanceof Error ? error.name : 'unknown',
        });
        this.metrics.recordLatency('token_refresh_duration', Date.now() - startTime, {
          status: 'failure',
        });

        // A rejected refresh token will not work later either; the user has to sign in again.
        await this.sessions.delete(userId);
        this.logger.warn('Token refresh failed, session removed', {
          userId,
          error: errorMessage(error),
        });

        throw new TokenRefreshError(`Token refresh failed for user ${userId}`, {
          userId,
          reason: errorMessage(error),
        });
      }
    });
  }
}
