// src/core/auth/AuthCore.ts

import { Issuer } from 'openid-client';
import type { BaseClient, TokenSet } from 'openid-client';
import { z } from 'zod';
import type { OAuthClientConfig, UserProfile } from './types';
import type { TokenGrant } from '../token/types';
import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import { OAuthConfigError, TokenExchangeError, TokenRefreshError, errorMessage } from '../../utils/errors';

const DEFAULT_AUTHORITY = 'https://login.microsoftonline.com';
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

const ProfileSchema = z.object({
  id: z.string().min(1),
  userPrincipalName: z.string().nullish(),
  mail: z.string().nullish(),
});

/**
 * Authorization-code and refresh grants against the identity platform,
 * plus the profile lookup that names the signed-in user.
 */
export class AuthCore {
  private client: BaseClient;
  private profileUrl: string;

  constructor(
    private config: OAuthClientConfig,
    apiBaseUrl: string,
    private http: HttpCore,
    private logger: Logger
  ) {
    if (config.scopes.length === 0) {
      throw new OAuthConfigError('At least one OAuth scope must be configured');
    }

    const authority = `${DEFAULT_AUTHORITY}/${encodeURIComponent(config.tenantId)}`;
    const issuer = new Issuer({
      issuer: `${authority}/v2.0`,
      authorization_endpoint: config.authorizationEndpoint ?? `${authority}/oauth2/v2.0/authorize`,
      token_endpoint: config.tokenEndpoint ?? `${authority}/oauth2/v2.0/token`,
      token_endpoint_auth_methods_supported: ['client_secret_post', 'client_secret_basic'],
    });

    this.client = new issuer.Client({
      client_id: config.clientId,
      client_secret: config.clientSecret,
      redirect_uris: [config.redirectUri],
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_post',
    });

    this.profileUrl = `${apiBaseUrl.replace(/\/+$/, '')}/me`;
  }

  createAuthUrl(state: string): string {
    const url = this.client.authorizationUrl({
      scope: this.config.scopes.join(' '),
      state,
      response_mode: 'query',
      prompt: 'select_account',
    });

    this.logger.debug('Created auth URL', { scopes: this.config.scopes });
    return url;
  }

  async exchangeCode(code: string, state: string): Promise<TokenGrant> {
    let tokenSet: TokenSet;
    try {
      tokenSet = await this.client.oauthCallback(this.config.redirectUri, { code, state }, { state });
    } catch (error: unknown) {
      this.logger.warn('Token exchange failed', { error: errorMessage(error) });
      throw new TokenExchangeError('Failed to exchange authorization code', {
        reason: errorMessage(error),
      });
    }

    this.logger.debug('Token exchange successful', {
      hasAccessToken: Boolean(tokenSet.access_token),
      hasRefreshToken: Boolean(tokenSet.refresh_token),
      expiresIn: tokenSet.expires_in,
    });

    return this.toGrant(tokenSet, (message) => new TokenExchangeError(message));
  }

  async refreshGrant(refreshToken: string): Promise<TokenGrant> {
    let tokenSet: TokenSet;
    try {
      tokenSet = await this.client.refresh(refreshToken);
    } catch (error: unknown) {
      this.logger.warn('Refresh grant rejected', { error: errorMessage(error) });
      throw new TokenRefreshError('Failed to refresh token', { reason: errorMessage(error) });
    }

    return this.toGrant(tokenSet, (message) => new TokenRefreshError(message));
  }

  async fetchProfile(accessToken: string): Promise<UserProfile> {
    try {
      const response = await this.http.get<unknown>(this.profileUrl, {
        headers: { Authorization: `Bearer ${accessToken}` },
      });
      const profile = ProfileSchema.parse(response.data);
      return {
        id: profile.id,
        email: profile.userPrincipalName ?? profile.mail ?? undefined,
      };
    } catch (error: unknown) {
      this.logger.warn('Profile lookup failed', { error: errorMessage(error) });
      throw new TokenExchangeError('Failed to resolve the signed-in user', {
        reason: errorMessage(error),
      });
    }
  }

  private toGrant(
    tokenSet: TokenSet,
    fail: (message: string) => Error
  ): TokenGrant {
    const accessToken = tokenSet.access_token;
    if (!accessToken) {
      throw fail('Token endpoint returned no access token');
    }

    const expiresAt =
      tokenSet.expires_at !== undefined
        ? new Date(tokenSet.expires_at * 1000)
        : new Date(Date.now() + DEFAULT_EXPIRES_IN_SECONDS * 1000);

    return {
      accessToken,
      refreshToken: tokenSet.refresh_token,
      expiresAt,
      scope: tokenSet.scope,
    };
  }
}
