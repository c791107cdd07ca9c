// src/core/token/types.ts

export interface OAuthSession {
  userId: string;
  email?: string;
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken?: string;
  acquiredAt: Date;
  updatedAt: Date;
}

/**
 * Result of a code exchange or refresh grant.
 */
export interface TokenGrant {
  accessToken: string;
  refreshToken?: string;
  expiresAt: Date;
  scope?: string;
}

export interface SessionRefresh {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken?: string;
}

/**
 * Cross-instance guard around a user's refresh.
 */
export interface RefreshLock {
  tryAcquire(userId: string): Promise<boolean>;
  /** Resolves true once the lock is free, false if it is still held at the deadline. */
  waitForRelease(userId: string): Promise<boolean>;
  release(userId: string): Promise<void>;
}

export interface SessionStoreConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  namespace?: string;
  encryption?: {
    key: string;
    previousKeys?: string[];
    algorithm: 'aes-256-gcm';
  };
}
